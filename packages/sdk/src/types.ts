/**
 * Core types for datamap
 */

import type { DataRow } from "./row.js";

/**
 * A field value: scalars, nested mappings, or sequences of the same
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * Display names of one entry, keyed by language code
 * @example { en: "Fire", ja: "火" }
 */
export type NameTranslations = Readonly<Record<string, string>>;

/**
 * Raw fields for one entry, as handed over by a loader.
 * Every field other than `name` is opaque payload.
 */
export interface RawFields {
  name: NameTranslations;
  [field: string]: FieldValue;
}

/**
 * Policy for a (language, name) pair already claimed by another entry
 * - "error": reject the write with DuplicateKeyError
 * - "overwrite": reassign the pair to the entry being written
 */
export type NameCollisionPolicy = "error" | "overwrite";

/**
 * Options for creating a DataMap
 */
export interface DataMapOptions {
  /** How to handle (language, name) collisions across entries (default: "error") */
  onNameCollision?: NameCollisionPolicy;
}

/**
 * Counters describing a DataMap
 */
export interface DataMapStats {
  /** Number of entries */
  entries: number;
  /** Number of (language, name) pairs in the reverse index */
  names: number;
  /** Distinct language codes in the reverse index */
  languages: string[];
}

/**
 * Hook a row uses to route name changes through the map that owns it.
 * The owner validates and re-indexes, then returns the names to store.
 * Rows the owner no longer holds are validated but never re-indexed.
 */
export interface NameIndexOwner {
  renameEntry(row: DataRow, next: unknown): NameTranslations;
}
