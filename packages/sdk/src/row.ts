/**
 * A single entry of a DataMap
 *
 * Invariants:
 * - The id never changes after construction
 * - Fields keep insertion order; new fields are appended
 * - A `name` field always exists; changes to it go through the owning map
 */

import type { FieldValue, NameIndexOwner, NameTranslations, RawFields } from "./types.js";
import { KeyNotFoundError, MissingFieldError } from "./errors.js";

const NAME_FIELD = "name";

export class DataRow implements Iterable<[string, FieldValue]> {
  readonly #id: number;
  readonly #owner: NameIndexOwner;
  #fields: Map<string, FieldValue>;
  #names: NameTranslations;

  /**
   * Rows are created by DataMap; use DataMap.insert or DataMap.addWithId
   */
  constructor(id: number, fields: RawFields, owner: NameIndexOwner) {
    if (!Object.hasOwn(fields, NAME_FIELD)) {
      throw new MissingFieldError(NAME_FIELD, `Entry ${id} is missing required field "name"`);
    }
    this.#id = id;
    this.#owner = owner;
    this.#fields = new Map(Object.entries(fields));
    this.#names = fields.name;
  }

  get id(): number {
    return this.#id;
  }

  /**
   * Number of fields
   */
  get size(): number {
    return this.#fields.size;
  }

  /**
   * The `name` field as a language -> display string map
   */
  get translations(): NameTranslations {
    return this.#names;
  }

  has(field: string): boolean {
    return this.#fields.has(field);
  }

  /**
   * @throws KeyNotFoundError if the field is absent
   */
  get(field: string): FieldValue {
    const value = this.#fields.get(field);
    if (value === undefined) {
      throw new KeyNotFoundError(field, `Entry ${this.#id} has no field "${field}"`);
    }
    return value;
  }

  /**
   * Insert or overwrite a field. New fields go to the end.
   */
  set(field: string, value: FieldValue): this {
    this.#fields.set(field, this.#prepare(field, value));
    return this;
  }

  /**
   * Set a field and place it immediately after another one.
   *
   * Fields following `after` are captured before the write and moved back
   * behind `field` in their original order. When `after` is not a field of
   * this entry (or is `field` itself) this is a plain `set`.
   */
  setAfter(field: string, value: FieldValue, after: string): this {
    if (field === after || !this.#fields.has(after)) {
      return this.set(field, value);
    }

    const following: string[] = [];
    let found = false;
    for (const key of this.#fields.keys()) {
      if (found) {
        if (key !== field) following.push(key);
      } else if (key === after) {
        found = true;
      }
    }

    const stored = this.#prepare(field, value);
    this.#fields.delete(field);
    this.#fields.set(field, stored);

    for (const key of following) {
      this.#moveToEnd(key);
    }
    return this;
  }

  /**
   * @throws KeyNotFoundError if the field is absent
   * @throws MissingFieldError when deleting `name`
   */
  delete(field: string): void {
    if (field === NAME_FIELD) {
      throw new MissingFieldError(
        NAME_FIELD,
        `Cannot delete required field "name" from entry ${this.#id}`
      );
    }
    if (!this.#fields.delete(field)) {
      throw new KeyNotFoundError(field, `Entry ${this.#id} has no field "${field}"`);
    }
  }

  /**
   * Name of this entry in one language
   * @throws KeyNotFoundError if there is no translation for the language
   */
  name(languageCode: string): string {
    const value = Object.hasOwn(this.#names, languageCode) ? this.#names[languageCode] : undefined;
    if (value === undefined) {
      throw new KeyNotFoundError(
        languageCode,
        `Entry ${this.#id} has no name in language "${languageCode}"`
      );
    }
    return value;
  }

  /**
   * All (language, name) pairs in stored order
   */
  *names(): IterableIterator<[string, string]> {
    yield* Object.entries(this.#names);
  }

  fields(): IterableIterator<string> {
    return this.#fields.keys();
  }

  entries(): IterableIterator<[string, FieldValue]> {
    return this.#fields.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, FieldValue]> {
    return this.entries();
  }

  toJSON(): { [field: string]: FieldValue } {
    return Object.fromEntries(this.#fields);
  }

  #prepare(field: string, value: FieldValue): FieldValue {
    if (field !== NAME_FIELD) {
      return value;
    }
    const names = this.#owner.renameEntry(this, value);
    this.#names = names;
    return names;
  }

  #moveToEnd(field: string): void {
    const value = this.#fields.get(field);
    if (value === undefined) return;
    this.#fields.delete(field);
    this.#fields.set(field, value);
  }
}
