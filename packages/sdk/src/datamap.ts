/**
 * Insertion-ordered entry store with a (language, name) reverse index
 *
 * Invariants:
 * - Ids are unique; entries iterate in insertion order regardless of id value
 * - The reverse index holds exactly the (language, name) pairs of current entries
 * - Auto-generated ids are strictly greater than every id used so far
 * - A failed addWithId leaves the map unchanged
 */

import type {
  DataMapOptions,
  DataMapStats,
  NameCollisionPolicy,
  NameIndexOwner,
  NameTranslations,
  RawFields,
} from "./types.js";
import { DataRow } from "./row.js";
import { NameSet } from "./name-set.js";
import { DuplicateKeyError, KeyNotFoundError, MissingFieldError } from "./errors.js";
import { parseEntryId, parseNameTranslations } from "./schemas.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

export class DataMap implements Iterable<number> {
  #entries = new Map<number, DataRow>();
  // language -> name -> id
  #reverse = new Map<string, Map<string, number>>();
  #nextId = 1;
  #highestId = 0;
  #onNameCollision: NameCollisionPolicy;
  #owner: NameIndexOwner;

  constructor(initial?: Iterable<readonly [number, RawFields]>, options: DataMapOptions = {}) {
    this.#onNameCollision = options.onNameCollision ?? "error";
    this.#owner = {
      renameEntry: (row, next) => this.#renameEntry(row, next),
    };

    if (initial) {
      for (const [id, fields] of initial) {
        this.addWithId(id, fields);
      }
    }
  }

  get size(): number {
    return this.#entries.size;
  }

  /**
   * Id of the entry named `name` in `languageCode`, if any
   */
  idOf(languageCode: string, name: string): number | undefined {
    const byName = this.#reverse.get(languageCode);
    // Counters are kept only for languages some entry uses
    if (!byName) {
      metrics.recordUnknownLanguage();
      return undefined;
    }

    const id = byName.get(name);
    if (id === undefined) {
      metrics.recordMiss(languageCode);
    } else {
      metrics.recordHit(languageCode);
    }
    return id;
  }

  /**
   * Entry named `name` in `languageCode`, if any
   */
  entryOf(languageCode: string, name: string): DataRow | undefined {
    const id = this.idOf(languageCode, name);
    return id === undefined ? undefined : this.#entries.get(id);
  }

  /**
   * Add an entry under an explicit id. Ids above every id seen so far
   * move the generator past them.
   *
   * @throws InvalidEntryError if the id is not a non-negative integer or the name map is malformed
   * @throws DuplicateKeyError if the id or one of the names is already taken
   * @throws MissingFieldError if there is no `name` field
   */
  addWithId(id: number, fields: RawFields): DataRow {
    const entryId = parseEntryId(id);

    if (this.#entries.has(entryId)) {
      throw DuplicateKeyError.forId(entryId);
    }

    if (!Object.hasOwn(fields, "name")) {
      throw new MissingFieldError("name", `Entry ${entryId} is missing required field "name"`);
    }

    const names = parseNameTranslations(fields.name);
    this.#checkNames(entryId, names);

    const row = new DataRow(entryId, { ...fields, name: names }, this.#owner);
    this.#indexNames(entryId, names);
    this.#entries.set(entryId, row);

    if (entryId > this.#highestId) {
      this.#highestId = entryId;
      this.#nextId = entryId + 1;
    }

    metrics.recordInsert();
    logger.debug("datamap.entry.add", { id: entryId, languages: Object.keys(names) });

    return row;
  }

  /**
   * Add an entry under the next generated id. The id is consumed even
   * when the insertion fails.
   */
  insert(fields: RawFields): DataRow {
    const id = this.#nextId;
    this.#nextId += 1;
    return this.addWithId(id, fields);
  }

  /**
   * Insert entries in order. Not atomic: entries inserted before a
   * failure stay in the map.
   */
  extend(entries: Iterable<RawFields>): DataRow[] {
    const rows: DataRow[] = [];
    for (const fields of entries) {
      rows.push(this.insert(fields));
    }
    return rows;
  }

  /**
   * Remove an entry and its names from the reverse index.
   * The id generator is not rewound.
   *
   * @throws KeyNotFoundError if there is no entry with this id
   */
  remove(id: number): DataRow {
    const row = this.get(id);
    this.#unindexNames(id, row.translations);
    this.#entries.delete(id);

    metrics.recordRemoval();
    logger.debug("datamap.entry.remove", { id });

    return row;
  }

  /**
   * Lazy view of every name in one language
   */
  names(languageCode: string): NameSet {
    return new NameSet(this, languageCode);
  }

  /**
   * @throws KeyNotFoundError if there is no entry with this id
   */
  get(id: number): DataRow {
    const row = this.#entries.get(id);
    if (!row) {
      throw new KeyNotFoundError(id, `No entry with id ${id}`);
    }
    return row;
  }

  has(id: number): boolean {
    return this.#entries.has(id);
  }

  keys(): IterableIterator<number> {
    return this.#entries.keys();
  }

  values(): IterableIterator<DataRow> {
    return this.#entries.values();
  }

  entries(): IterableIterator<[number, DataRow]> {
    return this.#entries.entries();
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this.keys();
  }

  stats(): DataMapStats {
    let names = 0;
    for (const byName of this.#reverse.values()) {
      names += byName.size;
    }
    return {
      entries: this.#entries.size,
      names,
      languages: [...this.#reverse.keys()],
    };
  }

  #checkNames(id: number, names: NameTranslations): void {
    if (this.#onNameCollision === "overwrite") return;

    for (const [language, name] of Object.entries(names)) {
      const ownerId = this.#reverse.get(language)?.get(name);
      if (ownerId !== undefined && ownerId !== id) {
        throw DuplicateKeyError.forName(language, name, ownerId);
      }
    }
  }

  #indexNames(id: number, names: NameTranslations): void {
    for (const [language, name] of Object.entries(names)) {
      let byName = this.#reverse.get(language);
      if (!byName) {
        byName = new Map();
        this.#reverse.set(language, byName);
      }

      const ownerId = byName.get(name);
      if (ownerId !== undefined && ownerId !== id) {
        logger.warn("datamap.name.overwrite", { id, language, name, previousId: ownerId });
      }
      byName.set(name, id);
    }
  }

  #unindexNames(id: number, names: NameTranslations): void {
    for (const [language, name] of Object.entries(names)) {
      const byName = this.#reverse.get(language);
      // Under "overwrite" the pair may belong to another entry by now
      if (!byName || byName.get(name) !== id) continue;

      byName.delete(name);
      if (byName.size === 0) {
        this.#reverse.delete(language);
      }
    }
  }

  #renameEntry(row: DataRow, next: unknown): NameTranslations {
    const names = parseNameTranslations(next);

    // A removed row stays detached, even once its id belongs to a new entry
    if (this.#entries.get(row.id) !== row) {
      return names;
    }

    this.#checkNames(row.id, names);
    this.#unindexNames(row.id, row.translations);
    this.#indexNames(row.id, names);
    return names;
  }
}
