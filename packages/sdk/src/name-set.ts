/**
 * Set-like view over the names of a DataMap in a single language
 */

import type { DataMap } from "./datamap.js";

export class NameSet implements Iterable<string> {
  readonly #map: DataMap;
  readonly languageCode: string;

  constructor(map: DataMap, languageCode: string) {
    this.#map = map;
    this.languageCode = languageCode;
  }

  has(name: string): boolean {
    return this.#map.entryOf(this.languageCode, name) !== undefined;
  }

  /**
   * Names in entry order, computed on each pass.
   * Throws KeyNotFoundError on reaching an entry without this language.
   */
  *[Symbol.iterator](): Iterator<string> {
    for (const row of this.#map.values()) {
      yield row.name(this.languageCode);
    }
  }
}
