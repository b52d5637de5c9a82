/**
 * Load a data file into a DataMap
 *
 * Accepted shapes:
 * - an object keyed by id: { "1": { "name": { "en": "Fire" } } }
 * - an array of entries, given ids 1, 2, ... in order
 */

import { z } from "zod";
import {
  DataMap,
  MissingFieldError,
  RawFieldsSchema,
  formatIssues,
  type DataMapOptions,
} from "@datamap/sdk";
import { readJsonFromFile } from "./io.js";
import { CliError } from "./errors.js";

const EntryListSchema = z.array(RawFieldsSchema);
const EntryTableSchema = z.record(z.string().regex(/^\d+$/, "id must be a non-negative integer"), RawFieldsSchema);

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireName(fields: unknown, label: string, source: string): void {
  if (isObject(fields) && !Object.hasOwn(fields, "name")) {
    throw new MissingFieldError("name", `${label} in ${source} is missing required field "name"`);
  }
}

/**
 * Build a DataMap from parsed JSON
 * @throws MissingFieldError if an entry has no `name`
 * @throws CliError if the content has neither accepted shape
 */
export function buildDataMap(content: unknown, source: string, options: DataMapOptions = {}): DataMap {
  if (Array.isArray(content)) {
    content.forEach((fields: unknown, index) => requireName(fields, `Entry at index ${index}`, source));
    const result = EntryListSchema.safeParse(content);
    if (!result.success) {
      throw new CliError(`Invalid data in ${source}: ${formatIssues(result.error)}`);
    }
    const map = new DataMap(undefined, options);
    map.extend(result.data);
    return map;
  }

  if (isObject(content)) {
    for (const [id, fields] of Object.entries(content)) {
      requireName(fields, `Entry ${id}`, source);
    }
  }

  const result = EntryTableSchema.safeParse(content);
  if (!result.success) {
    throw new CliError(`Invalid data in ${source}: ${formatIssues(result.error)}`);
  }
  // Integer-like keys iterate in ascending order
  return new DataMap(
    Object.entries(result.data).map(([id, fields]) => [Number(id), fields] as const),
    options
  );
}

/**
 * Read a JSON data file into a DataMap
 */
export async function loadDataMap(filePath: string, options: DataMapOptions = {}): Promise<DataMap> {
  const content = await readJsonFromFile(filePath);
  return buildDataMap(content, `file ${filePath}`, options);
}
