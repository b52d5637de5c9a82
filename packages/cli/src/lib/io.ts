/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read data file: ${filePath}`, { cause: err });
  }
  return parseJson(content, `file ${filePath}`);
}
