/**
 * Unit tests for datamap errors
 */

import { describe, it, expect } from "vitest";
import {
  DataMapError,
  DuplicateKeyError,
  InvalidEntryError,
  KeyNotFoundError,
  MissingFieldError,
} from "./errors.js";

describe("errors", () => {
  it("should expose stable names and codes", () => {
    const cases: Array<[DataMapError, string, string]> = [
      [new MissingFieldError("name"), "MissingFieldError", "E_MISSING_FIELD"],
      [DuplicateKeyError.forId(3), "DuplicateKeyError", "E_DUPLICATE_KEY"],
      [new KeyNotFoundError(7), "KeyNotFoundError", "E_KEY_NOT_FOUND"],
      [new InvalidEntryError("bad"), "InvalidEntryError", "E_INVALID_ENTRY"],
    ];

    for (const [error, name, code] of cases) {
      expect(error).toBeInstanceOf(DataMapError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it("should build default messages", () => {
    expect(new MissingFieldError("name").message).toBe('Entry is missing required field "name"');
    expect(new KeyNotFoundError(7).message).toBe("Key not found: 7");
    expect(DuplicateKeyError.forName("en", "Fire", 1).message).toBe(
      'Name "Fire" (en) is already used by entry 1'
    );
  });

  it("should keep the missing key", () => {
    expect(new KeyNotFoundError("ja").key).toBe("ja");
    expect(new MissingFieldError("name").field).toBe("name");
  });

  it("should support cause", () => {
    const cause = new Error("underlying");
    const error = new KeyNotFoundError(1, "No entry with id 1", { cause });
    expect(error.cause).toBe(cause);
  });
});
