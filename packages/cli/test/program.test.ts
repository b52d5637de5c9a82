/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommanderError } from "commander";
import { DuplicateKeyError, KeyNotFoundError, MissingFieldError } from "@datamap/sdk";
import { createProgram } from "../src/program.js";
import { CliError, mapSdkErrorToExitCode } from "../src/lib/errors.js";

const DATA = {
  "1": { name: { en: "Fire", ja: "ファイア" }, element: "fire", power: 3 },
  "2": { name: { en: "Ice", ja: "アイス" }, element: "ice" },
  "5": { name: { en: "Water" } },
};

describe("datamap CLI", () => {
  let testDir: string;
  let dataFile: string;
  let output: string[];
  let originalFile: string | undefined;
  let originalCollision: string | undefined;

  async function run(...args: string[]): Promise<string[]> {
    await createProgram().parseAsync(args, { from: "user" });
    return output;
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "datamap-cli-"));
    dataFile = join(testDir, "data.json");
    await writeFile(dataFile, JSON.stringify(DATA));

    originalFile = process.env.DATAMAP_FILE;
    delete process.env.DATAMAP_FILE;
    originalCollision = process.env.DATAMAP_ON_COLLISION;
    delete process.env.DATAMAP_ON_COLLISION;

    output = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (originalFile === undefined) {
      delete process.env.DATAMAP_FILE;
    } else {
      process.env.DATAMAP_FILE = originalFile;
    }
    if (originalCollision === undefined) {
      delete process.env.DATAMAP_ON_COLLISION;
    } else {
      process.env.DATAMAP_ON_COLLISION = originalCollision;
    }
    await rm(testDir, { recursive: true, force: true });
  });

  describe("get", () => {
    it("should print an entry by id", async () => {
      const lines = await run("--file", dataFile, "get", "1", "--raw");
      expect(lines).toEqual([
        '{"name":{"en":"Fire","ja":"ファイア"},"element":"fire","power":3}',
      ]);
    });

    it("should fail with exit code 2 for unknown ids", async () => {
      const error = await run("--file", dataFile, "get", "9").catch((err: unknown) => err);
      expect(error).toBeInstanceOf(KeyNotFoundError);
      expect(mapSdkErrorToExitCode(error)).toBe(2);
    });

    it("should reject non-numeric ids", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const error = await run("--file", dataFile, "get", "abc").catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CommanderError);
      if (error instanceof CommanderError) {
        expect(error.code).toBe("commander.invalidArgument");
      }
    });
  });

  describe("lookup", () => {
    it("should print the entry for a name", async () => {
      const lines = await run("--file", dataFile, "lookup", "Ice", "--lang", "en");
      expect(lines).toEqual([
        JSON.stringify({ name: { en: "Ice", ja: "アイス" }, element: "ice" }, null, 2),
      ]);
    });

    it("should fail with exit code 2 for unknown names", async () => {
      const error = await run("--file", dataFile, "lookup", "Steam", "--lang", "en").catch(
        (err: unknown) => err
      );
      expect(error).toBeInstanceOf(CliError);
      expect(mapSdkErrorToExitCode(error)).toBe(2);
    });

    it("should require a language", async () => {
      vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const error = await run("--file", dataFile, "lookup", "Ice").catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CommanderError);
    });
  });

  describe("id", () => {
    it("should print the id for a name", async () => {
      expect(await run("--file", dataFile, "id", "アイス", "--lang", "ja")).toEqual(["2"]);
    });
  });

  describe("names", () => {
    it("should list names in entry order", async () => {
      expect(await run("--file", dataFile, "names", "--lang", "en")).toEqual([
        "Fire",
        "Ice",
        "Water",
      ]);
    });

    it("should print a JSON array", async () => {
      expect(await run("--file", dataFile, "names", "--lang", "en", "--json")).toEqual([
        JSON.stringify(["Fire", "Ice", "Water"], null, 2),
      ]);
    });

    it("should fail when an entry lacks the language", async () => {
      const error = await run("--file", dataFile, "names", "--lang", "ja").catch(
        (err: unknown) => err
      );
      expect(error).toBeInstanceOf(KeyNotFoundError);
    });
  });

  describe("translate", () => {
    it("should print the name in the other language", async () => {
      expect(
        await run("--file", dataFile, "translate", "Fire", "--from", "en", "--to", "ja")
      ).toEqual(["ファイア"]);
    });
  });

  describe("stats", () => {
    it("should print counts", async () => {
      expect(await run("--file", dataFile, "stats")).toEqual([
        "Entries: 3",
        "Names: 5",
        "Languages: en, ja",
      ]);
    });

    it("should print JSON", async () => {
      expect(await run("--file", dataFile, "stats", "--json")).toEqual([
        '{"entries":3,"names":5,"languages":["en","ja"]}',
      ]);
    });

    it("should print nothing with --quiet", async () => {
      expect(await run("--file", dataFile, "--quiet", "stats")).toEqual([]);
    });
  });

  describe("--quiet", () => {
    it.each<string[]>([
      ["get", "1"],
      ["lookup", "Ice", "--lang", "en"],
      ["id", "Ice", "--lang", "en"],
      ["names", "--lang", "en", "--json"],
      ["translate", "Fire", "--from", "en", "--to", "ja"],
      ["stats", "--json"],
    ])("should silence %s", async (...command: string[]) => {
      expect(await run("--file", dataFile, "--quiet", ...command)).toEqual([]);
    });

    it("should still fail on unknown ids", async () => {
      await expect(run("--file", dataFile, "--quiet", "get", "9")).rejects.toThrow(KeyNotFoundError);
    });

    it("should still fail when an entry lacks the language", async () => {
      await expect(run("--file", dataFile, "--quiet", "names", "--lang", "ja")).rejects.toThrow(
        KeyNotFoundError
      );
    });
  });

  describe("--verbose", () => {
    it("should write the command's metric line to stderr", async () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      expect(await run("--file", dataFile, "--verbose", "id", "Ice", "--lang", "en")).toEqual(["2"]);
      expect(write).toHaveBeenCalledWith(
        expect.stringMatching(/^metric cli\.id duration_ms=\d+ success=true entries=3 hits=1 misses=0\n$/)
      );
    });
  });

  describe("data file", () => {
    it("should read the file named by DATAMAP_FILE", async () => {
      process.env.DATAMAP_FILE = dataFile;
      expect(await run("id", "Water", "--lang", "en")).toEqual(["5"]);
    });

    it("should report a missing file", async () => {
      const missing = join(testDir, "missing.json");
      await expect(run("--file", missing, "stats")).rejects.toThrow(
        `Cannot read data file: ${missing}`
      );
    });

    it("should reject entries without a name", async () => {
      await writeFile(dataFile, JSON.stringify({ "1": { power: 3 } }));
      const error = await run("--file", dataFile, "stats").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error).toHaveProperty(
        "message",
        `Entry 1 in file ${dataFile} is missing required field "name"`
      );
      expect(mapSdkErrorToExitCode(error)).toBe(1);
    });

    it("should apply the collision policy", async () => {
      await writeFile(
        dataFile,
        JSON.stringify([{ name: { en: "Fire" } }, { name: { en: "Fire" } }])
      );
      await expect(run("--file", dataFile, "stats")).rejects.toThrow(DuplicateKeyError);

      vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(
        await run("--file", dataFile, "--on-collision", "overwrite", "id", "Fire", "--lang", "en")
      ).toEqual(["2"]);
    });

    it("should take the collision policy from DATAMAP_ON_COLLISION", async () => {
      await writeFile(
        dataFile,
        JSON.stringify([{ name: { en: "Fire" } }, { name: { en: "Fire" } }])
      );
      vi.spyOn(console, "warn").mockImplementation(() => {});
      process.env.DATAMAP_ON_COLLISION = "overwrite";

      expect(await run("--file", dataFile, "id", "Fire", "--lang", "en")).toEqual(["2"]);
      await expect(
        run("--file", dataFile, "--on-collision", "error", "id", "Fire", "--lang", "en")
      ).rejects.toThrow(DuplicateKeyError);
    });
  });

  describe("version", () => {
    it("should print the package version", async () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const error = await run("--version").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CommanderError);
      expect(write).toHaveBeenCalledWith("0.1.0\n");
    });
  });
});
