/**
 * Command definitions for the datamap CLI
 */

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { DataMap } from "@datamap/sdk";
import { resolveConfig } from "./lib/env.js";
import { parseId, parseJson, parseLanguageCode } from "./lib/arg.js";
import { loadDataMap } from "./lib/load.js";
import { createPrinter, renderNames, renderRow, renderStats, type Printer } from "./lib/render.js";
import { CliError } from "./lib/errors.js";
import { withCommandMetrics } from "./lib/telemetry.js";

const PackageJsonSchema = z.object({ version: z.string() });

const GlobalOptionsSchema = z.object({
  file: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  onCollision: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJson = PackageJsonSchema.parse(
    parseJson(readFileSync(join(here, "../package.json"), "utf-8"), "package.json")
  );
  return packageJson.version;
}

function nameNotFound(name: string, language: string): CliError {
  return new CliError(`No entry named "${name}" in language "${language}"`, { exitCode: 2 });
}

/**
 * Build the datamap command tree.
 * Errors (including commander's own) are thrown rather than exiting.
 */
export function createProgram(): Command {
  const program = new Command();

  // Every command loads the data file, then prints through the --quiet aware printer
  const runCommand = async (
    command: string,
    fn: (map: DataMap, print: Printer) => void
  ): Promise<void> => {
    const config = resolveConfig(GlobalOptionsSchema.parse(program.opts()));
    const print = createPrinter(config.quiet);

    await withCommandMetrics(command, config.verbose, async () => {
      const map = await loadDataMap(config.dataFile, { onNameCollision: config.onNameCollision });
      fn(map, print);
    });
  };

  program.exitOverride();

  program
    .name("datamap")
    .description("Look up entries by id or by name in any language")
    .version(readVersion())
    .option("--file <path>", "JSON data file (default: $DATAMAP_FILE or ./datamap.json)")
    .addOption(
      new Option(
        "--on-collision <policy>",
        "Handling of names shared by two entries (default: $DATAMAP_ON_COLLISION or error)"
      ).choices(["error", "overwrite"])
    )
    .option("--verbose", "Print per-command metrics and error causes")
    .option("--quiet", "Suppress non-error output");

  program
    .command("get")
    .description("Print an entry by id")
    .argument("<id>", "Entry id", (value: string) => parseId(value))
    .option("--raw", "Output raw JSON without formatting")
    .action(async (id: number, options: { raw?: boolean }) => {
      await runCommand("get", (map, print) => {
        print(renderRow(map.get(id), { raw: options.raw }));
      });
    });

  program
    .command("lookup")
    .description("Print the entry with a given name")
    .argument("<name>", "Display name")
    .requiredOption("--lang <code>", "Language of the name", parseLanguageCode)
    .option("--raw", "Output raw JSON without formatting")
    .action(async (name: string, options: { lang: string; raw?: boolean }) => {
      await runCommand("lookup", (map, print) => {
        const row = map.entryOf(options.lang, name);
        if (!row) throw nameNotFound(name, options.lang);
        print(renderRow(row, { raw: options.raw }));
      });
    });

  program
    .command("id")
    .description("Print the id of the entry with a given name")
    .argument("<name>", "Display name")
    .requiredOption("--lang <code>", "Language of the name", parseLanguageCode)
    .action(async (name: string, options: { lang: string }) => {
      await runCommand("id", (map, print) => {
        const id = map.idOf(options.lang, name);
        if (id === undefined) throw nameNotFound(name, options.lang);
        print([String(id)]);
      });
    });

  program
    .command("names")
    .description("List every name in one language, in entry order")
    .requiredOption("--lang <code>", "Language code", parseLanguageCode)
    .option("--json", "Output as JSON array")
    .action(async (options: { lang: string; json?: boolean }) => {
      await runCommand("names", (map, print) => {
        print(renderNames(map.names(options.lang), { json: options.json }));
      });
    });

  program
    .command("translate")
    .description("Translate a name from one language to another")
    .argument("<name>", "Display name")
    .requiredOption("--from <code>", "Language of the given name", parseLanguageCode)
    .requiredOption("--to <code>", "Language to translate into", parseLanguageCode)
    .action(async (name: string, options: { from: string; to: string }) => {
      await runCommand("translate", (map, print) => {
        const row = map.entryOf(options.from, name);
        if (!row) throw nameNotFound(name, options.from);
        print([row.name(options.to)]);
      });
    });

  program
    .command("stats")
    .description("Show entry, name and language counts")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: { json?: boolean }) => {
      await runCommand("stats", (map, print) => {
        print(renderStats(map.stats(), { json: options.json }));
      });
    });

  return program;
}
