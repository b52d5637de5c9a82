/**
 * CLI configuration from options and environment
 *
 * Each setting resolves as: command-line option > environment > default
 * - data file:       --file          DATAMAP_FILE         ./datamap.json
 * - name collisions: --on-collision  DATAMAP_ON_COLLISION "error"
 * - metric lines:    --verbose       DATAMAP_CLI_DEBUG=1  off
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import type { NameCollisionPolicy } from "@datamap/sdk";
import { CliError } from "./errors.js";

const CollisionPolicySchema = z.enum(["error", "overwrite"]);

export interface CliOptions {
  file?: string;
  onCollision?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface CliConfig {
  dataFile: string;
  onNameCollision: NameCollisionPolicy;
  quiet: boolean;
  verbose: boolean;
}

function resolveDataFile(file: string): string {
  const expanded = file === "~" || file.startsWith("~/") ? path.join(homedir(), file.slice(1)) : file;
  return path.resolve(expanded);
}

function resolveCollisionPolicy(value: string, source: string): NameCollisionPolicy {
  const result = CollisionPolicySchema.safeParse(value);
  if (!result.success) {
    throw new CliError(`${source} must be "error" or "overwrite", got "${value}"`);
  }
  return result.data;
}

export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const collision =
    options.onCollision !== undefined
      ? resolveCollisionPolicy(options.onCollision, "--on-collision")
      : resolveCollisionPolicy(env.DATAMAP_ON_COLLISION ?? "error", "DATAMAP_ON_COLLISION");

  return {
    dataFile: resolveDataFile(options.file ?? env.DATAMAP_FILE ?? "./datamap.json"),
    onNameCollision: collision,
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? env.DATAMAP_CLI_DEBUG === "1",
  };
}
