/*
 * CLI entry for the schema index builder.
 * Common usage: `schema-index build schemas --url https://example.com/schemas --schema-store`.
 */

import { Command } from "commander";

import {
  DEFAULT_BASE_URL,
  DEFAULT_CATALOG_TIMEOUT_MS,
  DEFAULT_CATALOG_URL,
  DEFAULT_OUTPUT_FILE,
} from "../core/config.js";

import { buildCommand, type BuildCommandDeps } from "./build.js";

type BuildCommandOptions = {
  git?: string;
  out?: string;
  url?: string;
  schemaStore?: boolean;
  catalogUrl?: string;
  catalogTimeout?: number;
  pretty?: boolean;
  logFile?: string;
  verbose?: boolean;
  debug?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function buildCli(deps: BuildCommandDeps = {}): Command {
  const program = new Command();

  program
    .name("schema-index")
    .description("Build a JSON index of the schemas committed to a git repository");

  program
    .command("build", { isDefault: true })
    .description("Index the schema documents under <dir>")
    .argument("<dir>", "Schema directory, relative to the git repository path")
    .option("--git <path>", "Git repository (default: .)")
    .option("-o, --out <file>", `Output JSON file (default: ${DEFAULT_OUTPUT_FILE})`)
    .option("--url <url>", `Base URL of the schemas (default: ${DEFAULT_BASE_URL})`)
    .option("--schema-store", "Include toml-compatible schemas from the public schema catalog")
    .option("--catalog-url <url>", `Schema catalog endpoint (default: ${DEFAULT_CATALOG_URL})`)
    .option(
      "--catalog-timeout <ms>",
      `Catalog request timeout (default: ${DEFAULT_CATALOG_TIMEOUT_MS})`,
      (value) => parseInt(value, 10),
    )
    .option("--pretty", "Indent the output JSON")
    .option("--log-file <path>", "Append JSONL log events to this file")
    .option("--verbose", "Print progress events to stderr")
    .option("--debug", "Include error codes, causes and stacks in failures")
    .action(async (dir: string, opts: BuildCommandOptions) => {
      await buildCommand({ dir, ...opts }, deps);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildCli().parseAsync(argv);
}
