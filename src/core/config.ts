// Build configuration.
// Purpose: validate raw CLI options into a normalized BuildConfig.
// Assumes relative paths are resolved against the caller's working directory.

import path from "node:path";

import { z, type ZodIssue } from "zod";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_OUTPUT_FILE = "schema_index.json";
export const DEFAULT_BASE_URL = "https://taplo.tamasfe.dev/schemas";
export const DEFAULT_CATALOG_URL = "https://www.schemastore.org/api/json/catalog.json";
export const DEFAULT_CATALOG_TIMEOUT_MS = 30_000;

// Local schema documents are JSON; catalog globs are kept when they target TOML files.
export const SCHEMA_FILE_EXTENSION = "json";
export const CATALOG_MATCH_EXTENSION = "toml";

// =============================================================================
// SCHEMAS
// =============================================================================

const HttpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "Expected an http(s) URL" });

export const BuildOptionsSchema = z
  .object({
    dir: z.string().trim().min(1),
    git: z.string().trim().min(1).default("."),
    out: z.string().trim().min(1).default(DEFAULT_OUTPUT_FILE),
    url: HttpUrlSchema.default(DEFAULT_BASE_URL).transform(trimTrailingSlashes),
    schemaStore: z.boolean().default(false),
    catalogUrl: HttpUrlSchema.default(DEFAULT_CATALOG_URL),
    catalogTimeout: z.number().int().positive().default(DEFAULT_CATALOG_TIMEOUT_MS),
    pretty: z.boolean().default(false),
    logFile: z.string().trim().min(1).optional(),
    verbose: z.boolean().default(false),
    debug: z.boolean().default(false),
  })
  .strict();

export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

export type BuildConfig = {
  gitPath: string;
  scanDir: string;
  outputPath: string;
  baseUrl: string;
  schemaStore: boolean;
  catalogUrl: string;
  catalogTimeoutMs: number;
  pretty: boolean;
  logFile?: string;
  verbose: boolean;
  debug: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveBuildConfig(input: BuildOptionsInput, cwd: string = process.cwd()): BuildConfig {
  const parsed = BuildOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid options.",
      message: issues.join("\n"),
      hint: "Run `schema-index build --help` for the accepted options.",
      cause: new ConfigError("Build options failed validation.", parsed.error),
    });
  }

  const opts = parsed.data;
  const gitPath = path.resolve(cwd, opts.git);

  return {
    gitPath,
    scanDir: path.resolve(gitPath, opts.dir),
    outputPath: path.resolve(cwd, opts.out),
    baseUrl: opts.url,
    schemaStore: opts.schemaStore,
    catalogUrl: opts.catalogUrl,
    catalogTimeoutMs: opts.catalogTimeout,
    pretty: opts.pretty,
    logFile: opts.logFile ? path.resolve(cwd, opts.logFile) : undefined,
    verbose: opts.verbose,
    debug: opts.debug,
  };
}

export function formatZodIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, "");
}
