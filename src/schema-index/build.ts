// Schema index build orchestration.
// Purpose: scan candidates, resolve their history, build local entries, then append catalog entries.
// Assumes nothing is written here; callers persist the returned index only when the build succeeds.

import fs from "node:fs/promises";
import path from "node:path";

import { SCHEMA_FILE_EXTENSION } from "../core/config.js";
import {
  ConfigError,
  SchemaDocumentError,
  SchemaIndexError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logIndexEvent, silentLogger, type IndexLogger } from "../core/logger.js";
import { toRepoRelativePath } from "../core/paths.js";
import { resolveRepoRoot } from "../git/git.js";
import { createGitCommitSource } from "../git/history-source.js";

import { scanSchemaCandidates } from "./candidates.js";
import { fetchCatalog, integrateCatalog, type Catalog } from "./catalog.js";
import { resolveSchemaHistory } from "./history-resolver.js";
import { buildSchemaRecord } from "./schema-record.js";
import { createEmptyIndex, type CommitSource, type SchemaIndex, type SchemaIndexEntry } from "./schema.js";

export type SchemaIndexBuildOptions = {
  gitPath: string;
  scanDir: string;
  baseUrl: string;
  schemaStore: boolean;
  catalogUrl: string;
  catalogTimeoutMs: number;
  /** Run-start time; stamps catalog entries. */
  now: Date;
  logger?: IndexLogger;
};

export type SchemaIndexBuildPorts = {
  resolveRepoRoot: (startPath: string) => Promise<string>;
  createCommitSource: (repoRoot: string) => CommitSource;
  readFile: (filePath: string) => Promise<string>;
  fetchCatalog: (input: { url: string; timeoutMs: number }) => Promise<Catalog>;
};

const DEFAULT_PORTS: SchemaIndexBuildPorts = {
  resolveRepoRoot,
  createCommitSource: createGitCommitSource,
  readFile: (filePath) => fs.readFile(filePath, "utf8"),
  fetchCatalog: (input) => fetchCatalog(input),
};

// =============================================================================
// BUILD ORCHESTRATION
// =============================================================================

export async function buildSchemaIndex(
  options: SchemaIndexBuildOptions,
  ports: Partial<SchemaIndexBuildPorts> = {},
): Promise<SchemaIndex> {
  const deps: SchemaIndexBuildPorts = { ...DEFAULT_PORTS, ...ports };
  const logger = options.logger ?? silentLogger;
  const index = createEmptyIndex();

  const repoRoot = await fs.realpath(await deps.resolveRepoRoot(options.gitPath));
  const candidates = await collectCandidates(repoRoot, options.scanDir);
  logIndexEvent(logger, "scan.complete", { dir: options.scanDir, candidates: candidates.size });

  if (candidates.size === 0) {
    logIndexEvent(logger, "scan.empty", { dir: options.scanDir }, "warn");
  } else {
    const entries = await buildLocalEntries({
      repoRoot,
      candidates,
      baseUrl: options.baseUrl,
      source: deps.createCommitSource(repoRoot),
      readFile: deps.readFile,
      logger,
    });
    index.schemas.push(...entries);
  }

  if (options.schemaStore) {
    index.schemas.push(...(await loadCatalogEntries(options, deps, logger)));
  }

  return index;
}

// =============================================================================
// LOCAL ENTRIES
// =============================================================================

async function collectCandidates(repoRoot: string, scanDir: string): Promise<Map<string, string>> {
  const files = await scanSchemaCandidates(scanDir, SCHEMA_FILE_EXTENSION);
  const realScanDir = await fs.realpath(scanDir);
  const candidates = new Map<string, string>();

  for (const file of files) {
    const relative = toRepoRelativePath(repoRoot, path.join(realScanDir, path.relative(scanDir, file)));
    if (relative === null) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Schema directory outside repository.",
        message: `${scanDir} is not inside the git repository at ${repoRoot}.`,
        cause: new ConfigError(`Candidate outside repository: ${file}`),
      });
    }
    candidates.set(relative, file);
  }

  return candidates;
}

async function buildLocalEntries(input: {
  repoRoot: string;
  candidates: Map<string, string>;
  baseUrl: string;
  source: CommitSource;
  readFile: (filePath: string) => Promise<string>;
  logger: IndexLogger;
}): Promise<SchemaIndexEntry[]> {
  const { resolved, unresolved } = await resolveSchemaHistory({
    source: input.source,
    candidates: input.candidates.keys(),
    logger: input.logger,
  });

  if (unresolved.length > 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.integrity,
      title: "Not all schema files are committed.",
      message: `Not all schema files are committed: ${unresolved.join(", ")}`,
      hint: "Commit the listed files, then rebuild the index.",
      cause: new SchemaIndexError(`${unresolved.length} schema file(s) missing from history`),
    });
  }

  const entries: SchemaIndexEntry[] = [];
  const seenUrls = new Map<string, string>();

  for (const file of resolved) {
    const absolutePath = input.candidates.get(file.path) ?? path.join(input.repoRoot, file.path);
    const content = await readSchemaFile(absolutePath, input.readFile);
    const entry = buildLocalEntry(file.path, content, file.timestamp, input.baseUrl);

    const previous = seenUrls.get(entry.url);
    if (previous !== undefined) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.integrity,
        title: "Duplicate schema URL.",
        message: `${previous} and ${file.path} both publish ${entry.url}.`,
        hint: "Schema file names must be unique across the scanned directory.",
      });
    }
    seenUrls.set(entry.url, file.path);

    logIndexEvent(input.logger, "schema.built", { path: file.path, updated: entry.updated }, "debug");
    entries.push(entry);
  }

  return entries;
}

function buildLocalEntry(
  repoPath: string,
  content: string,
  timestamp: number,
  baseUrl: string,
): SchemaIndexEntry {
  try {
    return buildSchemaRecord({
      fileName: path.posix.basename(repoPath),
      sourcePath: repoPath,
      content,
      timestamp,
      baseUrl,
    });
  } catch (err) {
    if (err instanceof SchemaDocumentError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.integrity,
        title: "Invalid schema document.",
        message: err.message,
        hint: "Fix the document so it parses as a JSON object, then rebuild.",
        cause: err,
      });
    }
    throw err;
  }
}

async function readSchemaFile(
  filePath: string,
  readFile: (filePath: string) => Promise<string>,
): Promise<string> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.io,
      title: "Schema file unreadable.",
      message: `Could not read ${filePath}.`,
      cause: err,
    });
  }
}

// =============================================================================
// CATALOG ENTRIES
// =============================================================================

async function loadCatalogEntries(
  options: SchemaIndexBuildOptions,
  deps: SchemaIndexBuildPorts,
  logger: IndexLogger,
): Promise<SchemaIndexEntry[]> {
  logIndexEvent(logger, "catalog.fetch.start", { url: options.catalogUrl });

  let catalog: Catalog;
  try {
    catalog = await deps.fetchCatalog({
      url: options.catalogUrl,
      timeoutMs: options.catalogTimeoutMs,
    });
  } catch (err) {
    logIndexEvent(
      logger,
      "catalog.fetch.fail",
      { url: options.catalogUrl, error: formatErrorMessage(err) },
      "warn",
    );
    return [];
  }

  return integrateCatalog(catalog, { now: options.now, logger });
}
