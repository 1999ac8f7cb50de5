/**
 * Remote schema catalog integration.
 * Purpose: fetch the public schema catalog and turn its TOML-matching entries into index entries.
 * Assumptions: the catalog is best effort; callers downgrade CatalogError to a warning.
 * Usage: integrateCatalog(await fetchCatalog({ url, timeoutMs }), { now, logger }).
 */

import { z } from "zod";

import { CATALOG_MATCH_EXTENSION, formatZodIssues } from "../core/config.js";
import { CatalogError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logIndexEvent, silentLogger, type IndexLogger } from "../core/logger.js";

import { globToRegex, stripExtension } from "./glob-regex.js";
import { createIndexEntry, formatTimestamp } from "./schema-record.js";
import type { SchemaIndexEntry } from "./schema.js";

export const CATALOG_AUTHOR = "automatically included from https://schemastore.org";

// =============================================================================
// CATALOG SCHEMA
// =============================================================================

export const CatalogEntrySchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string(),
  fileMatch: z.array(z.string()).default([]),
});

export const CatalogSchema = z.object({
  schemas: z.array(CatalogEntrySchema).default([]),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export type Catalog = z.infer<typeof CatalogSchema>;

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

// =============================================================================
// FETCH
// =============================================================================

export async function fetchCatalog(input: {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}): Promise<Catalog> {
  const fetchImpl = input.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(input.url, { signal: AbortSignal.timeout(input.timeoutMs) });
  } catch (err) {
    throw new CatalogError(`Request to ${input.url} failed: ${formatErrorMessage(err)}`, err);
  }

  if (!response.ok) {
    throw new CatalogError(`Request to ${input.url} returned HTTP ${response.status}.`);
  }

  let raw: unknown;
  try {
    raw = await response.json();
  } catch (err) {
    throw new CatalogError(`Catalog at ${input.url} is not valid JSON.`, err);
  }

  return parseCatalog(raw);
}

export function parseCatalog(raw: unknown): Catalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues).join("; ");
    throw new CatalogError(`Catalog has an unexpected shape: ${issues}`, parsed.error);
  }

  return parsed.data;
}

// =============================================================================
// INTEGRATION
// =============================================================================

export function integrateCatalog(
  catalog: Catalog,
  opts: { now: Date; logger?: IndexLogger; extension?: string },
): SchemaIndexEntry[] {
  const logger = opts.logger ?? silentLogger;
  const extension = opts.extension ?? CATALOG_MATCH_EXTENSION;
  const updated = formatTimestamp(Math.floor(opts.now.getTime() / 1000));
  const entries: SchemaIndexEntry[] = [];

  for (const schema of catalog.schemas) {
    const globs = schema.fileMatch
      .map((fileMatch) => stripExtension(fileMatch, extension))
      .filter((glob): glob is string => glob !== null);
    if (globs.length === 0) continue;

    const patterns: string[] = [];
    for (const glob of globs) {
      const pattern = globToRegex(glob, extension);
      if (pattern === null) {
        logIndexEvent(logger, "catalog.glob.skip", { url: schema.url, glob }, "debug");
        continue;
      }
      patterns.push(pattern);
    }

    entries.push(
      createIndexEntry({
        title: schema.name ?? null,
        description: schema.description ?? null,
        updated,
        url: schema.url,
        extra: { authors: [CATALOG_AUTHOR], patterns },
      }),
    );
  }

  logIndexEvent(logger, "catalog.complete", {
    catalog_entries: catalog.schemas.length,
    included: entries.length,
  });

  return entries;
}
