/*
Purpose: build one index entry from a committed schema document.
Assumptions: documents are JSON; only title, description and the extra-info block are read.
Usage: buildSchemaRecord({ fileName, content, timestamp, baseUrl }).
*/

import crypto from "node:crypto";

import { z } from "zod";

import { formatZodIssues } from "../core/config.js";
import { SchemaDocumentError } from "../core/errors.js";

import type { SchemaExtraInfo, SchemaIndexEntry } from "./schema.js";

export const EXTRA_INFO_KEY = "x-taplo-info";

// =============================================================================
// DOCUMENT SCHEMA
// =============================================================================

export const SchemaExtraInfoSchema = z.object({
  authors: z.array(z.string()).default([]),
  patterns: z.array(z.string()).default([]),
  version: z.string().optional(),
});

export const SchemaDocumentSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  [EXTRA_INFO_KEY]: SchemaExtraInfoSchema.optional(),
});

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildSchemaRecord(input: {
  fileName: string;
  content: string;
  timestamp: number;
  baseUrl: string;
  /** Path named in parse errors; defaults to fileName. */
  sourcePath?: string;
}): SchemaIndexEntry {
  const document = parseSchemaDocument(input.content, input.sourcePath ?? input.fileName);
  const url = buildSchemaUrl(input.baseUrl, input.fileName);

  return createIndexEntry({
    title: document.title ?? null,
    description: document.description ?? null,
    updated: formatTimestamp(input.timestamp),
    url,
    extra: document[EXTRA_INFO_KEY] ?? { authors: [], patterns: [] },
  });
}

export function parseSchemaDocument(
  content: string,
  filePath: string,
): z.infer<typeof SchemaDocumentSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaDocumentError(`Invalid schema ${filePath}: ${reason}`, filePath, err);
  }

  const parsed = SchemaDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues).join("; ");
    throw new SchemaDocumentError(`Invalid schema ${filePath}: ${issues}`, filePath, parsed.error);
  }

  return parsed.data;
}

export function createIndexEntry(input: {
  title: string | null;
  description: string | null;
  updated: string | null;
  url: string;
  extra: SchemaExtraInfo;
}): SchemaIndexEntry {
  const entry: SchemaIndexEntry = {
    title: input.title,
    description: input.description,
    updated: input.updated,
    url: input.url,
    urlHash: hashUrl(input.url),
    authors: [...input.extra.authors],
    patterns: [...input.extra.patterns],
  };

  if (input.extra.version !== undefined) {
    entry.version = input.extra.version;
  }

  return entry;
}

export function buildSchemaUrl(baseUrl: string, fileName: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${fileName}`;
}

export function hashUrl(url: string): string {
  return crypto.createHash("sha256").update(url, "utf8").digest("hex");
}

/** RFC 3339 at second precision, always in UTC. */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
}
