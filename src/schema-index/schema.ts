// Schema index document types.
// Purpose: define the JSON shape written to the index file and the ports the builder reads from.
// Assumes entries are serialized in insertion order with camelCase keys.

// =============================================================================
// INDEX TYPES
// =============================================================================

export type SchemaExtraInfo = {
  authors: string[];
  patterns: string[];
  version?: string;
};

export type SchemaIndexEntry = {
  title: string | null;
  description: string | null;
  updated: string | null;
  url: string;
  urlHash: string;
} & SchemaExtraInfo;

export type SchemaIndex = {
  schemas: SchemaIndexEntry[];
};

// =============================================================================
// HISTORY TYPES
// =============================================================================

export type CommitRecord = {
  sha: string;
  /** Commit time in seconds since epoch. */
  time: number;
  /** Committer UTC offset in minutes. */
  offsetMinutes: number;
};

export interface CommitSource {
  listCommits(): Promise<CommitRecord[]>;
  listTree(sha: string): Promise<string[]>;
}

export type ResolvedSchemaFile = {
  path: string;
  sha: string;
  /** Seconds since epoch, shifted by the committer offset. */
  timestamp: number;
};

export type HistoryResolution = {
  resolved: ResolvedSchemaFile[];
  unresolved: string[];
};

// =============================================================================
// INITIALIZERS
// =============================================================================

export function createEmptyIndex(): SchemaIndex {
  return { schemas: [] };
}
