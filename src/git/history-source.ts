/**
 * Git-backed commit source.
 * Purpose: map CommitSource calls to git log / git ls-tree.
 * Assumptions: repoRoot is the top level of a local working copy.
 * Usage: resolveSchemaHistory({ source: createGitCommitSource(repoRoot), candidates }).
 */

import type { CommitRecord, CommitSource } from "../schema-index/schema.js";

import { listCommitsByTime, listTreePaths } from "./git.js";

export function createGitCommitSource(repoRoot: string): CommitSource {
  return {
    listCommits: async (): Promise<CommitRecord[]> => listCommitsByTime(repoRoot),
    listTree: (sha) => listTreePaths(repoRoot, sha),
  };
}
