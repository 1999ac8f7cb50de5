/**
 * Commit history scan for schema timestamps.
 * Purpose: assign each candidate the time of the newest commit whose tree contains its path.
 * Assumptions: candidate and tree paths are repository-relative POSIX paths.
 * Usage: await resolveSchemaHistory({ source, candidates, logger }).
 *
 * The first sighting walking newest to oldest wins. File content is never compared, so a file
 * untouched for years still takes the time of the latest commit it is present in.
 */

import { normalizeTreePath } from "../core/paths.js";
import { logIndexEvent, silentLogger, type IndexLogger } from "../core/logger.js";

import type { CommitRecord, CommitSource, HistoryResolution, ResolvedSchemaFile } from "./schema.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveSchemaHistory(input: {
  source: CommitSource;
  candidates: Iterable<string>;
  logger?: IndexLogger;
}): Promise<HistoryResolution> {
  const logger = input.logger ?? silentLogger;
  const pending = new Set(Array.from(input.candidates, normalizeTreePath));
  const resolved: ResolvedSchemaFile[] = [];

  if (pending.size === 0) {
    return { resolved, unresolved: [] };
  }

  const commits = sortNewestFirst(await input.source.listCommits());
  let scanned = 0;

  for (const commit of commits) {
    if (pending.size === 0) break;

    scanned += 1;
    const tree = await input.source.listTree(commit.sha);
    const before = resolved.length;

    for (const entry of tree) {
      const treePath = normalizeTreePath(entry);
      if (!pending.delete(treePath)) continue;

      resolved.push({ path: treePath, sha: commit.sha, timestamp: normalizedCommitTime(commit) });
      if (pending.size === 0) break;
    }

    if (resolved.length > before) {
      logIndexEvent(
        logger,
        "history.commit",
        { sha: commit.sha, resolved: resolved.length - before },
        "debug",
      );
    }
  }

  logIndexEvent(logger, "history.complete", {
    commits_scanned: scanned,
    resolved: resolved.length,
    unresolved: pending.size,
  });

  return { resolved, unresolved: Array.from(pending).sort() };
}

export function normalizedCommitTime(commit: CommitRecord): number {
  return commit.time + commit.offsetMinutes * 60;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

// Array.prototype.sort is stable, so equal commit times keep the source order.
function sortNewestFirst(commits: CommitRecord[]): CommitRecord[] {
  return [...commits].sort((a, b) => b.time - a.time);
}
