import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// CANDIDATE SCAN
// =============================================================================

export async function scanSchemaCandidates(scanDir: string, extension: string): Promise<string[]> {
  const stat = await fs.stat(scanDir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Schema directory not found.",
      message: `${scanDir} is not a directory.`,
      hint: "Pass a directory relative to the --git path.",
      cause: new ConfigError(`Missing schema directory: ${scanDir}`),
    });
  }

  const found: string[] = [];
  await walk(scanDir, `.${extension}`, found);
  return found.sort();
}

async function walk(dir: string, suffix: string, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    // Unreadable subdirectories hold nothing we can index.
    if (isAccessError(err)) return;
    throw err;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(entryPath, suffix, found);
      continue;
    }

    if ((entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(suffix)) {
      found.push(entryPath);
    }
  }
}

function isAccessError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "EACCES" || err.code === "EPERM" || err.code === "ENOENT";
}
