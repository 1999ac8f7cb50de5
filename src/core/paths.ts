import path from "node:path";

// Candidates and git tree entries are compared as repository-relative POSIX paths.

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

export function normalizeTreePath(treePath: string): string {
  const normalized = path.posix.normalize(treePath.replace(/\\/g, "/"));
  return normalized.replace(/^\.\//, "").replace(/\/+$/, "");
}

export function toRepoRelativePath(repoRoot: string, absolutePath: string): string | null {
  const relative = path.relative(repoRoot, absolutePath);
  const escapes = relative === ".." || relative.startsWith(`..${path.sep}`);
  if (relative === "" || escapes || path.isAbsolute(relative)) {
    return null;
  }

  return normalizeTreePath(toPosixPath(relative));
}
