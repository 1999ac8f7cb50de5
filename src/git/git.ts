import { execa } from "execa";

import { GitError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export type GitResult = {
  stdout: string;
  stderr: string;
};

export type GitCommitLine = {
  sha: string;
  time: number;
  offsetMinutes: number;
};

const GIT_ERROR_HINT = "Check that git is installed and the path points inside a git repository.";

// =============================================================================
// LOW-LEVEL
// =============================================================================

export async function git(cwd: string, args: string[]): Promise<GitResult> {
  try {
    const result = await execa("git", args, { cwd, stdio: "pipe" });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (err) {
    throw new GitError(`git ${args.join(" ")} failed: ${describeGitFailure(err)}`, err);
  }
}

// =============================================================================
// REPOSITORY QUERIES
// =============================================================================

export async function resolveRepoRoot(startPath: string): Promise<string> {
  try {
    const result = await git(startPath, ["rev-parse", "--show-toplevel"]);
    return result.stdout.trim();
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git repository not found.",
      message: `No git repository found at or above ${startPath}.`,
      hint: GIT_ERROR_HINT,
      cause: err,
    });
  }
}

export async function listCommitsByTime(repoRoot: string): Promise<GitCommitLine[]> {
  let result: GitResult;
  try {
    result = await git(repoRoot, ["log", "--format=%H %ct %ci", "HEAD"]);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git history unavailable.",
      message: `Could not read commit history of ${repoRoot}.`,
      hint: "Schema files must be committed before the index can be built.",
      cause: err,
    });
  }

  return result.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(parseCommitLine);
}

export async function listTreePaths(repoRoot: string, sha: string): Promise<string[]> {
  let result: GitResult;
  try {
    result = await git(repoRoot, ["ls-tree", "-r", "-z", "--full-tree", "--name-only", sha]);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git tree unavailable.",
      message: `Could not list the tree of commit ${sha} in ${repoRoot}.`,
      hint: GIT_ERROR_HINT,
      cause: err,
    });
  }

  return result.stdout.split("\0").filter((entry) => entry.length > 0);
}

// =============================================================================
// PARSING
// =============================================================================

// Line shape: "<sha> <unix seconds> <YYYY-MM-DD> <HH:MM:SS> <+HHMM>".
export function parseCommitLine(line: string): GitCommitLine {
  const parts = line.split(/\s+/);
  const sha = parts[0] ?? "";
  const time = Number(parts[1]);
  const offset = parts[parts.length - 1] ?? "";

  if (!/^[0-9a-f]{7,64}$/i.test(sha) || !Number.isInteger(time) || parts.length < 3) {
    throw new GitError(`Unexpected git log output: ${line}`);
  }

  return { sha, time, offsetMinutes: parseUtcOffset(offset) };
}

export function parseUtcOffset(value: string): number {
  const match = /^([+-])(\d{2})(\d{2})$/.exec(value);
  if (!match) {
    throw new GitError(`Unexpected timezone offset in git log output: ${value}`);
  }

  const [, sign, hours, minutes] = match;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -total : total;
}

function describeGitFailure(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err) {
    const stderr = err.stderr;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }

  if (err instanceof Error) return err.message;
  return String(err);
}
