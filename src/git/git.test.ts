import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { GitError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { listCommitsByTime, listTreePaths, parseUtcOffset, resolveRepoRoot } from "./git.js";
import { createGitCommitSource } from "./history-source.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

function resolveStdout(stdout: string): void {
  execaMock.mockResolvedValueOnce({
    stdout,
    stderr: "",
    exitCode: 0,
  } as Awaited<ReturnType<typeof execa>>);
}

// =============================================================================
// TESTS
// =============================================================================

describe("listCommitsByTime", () => {
  it("parses sha, commit time and committer offset", async () => {
    resolveStdout(
      [
        "1111111111111111111111111111111111111111 1700003600 2023-11-14 23:13:20 +0100",
        "2222222222222222222222222222222222222222 1700000000 2023-11-14 16:43:20 -0530",
        "",
      ].join("\n"),
    );

    const commits = await listCommitsByTime("/repo");

    expect(commits).toEqual([
      { sha: "1111111111111111111111111111111111111111", time: 1700003600, offsetMinutes: 60 },
      { sha: "2222222222222222222222222222222222222222", time: 1700000000, offsetMinutes: -330 },
    ]);
    expect(execaMock).toHaveBeenCalledWith("git", ["log", "--format=%H %ct %ci", "HEAD"], {
      cwd: "/repo",
      stdio: "pipe",
    });
  });

  it("maps a failing git log to a user-facing git error", async () => {
    execaMock.mockRejectedValueOnce(
      Object.assign(new Error("Command failed"), {
        stderr: "fatal: your current branch 'main' does not have any commits yet",
      }),
    );

    const result = await listCommitsByTime("/repo").catch((err: unknown) => err);

    expect(result).toBeInstanceOf(UserFacingError);
    const userError = result as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.git);
    expect(userError.title).toBe("Git history unavailable.");
    expect(userError.cause).toBeInstanceOf(GitError);
    expect((userError.cause as GitError).message).toBe(
      "git log --format=%H %ct %ci HEAD failed: fatal: your current branch 'main' does not have any commits yet",
    );
  });
});

describe("listTreePaths", () => {
  it("splits NUL-separated tree listings", async () => {
    resolveStdout("schemas/a.json\0schemas/with space.json\0README.md\0");

    const paths = await listTreePaths("/repo", "abc1234");

    expect(paths).toEqual(["schemas/a.json", "schemas/with space.json", "README.md"]);
    expect(execaMock).toHaveBeenCalledWith(
      "git",
      ["ls-tree", "-r", "-z", "--full-tree", "--name-only", "abc1234"],
      { cwd: "/repo", stdio: "pipe" },
    );
  });

  it("maps a failing ls-tree to a user-facing git error", async () => {
    execaMock.mockRejectedValueOnce(
      Object.assign(new Error("Command failed"), { stderr: "fatal: not a tree object" }),
    );

    const result = await listTreePaths("/repo", "abc1234").catch((err: unknown) => err);

    expect(result).toBeInstanceOf(UserFacingError);
    expect(result).toMatchObject({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git tree unavailable.",
      message: "Could not list the tree of commit abc1234 in /repo.",
    });
    expect((result as UserFacingError).cause).toBeInstanceOf(GitError);
  });
});

describe("resolveRepoRoot", () => {
  it("returns the trimmed top-level path", async () => {
    resolveStdout("/home/dev/repo\n");

    await expect(resolveRepoRoot("/home/dev/repo/schemas")).resolves.toBe("/home/dev/repo");
  });

  it("reports missing repositories as user-facing errors", async () => {
    execaMock.mockRejectedValueOnce(new Error("fatal: not a git repository"));

    const result = await resolveRepoRoot("/tmp/nowhere").catch((err: unknown) => err);

    expect(result).toBeInstanceOf(UserFacingError);
    expect((result as UserFacingError).message).toBe(
      "No git repository found at or above /tmp/nowhere.",
    );
  });
});

describe("createGitCommitSource", () => {
  it("lists commits and trees through git", async () => {
    resolveStdout("3333333333333333333333333333333333333333 1700000000 2023-11-14 22:13:20 +0000");
    resolveStdout("a.json\0");

    const source = createGitCommitSource("/repo");

    await expect(source.listCommits()).resolves.toEqual([
      { sha: "3333333333333333333333333333333333333333", time: 1700000000, offsetMinutes: 0 },
    ]);
    await expect(source.listTree("3333333333333333333333333333333333333333")).resolves.toEqual([
      "a.json",
    ]);
  });
});

describe("parseUtcOffset", () => {
  it("rejects malformed offsets", () => {
    expect(() => parseUtcOffset("UTC")).toThrow(GitError);
  });
});
