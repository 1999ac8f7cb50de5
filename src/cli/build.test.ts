import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { commit, FakeCommitSource } from "../schema-index/__tests__/fakes.js";

import type { BuildCommandDeps } from "./build.js";
import { buildCli } from "./index.js";

describe("schema-index build", () => {
  let repoRoot: string;
  let stderrChunks: string[];

  beforeEach(async () => {
    repoRoot = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "schema-index-cli-")));
    await fs.mkdir(path.join(repoRoot, "schemas"), { recursive: true });
    await fs.writeFile(
      path.join(repoRoot, "schemas", "a.json"),
      JSON.stringify({ title: "A" }),
      "utf8",
    );
    stderrChunks = [];
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  function deps(source: FakeCommitSource): BuildCommandDeps {
    return {
      cwd: repoRoot,
      now: () => new Date("2024-03-01T12:00:00Z"),
      stderr: { write: (chunk: string) => stderrChunks.push(chunk) },
      ports: {
        resolveRepoRoot: async () => repoRoot,
        createCommitSource: () => source,
      },
    };
  }

  it("writes the index file and reports the schema count", async () => {
    const source = new FakeCommitSource([commit("c1", 1000, ["schemas/a.json"])]);
    const outputPath = path.join(repoRoot, "out", "index.json");

    await buildCli(deps(source)).parseAsync(["schemas", "--out", "out/index.json"], {
      from: "user",
    });

    const written = JSON.parse(await fs.readFile(outputPath, "utf8"));
    expect(written.schemas).toHaveLength(1);
    expect(written.schemas[0]).toMatchObject({
      title: "A",
      updated: "1970-01-01T00:16:40Z",
      url: "https://taplo.tamasfe.dev/schemas/a.json",
    });
    expect(console.log).toHaveBeenCalledWith(`Wrote 1 schema(s) to ${outputPath}`);
    expect(process.exitCode).toBeUndefined();
  });

  it("honours the explicit build command, base URL and pretty output", async () => {
    const source = new FakeCommitSource([commit("c1", 1000, ["schemas/a.json"])]);

    await buildCli(deps(source)).parseAsync(
      ["build", "schemas", "--url", "https://schemas.example.test/v2/", "--pretty"],
      { from: "user" },
    );

    const text = await fs.readFile(path.join(repoRoot, "schema_index.json"), "utf8");
    expect(text.startsWith('{\n  "schemas": [\n')).toBe(true);
    expect(JSON.parse(text).schemas[0].url).toBe("https://schemas.example.test/v2/a.json");
  });

  it("fails without writing when a schema is not committed", async () => {
    const source = new FakeCommitSource([commit("c1", 1000, ["README.md"])]);

    await buildCli(deps(source)).parseAsync(["schemas"], { from: "user" });

    expect(process.exitCode).toBe(1);
    expect(vi.mocked(console.error).mock.calls.map((call) => call[0])).toEqual([
      "error: Not all schema files are committed.",
      "Not all schema files are committed: schemas/a.json",
      "hint: Commit the listed files, then rebuild the index.",
    ]);
    await expect(fs.access(path.join(repoRoot, "schema_index.json"))).rejects.toThrow();
  });

  it("rejects invalid option values", async () => {
    const source = new FakeCommitSource([]);

    await buildCli(deps(source)).parseAsync(["schemas", "--catalog-timeout", "0"], {
      from: "user",
    });

    expect(process.exitCode).toBe(1);
    expect(vi.mocked(console.error).mock.calls.map((call) => call[0])).toEqual([
      "error: Invalid options.",
      "catalogTimeout: Number must be greater than 0",
      "hint: Run `schema-index build --help` for the accepted options.",
    ]);
  });

  it("prints progress events to stderr with --verbose", async () => {
    const source = new FakeCommitSource([commit("c1", 1000, ["schemas/a.json"])]);

    await buildCli(deps(source)).parseAsync(["schemas", "--verbose"], { from: "user" });

    expect(stderrChunks).toContain(
      `info: scan.complete dir=${path.join(repoRoot, "schemas")} candidates=1\n`,
    );
    expect(stderrChunks.some((chunk) => chunk.startsWith("debug:"))).toBe(false);
  });

  it("appends JSONL events to the log file", async () => {
    const source = new FakeCommitSource([commit("c1", 1000, ["schemas/a.json"])]);

    await buildCli(deps(source)).parseAsync(["schemas", "--log-file", "logs/build.jsonl"], {
      from: "user",
    });

    const lines = (await fs.readFile(path.join(repoRoot, "logs", "build.jsonl"), "utf8"))
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(lines.map((line) => line.type)).toEqual([
      "scan.complete",
      "history.commit",
      "history.complete",
      "schema.built",
      "index.written",
    ]);
    expect(lines[0].out).toBe(path.join(repoRoot, "schema_index.json"));
  });
});
