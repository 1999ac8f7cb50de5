import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { OutputError, UserFacingError } from "../core/errors.js";

import { serializeSchemaIndex, writeSchemaIndex } from "./output.js";
import type { SchemaIndex } from "./schema.js";

const INDEX: SchemaIndex = {
  schemas: [
    {
      title: "A",
      description: null,
      updated: "2024-03-01T12:00:00Z",
      url: "https://schemas.example.test/a.json",
      urlHash: "abc",
      authors: [],
      patterns: [],
    },
  ],
};

describe("serializeSchemaIndex", () => {
  it("writes compact JSON with a trailing newline", () => {
    expect(serializeSchemaIndex({ schemas: [] })).toBe('{"schemas":[]}\n');
  });

  it("indents when pretty output is requested", () => {
    const text = serializeSchemaIndex({ schemas: [] }, { pretty: true });

    expect(text).toBe('{\n  "schemas": []\n}\n');
  });
});

describe("writeSchemaIndex", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "schema-index-output-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("creates missing parent directories", async () => {
    const outputPath = path.join(tmpDir, "public", "index.json");

    await writeSchemaIndex(outputPath, INDEX);

    expect(JSON.parse(await fs.readFile(outputPath, "utf8"))).toEqual(INDEX);
  });

  it("replaces an existing index", async () => {
    const outputPath = path.join(tmpDir, "index.json");
    await fs.writeFile(outputPath, "stale", "utf8");

    await writeSchemaIndex(outputPath, { schemas: [] });

    expect(await fs.readFile(outputPath, "utf8")).toBe('{"schemas":[]}\n');
  });

  it("reports unwritable paths as IO errors", async () => {
    const blocker = path.join(tmpDir, "file");
    await fs.writeFile(blocker, "", "utf8");
    const outputPath = path.join(blocker, "index.json");

    const error = await writeSchemaIndex(outputPath, INDEX).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ code: "IO_ERROR", message: `Could not write ${outputPath}.` });
    expect(error).toHaveProperty("cause", expect.any(OutputError));
  });
});
