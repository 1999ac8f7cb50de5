import fse from "fs-extra";

import { OutputError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import type { SchemaIndex } from "./schema.js";

export function serializeSchemaIndex(index: SchemaIndex, opts: { pretty?: boolean } = {}): string {
  const payload = opts.pretty ? JSON.stringify(index, null, 2) : JSON.stringify(index);
  return `${payload}\n`;
}

export async function writeSchemaIndex(
  outputPath: string,
  index: SchemaIndex,
  opts: { pretty?: boolean } = {},
): Promise<void> {
  try {
    await fse.outputFile(outputPath, serializeSchemaIndex(index, opts), "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.io,
      title: "Index file not written.",
      message: `Could not write ${outputPath}.`,
      hint: "Check that the output path is writable.",
      cause: new OutputError(`Failed to write ${outputPath}`, outputPath, err),
    });
  }
}
