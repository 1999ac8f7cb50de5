import { resolveBuildConfig, type BuildConfig, type BuildOptionsInput } from "../core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "../core/error-format.js";
import {
  createTeeLogger,
  JsonlLogger,
  logIndexEvent,
  StreamLogger,
  type IndexLogger,
} from "../core/logger.js";
import { buildSchemaIndex, type SchemaIndexBuildPorts } from "../schema-index/build.js";
import { writeSchemaIndex } from "../schema-index/output.js";

export type BuildCommandDeps = {
  ports?: Partial<SchemaIndexBuildPorts>;
  now?: () => Date;
  cwd?: string;
  stderr?: { write(chunk: string): unknown; isTTY?: boolean };
};

export async function buildCommand(opts: BuildOptionsInput, deps: BuildCommandDeps = {}): Promise<void> {
  const stderr = deps.stderr ?? process.stderr;
  let debug = opts.debug ?? false;

  try {
    const config = resolveBuildConfig(opts, deps.cwd);
    debug = config.debug;
    const logger = createCliLogger(config, stderr);

    const index = await buildSchemaIndex(
      {
        gitPath: config.gitPath,
        scanDir: config.scanDir,
        baseUrl: config.baseUrl,
        schemaStore: config.schemaStore,
        catalogUrl: config.catalogUrl,
        catalogTimeoutMs: config.catalogTimeoutMs,
        now: deps.now ? deps.now() : new Date(),
        logger,
      },
      deps.ports,
    );

    await writeSchemaIndex(config.outputPath, index, { pretty: config.pretty });
    logIndexEvent(logger, "index.written", {
      path: config.outputPath,
      schemas: index.schemas.length,
    });

    console.log(`Wrote ${index.schemas.length} schema(s) to ${config.outputPath}`);
  } catch (error) {
    const format = createAnsiFormatter(resolveColorEnabled({ stream: stderr }));
    const lines = formatErrorLines(error, { mode: debug ? "debug" : "short" });
    for (const line of renderErrorLines(lines, format)) {
      console.error(line);
    }
    process.exitCode = 1;
  }
}

function createCliLogger(config: BuildConfig, stderr: { write(chunk: string): unknown }): IndexLogger {
  const minLevel = config.debug ? "debug" : config.verbose ? "info" : "warn";
  const loggers: IndexLogger[] = [new StreamLogger(stderr, { minLevel })];

  if (config.logFile) {
    loggers.push(new JsonlLogger(config.logFile, { out: config.outputPath }));
  }

  return loggers.length === 1 ? loggers[0] : createTeeLogger(loggers);
}
