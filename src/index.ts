export { main, buildCli } from "./cli/index.js";
export { buildSchemaIndex } from "./schema-index/build.js";
export type { SchemaIndexBuildOptions, SchemaIndexBuildPorts } from "./schema-index/build.js";
export { fetchCatalog, integrateCatalog, parseCatalog } from "./schema-index/catalog.js";
export { globToRegex } from "./schema-index/glob-regex.js";
export { resolveSchemaHistory } from "./schema-index/history-resolver.js";
export { buildSchemaRecord, hashUrl } from "./schema-index/schema-record.js";
export { serializeSchemaIndex, writeSchemaIndex } from "./schema-index/output.js";
export type {
  CommitRecord,
  CommitSource,
  SchemaIndex,
  SchemaIndexEntry,
} from "./schema-index/schema.js";
