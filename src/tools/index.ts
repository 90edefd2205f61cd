export {
  decodeFile,
  decodeAll,
  decodeLogged,
  decodePlanned,
  planDocuments,
  reportFailure,
  DocumentError,
} from "./decode.js";
export type {
  DecodeFileOptions,
  DecodeFileResult,
  PlannedDocument,
  Plan,
  BatchOptions,
  BatchResult,
} from "./decode.js";

export { SchemaRegistry, loadDescriptorFile, formatSchemas } from "./registry.js";

export { loadConfig, resolveConfig, defineConfig, MAX_DEPTH_ENV } from "./config.js";
export type { CfgbinConfig, DocumentConfig, ResolvedConfig } from "./config.js";

export { watch, decodeChanged } from "./watch.js";
export { toJson } from "./json.js";
