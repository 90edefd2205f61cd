export * from "./runtime/index.js";
export { builtinSchemas, achievements, archivesBook, helper, nature } from "./schemas/index.js";
