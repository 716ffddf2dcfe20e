/**
 * methodcheck frontend - classification and validation of exposed
 * method declarations
 */

export * from "./types/diagnostic.js";
export * from "./types/result.js";
export * from "./model/index.js";
export * from "./options.js";
export {
  resolveMetadata,
  type ResolvedMetadata,
} from "./resolution/metadata-resolver.js";
export { classifyRole } from "./resolution/role-classifier.js";
export { resolveExposedName } from "./naming.js";
export * from "./validation/index.js";
export {
  loadDeclarationBatch,
  parseDeclarationBatch,
} from "./batch/loader.js";
