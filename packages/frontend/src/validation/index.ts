/**
 * Validation - Public API
 */

export {
  validateDeclaration,
  validateDeclarations,
  type ValidationResult,
} from "./orchestrator.js";
export { validateShape } from "./shape-validator.js";
export {
  validateParameterForms,
  validateGenericParameters,
} from "./forms.js";
export { validateAuxiliaryOptions } from "./auxiliary-options.js";
