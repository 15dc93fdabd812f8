export { validate } from "./validate.js";
export {
  DEFAULT_VALIDATION_RULES,
  MAX_SELECTION_DEPTH,
  moduleNameOf,
  validateModuleNames,
  validateRelayDirective,
  validateUnusedVariables,
  validateSelectionConflicts,
  validateSelectionDepth,
  type ValidationRule,
  type ValidationContext,
} from "./rules.js";
