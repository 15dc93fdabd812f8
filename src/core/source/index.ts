export {
  toGraphQLSource,
  fileSource,
  resolveLocation,
  type SourceText,
  type Sources,
  type Location,
  type ResolvedLocation,
} from "./sources.js";
export { DiagnosticCode, ValidationError, ResolvedValidationError } from "./validation-error.js";
