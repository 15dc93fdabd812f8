/**
 * Validation Errors
 *
 * Errors produced by type checking and semantic validation. They carry
 * abstract locations until the build driver resolves them against the
 * source text set.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import { resolveLocation, type Location, type ResolvedLocation, type Sources } from "./sources.js";

/**
 * Diagnostic codes for type and validation errors
 */
export enum DiagnosticCode {
  // Document parsing
  SYNTAX_ERROR = "SYNTAX_ERROR",
  TEMPLATE_INTERPOLATION = "TEMPLATE_INTERPOLATION",

  // Type checking (IR construction)
  UNKNOWN_FIELD = "UNKNOWN_FIELD",
  UNKNOWN_TYPE = "UNKNOWN_TYPE",
  UNKNOWN_FRAGMENT = "UNKNOWN_FRAGMENT",
  UNKNOWN_ARGUMENT = "UNKNOWN_ARGUMENT",
  MISSING_REQUIRED_ARGUMENT = "MISSING_REQUIRED_ARGUMENT",
  INVALID_ARGUMENT_VALUE = "INVALID_ARGUMENT_VALUE",
  MISSING_SELECTION = "MISSING_SELECTION",
  UNEXPECTED_SELECTION = "UNEXPECTED_SELECTION",
  INVALID_FRAGMENT_SPREAD = "INVALID_FRAGMENT_SPREAD",
  FRAGMENT_CYCLE = "FRAGMENT_CYCLE",
  INVALID_TYPE_CONDITION = "INVALID_TYPE_CONDITION",
  UNKNOWN_DIRECTIVE = "UNKNOWN_DIRECTIVE",
  MISPLACED_DIRECTIVE = "MISPLACED_DIRECTIVE",
  UNDEFINED_VARIABLE = "UNDEFINED_VARIABLE",
  DUPLICATE_DEFINITION = "DUPLICATE_DEFINITION",
  UNNAMED_OPERATION = "UNNAMED_OPERATION",
  NON_EXECUTABLE_DEFINITION = "NON_EXECUTABLE_DEFINITION",
  UNKNOWN_ROOT_TYPE = "UNKNOWN_ROOT_TYPE",

  // Semantic validation
  INVALID_MODULE_NAME = "INVALID_MODULE_NAME",
  INVALID_RELAY_DIRECTIVE = "INVALID_RELAY_DIRECTIVE",
  UNUSED_VARIABLE = "UNUSED_VARIABLE",
  SELECTION_CONFLICT = "SELECTION_CONFLICT",
  SELECTION_TOO_DEEP = "SELECTION_TOO_DEEP",
}

/**
 * A rule violation with unresolved locations.
 */
export class ValidationError {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly locations: readonly Location[];

  constructor(code: DiagnosticCode, message: string, locations: readonly Location[]) {
    this.code = code;
    this.message = message;
    this.locations = locations;
  }

  /**
   * Attaches literal source context to every location.
   *
   * @throws CompilerInvariantError when a location cannot be resolved: the
   * stage that produced this error is at fault.
   */
  withSources(sources: Sources): ResolvedValidationError {
    if (this.locations.length === 0) {
      throw new CompilerInvariantError(`Validation error without a location: ${this.message}`, {
        code: this.code,
      });
    }
    const locations = this.locations.map((location) => {
      const resolved = resolveLocation(sources, location);
      if (!resolved) {
        throw new CompilerInvariantError(
          `Cannot resolve location ${location.sourceKey}:${location.start}-${location.end} of error: ${this.message}`,
          { code: this.code, sourceKey: location.sourceKey }
        );
      }
      return resolved;
    });
    return new ResolvedValidationError(this.code, this.message, locations);
  }
}

/**
 * A rule violation pointing at concrete source text.
 */
export class ResolvedValidationError {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly locations: readonly ResolvedLocation[];

  constructor(code: DiagnosticCode, message: string, locations: readonly ResolvedLocation[]) {
    this.code = code;
    this.message = message;
    this.locations = locations;
  }

  /**
   * `path:line:column: [CODE] message`, using the first location.
   */
  toString(): string {
    const [first] = this.locations;
    const where = first ? `${first.path}:${first.line}:${first.column}: ` : "";
    return `${where}[${this.code}] ${this.message}`;
  }
}
