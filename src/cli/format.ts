/**
 * Plain-text rendering of build failures for the terminal. Colors are added
 * by the commands, so these functions stay deterministic.
 */

import { SchemaBuildError, ValidationErrors, type BuildProjectError, type ProjectCrashError } from "../core/errors.js";
import type { ResolvedLocation, ResolvedValidationError } from "../core/source/index.js";

function caretWidth(location: ResolvedLocation): number {
  if (location.endLine === location.line) {
    return Math.max(1, location.endColumn - location.column);
  }
  return Math.max(1, location.lineText.length - location.lineTextColumn + 1);
}

/**
 * The offending source line with a caret under the range.
 */
export function formatSnippet(location: ResolvedLocation): string[] {
  const indent = " ".repeat(location.lineTextColumn - 1);
  return [`  ${location.lineText}`, `  ${indent}${"^".repeat(caretWidth(location))}`];
}

/**
 * `path:line:column: [CODE] message`, the snippet of the first location and
 * one `also at` line per further location.
 */
export function formatValidationError(error: ResolvedValidationError): string[] {
  const [first, ...rest] = error.locations;
  const lines = [error.toString()];
  if (first) {
    lines.push(...formatSnippet(first));
  }
  for (const location of rest) {
    lines.push(`  also at ${location.path}:${location.line}:${location.column}`);
  }
  return lines;
}

/**
 * Detail lines of a failed project build.
 */
export function formatBuildError(error: BuildProjectError | ProjectCrashError): string[] {
  if (error instanceof ValidationErrors) {
    return error.errors.flatMap((e) => formatValidationError(e));
  }
  if (error instanceof SchemaBuildError) {
    return error.details.map((detail) => `  - ${detail}`);
  }
  return error.message.split("\n");
}
