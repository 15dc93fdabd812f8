/**
 * Document Parsing
 *
 * Turns document files into source units and graphql-js definitions.
 *
 * @module
 */

import * as path from "node:path";
import { GraphQLError, parse, type DefinitionNode } from "graphql";
import type { Result } from "../../types/result.js";
import { ok, err } from "../../types/result.js";
import { DiagnosticCode, ValidationError, fileSource, toGraphQLSource, type SourceText } from "../source/index.js";
import { extractGraphQLTemplates } from "./extract.js";

/**
 * A document file as read from disk.
 */
export interface DocumentFile {
  /** Path relative to the config root, forward slashes */
  path: string;
  text: string;
}

export interface ParsedFile {
  /** Source units the file contributed, keyed by source key */
  sources: Map<string, SourceText>;
  definitions: DefinitionNode[];
  /** Syntax errors; the units they point into are in `sources` */
  errors: ValidationError[];
}

const GRAPHQL_EXTENSIONS = new Set([".graphql", ".gql"]);

export function isGraphQLFile(filePath: string): boolean {
  return GRAPHQL_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

function syntaxError(sourceKey: string, text: string, error: GraphQLError): ValidationError {
  const position = error.positions?.[0] ?? 0;
  const start = Math.min(position, text.length);
  return new ValidationError(DiagnosticCode.SYNTAX_ERROR, error.message, [
    { sourceKey, start, end: Math.min(start + 1, text.length) },
  ]);
}

function parseUnit(sourceKey: string, unit: SourceText): Result<DefinitionNode[], ValidationError> {
  try {
    return ok([...parse(toGraphQLSource(sourceKey, unit)).definitions]);
  } catch (error) {
    if (error instanceof GraphQLError) {
      return err(syntaxError(sourceKey, unit.text, error));
    }
    throw error;
  }
}

/**
 * Parses one document file. `.graphql` files are one source unit keyed by
 * their path; modules contribute one unit per tagged template, keyed
 * `<path>#<n>`, plus the host file itself (keyed by its path) for errors
 * about the templates.
 */
export function parseDocumentFile(file: DocumentFile): ParsedFile {
  const sources = new Map<string, SourceText>();
  const definitions: DefinitionNode[] = [];
  const errors: ValidationError[] = [];

  if (isGraphQLFile(file.path)) {
    const unit = fileSource(file.path, file.text);
    sources.set(file.path, unit);
    const result = parseUnit(file.path, unit);
    if (result.ok) definitions.push(...result.value);
    else errors.push(result.error);
    return { sources, definitions, errors };
  }

  sources.set(file.path, fileSource(file.path, file.text));
  extractGraphQLTemplates(file.text).forEach((template, index) => {
    if (template.interpolationOffset !== null) {
      errors.push(
        new ValidationError(
          DiagnosticCode.TEMPLATE_INTERPOLATION,
          "graphql templates cannot contain interpolations; spread fragments by name instead",
          [{ sourceKey: file.path, start: template.interpolationOffset, end: template.interpolationOffset + 2 }]
        )
      );
      return;
    }
    const sourceKey = `${file.path}#${index + 1}`;
    const unit: SourceText = { path: file.path, text: template.text, line: template.line, column: template.column };
    sources.set(sourceKey, unit);
    const result = parseUnit(sourceKey, unit);
    if (result.ok) definitions.push(...result.value);
    else errors.push(result.error);
  });

  return { sources, definitions, errors };
}
