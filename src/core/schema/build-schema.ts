/**
 * Schema Builder
 *
 * Builds the typed schema of one project: its server schema sources, the
 * compiler's own directives, then the project's client extensions.
 *
 * @module
 */

import {
  GraphQLError,
  Kind,
  Source,
  buildASTSchema,
  extendSchema,
  parse,
  validateSchema,
  type DefinitionNode,
  type DocumentNode,
  type GraphQLSchema,
} from "graphql";
import type { ProjectConfig } from "../config/index.js";
import type { CompilerState, SchemaDocument } from "../state/index.js";
import { SchemaBuildError, ErrorCode, errorMessage } from "../errors.js";
import type { Result } from "../../types/result.js";
import { ok, err, partition } from "../../types/result.js";
import { CompilerSchema } from "./compiler-schema.js";

/**
 * Directives the compiler understands in documents. Added to every project
 * schema.
 */
export const COMPILER_DIRECTIVES_SDL = `
directive @relay(plural: Boolean, mask: Boolean) on FRAGMENT_DEFINITION | FRAGMENT_SPREAD
directive @inline on FRAGMENT_DEFINITION
`;

export const COMPILER_DIRECTIVE_NAMES: ReadonlySet<string> = new Set(["relay", "inline"]);

function describeGraphQLError(filePath: string, error: GraphQLError): string {
  const [location] = error.locations ?? [];
  return location ? `${filePath}:${location.line}:${location.column}: ${error.message}` : `${filePath}: ${error.message}`;
}

function parseSchemaDocument(document: SchemaDocument): Result<readonly DefinitionNode[], string> {
  try {
    return ok(parse(new Source(document.text, document.path)).definitions);
  } catch (error) {
    if (error instanceof GraphQLError) return err(describeGraphQLError(document.path, error));
    throw error;
  }
}

function parseAll(documents: readonly SchemaDocument[]): Result<DocumentNode, string[]> {
  const { oks, errs } = partition(documents.map(parseSchemaDocument));
  if (errs.length > 0) return err(errs);
  return ok({ kind: Kind.DOCUMENT, definitions: oks.flat() });
}

/**
 * graphql-js reports SDL validation failures as one error whose message
 * joins the individual messages with blank lines.
 */
function splitSDLErrors(error: unknown): string[] {
  return errorMessage(error)
    .split("\n\n")
    .map((message) => message.trim())
    .filter((message) => message.length > 0);
}

function validationMessages(schema: GraphQLSchema): string[] {
  return validateSchema(schema).map((error) => error.message);
}

/**
 * Types and fields declared by client extension documents.
 */
function collectClientDeclarations(document: DocumentNode): {
  clientTypes: Set<string>;
  clientFields: Map<string, Set<string>>;
} {
  const clientTypes = new Set<string>();
  const clientFields = new Map<string, Set<string>>();

  for (const definition of document.definitions) {
    switch (definition.kind) {
      case Kind.OBJECT_TYPE_DEFINITION:
      case Kind.INTERFACE_TYPE_DEFINITION:
      case Kind.UNION_TYPE_DEFINITION:
      case Kind.ENUM_TYPE_DEFINITION:
      case Kind.SCALAR_TYPE_DEFINITION:
      case Kind.INPUT_OBJECT_TYPE_DEFINITION:
        clientTypes.add(definition.name.value);
        break;
      case Kind.OBJECT_TYPE_EXTENSION:
      case Kind.INTERFACE_TYPE_EXTENSION: {
        const fields = clientFields.get(definition.name.value) ?? new Set<string>();
        for (const field of definition.fields ?? []) fields.add(field.name.value);
        clientFields.set(definition.name.value, fields);
        break;
      }
      default:
        break;
    }
  }

  return { clientTypes, clientFields };
}

/**
 * Builds the schema of `projectConfig` from the texts held by compiler state.
 */
export function buildSchema(
  compilerState: CompilerState,
  projectConfig: ProjectConfig
): Result<CompilerSchema, SchemaBuildError> {
  const project = projectConfig.name;
  const schemaDocuments = compilerState.schemas.get(project) ?? [];
  if (schemaDocuments.length === 0) {
    return err(
      new SchemaBuildError(project, [`No schema files match ${projectConfig.schema.join(", ")}`], ErrorCode.SCHEMA_MISSING)
    );
  }

  const base = parseAll([...schemaDocuments, { path: "<compiler directives>", text: COMPILER_DIRECTIVES_SDL }]);
  if (!base.ok) return err(new SchemaBuildError(project, base.error));

  let schema: GraphQLSchema;
  try {
    schema = buildASTSchema(base.value);
  } catch (error) {
    return err(new SchemaBuildError(project, splitSDLErrors(error)));
  }
  const baseErrors = validationMessages(schema);
  if (baseErrors.length > 0) return err(new SchemaBuildError(project, baseErrors));

  const extensionDocuments = compilerState.extensions.get(project) ?? [];
  if (extensionDocuments.length === 0) {
    return ok(new CompilerSchema(schema));
  }

  const extensions = parseAll(extensionDocuments);
  if (!extensions.ok) return err(new SchemaBuildError(project, extensions.error));

  try {
    schema = extendSchema(schema, extensions.value);
  } catch (error) {
    return err(new SchemaBuildError(project, splitSDLErrors(error)));
  }
  const extendedErrors = validationMessages(schema);
  if (extendedErrors.length > 0) return err(new SchemaBuildError(project, extendedErrors));

  const { clientTypes, clientFields } = collectClientDeclarations(extensions.value);
  return ok(new CompilerSchema(schema, clientTypes, clientFields));
}
