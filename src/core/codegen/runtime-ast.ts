/**
 * Runtime ASTs
 *
 * The JSON structures the client runtime reads: reader ASTs describe what a
 * component reads from the store, normalization ASTs describe how a response
 * is written into it.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type {
  Argument,
  ArgumentValue,
  Directive,
  FragmentDefinition,
  JsonValue,
  OperationDefinition,
  Selection,
  VariableDefinition,
} from "../ir/index.js";
import { findDirective, literalArgument } from "../ir/index.js";
import type { CompilerSchema } from "../schema/index.js";

// =============================================================================
// Node types
// =============================================================================

export type RuntimeArgument =
  | { kind: "Literal"; name: string; value: JsonValue }
  | { kind: "Variable"; name: string; variableName: string }
  | { kind: "ListValue"; name: string; items: RuntimeArgument[] }
  | { kind: "ObjectValue"; name: string; fields: RuntimeArgument[] };

export interface RuntimeScalarField {
  kind: "ScalarField";
  alias: string | null;
  name: string;
  args: RuntimeArgument[] | null;
  storageKey: string | null;
}

export interface RuntimeLinkedField {
  kind: "LinkedField";
  alias: string | null;
  name: string;
  args: RuntimeArgument[] | null;
  storageKey: string | null;
  concreteType: string | null;
  plural: boolean;
  selections: RuntimeSelection[];
}

export type RuntimeSelection =
  | RuntimeScalarField
  | RuntimeLinkedField
  | { kind: "InlineFragment"; type: string; abstractKey: string | null; selections: RuntimeSelection[] }
  | { kind: "FragmentSpread"; name: string; args: null }
  | { kind: "Condition"; condition: string; passingValue: boolean; selections: RuntimeSelection[] }
  | { kind: "ClientExtension"; selections: RuntimeSelection[] };

export interface LocalArgument {
  kind: "LocalArgument";
  name: string;
  defaultValue: JsonValue;
}

export interface ReaderFragment {
  kind: "Fragment";
  name: string;
  type: string;
  abstractKey: string | null;
  metadata: { plural?: true } | null;
  argumentDefinitions: LocalArgument[];
  selections: RuntimeSelection[];
}

export interface NormalizationOperation {
  kind: "Operation";
  name: string;
  argumentDefinitions: LocalArgument[];
  selections: RuntimeSelection[];
}

// =============================================================================
// Arguments
// =============================================================================

function convertValue(name: string, value: ArgumentValue): RuntimeArgument {
  switch (value.kind) {
    case "Literal":
      return { kind: "Literal", name, value: value.value };
    case "Variable":
      return { kind: "Variable", name, variableName: value.variableName };
    case "ListValue":
      return { kind: "ListValue", name, items: value.items.map((item, index) => convertValue(String(index), item)) };
    case "ObjectValue":
      return { kind: "ObjectValue", name, fields: value.fields.map((field) => convertValue(field.name, field.value)) };
  }
}

function sortedArgs(args: readonly Argument[]): Argument[] {
  return [...args].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Store key of a field whose arguments are all constant:
 * `friends(first:10,orderBy:"name")`. Null without arguments or when an
 * argument depends on a variable.
 */
export function storageKey(name: string, args: readonly Argument[]): string | null {
  if (args.length === 0) return null;
  const printed: string[] = [];
  for (const arg of sortedArgs(args)) {
    if (arg.value.kind !== "Literal") return null;
    printed.push(`${arg.name}:${JSON.stringify(arg.value.value)}`);
  }
  return `${name}(${printed.join(",")})`;
}

function runtimeArgs(args: readonly Argument[]): RuntimeArgument[] | null {
  return args.length === 0 ? null : sortedArgs(args).map((arg) => convertValue(arg.name, arg.value));
}

function localArguments(variables: readonly VariableDefinition[]): LocalArgument[] {
  return variables.map((variable): LocalArgument => ({
    kind: "LocalArgument",
    name: variable.name,
    defaultValue: variable.defaultValue?.value ?? null,
  }));
}

// =============================================================================
// Selections
// =============================================================================

type Mode = "reader" | "normalization";

/**
 * Wraps `node` for `@include`/`@skip`. Returns null when a constant
 * condition excludes it.
 */
function applyConditions(directives: readonly Directive[], node: RuntimeSelection): RuntimeSelection | null {
  let result: RuntimeSelection = node;
  for (const name of ["skip", "include"] as const) {
    const directive = findDirective(directives, name);
    const condition = directive?.args.find((arg) => arg.name === "if")?.value;
    if (!condition) continue;
    const passingValue = name === "include";
    if (condition.kind === "Literal") {
      if (condition.value !== passingValue) return null;
      continue;
    }
    if (condition.kind !== "Variable") {
      throw new CompilerInvariantError(`@${name}(if:) must be a Boolean or a variable`);
    }
    result = { kind: "Condition", condition: condition.variableName, passingValue, selections: [result] };
  }
  return result;
}

function abstractKey(schema: CompilerSchema, typeName: string): string | null {
  return schema.isAbstractType(typeName) ? `__is${typeName}` : null;
}

function convertSelection(
  schema: CompilerSchema,
  selection: Selection,
  mode: Mode
): { node: RuntimeSelection; isClient: boolean } {
  switch (selection.kind) {
    case "ScalarField":
      return {
        node: {
          kind: "ScalarField",
          alias: selection.alias,
          name: selection.name,
          args: runtimeArgs(selection.args),
          storageKey: storageKey(selection.name, selection.args),
        },
        isClient: schema.isClientField(selection.parentType, selection.name),
      };
    case "LinkedField":
      return {
        node: {
          kind: "LinkedField",
          alias: selection.alias,
          name: selection.name,
          args: runtimeArgs(selection.args),
          storageKey: storageKey(selection.name, selection.args),
          concreteType: selection.concreteType,
          plural: selection.plural,
          selections: convertSelections(schema, selection.selections, mode),
        },
        isClient: schema.isClientField(selection.parentType, selection.name),
      };
    case "InlineFragment":
      return {
        node: {
          kind: "InlineFragment",
          type: selection.typeCondition,
          abstractKey: abstractKey(schema, selection.typeCondition),
          selections: convertSelections(schema, selection.selections, mode),
        },
        isClient: schema.isClientType(selection.typeCondition),
      };
    case "FragmentSpread":
      if (mode === "normalization") {
        throw new CompilerInvariantError(`Fragment spread ${selection.name} left in a normalization program`);
      }
      return { node: { kind: "FragmentSpread", name: selection.name, args: null }, isClient: false };
  }
}

/**
 * Converts a selection set. Client extension selections move into one
 * trailing ClientExtension node.
 */
function convertSelections(schema: CompilerSchema, selections: readonly Selection[], mode: Mode): RuntimeSelection[] {
  const server: RuntimeSelection[] = [];
  const client: RuntimeSelection[] = [];

  for (const selection of selections) {
    const { node, isClient } = convertSelection(schema, selection, mode);
    const conditioned = applyConditions(selection.directives, node);
    if (!conditioned) continue;
    (isClient ? client : server).push(conditioned);
  }

  return client.length > 0 ? [...server, { kind: "ClientExtension", selections: client }] : server;
}

// =============================================================================
// Definitions
// =============================================================================

export function buildReaderAst(
  schema: CompilerSchema,
  definition: OperationDefinition | FragmentDefinition
): ReaderFragment {
  if (definition.kind === "Operation") {
    return {
      kind: "Fragment",
      name: definition.name,
      type: definition.type,
      abstractKey: null,
      metadata: null,
      argumentDefinitions: localArguments(definition.variableDefinitions),
      selections: convertSelections(schema, definition.selections, "reader"),
    };
  }

  const plural = literalArgument(findDirective(definition.directives, "relay"), "plural") === true;
  return {
    kind: "Fragment",
    name: definition.name,
    type: definition.typeCondition,
    abstractKey: abstractKey(schema, definition.typeCondition),
    metadata: plural ? { plural: true } : null,
    argumentDefinitions: [],
    selections: convertSelections(schema, definition.selections, "reader"),
  };
}

export function buildNormalizationAst(schema: CompilerSchema, operation: OperationDefinition): NormalizationOperation {
  return {
    kind: "Operation",
    name: operation.name,
    argumentDefinitions: localArguments(operation.variableDefinitions),
    selections: convertSelections(schema, operation.selections, "normalization"),
  };
}
