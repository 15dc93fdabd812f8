/**
 * IR Types
 *
 * Typed, schema-checked form of executable documents. Every node is
 * read-only; transforms build new nodes instead of editing old ones.
 *
 * @module
 */

import type { Location } from "../source/index.js";

// =============================================================================
// Values
// =============================================================================

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * A constant value. `graphql` keeps the printed form so enum values survive
 * printing unquoted.
 */
export interface Literal {
  readonly kind: "Literal";
  readonly value: JsonValue;
  readonly graphql: string;
}

export interface Variable {
  readonly kind: "Variable";
  readonly variableName: string;
  /** Input type expected where the variable is used */
  readonly type: string;
}

export interface ListValue {
  readonly kind: "ListValue";
  readonly items: readonly ArgumentValue[];
}

export interface ObjectValue {
  readonly kind: "ObjectValue";
  readonly fields: readonly { readonly name: string; readonly value: ArgumentValue }[];
}

export type ArgumentValue = Literal | Variable | ListValue | ObjectValue;

export interface Argument {
  readonly kind: "Argument";
  readonly name: string;
  readonly value: ArgumentValue;
  readonly loc: Location;
}

export interface Directive {
  readonly kind: "Directive";
  readonly name: string;
  readonly args: readonly Argument[];
  readonly loc: Location;
}

// =============================================================================
// Selections
// =============================================================================

export interface ScalarField {
  readonly kind: "ScalarField";
  readonly alias: string | null;
  readonly name: string;
  /** Printed output type, e.g. `ID!` */
  readonly type: string;
  readonly parentType: string;
  readonly args: readonly Argument[];
  readonly directives: readonly Directive[];
  readonly loc: Location;
}

export interface LinkedField {
  readonly kind: "LinkedField";
  readonly alias: string | null;
  readonly name: string;
  readonly type: string;
  readonly parentType: string;
  /** Name of the field's object type, null for abstract types */
  readonly concreteType: string | null;
  readonly plural: boolean;
  readonly args: readonly Argument[];
  readonly directives: readonly Directive[];
  readonly selections: readonly Selection[];
  readonly loc: Location;
}

export interface InlineFragment {
  readonly kind: "InlineFragment";
  /** Type condition; the parent type when the document omitted one */
  readonly typeCondition: string;
  readonly directives: readonly Directive[];
  readonly selections: readonly Selection[];
  readonly loc: Location;
}

export interface FragmentSpread {
  readonly kind: "FragmentSpread";
  readonly name: string;
  readonly directives: readonly Directive[];
  readonly loc: Location;
}

export type Field = ScalarField | LinkedField;
export type Selection = ScalarField | LinkedField | InlineFragment | FragmentSpread;

// =============================================================================
// Definitions
// =============================================================================

export type OperationKind = "query" | "mutation" | "subscription";

export interface VariableDefinition {
  readonly kind: "VariableDefinition";
  readonly name: string;
  readonly type: string;
  readonly defaultValue: Literal | null;
  readonly loc: Location;
}

export interface OperationDefinition {
  readonly kind: "Operation";
  readonly operation: OperationKind;
  readonly name: string;
  /** Root type name */
  readonly type: string;
  readonly variableDefinitions: readonly VariableDefinition[];
  readonly directives: readonly Directive[];
  readonly selections: readonly Selection[];
  readonly loc: Location;
}

export interface FragmentDefinition {
  readonly kind: "Fragment";
  readonly name: string;
  readonly typeCondition: string;
  readonly directives: readonly Directive[];
  readonly selections: readonly Selection[];
  readonly loc: Location;
}

export type ExecutableDefinition = OperationDefinition | FragmentDefinition;

/**
 * Response key of a field: its alias, or its name.
 */
export function responseKey(field: Field): string {
  return field.alias ?? field.name;
}

/**
 * Finds a directive by name.
 */
export function findDirective(directives: readonly Directive[], name: string): Directive | undefined {
  return directives.find((directive) => directive.name === name);
}

/**
 * Literal value of a directive argument, undefined when absent or not literal.
 */
export function literalArgument(directive: Directive | undefined, name: string): JsonValue | undefined {
  const arg = directive?.args.find((a) => a.name === name);
  return arg?.value.kind === "Literal" ? arg.value.value : undefined;
}
