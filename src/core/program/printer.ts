/**
 * GraphQL Printer
 *
 * Prints Program definitions back to GraphQL text. Operation text sent to
 * servers is the operation followed by every fragment it reaches, sorted by
 * name.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type {
  Argument,
  ArgumentValue,
  Directive,
  ExecutableDefinition,
  Selection,
  VariableDefinition,
} from "../ir/index.js";
import type { Program } from "./program.js";

const INDENT = "  ";

export function printValue(value: ArgumentValue): string {
  switch (value.kind) {
    case "Literal":
      return value.graphql;
    case "Variable":
      return `$${value.variableName}`;
    case "ListValue":
      return `[${value.items.map(printValue).join(", ")}]`;
    case "ObjectValue":
      return `{${value.fields.map((field) => `${field.name}: ${printValue(field.value)}`).join(", ")}}`;
  }
}

function printArguments(args: readonly Argument[]): string {
  return args.length === 0 ? "" : `(${args.map((arg) => `${arg.name}: ${printValue(arg.value)}`).join(", ")})`;
}

function printDirectives(directives: readonly Directive[]): string {
  return directives.map((directive) => ` @${directive.name}${printArguments(directive.args)}`).join("");
}

function printVariableDefinitions(variables: readonly VariableDefinition[]): string {
  if (variables.length === 0) return "";
  const printed = variables.map((variable) => {
    const defaultValue = variable.defaultValue ? ` = ${variable.defaultValue.graphql}` : "";
    return `$${variable.name}: ${variable.type}${defaultValue}`;
  });
  return `(${printed.join(", ")})`;
}

function printSelections(selections: readonly Selection[], depth: number): string {
  const indent = INDENT.repeat(depth);
  const lines = selections.map((selection) => {
    switch (selection.kind) {
      case "ScalarField": {
        const alias = selection.alias ? `${selection.alias}: ` : "";
        return `${indent}${alias}${selection.name}${printArguments(selection.args)}${printDirectives(selection.directives)}`;
      }
      case "LinkedField": {
        const alias = selection.alias ? `${selection.alias}: ` : "";
        return `${indent}${alias}${selection.name}${printArguments(selection.args)}${printDirectives(
          selection.directives
        )} ${printSelectionSet(selection.selections, depth)}`;
      }
      case "InlineFragment":
        return `${indent}... on ${selection.typeCondition}${printDirectives(selection.directives)} ${printSelectionSet(
          selection.selections,
          depth
        )}`;
      case "FragmentSpread":
        return `${indent}...${selection.name}${printDirectives(selection.directives)}`;
    }
  });
  return lines.join("\n");
}

function printSelectionSet(selections: readonly Selection[], depth: number): string {
  return `{\n${printSelections(selections, depth + 1)}\n${INDENT.repeat(depth)}}`;
}

/**
 * Prints one definition.
 */
export function printDefinition(definition: ExecutableDefinition): string {
  const head =
    definition.kind === "Operation"
      ? `${definition.operation} ${definition.name}${printVariableDefinitions(definition.variableDefinitions)}`
      : `fragment ${definition.name} on ${definition.typeCondition}`;
  return `${head}${printDirectives(definition.directives)} ${printSelectionSet(definition.selections, 0)}`;
}

/**
 * Names of the fragments reachable from `selections`, resolved in `program`.
 */
export function collectReferencedFragments(program: Program, selections: readonly Selection[]): Set<string> {
  const seen = new Set<string>();
  const visit = (nodes: readonly Selection[]): void => {
    for (const selection of nodes) {
      if (selection.kind === "FragmentSpread") {
        if (seen.has(selection.name)) continue;
        const fragment = program.fragment(selection.name);
        if (!fragment) {
          throw new CompilerInvariantError(`Spread of fragment ${selection.name} missing from the program`);
        }
        seen.add(selection.name);
        visit(fragment.selections);
      } else if (selection.kind !== "ScalarField") {
        visit(selection.selections);
      }
    }
  };
  visit(selections);
  return seen;
}

/**
 * Full text of an operation: the operation, then its fragments by name.
 */
export function printOperationText(program: Program, operationName: string): string {
  const operation = program.operation(operationName);
  if (!operation) {
    throw new CompilerInvariantError(`Unknown operation ${operationName}`);
  }
  const fragments = [...collectReferencedFragments(program, operation.selections)]
    .sort()
    .flatMap((name) => program.fragment(name) ?? []);
  return [operation, ...fragments].map(printDefinition).join("\n\n");
}
