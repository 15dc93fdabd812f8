/**
 * Validation Rules
 *
 * Semantic checks beyond type checking. Each rule reports every violation it
 * finds; none of them edits the Program.
 *
 * @module
 */

import * as path from "node:path";
import type {
  Argument,
  ArgumentValue,
  Directive,
  ExecutableDefinition,
  Field,
  LinkedField,
  Selection,
} from "../ir/index.js";
import { findDirective, literalArgument, responseKey } from "../ir/index.js";
import { collectReferencedFragments, forEachSelection, printValue, type Program } from "../program/index.js";
import { DiagnosticCode, ValidationError } from "../source/index.js";
import { CompilerInvariantError } from "../errors.js";

export interface ValidationContext {
  /** Fragments owned by the base project; rules do not check them again */
  baseFragmentNames: ReadonlySet<string>;
}

export interface ValidationRule {
  readonly name: string;
  validate(program: Program, context: ValidationContext): ValidationError[];
}

function ownDefinitions(program: Program, context: ValidationContext): ExecutableDefinition[] {
  return program.definitions().filter((d) => !(d.kind === "Fragment" && context.baseFragmentNames.has(d.name)));
}

/** Maximum selection nesting */
export const MAX_SELECTION_DEPTH = 30;

// =============================================================================
// Module names
// =============================================================================

/**
 * Module name of a source key: the file base name up to its first dot,
 * without non-word characters. `src/UserCard.react.ts#2` → `UserCard`.
 */
export function moduleNameOf(sourceKey: string): string {
  const filePath = sourceKey.replace(/#\d+$/, "");
  const [stem = ""] = path.posix.basename(filePath).split(".");
  return stem.replace(/\W/g, "");
}

const OPERATION_SUFFIXES = {
  query: "Query",
  mutation: "Mutation",
  subscription: "Subscription",
} as const;

export const validateModuleNames: ValidationRule = {
  name: "validateModuleNames",
  validate(program, context) {
    const errors: ValidationError[] = [];
    for (const definition of ownDefinitions(program, context)) {
      const moduleName = moduleNameOf(definition.loc.sourceKey);
      if (definition.kind === "Operation") {
        const suffix = OPERATION_SUFFIXES[definition.operation];
        if (!definition.name.startsWith(moduleName) || !definition.name.endsWith(suffix)) {
          errors.push(
            new ValidationError(
              DiagnosticCode.INVALID_MODULE_NAME,
              `Operation "${definition.name}" must be named "${moduleName}<Name>${suffix}": start with the module name "${moduleName}" and end with "${suffix}".`,
              [definition.loc]
            )
          );
        }
      } else if (!definition.name.startsWith(`${moduleName}_`)) {
        errors.push(
          new ValidationError(
            DiagnosticCode.INVALID_MODULE_NAME,
            `Fragment "${definition.name}" must be named "${moduleName}_<propName>": start with the module name "${moduleName}_".`,
            [definition.loc]
          )
        );
      }
    }
    return errors;
  },
};

// =============================================================================
// @relay and @inline
// =============================================================================

function hasArgument(directive: Directive, name: string): boolean {
  return directive.args.some((arg) => arg.name === name);
}

export const validateRelayDirective: ValidationRule = {
  name: "validateRelayDirective",
  validate(program, context) {
    const errors: ValidationError[] = [];
    const report = (message: string, directive: Directive): void => {
      errors.push(new ValidationError(DiagnosticCode.INVALID_RELAY_DIRECTIVE, message, [directive.loc]));
    };

    for (const definition of ownDefinitions(program, context)) {
      const relay = findDirective(definition.directives, "relay");
      if (relay) {
        if (hasArgument(relay, "mask")) {
          report("@relay(mask:) is only allowed on fragment spreads.", relay);
        }
        if (!hasArgument(relay, "plural") && !hasArgument(relay, "mask")) {
          report("@relay expects a plural or mask argument.", relay);
        }
        const inline = findDirective(definition.directives, "inline");
        if (inline && literalArgument(relay, "plural") === true) {
          report(`Fragment "${definition.name}" cannot be both @inline and plural.`, relay);
        }
      }

      forEachSelection(definition.selections, (selection) => {
        if (selection.kind !== "FragmentSpread") return;
        const spreadRelay = findDirective(selection.directives, "relay");
        if (!spreadRelay) return;
        if (hasArgument(spreadRelay, "plural")) {
          report("@relay(plural:) is only allowed on fragment definitions.", spreadRelay);
        }
        if (!hasArgument(spreadRelay, "plural") && !hasArgument(spreadRelay, "mask")) {
          report("@relay expects a plural or mask argument.", spreadRelay);
        }
        const target = program.fragment(selection.name);
        if (
          literalArgument(spreadRelay, "mask") === false &&
          target &&
          findDirective(target.directives, "inline")
        ) {
          report(`Cannot unmask @inline fragment "${selection.name}".`, spreadRelay);
        }
      });
    }
    return errors;
  },
};

// =============================================================================
// Unused variables
// =============================================================================

function collectValueVariables(value: ArgumentValue, into: Set<string>): void {
  switch (value.kind) {
    case "Variable":
      into.add(value.variableName);
      break;
    case "ListValue":
      value.items.forEach((item) => collectValueVariables(item, into));
      break;
    case "ObjectValue":
      value.fields.forEach((field) => collectValueVariables(field.value, into));
      break;
    case "Literal":
      break;
  }
}

function collectArgumentVariables(args: readonly Argument[], into: Set<string>): void {
  for (const arg of args) collectValueVariables(arg.value, into);
}

function collectSelectionVariables(selections: readonly Selection[], into: Set<string>): void {
  forEachSelection(selections, (selection) => {
    for (const directive of selection.directives) collectArgumentVariables(directive.args, into);
    if (selection.kind === "ScalarField" || selection.kind === "LinkedField") {
      collectArgumentVariables(selection.args, into);
    }
  });
}

export const validateUnusedVariables: ValidationRule = {
  name: "validateUnusedVariables",
  validate(program) {
    const errors: ValidationError[] = [];
    for (const operation of program.operations()) {
      const used = new Set<string>();
      for (const directive of operation.directives) collectArgumentVariables(directive.args, used);
      collectSelectionVariables(operation.selections, used);
      for (const name of collectReferencedFragments(program, operation.selections)) {
        const fragment = program.fragment(name);
        if (fragment) {
          for (const directive of fragment.directives) collectArgumentVariables(directive.args, used);
          collectSelectionVariables(fragment.selections, used);
        }
      }

      for (const variable of operation.variableDefinitions) {
        if (!used.has(variable.name)) {
          errors.push(
            new ValidationError(
              DiagnosticCode.UNUSED_VARIABLE,
              `Variable "$${variable.name}" is never used in operation "${operation.name}".`,
              [variable.loc]
            )
          );
        }
      }
    }
    return errors;
  },
};

// =============================================================================
// Selection conflicts
// =============================================================================

function printArgs(args: readonly Argument[]): string {
  return [...args]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((arg) => `${arg.name}:${printValue(arg.value)}`)
    .join(",");
}

/**
 * Fields of a selection set grouped by response key, looking through inline
 * fragments and fragment spreads the way the executor merges them.
 */
function collectFields(
  program: Program,
  selections: readonly Selection[],
  groups: Map<string, Field[]>,
  visitedFragments: Set<string>
): void {
  for (const selection of selections) {
    switch (selection.kind) {
      case "ScalarField":
      case "LinkedField": {
        const key = responseKey(selection);
        const group = groups.get(key);
        if (group) group.push(selection);
        else groups.set(key, [selection]);
        break;
      }
      case "InlineFragment":
        collectFields(program, selection.selections, groups, visitedFragments);
        break;
      case "FragmentSpread": {
        if (visitedFragments.has(selection.name)) break;
        visitedFragments.add(selection.name);
        const fragment = program.fragment(selection.name);
        if (!fragment) {
          throw new CompilerInvariantError(`Spread of fragment ${selection.name} missing from the program`);
        }
        collectFields(program, fragment.selections, groups, visitedFragments);
        break;
      }
    }
  }
}

/**
 * Fields on two different object types never apply to the same object.
 */
function mutuallyExclusive(program: Program, a: Field, b: Field): boolean {
  return (
    a.parentType !== b.parentType &&
    !program.schema.isAbstractType(a.parentType) &&
    !program.schema.isAbstractType(b.parentType)
  );
}

function conflictReason(program: Program, a: Field, b: Field): string | null {
  if (!mutuallyExclusive(program, a, b)) {
    if (a.name !== b.name) return `"${a.name}" and "${b.name}" are different fields`;
    if (printArgs(a.args) !== printArgs(b.args)) return "they have differing arguments";
  }
  if (a.type !== b.type) return `they return conflicting types "${a.type}" and "${b.type}"`;
  return null;
}

interface ConflictScan {
  program: Program;
  errors: ValidationError[];
  /** Field pairs already reported, by location */
  reported: Set<string>;
}

function reportConflicts(scan: ConflictScan, key: string, fields: readonly Field[]): void {
  for (let i = 1; i < fields.length; i++) {
    const field = fields[i];
    if (!field) continue;
    for (const previous of fields.slice(0, i)) {
      const reason = conflictReason(scan.program, previous, field);
      if (!reason) continue;
      const pair = `${previous.loc.sourceKey}:${previous.loc.start}|${field.loc.sourceKey}:${field.loc.start}`;
      if (!scan.reported.has(pair)) {
        scan.reported.add(pair);
        scan.errors.push(
          new ValidationError(
            DiagnosticCode.SELECTION_CONFLICT,
            `Fields "${key}" conflict because ${reason}. Use different aliases on the fields.`,
            [previous.loc, field.loc]
          )
        );
      }
      break;
    }
  }
}

/**
 * Checks the merged selections of several selection sets that write into the
 * same response object, then the merged sub-selections of every key.
 */
function checkMergedSelections(scan: ConflictScan, selectionSets: readonly (readonly Selection[])[]): void {
  const groups = new Map<string, Field[]>();
  const visitedFragments = new Set<string>();
  for (const selections of selectionSets) {
    collectFields(scan.program, selections, groups, visitedFragments);
  }

  for (const [key, fields] of groups) {
    reportConflicts(scan, key, fields);

    const linked = fields.filter((field): field is LinkedField => field.kind === "LinkedField");
    if (linked.length === 0) continue;
    const objectParents = new Set(
      linked.map((field) => field.parentType).filter((type) => !scan.program.schema.isAbstractType(type))
    );
    if (objectParents.size <= 1) {
      checkMergedSelections(scan, linked.map((field) => field.selections));
      continue;
    }
    // Fields on different object types only merge with fields on abstract parents
    for (const parent of objectParents) {
      const merged = linked.filter(
        (field) => field.parentType === parent || scan.program.schema.isAbstractType(field.parentType)
      );
      checkMergedSelections(scan, merged.map((field) => field.selections));
    }
  }
}

export const validateSelectionConflicts: ValidationRule = {
  name: "validateSelectionConflicts",
  validate(program, context) {
    const scan: ConflictScan = { program, errors: [], reported: new Set() };
    for (const definition of ownDefinitions(program, context)) {
      checkMergedSelections(scan, [definition.selections]);
    }
    return scan.errors;
  },
};

// =============================================================================
// Selection depth
// =============================================================================

export const validateSelectionDepth: ValidationRule = {
  name: "validateSelectionDepth",
  validate(program, context) {
    const errors: ValidationError[] = [];
    for (const definition of ownDefinitions(program, context)) {
      let reported = false;
      forEachSelection(definition.selections, (selection, depth) => {
        if (reported || depth <= MAX_SELECTION_DEPTH) return;
        reported = true;
        errors.push(
          new ValidationError(
            DiagnosticCode.SELECTION_TOO_DEEP,
            `Selections of "${definition.name}" are nested deeper than ${MAX_SELECTION_DEPTH} levels.`,
            [selection.loc]
          )
        );
      });
    }
    return errors;
  },
};

export const DEFAULT_VALIDATION_RULES: readonly ValidationRule[] = [
  validateModuleNames,
  validateRelayDirective,
  validateUnusedVariables,
  validateSelectionConflicts,
  validateSelectionDepth,
];
