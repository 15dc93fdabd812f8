/**
 * IR Builder
 *
 * Type-checks the executable definitions of a project (and the base
 * fragments it reaches) against the project schema and produces IR.
 * Every error is collected; a failing definition does not hide the errors
 * of the others.
 *
 * @module
 */

import {
  DirectiveLocation,
  Kind,
  OperationTypeNode,
  getNamedType,
  isCompositeType,
  isInputObjectType,
  isInputType,
  isInterfaceType,
  isLeafType,
  isListType,
  isNonNullType,
  isObjectType,
  isRequiredArgument,
  print,
  typeFromAST,
  valueFromAST,
  type ASTNode,
  type ArgumentNode,
  type DirectiveNode,
  type FieldNode,
  type FragmentDefinitionNode,
  type FragmentSpreadNode,
  type GraphQLArgument,
  type GraphQLCompositeType,
  type GraphQLInputType,
  type GraphQLOutputType,
  type InlineFragmentNode,
  type OperationDefinitionNode,
  type SelectionSetNode,
  type TypeNode,
  type ValueNode,
  type VariableDefinitionNode,
} from "graphql";
import type { ProjectConfig } from "../config/index.js";
import type { AstSets } from "../documents/index.js";
import type { CompilerSchema } from "../schema/index.js";
import { CompilerInvariantError } from "../errors.js";
import { DiagnosticCode, ValidationError, type Location } from "../source/index.js";
import type { Result } from "../../types/result.js";
import { ok, err } from "../../types/result.js";
import type {
  Argument,
  ArgumentValue,
  Directive,
  ExecutableDefinition,
  Field,
  FragmentDefinition,
  FragmentSpread,
  InlineFragment,
  JsonValue,
  Literal,
  OperationDefinition,
  OperationKind,
  Selection,
  VariableDefinition,
} from "./types.js";

export interface BuildIRResult {
  /** Project definitions in source order, then the base fragments they reach */
  ir: readonly ExecutableDefinition[];
  /** Base-project fragments included in `ir` */
  baseFragmentNames: ReadonlySet<string>;
}

// =============================================================================
// AST helpers
// =============================================================================

/**
 * Abstract location of an AST node. Parsed documents always carry locations.
 */
export function locationOf(node: ASTNode): Location {
  if (!node.loc) {
    throw new CompilerInvariantError(`AST node of kind ${node.kind} has no location`);
  }
  return { sourceKey: node.loc.source.name, start: node.loc.start, end: node.loc.end };
}

function collectSpreadNames(selectionSet: SelectionSetNode | undefined, into: Set<string>): Set<string> {
  for (const selection of selectionSet?.selections ?? []) {
    if (selection.kind === Kind.FRAGMENT_SPREAD) {
      into.add(selection.name.value);
    } else {
      collectSpreadNames(selection.selectionSet, into);
    }
  }
  return into;
}

/**
 * Names of every fragment reachable from `roots`, the roots included.
 */
function reachableFragments(
  roots: Iterable<string>,
  spreadsOf: ReadonlyMap<string, ReadonlySet<string>>
): Set<string> {
  const seen = new Set<string>();
  const stack = [...roots];
  while (stack.length > 0) {
    const name = stack.pop();
    if (name === undefined || seen.has(name)) continue;
    seen.add(name);
    stack.push(...(spreadsOf.get(name) ?? []));
  }
  return seen;
}

function jsonOf(node: ValueNode): JsonValue {
  switch (node.kind) {
    case Kind.INT:
      return parseInt(node.value, 10);
    case Kind.FLOAT:
      return parseFloat(node.value);
    case Kind.STRING:
    case Kind.ENUM:
      return node.value;
    case Kind.BOOLEAN:
      return node.value;
    case Kind.NULL:
      return null;
    case Kind.LIST:
      return node.values.map(jsonOf);
    case Kind.OBJECT:
      return Object.fromEntries(node.fields.map((field) => [field.name.value, jsonOf(field.value)]));
    case Kind.VARIABLE:
      throw new CompilerInvariantError(`Variable $${node.name.value} inside a constant value`);
  }
}

function containsVariable(node: ValueNode): boolean {
  switch (node.kind) {
    case Kind.VARIABLE:
      return true;
    case Kind.LIST:
      return node.values.some(containsVariable);
    case Kind.OBJECT:
      return node.fields.some((field) => containsVariable(field.value));
    default:
      return false;
  }
}

function literal(node: ValueNode): Literal {
  return { kind: "Literal", value: jsonOf(node), graphql: print(node) };
}

function isPluralType(type: GraphQLOutputType): boolean {
  let current: GraphQLOutputType = type;
  while (isNonNullType(current)) current = current.ofType;
  return isListType(current);
}

const OPERATION_KINDS: Record<OperationTypeNode, OperationKind> = {
  [OperationTypeNode.QUERY]: "query",
  [OperationTypeNode.MUTATION]: "mutation",
  [OperationTypeNode.SUBSCRIPTION]: "subscription",
};

const OPERATION_DIRECTIVE_LOCATIONS: Record<OperationTypeNode, DirectiveLocation> = {
  [OperationTypeNode.QUERY]: DirectiveLocation.QUERY,
  [OperationTypeNode.MUTATION]: DirectiveLocation.MUTATION,
  [OperationTypeNode.SUBSCRIPTION]: DirectiveLocation.SUBSCRIPTION,
};

// =============================================================================
// Builder
// =============================================================================

type NamedOperationNode = OperationDefinitionNode & { readonly name: NonNullable<OperationDefinitionNode["name"]> };

function isNamedOperation(node: OperationDefinitionNode): node is NamedOperationNode {
  return node.name !== undefined;
}

class IRBuilder {
  readonly errors: ValidationError[] = [];
  /** Variables referenced by the definition being built, with their uses */
  private variableUses = new Map<string, Location[]>();

  constructor(
    private readonly schema: CompilerSchema,
    private readonly fragmentNodes: ReadonlyMap<string, FragmentDefinitionNode>
  ) {}

  private report(code: DiagnosticCode, message: string, nodes: readonly ASTNode[]): void {
    this.errors.push(new ValidationError(code, message, nodes.map(locationOf)));
  }

  /**
   * Builds one definition and returns it with the variables it references.
   */
  build(node: NamedOperationNode | FragmentDefinitionNode): {
    definition: ExecutableDefinition | null;
    variableUses: ReadonlyMap<string, readonly Location[]>;
  } {
    this.variableUses = new Map();
    const definition = node.kind === Kind.OPERATION_DEFINITION ? this.buildOperation(node) : this.buildFragment(node);
    return { definition, variableUses: this.variableUses };
  }

  private buildOperation(node: NamedOperationNode): OperationDefinition | null {
    const rootType = this.schema.getRootType(node.operation);
    if (!rootType) {
      this.report(DiagnosticCode.UNKNOWN_ROOT_TYPE, `Schema does not define a "${node.operation}" root type.`, [
        node.name,
      ]);
      return null;
    }

    const variableDefinitions = node.variableDefinitions?.flatMap((v) => this.buildVariableDefinition(v) ?? []) ?? [];
    const directives = this.buildDirectives(node.directives, OPERATION_DIRECTIVE_LOCATIONS[node.operation]);
    const selections = this.buildSelections(node.selectionSet, rootType);

    return {
      kind: "Operation",
      operation: OPERATION_KINDS[node.operation],
      name: node.name.value,
      type: rootType.name,
      variableDefinitions,
      directives,
      selections,
      loc: locationOf(node),
    };
  }

  private buildVariableDefinition(node: VariableDefinitionNode): VariableDefinition | null {
    const type = typeFromAST(this.schema.schema, node.type);
    const printedType = print(node.type);
    if (!type) {
      this.report(DiagnosticCode.UNKNOWN_TYPE, `Unknown type "${getNamedTypeName(node)}".`, [node.type]);
      return null;
    }
    if (!isInputType(type)) {
      this.report(
        DiagnosticCode.UNKNOWN_TYPE,
        `Variable "$${node.variable.name.value}" cannot be non-input type "${printedType}".`,
        [node.type]
      );
      return null;
    }

    let defaultValue: Literal | null = null;
    if (node.defaultValue) {
      if (valueFromAST(node.defaultValue, type) === undefined) {
        this.report(
          DiagnosticCode.INVALID_ARGUMENT_VALUE,
          `Expected value of type "${printedType}", found ${print(node.defaultValue)}.`,
          [node.defaultValue]
        );
      } else {
        defaultValue = literal(node.defaultValue);
      }
    }

    return {
      kind: "VariableDefinition",
      name: node.variable.name.value,
      type: printedType,
      defaultValue,
      loc: locationOf(node),
    };
  }

  private buildFragment(node: FragmentDefinitionNode): FragmentDefinition | null {
    const typeName = node.typeCondition.name.value;
    const type = this.schema.getType(typeName);
    if (!type) {
      this.report(DiagnosticCode.UNKNOWN_TYPE, `Unknown type "${typeName}".`, [node.typeCondition]);
      return null;
    }
    if (!isCompositeType(type)) {
      this.report(
        DiagnosticCode.INVALID_TYPE_CONDITION,
        `Fragment "${node.name.value}" cannot condition on non composite type "${typeName}".`,
        [node.typeCondition]
      );
      return null;
    }

    return {
      kind: "Fragment",
      name: node.name.value,
      typeCondition: typeName,
      directives: this.buildDirectives(node.directives, DirectiveLocation.FRAGMENT_DEFINITION),
      selections: this.buildSelections(node.selectionSet, type),
      loc: locationOf(node),
    };
  }

  private buildSelections(selectionSet: SelectionSetNode, parentType: GraphQLCompositeType): Selection[] {
    const selections: Selection[] = [];
    for (const node of selectionSet.selections) {
      let selection: Selection | null = null;
      switch (node.kind) {
        case Kind.FIELD:
          selection = this.buildField(node, parentType);
          break;
        case Kind.INLINE_FRAGMENT:
          selection = this.buildInlineFragment(node, parentType);
          break;
        case Kind.FRAGMENT_SPREAD:
          selection = this.buildFragmentSpread(node, parentType);
          break;
      }
      if (selection) selections.push(selection);
    }
    return selections;
  }

  private buildField(node: FieldNode, parentType: GraphQLCompositeType): Field | null {
    const name = node.name.value;
    const alias = node.alias?.value ?? null;
    const directives = this.buildDirectives(node.directives, DirectiveLocation.FIELD);

    if (name === "__typename") {
      if (node.selectionSet) {
        this.report(
          DiagnosticCode.UNEXPECTED_SELECTION,
          `Field "__typename" must not have a selection since type "String!" has no subfields.`,
          [node.selectionSet]
        );
      }
      return {
        kind: "ScalarField",
        alias,
        name,
        type: "String!",
        parentType: parentType.name,
        args: [],
        directives,
        loc: locationOf(node),
      };
    }

    const fieldDef = isObjectType(parentType) || isInterfaceType(parentType) ? parentType.getFields()[name] : undefined;
    if (!fieldDef) {
      this.report(DiagnosticCode.UNKNOWN_FIELD, `Cannot query field "${name}" on type "${parentType.name}".`, [
        node.name,
      ]);
      return null;
    }

    const args = this.buildArguments(node.arguments, fieldDef.args, node, `field "${parentType.name}.${name}"`);
    const namedType = getNamedType(fieldDef.type);
    const typeString = fieldDef.type.toString();

    if (isLeafType(namedType)) {
      if (node.selectionSet) {
        this.report(
          DiagnosticCode.UNEXPECTED_SELECTION,
          `Field "${name}" must not have a selection since type "${typeString}" has no subfields.`,
          [node.selectionSet]
        );
        return null;
      }
      return {
        kind: "ScalarField",
        alias,
        name,
        type: typeString,
        parentType: parentType.name,
        args,
        directives,
        loc: locationOf(node),
      };
    }

    if (!node.selectionSet) {
      this.report(
        DiagnosticCode.MISSING_SELECTION,
        `Field "${name}" of type "${typeString}" must have a selection of subfields.`,
        [node]
      );
      return null;
    }
    return {
      kind: "LinkedField",
      alias,
      name,
      type: typeString,
      parentType: parentType.name,
      concreteType: isObjectType(namedType) ? namedType.name : null,
      plural: isPluralType(fieldDef.type),
      args,
      directives,
      selections: this.buildSelections(node.selectionSet, namedType),
      loc: locationOf(node),
    };
  }

  private buildInlineFragment(node: InlineFragmentNode, parentType: GraphQLCompositeType): InlineFragment | null {
    let conditionType: GraphQLCompositeType = parentType;
    if (node.typeCondition) {
      const typeName = node.typeCondition.name.value;
      const type = this.schema.getType(typeName);
      if (!type) {
        this.report(DiagnosticCode.UNKNOWN_TYPE, `Unknown type "${typeName}".`, [node.typeCondition]);
        return null;
      }
      if (!isCompositeType(type)) {
        this.report(
          DiagnosticCode.INVALID_TYPE_CONDITION,
          `Fragment cannot condition on non composite type "${typeName}".`,
          [node.typeCondition]
        );
        return null;
      }
      if (!this.schema.canOverlap(parentType.name, typeName)) {
        this.report(
          DiagnosticCode.INVALID_FRAGMENT_SPREAD,
          `Fragment cannot be spread here as objects of type "${parentType.name}" can never be of type "${typeName}".`,
          [node]
        );
        return null;
      }
      conditionType = type;
    }

    return {
      kind: "InlineFragment",
      typeCondition: conditionType.name,
      directives: this.buildDirectives(node.directives, DirectiveLocation.INLINE_FRAGMENT),
      selections: this.buildSelections(node.selectionSet, conditionType),
      loc: locationOf(node),
    };
  }

  private buildFragmentSpread(node: FragmentSpreadNode, parentType: GraphQLCompositeType): FragmentSpread | null {
    const name = node.name.value;
    const directives = this.buildDirectives(node.directives, DirectiveLocation.FRAGMENT_SPREAD);
    const fragment = this.fragmentNodes.get(name);
    if (!fragment) {
      this.report(DiagnosticCode.UNKNOWN_FRAGMENT, `Unknown fragment "${name}".`, [node.name]);
      return null;
    }

    const typeName = fragment.typeCondition.name.value;
    // An unknown condition type is reported where the fragment is defined.
    if (this.schema.getType(typeName) && !this.schema.canOverlap(parentType.name, typeName)) {
      this.report(
        DiagnosticCode.INVALID_FRAGMENT_SPREAD,
        `Fragment "${name}" cannot be spread here as objects of type "${parentType.name}" can never be of type "${typeName}".`,
        [node]
      );
      return null;
    }

    return { kind: "FragmentSpread", name, directives, loc: locationOf(node) };
  }

  private buildDirectives(nodes: readonly DirectiveNode[] | undefined, location: DirectiveLocation): Directive[] {
    const directives: Directive[] = [];
    for (const node of nodes ?? []) {
      const name = node.name.value;
      const definition = this.schema.getDirective(name);
      if (!definition) {
        this.report(DiagnosticCode.UNKNOWN_DIRECTIVE, `Unknown directive "@${name}".`, [node.name]);
        continue;
      }
      if (!definition.locations.includes(location)) {
        this.report(DiagnosticCode.MISPLACED_DIRECTIVE, `Directive "@${name}" may not be used on ${location}.`, [node]);
        continue;
      }
      directives.push({
        kind: "Directive",
        name,
        args: this.buildArguments(node.arguments, definition.args, node, `directive "@${name}"`),
        loc: locationOf(node),
      });
    }
    return directives;
  }

  private buildArguments(
    nodes: readonly ArgumentNode[] | undefined,
    definitions: readonly GraphQLArgument[],
    owner: FieldNode | DirectiveNode,
    ownerLabel: string
  ): Argument[] {
    const args: Argument[] = [];
    const provided = new Set<string>();

    for (const node of nodes ?? []) {
      const name = node.name.value;
      const definition = definitions.find((d) => d.name === name);
      if (!definition) {
        this.report(DiagnosticCode.UNKNOWN_ARGUMENT, `Unknown argument "${name}" on ${ownerLabel}.`, [node.name]);
        continue;
      }
      provided.add(name);
      args.push({ kind: "Argument", name, value: this.buildValue(node.value, definition.type), loc: locationOf(node) });
    }

    for (const definition of definitions) {
      if (isRequiredArgument(definition) && !provided.has(definition.name)) {
        const label = ownerLabel.charAt(0).toUpperCase() + ownerLabel.slice(1);
        this.report(
          DiagnosticCode.MISSING_REQUIRED_ARGUMENT,
          `${label} argument "${definition.name}" of type "${definition.type.toString()}" is required, but it was not provided.`,
          [owner.name]
        );
      }
    }

    return args;
  }

  private buildValue(node: ValueNode, type: GraphQLInputType): ArgumentValue {
    if (node.kind === Kind.VARIABLE) {
      const name = node.name.value;
      const uses = this.variableUses.get(name) ?? [];
      uses.push(locationOf(node));
      this.variableUses.set(name, uses);
      return { kind: "Variable", variableName: name, type: type.toString() };
    }

    if (!containsVariable(node)) {
      if (valueFromAST(node, type) === undefined) {
        this.report(
          DiagnosticCode.INVALID_ARGUMENT_VALUE,
          `Expected value of type "${type.toString()}", found ${print(node)}.`,
          [node]
        );
      }
      return literal(node);
    }

    const nullable = isNonNullType(type) ? type.ofType : type;
    if (node.kind === Kind.LIST) {
      const itemType = isListType(nullable) ? nullable.ofType : nullable;
      return { kind: "ListValue", items: node.values.map((item) => this.buildValue(item, itemType)) };
    }
    if (node.kind === Kind.OBJECT && isInputObjectType(nullable)) {
      const fieldDefs = nullable.getFields();
      const fields: { name: string; value: ArgumentValue }[] = [];
      for (const field of node.fields) {
        const fieldDef = fieldDefs[field.name.value];
        if (!fieldDef) {
          this.report(
            DiagnosticCode.INVALID_ARGUMENT_VALUE,
            `Field "${field.name.value}" is not defined by type "${nullable.name}".`,
            [field.name]
          );
          continue;
        }
        fields.push({ name: field.name.value, value: this.buildValue(field.value, fieldDef.type) });
      }
      return { kind: "ObjectValue", fields };
    }

    this.report(
      DiagnosticCode.INVALID_ARGUMENT_VALUE,
      `Expected value of type "${type.toString()}", found ${print(node)}.`,
      [node]
    );
    return { kind: "Literal", value: null, graphql: "null" };
  }
}

function getNamedTypeName(node: VariableDefinitionNode): string {
  let type: TypeNode = node.type;
  while (type.kind !== Kind.NAMED_TYPE) type = type.type;
  return type.name.value;
}

// =============================================================================
// buildIR
// =============================================================================

/**
 * Type-checks the project's documents and returns IR plus the names of the
 * base fragments it pulled in.
 */
export function buildIR(
  projectConfig: ProjectConfig,
  schema: CompilerSchema,
  astSets: AstSets
): Result<BuildIRResult, ValidationError[]> {
  const asts = astSets.get(projectConfig.name) ?? { definitions: [], baseDefinitions: [] };
  const errors: ValidationError[] = [];
  const report = (code: DiagnosticCode, message: string, nodes: readonly ASTNode[]): void => {
    errors.push(new ValidationError(code, message, nodes.map(locationOf)));
  };

  // Own definitions
  const own: (NamedOperationNode | FragmentDefinitionNode)[] = [];
  const ownByName = new Map<string, NamedOperationNode | FragmentDefinitionNode>();
  for (const definition of asts.definitions) {
    if (definition.kind === Kind.OPERATION_DEFINITION) {
      if (!isNamedOperation(definition)) {
        report(DiagnosticCode.UNNAMED_OPERATION, "Operations must be named.", [definition]);
        continue;
      }
    } else if (definition.kind !== Kind.FRAGMENT_DEFINITION) {
      report(DiagnosticCode.NON_EXECUTABLE_DEFINITION, `The "${definition.kind}" definition is not executable.`, [
        definition,
      ]);
      continue;
    }

    const name = definition.name.value;
    const existing = ownByName.get(name);
    if (existing) {
      report(DiagnosticCode.DUPLICATE_DEFINITION, `There can be only one definition named "${name}".`, [
        existing.name,
        definition.name,
      ]);
      continue;
    }
    ownByName.set(name, definition);
    own.push(definition);
  }

  // Base fragments
  const baseFragments = new Map<string, FragmentDefinitionNode>();
  for (const definition of asts.baseDefinitions) {
    if (definition.kind !== Kind.FRAGMENT_DEFINITION || baseFragments.has(definition.name.value)) continue;
    const shadowing = ownByName.get(definition.name.value);
    if (shadowing) {
      report(
        DiagnosticCode.DUPLICATE_DEFINITION,
        `There can be only one definition named "${definition.name.value}".`,
        [shadowing.name, definition.name]
      );
      continue;
    }
    baseFragments.set(definition.name.value, definition);
  }

  const fragmentNodes = new Map<string, FragmentDefinitionNode>(baseFragments);
  for (const definition of own) {
    if (definition.kind === Kind.FRAGMENT_DEFINITION) fragmentNodes.set(definition.name.value, definition);
  }

  const spreadsOf = new Map<string, ReadonlySet<string>>();
  for (const [name, fragment] of fragmentNodes) {
    spreadsOf.set(name, collectSpreadNames(fragment.selectionSet, new Set()));
  }
  const ownSpreads = own.flatMap((definition) => [...collectSpreadNames(definition.selectionSet, new Set())]);
  const reachableBase = [...reachableFragments(ownSpreads, spreadsOf)].filter((name) => baseFragments.has(name));
  const baseFragmentNames = new Set(reachableBase);

  // Fragment cycles
  for (const [name, fragment] of fragmentNodes) {
    if (!baseFragments.has(name) || baseFragmentNames.has(name)) {
      const reachableFromSpreads = reachableFragments(spreadsOf.get(name) ?? [], spreadsOf);
      if (reachableFromSpreads.has(name)) {
        report(DiagnosticCode.FRAGMENT_CYCLE, `Cannot spread fragment "${name}" within itself.`, [fragment.name]);
      }
    }
  }
  // Cyclic fragments cannot be typed or inlined
  if (errors.some((e) => e.code === DiagnosticCode.FRAGMENT_CYCLE)) {
    return err(errors);
  }

  // Type checking
  const builder = new IRBuilder(schema, fragmentNodes);
  const toBuild = [...own, ...[...baseFragments.values()].filter((f) => baseFragmentNames.has(f.name.value))];
  const ir: ExecutableDefinition[] = [];
  const variableUses = new Map<string, ReadonlyMap<string, readonly Location[]>>();
  for (const node of toBuild) {
    const built = builder.build(node);
    variableUses.set(node.name.value, built.variableUses);
    if (built.definition) ir.push(built.definition);
  }
  errors.push(...builder.errors);

  // Variables must be defined by every operation that reaches their use
  for (const node of own) {
    if (node.kind !== Kind.OPERATION_DEFINITION) continue;
    const operationName = node.name.value;
    const declared = new Set(node.variableDefinitions?.map((v) => v.variable.name.value) ?? []);
    const reached = reachableFragments(collectSpreadNames(node.selectionSet, new Set()), spreadsOf);
    const sources = [operationName, ...reached];
    for (const source of sources) {
      for (const [variable, uses] of variableUses.get(source) ?? []) {
        if (declared.has(variable)) continue;
        errors.push(
          new ValidationError(
            DiagnosticCode.UNDEFINED_VARIABLE,
            `Variable "$${variable}" is not defined by operation "${operationName}".`,
            uses
          )
        );
      }
    }
  }

  if (errors.length > 0) {
    return err(errors);
  }
  return ok({ ir, baseFragmentNames });
}
