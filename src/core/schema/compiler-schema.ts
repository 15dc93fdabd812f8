/**
 * Compiler Schema
 *
 * A graphql-js schema together with the record of which types and fields
 * the project's client extensions declared.
 *
 * @module
 */

import {
  isObjectType,
  isInterfaceType,
  isUnionType,
  type GraphQLDirective,
  type GraphQLNamedType,
  type GraphQLObjectType,
  type GraphQLSchema,
  type OperationTypeNode,
} from "graphql";

export class CompilerSchema {
  readonly schema: GraphQLSchema;
  private readonly clientTypes: ReadonlySet<string>;
  private readonly clientFields: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(
    schema: GraphQLSchema,
    clientTypes: ReadonlySet<string> = new Set(),
    clientFields: ReadonlyMap<string, ReadonlySet<string>> = new Map()
  ) {
    this.schema = schema;
    this.clientTypes = clientTypes;
    this.clientFields = clientFields;
  }

  getType(name: string): GraphQLNamedType | undefined {
    return this.schema.getType(name);
  }

  getDirective(name: string): GraphQLDirective | undefined {
    return this.schema.getDirective(name) ?? undefined;
  }

  getRootType(operation: OperationTypeNode): GraphQLObjectType | undefined {
    return this.schema.getRootType(operation) ?? undefined;
  }

  /**
   * Whether the type was declared by a client extension.
   */
  isClientType(typeName: string): boolean {
    return this.clientTypes.has(typeName);
  }

  /**
   * Whether the field was declared by a client extension, either on a
   * client type or as an extension of a server type.
   */
  isClientField(typeName: string, fieldName: string): boolean {
    return this.clientTypes.has(typeName) || (this.clientFields.get(typeName)?.has(fieldName) ?? false);
  }

  /**
   * Printed type of a field of an object or interface type.
   */
  getFieldType(typeName: string, fieldName: string): string | undefined {
    const type = this.schema.getType(typeName);
    if (!isObjectType(type) && !isInterfaceType(type)) return undefined;
    return type.getFields()[fieldName]?.type.toString();
  }

  /**
   * Whether objects of the type can be identified by an `id: ID` field.
   */
  hasIdField(typeName: string): boolean {
    return this.getFieldType(typeName, "id")?.replace(/!$/, "") === "ID";
  }

  isAbstractType(typeName: string): boolean {
    const type = this.schema.getType(typeName);
    return isInterfaceType(type) || isUnionType(type);
  }

  /**
   * Whether an object of `typeName` can satisfy a selection on `conditionName`.
   */
  canOverlap(typeName: string, conditionName: string): boolean {
    if (typeName === conditionName) return true;
    const type = this.schema.getType(typeName);
    const condition = this.schema.getType(conditionName);
    if (!type || !condition) return false;
    const possible = (named: GraphQLNamedType): readonly GraphQLObjectType[] =>
      isObjectType(named)
        ? [named]
        : isInterfaceType(named) || isUnionType(named)
          ? this.schema.getPossibleTypes(named)
          : [];
    const conditionTypes = new Set(possible(condition).map((t) => t.name));
    return possible(type).some((t) => conditionTypes.has(t.name));
  }

  /**
   * Whether every object of `typeName` is also of `conditionName`.
   */
  isSubtype(typeName: string, conditionName: string): boolean {
    if (typeName === conditionName) return true;
    const type = this.schema.getType(typeName);
    const condition = this.schema.getType(conditionName);
    if (!type || !condition) return false;
    if ((isInterfaceType(condition) || isUnionType(condition)) && (isObjectType(type) || isInterfaceType(type))) {
      return this.schema.isSubType(condition, type);
    }
    return false;
  }
}
