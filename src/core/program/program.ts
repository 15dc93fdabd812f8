/**
 * Program
 *
 * Immutable set of typed definitions. Transforms never edit a Program; they
 * derive a new one.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type { ExecutableDefinition, FragmentDefinition, OperationDefinition } from "../ir/index.js";
import type { CompilerSchema } from "../schema/index.js";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class Program {
  readonly schema: CompilerSchema;
  private readonly ordered: readonly ExecutableDefinition[];
  private readonly operationsByName: ReadonlyMap<string, OperationDefinition>;
  private readonly fragmentsByName: ReadonlyMap<string, FragmentDefinition>;

  private constructor(schema: CompilerSchema, definitions: readonly ExecutableDefinition[]) {
    this.schema = schema;
    this.ordered = deepFreeze([...definitions]);

    const operations = new Map<string, OperationDefinition>();
    const fragments = new Map<string, FragmentDefinition>();
    for (const definition of this.ordered) {
      if (operations.has(definition.name) || fragments.has(definition.name)) {
        throw new CompilerInvariantError(`Program holds two definitions named ${definition.name}`);
      }
      if (definition.kind === "Operation") operations.set(definition.name, definition);
      else fragments.set(definition.name, definition);
    }
    this.operationsByName = operations;
    this.fragmentsByName = fragments;
  }

  /**
   * Program holding `definitions` in the given order.
   */
  static fromDefinitions(schema: CompilerSchema, definitions: readonly ExecutableDefinition[]): Program {
    return new Program(schema, definitions);
  }

  definitions(): readonly ExecutableDefinition[] {
    return this.ordered;
  }

  operations(): OperationDefinition[] {
    return [...this.operationsByName.values()];
  }

  fragments(): FragmentDefinition[] {
    return [...this.fragmentsByName.values()];
  }

  operation(name: string): OperationDefinition | undefined {
    return this.operationsByName.get(name);
  }

  fragment(name: string): FragmentDefinition | undefined {
    return this.fragmentsByName.get(name);
  }

  documentCount(): number {
    return this.ordered.length;
  }

  /**
   * A Program over the same schema with other definitions.
   */
  withDefinitions(
    operations: readonly OperationDefinition[],
    fragments: readonly FragmentDefinition[]
  ): Program {
    return new Program(this.schema, [...operations, ...fragments]);
  }

  /**
   * Maps every definition; `null` drops it.
   */
  transform(fn: (definition: ExecutableDefinition) => ExecutableDefinition | null): Program {
    return new Program(
      this.schema,
      this.ordered.flatMap((definition) => fn(definition) ?? [])
    );
  }
}

/**
 * The `build_program` stage: total over type-checked IR.
 */
export function buildProgram(schema: CompilerSchema, ir: readonly ExecutableDefinition[]): Program {
  return Program.fromDefinitions(schema, ir);
}
