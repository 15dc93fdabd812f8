/**
 * Server Text Transforms
 *
 * Operation text goes to the server, which knows neither client extensions
 * nor compiler directives.
 *
 * @module
 */

import type { ExecutableDefinition, Selection } from "../ir/index.js";
import { COMPILER_DIRECTIVE_NAMES, type CompilerSchema } from "../schema/index.js";
import type { NamedTransform } from "./types.js";

function removeClientSelections(
  schema: CompilerSchema,
  selections: readonly Selection[],
  dropped: ReadonlySet<string>
): Selection[] {
  return selections.flatMap((selection): Selection[] => {
    switch (selection.kind) {
      case "ScalarField":
        return schema.isClientField(selection.parentType, selection.name) ? [] : [selection];
      case "LinkedField": {
        if (schema.isClientField(selection.parentType, selection.name)) return [];
        const children = removeClientSelections(schema, selection.selections, dropped);
        return children.length === 0 ? [] : [{ ...selection, selections: children }];
      }
      case "InlineFragment": {
        if (schema.isClientType(selection.typeCondition)) return [];
        const children = removeClientSelections(schema, selection.selections, dropped);
        return children.length === 0 ? [] : [{ ...selection, selections: children }];
      }
      case "FragmentSpread":
        return dropped.has(selection.name) ? [] : [selection];
    }
  });
}

/**
 * Removes fields and types declared by client extensions. Fragments left
 * without selections are dropped together with their spreads.
 */
export const skipClientExtensions: NamedTransform = {
  name: "skipClientExtensions",
  transform(program) {
    const { schema } = program;
    const dropped = new Set(
      program
        .fragments()
        .filter((fragment) => schema.isClientType(fragment.typeCondition))
        .map((fragment) => fragment.name)
    );

    // Dropping a fragment can empty the fragments spreading it.
    let definitions: ExecutableDefinition[] = [];
    for (;;) {
      const before = dropped.size;
      definitions = program
        .definitions()
        .filter((definition) => !dropped.has(definition.name))
        .map((definition) => ({
          ...definition,
          selections: removeClientSelections(schema, definition.selections, dropped),
        }));
      for (const definition of definitions) {
        if (definition.kind === "Fragment" && definition.selections.length === 0) dropped.add(definition.name);
      }
      if (dropped.size === before) break;
    }

    return program.transform((definition) => definitions.find((d) => d.name === definition.name) ?? null);
  },
};

/**
 * Removes `@relay` and `@inline` from definitions and spreads.
 */
export const stripCompilerDirectives: NamedTransform = {
  name: "stripCompilerDirectives",
  transform(program) {
    const strip = (selections: readonly Selection[]): Selection[] =>
      selections.map((selection): Selection => {
        const directives = selection.directives.filter((d) => !COMPILER_DIRECTIVE_NAMES.has(d.name));
        switch (selection.kind) {
          case "LinkedField":
          case "InlineFragment":
            return { ...selection, directives, selections: strip(selection.selections) };
          default:
            return { ...selection, directives };
        }
      });
    return program.transform((definition) => ({
      ...definition,
      directives: definition.directives.filter((d) => !COMPILER_DIRECTIVE_NAMES.has(d.name)),
      selections: strip(definition.selections),
    }));
  },
};
