/**
 * Fragment Transforms
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type { Directive, InlineFragment, Selection } from "../ir/index.js";
import { findDirective, literalArgument } from "../ir/index.js";
import type { Program } from "../program/index.js";
import type { NamedTransform } from "./types.js";

function withoutDirective(directives: readonly Directive[], name: string): Directive[] {
  return directives.filter((directive) => directive.name !== name);
}

/**
 * Replaces spreads accepted by `shouldInline` with inline fragments holding
 * the fragment's selections, recursively.
 */
function inlineSpreads(
  program: Program,
  selections: readonly Selection[],
  shouldInline: (directives: readonly Directive[]) => boolean,
  path: readonly string[] = []
): Selection[] {
  return selections.map((selection): Selection => {
    switch (selection.kind) {
      case "FragmentSpread": {
        if (!shouldInline(selection.directives)) return selection;
        const fragment = program.fragment(selection.name);
        if (!fragment) {
          throw new CompilerInvariantError(`Spread of fragment ${selection.name} missing from the program`);
        }
        if (path.includes(fragment.name)) {
          throw new CompilerInvariantError(`Fragment ${fragment.name} spreads itself`, { path: [...path] });
        }
        const inlined: InlineFragment = {
          kind: "InlineFragment",
          typeCondition: fragment.typeCondition,
          directives: withoutDirective(selection.directives, "relay"),
          selections: inlineSpreads(program, fragment.selections, shouldInline, [...path, fragment.name]),
          loc: selection.loc,
        };
        return inlined;
      }
      case "LinkedField":
      case "InlineFragment":
        return { ...selection, selections: inlineSpreads(program, selection.selections, shouldInline, path) };
      default:
        return selection;
    }
  });
}

/**
 * Inlines spreads marked `@relay(mask: false)` so the reader sees the data
 * as its own.
 */
export const maskFalseSpreads: NamedTransform = {
  name: "maskFalseSpreads",
  transform(program) {
    const unmasked = (directives: readonly Directive[]): boolean =>
      literalArgument(findDirective(directives, "relay"), "mask") === false;
    return program.transform((definition) => ({
      ...definition,
      selections: inlineSpreads(program, definition.selections, unmasked),
    }));
  },
};

/**
 * Drops base-project fragments; their artifacts belong to the base project.
 */
export const removeBaseFragments: NamedTransform = {
  name: "removeBaseFragments",
  transform(program, context) {
    return program.transform((definition) =>
      definition.kind === "Fragment" && context.baseFragmentNames.has(definition.name) ? null : definition
    );
  },
};

/**
 * Inlines every fragment spread of every operation and drops the fragment
 * definitions.
 */
export const inlineFragmentSpreads: NamedTransform = {
  name: "inlineFragmentSpreads",
  transform(program) {
    const operations = program
      .operations()
      .map((operation) => ({ ...operation, selections: inlineSpreads(program, operation.selections, () => true) }));
    return program.withDefinitions(operations, []);
  },
};
