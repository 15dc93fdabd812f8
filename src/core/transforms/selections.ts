/**
 * Selection Set Cleanup
 *
 * @module
 */

import type { Directive, Selection } from "../ir/index.js";
import { responseKey } from "../ir/index.js";
import { mapSelectionSets, printValue } from "../program/index.js";
import type { NamedTransform } from "./types.js";

/**
 * Splices inline fragments that cannot narrow their parent (no directives,
 * and a condition every parent object satisfies) into the parent set.
 */
export const flattenInlineFragments: NamedTransform = {
  name: "flattenInlineFragments",
  transform(program) {
    return program.transform((definition) =>
      mapSelectionSets(definition, (selections, parentType) =>
        selections.flatMap((selection) =>
          selection.kind === "InlineFragment" &&
          selection.directives.length === 0 &&
          program.schema.isSubtype(parentType, selection.typeCondition)
            ? selection.selections
            : [selection]
        )
      )
    );
  },
};

function printDirectiveKey(directives: readonly Directive[]): string {
  return directives
    .map((d) => `@${d.name}(${d.args.map((a) => `${a.name}:${printValue(a.value)}`).join(",")})`)
    .join("");
}

function identityKey(selection: Selection): string {
  const directives = printDirectiveKey(selection.directives);
  switch (selection.kind) {
    case "ScalarField":
    case "LinkedField": {
      const args = selection.args.map((a) => `${a.name}:${printValue(a.value)}`).join(",");
      return `${selection.kind}:${responseKey(selection)}:${selection.name}(${args})${directives}`;
    }
    case "InlineFragment":
      return `InlineFragment:${selection.typeCondition}${directives}`;
    case "FragmentSpread":
      return `FragmentSpread:${selection.name}${directives}`;
  }
}

/**
 * Drops repeated selections and merges repeated linked fields and inline
 * fragments, keeping the position of the first occurrence.
 */
function dedupe(selections: readonly Selection[]): Selection[] {
  const merged = new Map<string, Selection>();
  for (const selection of selections) {
    const key = identityKey(selection);
    const previous = merged.get(key);
    if (!previous) {
      merged.set(key, selection);
    } else if (
      (previous.kind === "LinkedField" && selection.kind === "LinkedField") ||
      (previous.kind === "InlineFragment" && selection.kind === "InlineFragment")
    ) {
      merged.set(key, { ...previous, selections: [...previous.selections, ...selection.selections] });
    }
  }
  return [...merged.values()].map((selection) =>
    selection.kind === "LinkedField" || selection.kind === "InlineFragment"
      ? { ...selection, selections: dedupe(selection.selections) }
      : selection
  );
}

export const skipRedundantNodes: NamedTransform = {
  name: "skipRedundantNodes",
  transform(program) {
    return program.transform((definition) => ({ ...definition, selections: dedupe(definition.selections) }));
  },
};
