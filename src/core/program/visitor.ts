/**
 * Selection Visitors
 *
 * Bottom-up rewriting of selection trees. Children are rewritten before the
 * callback sees their parent.
 *
 * @module
 */

import type { ExecutableDefinition, Selection } from "../ir/index.js";

/**
 * Named type of a printed type reference: `[User!]!` → `User`.
 */
export function namedTypeOf(typeString: string): string {
  return typeString.replace(/[[\]!]/g, "");
}

export type SelectionMapper = (selection: Selection) => Selection | readonly Selection[] | null;

function toList(mapped: Selection | readonly Selection[] | null): readonly Selection[] {
  if (mapped === null) return [];
  if ("kind" in mapped) return [mapped];
  return mapped;
}

/**
 * Rewrites every selection; the mapper may keep, replace, expand or drop it.
 */
export function mapSelectionsDeep(selections: readonly Selection[], fn: SelectionMapper): Selection[] {
  return selections.flatMap((selection) => {
    switch (selection.kind) {
      case "LinkedField":
      case "InlineFragment":
        return toList(fn({ ...selection, selections: mapSelectionsDeep(selection.selections, fn) }));
      default:
        return toList(fn(selection));
    }
  });
}

export type SelectionSetMapper = (selections: readonly Selection[], parentType: string) => readonly Selection[];

function mapSets(selections: readonly Selection[], parentType: string, fn: SelectionSetMapper): readonly Selection[] {
  const rewritten = selections.map((selection): Selection => {
    switch (selection.kind) {
      case "LinkedField":
        return { ...selection, selections: mapSets(selection.selections, namedTypeOf(selection.type), fn) };
      case "InlineFragment":
        return { ...selection, selections: mapSets(selection.selections, selection.typeCondition, fn) };
      default:
        return selection;
    }
  });
  return fn(rewritten, parentType);
}

/**
 * Rewrites every selection set of a definition, innermost first, passing
 * the type the set selects on.
 */
export function mapSelectionSets<D extends ExecutableDefinition>(definition: D, fn: SelectionSetMapper): D {
  const base: ExecutableDefinition = definition;
  const parentType = base.kind === "Operation" ? base.type : base.typeCondition;
  return { ...definition, selections: mapSets(definition.selections, parentType, fn) };
}

/**
 * Calls `fn` for every selection, parents before children.
 */
export function forEachSelection(
  selections: readonly Selection[],
  fn: (selection: Selection, depth: number) => void,
  depth = 1
): void {
  for (const selection of selections) {
    fn(selection, depth);
    if (selection.kind === "LinkedField" || selection.kind === "InlineFragment") {
      forEachSelection(selection.selections, fn, depth + 1);
    }
  }
}
