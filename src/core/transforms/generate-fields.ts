/**
 * Generated Fields
 *
 * Adds the fields the runtime needs to normalize responses: `__typename`
 * on abstract selections and `id` where the type has one.
 *
 * @module
 */

import type { LinkedField, ScalarField, Selection } from "../ir/index.js";
import { responseKey } from "../ir/index.js";
import { mapSelectionsDeep, namedTypeOf, type Program } from "../program/index.js";
import type { NamedTransform } from "./types.js";

function selectsKey(selections: readonly Selection[], key: string): boolean {
  return selections.some(
    (selection) => (selection.kind === "ScalarField" || selection.kind === "LinkedField") && responseKey(selection) === key
  );
}

function scalarField(name: string, type: string, parent: LinkedField): ScalarField {
  return {
    kind: "ScalarField",
    alias: null,
    name,
    type,
    parentType: namedTypeOf(parent.type),
    args: [],
    directives: [],
    loc: parent.loc,
  };
}

function addToLinkedFields(
  program: Program,
  fieldFor: (field: LinkedField) => ScalarField | null
): Program {
  return program.transform((definition) => ({
    ...definition,
    selections: mapSelectionsDeep(definition.selections, (selection) => {
      if (selection.kind !== "LinkedField") return selection;
      const added = fieldFor(selection);
      if (!added || selectsKey(selection.selections, added.name)) return selection;
      return { ...selection, selections: [...selection.selections, added] };
    }),
  }));
}

export const generateTypename: NamedTransform = {
  name: "generateTypename",
  transform(program) {
    return addToLinkedFields(program, (field) =>
      program.schema.isAbstractType(namedTypeOf(field.type)) ? scalarField("__typename", "String!", field) : null
    );
  },
};

export const generateId: NamedTransform = {
  name: "generateId",
  transform(program) {
    return addToLinkedFields(program, (field) => {
      const idType = program.schema.getFieldType(namedTypeOf(field.type), "id");
      return idType !== undefined && program.schema.hasIdField(namedTypeOf(field.type))
        ? scalarField("id", idType, field)
        : null;
    });
  },
};
