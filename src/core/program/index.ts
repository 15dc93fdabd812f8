export { Program, buildProgram } from "./program.js";
export {
  mapSelectionsDeep,
  mapSelectionSets,
  forEachSelection,
  namedTypeOf,
  type SelectionMapper,
  type SelectionSetMapper,
} from "./visitor.js";
export { printDefinition, printOperationText, printValue, collectReferencedFragments } from "./printer.js";
