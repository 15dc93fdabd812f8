export type { NamedTransform, TargetPipeline, TargetProgramSet, TransformContext } from "./types.js";
export {
  applyTransforms,
  DEFAULT_TARGETS,
  READER_TARGET,
  NORMALIZATION_TARGET,
  OPERATION_TEXT_TARGET,
} from "./pipeline.js";
export { maskFalseSpreads, removeBaseFragments, inlineFragmentSpreads } from "./fragments.js";
export { generateTypename, generateId } from "./generate-fields.js";
export { flattenInlineFragments, skipRedundantNodes } from "./selections.js";
export { skipClientExtensions, stripCompilerDirectives } from "./client-extensions.js";
