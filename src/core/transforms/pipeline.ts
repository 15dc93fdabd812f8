/**
 * Transform Pipeline
 *
 * Fans one validated Program out into one Program per target. Adding a
 * target means passing another pipeline; nothing here changes.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type { Program } from "../program/index.js";
import { createLogger } from "../../utils/logger.js";
import { inlineFragmentSpreads, maskFalseSpreads, removeBaseFragments } from "./fragments.js";
import { generateId, generateTypename } from "./generate-fields.js";
import { flattenInlineFragments, skipRedundantNodes } from "./selections.js";
import { skipClientExtensions, stripCompilerDirectives } from "./client-extensions.js";
import type { TargetPipeline, TargetProgramSet, TransformContext } from "./types.js";

const logger = createLogger("transforms");

export const READER_TARGET: TargetPipeline = {
  name: "reader",
  transforms: [maskFalseSpreads, removeBaseFragments],
};

export const NORMALIZATION_TARGET: TargetPipeline = {
  name: "normalization",
  transforms: [inlineFragmentSpreads, generateTypename, generateId, flattenInlineFragments, skipRedundantNodes],
};

export const OPERATION_TEXT_TARGET: TargetPipeline = {
  name: "operation_text",
  transforms: [
    skipClientExtensions,
    generateTypename,
    generateId,
    stripCompilerDirectives,
    flattenInlineFragments,
    skipRedundantNodes,
  ],
};

export const DEFAULT_TARGETS: readonly TargetPipeline[] = [READER_TARGET, NORMALIZATION_TARGET, OPERATION_TEXT_TARGET];

/**
 * Runs every target pipeline over `program`.
 *
 * @throws CompilerInvariantError for duplicate target names or a broken
 * transform invariant
 */
export function applyTransforms(
  program: Program,
  baseFragmentNames: ReadonlySet<string>,
  targets: readonly TargetPipeline[] = DEFAULT_TARGETS
): TargetProgramSet {
  const context: TransformContext = { baseFragmentNames };
  const programs = new Map<string, Program>();

  for (const target of targets) {
    if (programs.has(target.name)) {
      throw new CompilerInvariantError(`Duplicate target ${target.name}`);
    }
    const result = target.transforms.reduce((current, step) => step.transform(current, context), program);
    logger.trace(
      { target: target.name, transforms: target.transforms.map((t) => t.name), definitions: result.documentCount() },
      "Target program built"
    );
    programs.set(target.name, result);
  }

  return programs;
}
