/**
 * Transform Types
 *
 * @module
 */

import type { Program } from "../program/index.js";

export interface TransformContext {
  /** Base-project fragments pulled into the program */
  readonly baseFragmentNames: ReadonlySet<string>;
}

/**
 * A pure Program → Program step.
 */
export interface NamedTransform {
  readonly name: string;
  transform(program: Program, context: TransformContext): Program;
}

/**
 * The chain of transforms producing one output representation.
 */
export interface TargetPipeline {
  readonly name: string;
  readonly transforms: readonly NamedTransform[];
}

/**
 * Target name → transformed Program, in pipeline order.
 */
export type TargetProgramSet = ReadonlyMap<string, Program>;
