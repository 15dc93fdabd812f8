/**
 * Artifact Types
 *
 * @module
 */

import type { ProjectConfig } from "../config/index.js";
import type { ExecutableDefinition } from "../ir/index.js";
import type { Program } from "../program/index.js";

export type ArtifactKind = "reader" | "normalization" | "params";

/**
 * A generated file, held in memory until the writer persists it.
 */
export interface Artifact {
  /** Path relative to the config root, forward slashes */
  readonly path: string;
  readonly content: string;
  readonly target: string;
  readonly definitionName: string;
  readonly kind: ArtifactKind;
}

/**
 * Assigns ids to operation texts. May call out to a service.
 */
export interface OperationPersister {
  persist(text: string): Promise<string>;
}

export interface EmitContext {
  readonly projectConfig: ProjectConfig;
  /** The program of the emitter's target */
  readonly program: Program;
  readonly persister: OperationPersister | null;
}

/**
 * Body of one artifact, before signing and placement.
 */
export interface EmittedFile {
  readonly fileName: string;
  readonly kind: ArtifactKind;
  /** TypeScript source following the header */
  readonly body: string;
}

/**
 * Turns the definitions of one target program into file bodies.
 */
export interface ArtifactEmitter {
  readonly target: string;
  /** Definitions that get an artifact */
  select(program: Program): readonly ExecutableDefinition[];
  emit(definition: ExecutableDefinition, context: EmitContext): Promise<EmittedFile>;
}
