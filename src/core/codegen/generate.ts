/**
 * Artifact Generator
 *
 * Produces every artifact of a project in memory. Nothing is written here;
 * a failure anywhere means no artifact is returned at all.
 *
 * @module
 */

import * as path from "node:path";
import type { ProjectConfig } from "../config/index.js";
import { ArtifactGenerationError, ErrorCode, errorMessage, isForgeError } from "../errors.js";
import type { Program } from "../program/index.js";
import type { TargetProgramSet } from "../transforms/index.js";
import type { Result } from "../../types/result.js";
import { ok, err, fromPromiseWith } from "../../types/result.js";
import { DEFAULT_EMITTERS } from "./emitters.js";
import { createPersister } from "./persister.js";
import { signSource } from "./sign.js";
import type { Artifact, ArtifactEmitter, OperationPersister } from "./types.js";

export interface GenerateArtifactsOptions {
  /** Lines added to every header */
  header?: readonly string[];
  /** Overrides the persister derived from the project's `persist` setting */
  persister?: OperationPersister | null;
  emitters?: readonly ArtifactEmitter[];
}

function generationError(target: string, definitionName: string, cause: unknown): ArtifactGenerationError {
  const code =
    isForgeError(cause) && cause.code === ErrorCode.ARTIFACT_PERSIST_FAILED
      ? ErrorCode.ARTIFACT_PERSIST_FAILED
      : ErrorCode.ARTIFACT_GENERATION_FAILED;
  return new ArtifactGenerationError(
    `Cannot generate ${target} artifact for ${definitionName}: ${errorMessage(cause)}`,
    { target, definitionName, cause },
    code
  );
}

/**
 * Generates the artifacts of every target, sorted by path.
 */
export async function generateArtifacts(
  projectConfig: ProjectConfig,
  programs: TargetProgramSet,
  options: GenerateArtifactsOptions = {}
): Promise<Result<Artifact[], ArtifactGenerationError>> {
  const emitters = new Map((options.emitters ?? DEFAULT_EMITTERS).map((emitter) => [emitter.target, emitter]));
  const persister = options.persister !== undefined ? options.persister : createPersister(projectConfig.persist);
  const header = options.header ?? [];

  const work: { target: string; program: Program; emitter: ArtifactEmitter }[] = [];
  for (const [target, program] of programs) {
    const emitter = emitters.get(target);
    if (!emitter) {
      return err(
        new ArtifactGenerationError(`No artifact emitter for target "${target}"`, { target, definitionName: null })
      );
    }
    work.push({ target, program, emitter });
  }

  const pending: Promise<Result<Artifact, ArtifactGenerationError>>[] = [];
  for (const { target, program, emitter } of work) {
    for (const definition of emitter.select(program)) {
      pending.push(
        fromPromiseWith(
          emitter.emit(definition, { projectConfig, program, persister }).then(
            (file): Artifact => ({
              path: path.posix.join(projectConfig.output, file.fileName),
              content: signSource(file.body, header),
              target,
              definitionName: definition.name,
              kind: file.kind,
            })
          ),
          (error) => generationError(target, definition.name, error)
        )
      );
    }
  }

  const artifacts: Artifact[] = [];
  for (const result of await Promise.all(pending)) {
    if (!result.ok) return err(result.error);
    artifacts.push(result.value);
  }

  return ok(artifacts.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)));
}
