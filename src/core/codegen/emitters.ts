/**
 * Artifact Emitters
 *
 * One emitter per target. Emitters produce file bodies; generateArtifacts
 * signs and places them.
 *
 * @module
 */

import { CompilerInvariantError } from "../errors.js";
import type { ExecutableDefinition, OperationDefinition } from "../ir/index.js";
import { printOperationText } from "../program/index.js";
import { buildNormalizationAst, buildReaderAst } from "./runtime-ast.js";
import type { ArtifactEmitter, EmitContext, EmittedFile } from "./types.js";

function moduleBody(constName: string, value: unknown): string {
  return `const ${constName} = ${JSON.stringify(value, null, 2)};\n\nexport default ${constName};\n`;
}

function expectOperation(definition: ExecutableDefinition, target: string): OperationDefinition {
  if (definition.kind !== "Operation") {
    throw new CompilerInvariantError(`${target} artifacts are emitted for operations only, got fragment ${definition.name}`);
  }
  return definition;
}

export const readerEmitter: ArtifactEmitter = {
  target: "reader",
  select(program) {
    return program.definitions();
  },
  async emit(definition, context) {
    return {
      fileName: `${definition.name}.reader.ts`,
      kind: "reader",
      body: moduleBody("node", buildReaderAst(context.program.schema, definition)),
    };
  },
};

export const normalizationEmitter: ArtifactEmitter = {
  target: "normalization",
  select(program) {
    return program.operations();
  },
  async emit(definition, context) {
    const operation = expectOperation(definition, "normalization");
    return {
      fileName: `${operation.name}.normalization.ts`,
      kind: "normalization",
      body: moduleBody("node", buildNormalizationAst(context.program.schema, operation)),
    };
  },
};

export interface OperationParams {
  id: string | null;
  name: string;
  operationKind: "query" | "mutation" | "subscription";
  text: string | null;
}

export const operationTextEmitter: ArtifactEmitter = {
  target: "operation_text",
  select(program) {
    return program.operations();
  },
  async emit(definition: ExecutableDefinition, context: EmitContext): Promise<EmittedFile> {
    const operation = expectOperation(definition, "operation_text");
    const base = { name: operation.name, operationKind: operation.operation };
    let params: OperationParams;
    if (operation.selections.length === 0) {
      // Client-only: nothing is sent to the server, so there is no text to persist
      params = { id: null, ...base, text: null };
    } else {
      const text = printOperationText(context.program, operation.name);
      params = context.persister
        ? { id: await context.persister.persist(text), ...base, text: null }
        : { id: null, ...base, text };
    }
    return { fileName: `${operation.name}.params.ts`, kind: "params", body: moduleBody("params", params) };
  },
};

export const DEFAULT_EMITTERS: readonly ArtifactEmitter[] = [readerEmitter, normalizationEmitter, operationTextEmitter];
