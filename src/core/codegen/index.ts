export type { Artifact, ArtifactKind, ArtifactEmitter, EmitContext, EmittedFile, OperationPersister } from "./types.js";
export { generateArtifacts, type GenerateArtifactsOptions } from "./generate.js";
export {
  readerEmitter,
  normalizationEmitter,
  operationTextEmitter,
  DEFAULT_EMITTERS,
  type OperationParams,
} from "./emitters.js";
export { HashPersister, RemotePersister, createPersister, type RemotePersisterOptions } from "./persister.js";
export { signSource, isSignatureValid } from "./sign.js";
export {
  buildReaderAst,
  buildNormalizationAst,
  storageKey,
  type ReaderFragment,
  type NormalizationOperation,
  type RuntimeSelection,
  type RuntimeArgument,
} from "./runtime-ast.js";
