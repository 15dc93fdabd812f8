/**
 * Error Classes for graphql-forge
 * Structured error handling with error codes
 */

import type { ResolvedValidationError } from "./source/validation-error.js";

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_NOT_FOUND = "E1000",
  CONFIG_INVALID = "E1001",
  CONFIG_UNKNOWN_PROJECT = "E1002",

  // Schema errors (2xxx)
  SCHEMA_BUILD_FAILED = "E2000",
  SCHEMA_MISSING = "E2001",

  // Document errors (3xxx)
  DOCUMENT_READ_FAILED = "E3001",

  // Validation errors (4xxx)
  VALIDATION_FAILED = "E4000",

  // Artifact errors (5xxx)
  ARTIFACT_GENERATION_FAILED = "E5000",
  ARTIFACT_PERSIST_FAILED = "E5001",
  ARTIFACT_WRITE_FAILED = "E5100",
  ARTIFACTS_OUT_OF_DATE = "E5101",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVARIANT_VIOLATION = "E9001",
}

/**
 * Stages of a project build, in execution order.
 */
export const BUILD_STAGES = [
  "build_schema",
  "build_ir",
  "build_program",
  "validate",
  "apply_transforms",
  "generate_artifacts",
  "write_artifacts",
] as const;

export type BuildStage = (typeof BUILD_STAGES)[number];

/**
 * Base error class for all graphql-forge errors
 */
export class ForgeError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ForgeError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends ForgeError {
  public readonly configPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { configPath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigError";
    this.configPath = context?.configPath;
  }
}

/**
 * Failure to read or parse a document file before any build starts.
 */
export class DocumentError extends ForgeError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DOCUMENT_PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "DocumentError";
    this.filePath = context?.filePath;
  }
}

// =============================================================================
// Build errors
// =============================================================================

/**
 * Base class of every failure a project build reports to its caller.
 */
export abstract class BuildProjectErrorBase extends ForgeError {
  abstract readonly stage: BuildStage;
}

/**
 * Malformed or conflicting schema sources or extensions.
 */
export class SchemaBuildError extends BuildProjectErrorBase {
  readonly stage = "build_schema" as const;
  public readonly project: string;
  public readonly details: readonly string[];

  constructor(project: string, details: readonly string[], code: ErrorCode = ErrorCode.SCHEMA_BUILD_FAILED) {
    super(
      `Failed to build schema for project '${project}':\n${details.map((d) => `  - ${d}`).join("\n")}`,
      code,
      { project, details }
    );
    this.name = "SchemaBuildError";
    this.project = project;
    this.details = details;
  }
}

/**
 * A batch of source-resolved type or validation errors.
 */
export class ValidationErrors extends BuildProjectErrorBase {
  public readonly stage: "build_ir" | "validate";
  public readonly errors: readonly ResolvedValidationError[];

  constructor(stage: "build_ir" | "validate", errors: readonly ResolvedValidationError[]) {
    super(
      `${errors.length} error(s) during ${stage}:\n${errors.map((e) => `  - ${e.message}`).join("\n")}`,
      ErrorCode.VALIDATION_FAILED,
      { stage, count: errors.length }
    );
    this.name = "ValidationErrors";
    this.stage = stage;
    this.errors = errors;
  }
}

/**
 * Generation of one target/definition failed. Nothing was written.
 */
export class ArtifactGenerationError extends BuildProjectErrorBase {
  readonly stage = "generate_artifacts" as const;
  public readonly target: string;
  public readonly definitionName: string | null;

  constructor(
    message: string,
    context: { target: string; definitionName: string | null; cause?: unknown },
    code: ErrorCode = ErrorCode.ARTIFACT_GENERATION_FAILED
  ) {
    super(message, code, { target: context.target, definitionName: context.definitionName });
    this.name = "ArtifactGenerationError";
    this.target = context.target;
    this.definitionName = context.definitionName;
    this.cause = context.cause;
  }
}

/**
 * Persisting artifacts failed. Files written before the failure may remain.
 */
export class ArtifactWriteError extends BuildProjectErrorBase {
  readonly stage = "write_artifacts" as const;
  public readonly paths: readonly string[];

  constructor(
    message: string,
    paths: readonly string[],
    code: ErrorCode = ErrorCode.ARTIFACT_WRITE_FAILED,
    cause?: unknown
  ) {
    super(message, code, { paths });
    this.name = "ArtifactWriteError";
    this.paths = paths;
    this.cause = cause;
  }
}

export type BuildProjectError =
  | SchemaBuildError
  | ValidationErrors
  | ArtifactGenerationError
  | ArtifactWriteError;

/**
 * A project build that threw instead of returning a result. The compiler
 * reports it as that project's outcome; other projects are unaffected.
 */
export class ProjectCrashError extends ForgeError {
  readonly stage = null;
  public readonly project: string;

  constructor(project: string, cause: unknown) {
    super(
      `Build of project '${project}' crashed: ${errorMessage(cause)}`,
      isForgeError(cause) ? cause.code : ErrorCode.UNKNOWN_ERROR,
      { project }
    );
    this.name = "ProjectCrashError";
    this.project = project;
    this.cause = cause;
  }
}

/**
 * A broken internal assumption. Thrown, never returned as a build result.
 */
export class CompilerInvariantError extends ForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVARIANT_VIOLATION, context);
    this.name = "CompilerInvariantError";
  }
}

/**
 * Check if an error is a ForgeError
 */
export function isForgeError(error: unknown): error is ForgeError {
  return error instanceof ForgeError;
}

/**
 * Wrap an unknown error in a ForgeError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): ForgeError {
  if (isForgeError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ForgeError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new ForgeError(typeof error === "string" ? error : defaultMessage, code);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null) return JSON.stringify(error);
  return String(error);
}
