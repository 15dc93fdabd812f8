/**
 * Project Build Pipeline
 *
 * Runs one project through the stages, in order:
 * build_schema → build_ir → build_program → validate → apply_transforms →
 * generate_artifacts → write_artifacts.
 *
 * Every stage runs in its own span under a `build_project <project>` root
 * span. A failed stage ends the build; later stages never run. Artifacts are
 * generated for the whole project before anything is written.
 *
 * @module
 */

import type { Config, ProjectConfig } from "../config/index.js";
import type { CompilerState } from "../state/index.js";
import type { AstSets } from "../documents/index.js";
import type { Sources, ValidationError } from "../source/index.js";
import { buildSchema } from "../schema/index.js";
import { buildIR } from "../ir/index.js";
import { buildProgram } from "../program/index.js";
import { validate } from "../validate/index.js";
import { applyTransforms, DEFAULT_TARGETS, type TargetPipeline } from "../transforms/index.js";
import { generateArtifacts, type Artifact, type OperationPersister } from "../codegen/index.js";
import { FileSystemArtifactWriter, type ArtifactWriter, type WriteReport } from "../writer/index.js";
import {
  ArtifactWriteError,
  ErrorCode,
  ValidationErrors,
  errorMessage,
  type BuildProjectError,
  type BuildStage,
} from "../errors.js";
import { getTracer, SpanStatusCode, type Span, type Tracer } from "../telemetry/index.js";
import type { Result } from "../../types/result.js";
import { ok, err, mapErr } from "../../types/result.js";
import { createChildLogger, createLogger, type Logger } from "../../utils/logger.js";

const defaultLogger = createLogger("build-project");

// =============================================================================
// Types
// =============================================================================

/**
 * Stage implementations. Tests replace single stages to observe or break
 * the pipeline.
 */
export interface BuildStages {
  buildSchema: typeof buildSchema;
  buildIR: typeof buildIR;
  buildProgram: typeof buildProgram;
  validate: typeof validate;
  applyTransforms: typeof applyTransforms;
  generateArtifacts: typeof generateArtifacts;
}

export const DEFAULT_STAGES: BuildStages = {
  buildSchema,
  buildIR,
  buildProgram,
  validate,
  applyTransforms,
  generateArtifacts,
};

export interface BuildProjectOptions {
  /**
   * Tracer for stage spans. Defaults to the process-wide "graphql-forge" tracer, whose span
   * buffer every build without its own tracer shares; runCompiler passes one tracer per run.
   */
  tracer?: Tracer;
  logger?: Logger;
  stages?: Partial<BuildStages>;
  /** Target pipelines (default: reader, normalization, operation_text) */
  targets?: readonly TargetPipeline[];
  /** Overrides the persister derived from the project's `persist` setting */
  persister?: OperationPersister | null;
  /** Default: FileSystemArtifactWriter */
  writer?: ArtifactWriter;
}

export interface TargetDocumentCount {
  target: string;
  count: number;
}

export interface BuildProjectSummary {
  project: string;
  /** Definition count per target, in target order */
  documents: TargetDocumentCount[];
  artifacts: number;
  written: string[];
  unchanged: string[];
  /** Stage durations in milliseconds */
  timings: Partial<Record<BuildStage, number>>;
  /** `[project] documents: <n> reader, ...` */
  line: string;
}

/**
 * The summary line of a successful build.
 */
export function formatSummaryLine(project: string, documents: readonly TargetDocumentCount[]): string {
  return `[${project}] documents: ${documents.map(({ target, count }) => `${count} ${target}`).join(", ")}`;
}

/**
 * Resolves a batch of errors against the source text set.
 *
 * @throws CompilerInvariantError when an error has no resolvable location
 */
export function addErrorSources(
  stage: "build_ir" | "validate",
  errors: readonly ValidationError[],
  sources: Sources
): ValidationErrors {
  return new ValidationErrors(
    stage,
    errors.map((error) => error.withSources(sources))
  );
}

function firstLine(message: string): string {
  return message.split("\n", 1)[0] ?? message;
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Builds one project.
 *
 * Batch failures (schema, type, validation, generation, write) come back as
 * an `err` result. Internal defects such as CompilerInvariantError are thrown.
 */
export async function buildProject(
  compilerState: CompilerState,
  config: Config,
  projectConfig: ProjectConfig,
  astSets: AstSets,
  sources: Sources,
  options: BuildProjectOptions = {}
): Promise<Result<BuildProjectSummary, BuildProjectError>> {
  const project = projectConfig.name;
  const tracer = options.tracer ?? getTracer("graphql-forge");
  const logger = createChildLogger(options.logger ?? defaultLogger, { project });
  const stages: BuildStages = { ...DEFAULT_STAGES, ...options.stages };
  const targets = options.targets ?? DEFAULT_TARGETS;
  const writer = options.writer ?? new FileSystemArtifactWriter();
  const timings: Partial<Record<BuildStage, number>> = {};

  const runStages = async (root: Span): Promise<Result<BuildProjectSummary, BuildProjectError>> => {
    const runStage = async <T, E extends Error>(
      stage: BuildStage,
      fn: () => Promise<Result<T, E>> | Result<T, E>
    ): Promise<Result<T, E>> => {
      logger.debug({ stage }, "Stage started");
      const start = performance.now();
      try {
        return await tracer.withSpan(
          `${stage} ${project}`,
          async (span) => {
            const result = await fn();
            if (!result.ok) {
              span.setStatus({ code: SpanStatusCode.ERROR, message: firstLine(result.error.message) });
            }
            return result;
          },
          { parent: root, attributes: { stage, project } }
        );
      } finally {
        timings[stage] = performance.now() - start;
        logger.debug({ stage, durationMs: timings[stage] }, "Stage finished");
      }
    };

    const schema = await runStage("build_schema", () => stages.buildSchema(compilerState, projectConfig));
    if (!schema.ok) return schema;

    const ir = await runStage("build_ir", () =>
      mapErr(stages.buildIR(projectConfig, schema.value, astSets), (errors) =>
        addErrorSources("build_ir", errors, sources)
      )
    );
    if (!ir.ok) return ir;
    const { baseFragmentNames } = ir.value;

    const program = await runStage("build_program", () => ok(stages.buildProgram(schema.value, ir.value.ir)));
    if (!program.ok) return program;

    const validated = await runStage("validate", () =>
      mapErr(stages.validate(program.value, baseFragmentNames), (errors) =>
        addErrorSources("validate", errors, sources)
      )
    );
    if (!validated.ok) return validated;

    const programs = await runStage("apply_transforms", () =>
      ok(stages.applyTransforms(program.value, baseFragmentNames, targets))
    );
    if (!programs.ok) return programs;

    const artifacts = await runStage("generate_artifacts", () =>
      stages.generateArtifacts(projectConfig, programs.value, { header: config.header, persister: options.persister })
    );
    if (!artifacts.ok) return artifacts;

    const report = await runStage("write_artifacts", () => writeArtifacts(writer, config, projectConfig, artifacts.value));
    if (!report.ok) return report;

    const documents = [...programs.value].map(([target, targetProgram]) => ({
      target,
      count: targetProgram.documentCount(),
    }));
    const summary: BuildProjectSummary = {
      project,
      documents,
      artifacts: artifacts.value.length,
      written: report.value.written,
      unchanged: report.value.unchanged,
      timings,
      line: formatSummaryLine(project, documents),
    };
    root.setAttributes({ artifacts: summary.artifacts, written: summary.written.length });
    logger.info({ documents, artifacts: summary.artifacts, written: summary.written.length, timings }, summary.line);
    return ok(summary);
  };

  return tracer.withSpan(
    `build_project ${project}`,
    async (root) => {
      const result = await runStages(root);
      if (!result.ok) {
        root.setStatus({ code: SpanStatusCode.ERROR, message: firstLine(result.error.message) });
        root.setAttribute("failed_stage", result.error.stage);
        logger.debug({ stage: result.error.stage, code: result.error.code }, "Build failed");
      }
      return result;
    },
    { attributes: { project } }
  );
}

async function writeArtifacts(
  writer: ArtifactWriter,
  config: Config,
  projectConfig: ProjectConfig,
  artifacts: readonly Artifact[]
): Promise<Result<WriteReport, ArtifactWriteError>> {
  try {
    return ok(await writer.write(config, projectConfig, artifacts));
  } catch (error) {
    if (error instanceof ArtifactWriteError) return err(error);
    return err(
      new ArtifactWriteError(
        `Cannot write artifacts of project '${projectConfig.name}': ${errorMessage(error)}`,
        [],
        ErrorCode.ARTIFACT_WRITE_FAILED,
        error
      )
    );
  }
}
