/**
 * Compiler
 *
 * Loads compiler state and documents once, then builds every selected
 * project. Projects build concurrently and independently: one failing
 * project does not stop the others, even when its build throws.
 *
 * @module
 */

import { selectProjects, type Config } from "../config/index.js";
import { loadCompilerState } from "../state/index.js";
import { loadDocuments } from "../documents/index.js";
import type { ResolvedValidationError } from "../source/index.js";
import { ProjectCrashError, type BuildProjectError } from "../errors.js";
import { buildProject, type BuildProjectOptions, type BuildProjectSummary } from "../build-project/index.js";
import { getScopedTracer } from "../telemetry/index.js";
import type { Result } from "../../types/result.js";
import { err, partition } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("compiler");

export interface CompilerOptions extends BuildProjectOptions {
  /** Project names to build; all projects when empty */
  projects?: readonly string[];
}

export interface ProjectOutcome {
  project: string;
  result: Result<BuildProjectSummary, BuildProjectError | ProjectCrashError>;
}

export interface CompilerResult {
  /** Syntax errors found while loading documents; no project was built */
  syntaxErrors: readonly ResolvedValidationError[];
  outcomes: readonly ProjectOutcome[];
  succeeded: boolean;
}

/**
 * Builds the selected projects of `config`.
 *
 * @throws ConfigError for unknown project names
 */
export async function runCompiler(config: Config, options: CompilerOptions = {}): Promise<CompilerResult> {
  const { projects: names = [], tracer: givenTracer, ...buildOptions } = options;
  const projects = selectProjects(config, names);
  logger.debug({ projects: projects.map((p) => p.name) }, "Compiling");

  // Spans of this run stay out of the process-wide tracer's buffer
  const runTracer = getScopedTracer("graphql-forge");
  const tracer = givenTracer ?? runTracer;

  try {
    const compilerState = await loadCompilerState(config, projects);
    const documents = await loadDocuments(config, projects);
    if (!documents.ok) {
      return { syntaxErrors: documents.error, outcomes: [], succeeded: false };
    }
    const { astSets, sources } = documents.value;

    const outcomes = await Promise.all(
      projects.map(async (projectConfig): Promise<ProjectOutcome> => {
        const project = projectConfig.name;
        try {
          const result = await buildProject(compilerState, config, projectConfig, astSets, sources, {
            ...buildOptions,
            tracer,
          });
          return { project, result };
        } catch (error) {
          logger.error({ err: error, project }, "Project build crashed");
          return { project, result: err(new ProjectCrashError(project, error)) };
        }
      })
    );

    const { errs } = partition(outcomes.map((outcome) => outcome.result));
    logger.debug({ projects: outcomes.length, failed: errs.length }, "Compilation finished");
    return { syntaxErrors: [], outcomes, succeeded: errs.length === 0 };
  } finally {
    await runTracer.flush();
  }
}
