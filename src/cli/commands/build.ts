/**
 * build command - Compile documents and write artifacts
 */

import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../core/config/index.js";
import { runCompiler, type ProjectOutcome } from "../../core/compiler/index.js";
import { createTracer, FileTraceExporter, type Tracer } from "../../core/telemetry/index.js";
import {
  FileSystemArtifactWriter,
  InMemoryArtifactWriter,
  ValidatingArtifactWriter,
  type ArtifactWriter,
} from "../../core/writer/index.js";
import { createLogger, setLogLevel } from "../../utils/logger.js";
import { formatBuildError, formatValidationError } from "../format.js";

const logger = createLogger("build");

export interface BuildOptions {
  config?: string;
  project?: string[];
  validate?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  /** Directory for the trace file; `true` when given without a value */
  trace?: string | boolean;
}

const DEFAULT_TRACE_DIR = ".graphql-forge/traces";

function selectWriter(options: BuildOptions): ArtifactWriter {
  if (options.validate) return new ValidatingArtifactWriter();
  if (options.dryRun) return new InMemoryArtifactWriter();
  return new FileSystemArtifactWriter();
}

function printOutcome(outcome: ProjectOutcome, options: BuildOptions): void {
  const { result } = outcome;
  if (result.ok) {
    const summary = result.value;
    const files = options.validate
      ? `${summary.unchanged.length} up to date`
      : `${summary.written.length} written, ${summary.unchanged.length} unchanged`;
    console.log(chalk.green("✓"), summary.line, chalk.dim(`(${files})`));
    return;
  }

  const error = result.error;
  const where = error.stage === null ? "crashed" : `failed at ${error.stage}`;
  console.log(chalk.red("✗"), chalk.bold(`[${outcome.project}]`), chalk.red(where));
  for (const line of formatBuildError(error)) {
    console.log(line.startsWith("  ") ? chalk.dim(line) : line);
  }
}

/**
 * Builds every selected project. Sets exit code 1 when any project fails.
 */
export async function buildCommand(options: BuildOptions): Promise<void> {
  if (options.verbose) {
    process.env.LOG_LEVEL = "debug";
    setLogLevel("debug");
  } else if (!process.env.LOG_LEVEL) {
    setLogLevel("warn");
  }
  logger.debug({ options }, "Starting build");

  const config = await loadConfig(process.cwd(), options.config);

  let tracer: (Tracer & { shutdown(): Promise<void> }) | undefined;
  if (options.trace) {
    const outputDir = typeof options.trace === "string" ? options.trace : DEFAULT_TRACE_DIR;
    tracer = createTracer("graphql-forge", { exporter: new FileTraceExporter({ outputDir }) });
  }

  const spinner = ora(options.validate ? "Checking artifacts..." : "Compiling...").start();
  const startTime = Date.now();

  try {
    const result = await runCompiler(config, {
      projects: options.project ?? [],
      writer: selectWriter(options),
      tracer,
    });

    if (result.syntaxErrors.length > 0) {
      spinner.fail(chalk.red(`${result.syntaxErrors.length} syntax error(s)`));
      for (const error of result.syntaxErrors) {
        console.log(formatValidationError(error).join("\n"));
      }
      process.exitCode = 1;
      return;
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
    if (result.succeeded) {
      spinner.succeed(chalk.green(`Compiled ${result.outcomes.length} project(s) in ${elapsed}s`));
    } else {
      spinner.fail(chalk.red(`Compilation failed after ${elapsed}s`));
    }

    for (const outcome of result.outcomes) {
      printOutcome(outcome, options);
    }
    if (options.dryRun) {
      console.log(chalk.dim("Dry run: no files were written."));
    }

    if (!result.succeeded) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail(chalk.red("Compilation failed"));
    throw error;
  } finally {
    await tracer?.shutdown();
  }
}
