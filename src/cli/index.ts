#!/usr/bin/env node

/**
 * graphql-forge CLI
 * Compiles GraphQL documents into runtime artifacts
 */

import { Command } from "commander";
import chalk from "chalk";
import { buildCommand } from "./commands/build.js";
import { isForgeError, wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("graphql-forge")
  .description("Ahead-of-time compiler for GraphQL documents")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("build")
  .description("Compile every project and write its artifacts")
  .option("-c, --config <path>", "Path to graphql-forge.config.json")
  .option("-p, --project <name...>", "Only build the named projects")
  .option("--validate", "Fail when artifacts on disk are out of date instead of writing them")
  .option("--dry-run", "Compile without writing artifacts")
  .option("-v, --verbose", "Enable debug logging")
  .option("--trace [dir]", "Write a Chrome trace of the build stages")
  .action(buildCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  logger.error({ err: error }, "CLI error occurred");
  console.error(chalk.red(`\nError: ${wrapError(error).message}`));
  if (error instanceof Error && !isForgeError(error) && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, stopping.`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
