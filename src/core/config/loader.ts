/**
 * Configuration loading
 *
 * @module
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigError, ErrorCode } from "../errors.js";
import { fileExists, readFileWithEncoding } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { ConfigSchema, type Config, type ProjectConfig } from "./schema.js";

const logger = createLogger("config");

export const CONFIG_FILE = "graphql-forge.config.json";

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

/**
 * Validates raw configuration and resolves it against `baseDir`.
 *
 * @throws ConfigError on schema violations or an unknown/self base project
 */
export function createConfig(input: unknown, baseDir: string, configPath: string | null = null): Config {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, ErrorCode.CONFIG_INVALID, {
      configPath: configPath ?? undefined,
    });
  }

  const projects: Record<string, ProjectConfig> = {};
  for (const [name, project] of Object.entries(parsed.data.projects)) {
    if (project.base !== null) {
      if (project.base === name) {
        throw new ConfigError(`Project '${name}' cannot be its own base`, ErrorCode.CONFIG_INVALID);
      }
      if (!(project.base in parsed.data.projects)) {
        throw new ConfigError(
          `Project '${name}' names unknown base project '${project.base}'`,
          ErrorCode.CONFIG_UNKNOWN_PROJECT
        );
      }
    }
    projects[name] = { ...project, name };
  }

  return {
    root: path.resolve(baseDir, parsed.data.root ?? "."),
    configPath,
    header: parsed.data.header,
    projects,
  };
}

/**
 * Loads the config file: `explicitPath` when given, else `graphql-forge.config.json` in `cwd`.
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<Config> {
  const configPath = path.resolve(cwd, explicitPath ?? CONFIG_FILE);

  if (!(await fileExists(configPath))) {
    throw new ConfigError(`No configuration file found at ${configPath}`, ErrorCode.CONFIG_NOT_FOUND, {
      configPath,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFileWithEncoding(configPath));
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIG_INVALID,
      { configPath }
    );
  }

  const config = createConfig(raw, path.dirname(configPath), configPath);
  logger.debug({ configPath, projects: Object.keys(config.projects) }, "Configuration loaded");
  return config;
}

/**
 * Selects projects by name, all of them when `names` is empty.
 *
 * @throws ConfigError for a name that is not configured
 */
export function selectProjects(config: Config, names: readonly string[] = []): ProjectConfig[] {
  if (names.length === 0) {
    return Object.values(config.projects);
  }
  return names.map((name) => {
    const project = config.projects[name];
    if (!project) {
      throw new ConfigError(`Unknown project '${name}'`, ErrorCode.CONFIG_UNKNOWN_PROJECT);
    }
    return project;
  });
}
