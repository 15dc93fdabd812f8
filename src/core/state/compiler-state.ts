/**
 * Compiler State
 *
 * Schema and extension texts per project, read from disk once per run.
 * Schema construction reads nothing else.
 *
 * @module
 */

import * as path from "node:path";
import type { Config, ProjectConfig } from "../config/index.js";
import { ForgeError, ErrorCode } from "../errors.js";
import { findFiles, readFileWithEncoding, toPosixPath } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("compiler-state");

/**
 * One schema or extension file.
 */
export interface SchemaDocument {
  /** Path relative to the config root */
  path: string;
  text: string;
}

export interface CompilerState {
  readonly schemas: ReadonlyMap<string, readonly SchemaDocument[]>;
  readonly extensions: ReadonlyMap<string, readonly SchemaDocument[]>;
}

async function readSchemaDocuments(root: string, patterns: readonly string[]): Promise<SchemaDocument[]> {
  if (patterns.length === 0) return [];
  const files = await findFiles({ patterns: [...patterns], cwd: root });
  return Promise.all(
    files.map(async (file) => {
      try {
        return { path: toPosixPath(file), text: await readFileWithEncoding(path.join(root, file)) };
      } catch (error) {
        throw new ForgeError(`Cannot read schema file ${file}`, ErrorCode.SCHEMA_MISSING, {
          filePath: file,
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    })
  );
}

/**
 * Reads the schema and extension files of the given projects.
 */
export async function loadCompilerState(config: Config, projects: readonly ProjectConfig[]): Promise<CompilerState> {
  const schemas = new Map<string, SchemaDocument[]>();
  const extensions = new Map<string, SchemaDocument[]>();

  for (const project of projects) {
    schemas.set(project.name, await readSchemaDocuments(config.root, project.schema));
    extensions.set(project.name, await readSchemaDocuments(config.root, project.extensions));
    logger.debug(
      {
        project: project.name,
        schemaFiles: schemas.get(project.name)?.length ?? 0,
        extensionFiles: extensions.get(project.name)?.length ?? 0,
      },
      "Schema sources loaded"
    );
  }

  return { schemas, extensions };
}

/**
 * Compiler state from in-memory texts, keyed by project name.
 */
export function createCompilerState(
  schemas: Record<string, readonly SchemaDocument[]>,
  extensions: Record<string, readonly SchemaDocument[]> = {}
): CompilerState {
  return {
    schemas: new Map(Object.entries(schemas)),
    extensions: new Map(Object.entries(extensions)),
  };
}
