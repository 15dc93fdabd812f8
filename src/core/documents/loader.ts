/**
 * Document Loading
 *
 * Discovers the document files of the selected projects (and of their base
 * projects) and parses them into AST sets.
 *
 * @module
 */

import * as path from "node:path";
import type { Config, ProjectConfig } from "../config/index.js";
import { DocumentError, ErrorCode } from "../errors.js";
import type { Result } from "../../types/result.js";
import type { ResolvedValidationError } from "../source/index.js";
import { findFiles, readFileWithEncoding, toPosixPath } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { buildAstSets, type DocumentSet } from "./ast-sets.js";
import type { DocumentFile } from "./parse.js";

const logger = createLogger("documents");

async function readProjectFiles(root: string, project: ProjectConfig): Promise<DocumentFile[]> {
  const paths = await findFiles({ patterns: project.documents, ignore: project.exclude, cwd: root });
  return Promise.all(
    paths.map(async (relativePath) => {
      try {
        return { path: toPosixPath(relativePath), text: await readFileWithEncoding(path.join(root, relativePath)) };
      } catch (error) {
        throw new DocumentError(`Cannot read document ${relativePath}`, ErrorCode.DOCUMENT_READ_FAILED, {
          filePath: relativePath,
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    })
  );
}

/**
 * Loads and parses the documents of `projects` and of their base projects.
 *
 * @throws DocumentError when a discovered file cannot be read
 */
export async function loadDocuments(
  config: Config,
  projects: readonly ProjectConfig[]
): Promise<Result<DocumentSet, ResolvedValidationError[]>> {
  const needed = new Map<string, ProjectConfig>();
  for (const project of projects) {
    needed.set(project.name, project);
    const base = project.base ? config.projects[project.base] : undefined;
    if (base) needed.set(base.name, base);
  }

  const files = new Map<string, DocumentFile[]>();
  for (const project of needed.values()) {
    const projectFiles = await readProjectFiles(config.root, project);
    files.set(project.name, projectFiles);
    logger.debug({ project: project.name, files: projectFiles.length }, "Documents discovered");
  }

  return buildAstSets(files, projects);
}
