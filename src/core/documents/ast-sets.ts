/**
 * AST Sets
 *
 * Parsed definitions per project, together with the definitions of the
 * project's base project.
 *
 * @module
 */

import type { DefinitionNode } from "graphql";
import type { ProjectConfig } from "../config/index.js";
import type { Result } from "../../types/result.js";
import { ok, err } from "../../types/result.js";
import type { ResolvedValidationError, SourceText, Sources, ValidationError } from "../source/index.js";
import { parseDocumentFile, type DocumentFile } from "./parse.js";

export interface ProjectAsts {
  /** Definitions of the project's own documents */
  readonly definitions: readonly DefinitionNode[];
  /** Definitions of the base project's documents; empty without a base */
  readonly baseDefinitions: readonly DefinitionNode[];
}

export type AstSets = ReadonlyMap<string, ProjectAsts>;

export interface DocumentSet {
  astSets: AstSets;
  sources: Sources;
}

/**
 * Parses the document files of every project and pairs each project with its
 * base project's definitions. Syntax errors of all files are collected and
 * returned resolved.
 *
 * @param files - Document files keyed by project name, base projects included
 * @param projects - Projects to build AST sets for
 */
export function buildAstSets(
  files: ReadonlyMap<string, readonly DocumentFile[]>,
  projects: readonly ProjectConfig[]
): Result<DocumentSet, ResolvedValidationError[]> {
  const sources = new Map<string, SourceText>();
  const definitionsByProject = new Map<string, DefinitionNode[]>();
  const errors: ValidationError[] = [];

  for (const [projectName, projectFiles] of files) {
    const definitions: DefinitionNode[] = [];
    for (const file of projectFiles) {
      const parsed = parseDocumentFile(file);
      for (const [key, unit] of parsed.sources) sources.set(key, unit);
      definitions.push(...parsed.definitions);
      errors.push(...parsed.errors);
    }
    definitionsByProject.set(projectName, definitions);
  }

  if (errors.length > 0) {
    return err(errors.map((error) => error.withSources(sources)));
  }

  const astSets = new Map<string, ProjectAsts>();
  for (const project of projects) {
    astSets.set(project.name, {
      definitions: definitionsByProject.get(project.name) ?? [],
      baseDefinitions: project.base ? (definitionsByProject.get(project.base) ?? []) : [],
    });
  }

  return ok({ astSets, sources });
}
