/**
 * Artifact Writers
 *
 * Persist generated artifacts. A writer is called once per project, after
 * generation succeeded for the whole project.
 *
 * @module
 */

import * as path from "node:path";
import type { Artifact } from "../codegen/index.js";
import { isSignatureValid } from "../codegen/index.js";
import type { Config, ProjectConfig } from "../config/index.js";
import { ArtifactWriteError, ErrorCode, errorMessage } from "../errors.js";
import { readFileIfExists, writeFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("artifact-writer");

export interface WriteReport {
  /** Paths whose content was written */
  written: string[];
  /** Paths whose content already matched */
  unchanged: string[];
}

export interface ArtifactWriter {
  write(config: Config, projectConfig: ProjectConfig, artifacts: readonly Artifact[]): Promise<WriteReport>;
}

// =============================================================================
// File system
// =============================================================================

/**
 * Writes artifacts under the config root, skipping files whose content is
 * unchanged. Files written before a failure stay on disk.
 */
export class FileSystemArtifactWriter implements ArtifactWriter {
  async write(config: Config, projectConfig: ProjectConfig, artifacts: readonly Artifact[]): Promise<WriteReport> {
    const report: WriteReport = { written: [], unchanged: [] };

    for (const artifact of artifacts) {
      const absolutePath = path.join(config.root, artifact.path);
      try {
        const existing = await readFileIfExists(absolutePath);
        if (existing === artifact.content) {
          report.unchanged.push(artifact.path);
          continue;
        }
        await writeFile(absolutePath, artifact.content);
        report.written.push(artifact.path);
      } catch (error) {
        throw new ArtifactWriteError(
          `Cannot write ${artifact.path}: ${errorMessage(error)}`,
          [artifact.path],
          ErrorCode.ARTIFACT_WRITE_FAILED,
          error
        );
      }
    }

    logger.debug(
      { project: projectConfig.name, written: report.written.length, unchanged: report.unchanged.length },
      "Artifacts written"
    );
    return report;
  }
}

// =============================================================================
// In memory
// =============================================================================

/**
 * Records artifacts by path. Used by dry runs and tests.
 */
export class InMemoryArtifactWriter implements ArtifactWriter {
  readonly files = new Map<string, string>();
  /** Number of write calls */
  calls = 0;

  async write(_config: Config, _projectConfig: ProjectConfig, artifacts: readonly Artifact[]): Promise<WriteReport> {
    this.calls++;
    const report: WriteReport = { written: [], unchanged: [] };
    for (const artifact of artifacts) {
      if (this.files.get(artifact.path) === artifact.content) {
        report.unchanged.push(artifact.path);
      } else {
        this.files.set(artifact.path, artifact.content);
        report.written.push(artifact.path);
      }
    }
    return report;
  }
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Writes nothing; fails when any artifact on disk is missing or differs.
 */
export class ValidatingArtifactWriter implements ArtifactWriter {
  async write(config: Config, projectConfig: ProjectConfig, artifacts: readonly Artifact[]): Promise<WriteReport> {
    const stale: string[] = [];
    const unchanged: string[] = [];

    for (const artifact of artifacts) {
      const existing = await readFileIfExists(path.join(config.root, artifact.path));
      if (existing === artifact.content) {
        unchanged.push(artifact.path);
        continue;
      }
      stale.push(artifact.path);
      if (existing !== null && !isSignatureValid(existing)) {
        logger.warn({ project: projectConfig.name, path: artifact.path }, "Artifact was edited by hand");
      }
    }

    if (stale.length > 0) {
      throw new ArtifactWriteError(
        `${stale.length} artifact(s) of project '${projectConfig.name}' are out of date:\n${stale
          .map((p) => `  - ${p}`)
          .join("\n")}`,
        stale,
        ErrorCode.ARTIFACTS_OUT_OF_DATE
      );
    }
    return { written: [], unchanged };
  }
}
