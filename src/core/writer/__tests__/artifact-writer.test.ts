/**
 * Artifact writer tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FileSystemArtifactWriter, InMemoryArtifactWriter, ValidatingArtifactWriter } from "../artifact-writer.js";
import type { Artifact } from "../../codegen/index.js";
import { signSource } from "../../codegen/index.js";
import { ArtifactWriteError, ErrorCode } from "../../errors.js";
import { testConfig, testProject } from "../../__tests__/fixtures.js";

function artifact(name: string, body: string): Artifact {
  return {
    path: `src/__generated__/${name}.reader.ts`,
    content: signSource(body),
    target: "reader",
    definitionName: name,
    kind: "reader",
  };
}

describe("artifact writers", () => {
  const project = testProject();
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "forge-writer-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("FileSystemArtifactWriter", () => {
    it("writes artifacts under the config root, creating directories", async () => {
      const config = testConfig([project], root);
      const a = artifact("A_user", "export default 1;\n");

      const report = await new FileSystemArtifactWriter().write(config, project, [a]);

      expect(report).toEqual({ written: [a.path], unchanged: [] });
      await expect(fs.readFile(path.join(root, a.path), "utf-8")).resolves.toBe(a.content);
    });

    it("skips files whose content is unchanged", async () => {
      const config = testConfig([project], root);
      const writer = new FileSystemArtifactWriter();
      const a = artifact("A_user", "export default 1;\n");
      const b = artifact("B_user", "export default 2;\n");
      await writer.write(config, project, [a, b]);

      const changed = artifact("B_user", "export default 3;\n");
      const report = await writer.write(config, project, [a, changed]);

      expect(report).toEqual({ written: [changed.path], unchanged: [a.path] });
    });

    it("reports the path it could not write", async () => {
      const config = testConfig([project], root);
      // A file where the output directory should be
      await fs.writeFile(path.join(root, "src"), "not a directory");

      const a = artifact("A_user", "export default 1;\n");
      const failure = new FileSystemArtifactWriter().write(config, project, [a]);

      await expect(failure).rejects.toBeInstanceOf(ArtifactWriteError);
      await expect(failure).rejects.toMatchObject({ paths: [a.path], code: ErrorCode.ARTIFACT_WRITE_FAILED });
    });
  });

  describe("InMemoryArtifactWriter", () => {
    it("records artifacts by path and counts calls", async () => {
      const writer = new InMemoryArtifactWriter();
      const a = artifact("A_user", "export default 1;\n");

      await writer.write(testConfig([project], root), project, [a]);
      const second = await writer.write(testConfig([project], root), project, [a]);

      expect(writer.calls).toBe(2);
      expect(writer.files.get(a.path)).toBe(a.content);
      expect(second).toEqual({ written: [], unchanged: [a.path] });
    });
  });

  describe("ValidatingArtifactWriter", () => {
    it("passes when every artifact is up to date", async () => {
      const config = testConfig([project], root);
      const a = artifact("A_user", "export default 1;\n");
      await new FileSystemArtifactWriter().write(config, project, [a]);

      const report = await new ValidatingArtifactWriter().write(config, project, [a]);

      expect(report).toEqual({ written: [], unchanged: [a.path] });
    });

    it("lists every missing or stale artifact and writes nothing", async () => {
      const config = testConfig([project], root);
      const a = artifact("A_user", "export default 1;\n");
      const b = artifact("B_user", "export default 2;\n");
      await new FileSystemArtifactWriter().write(config, project, [a]);

      const stale = artifact("A_user", "export default 3;\n");
      const failure = new ValidatingArtifactWriter().write(config, project, [stale, b]);

      await expect(failure).rejects.toMatchObject({
        code: ErrorCode.ARTIFACTS_OUT_OF_DATE,
        paths: [stale.path, b.path],
      });
      await expect(fs.readFile(path.join(root, a.path), "utf-8")).resolves.toBe(a.content);
      await expect(fs.access(path.join(root, b.path))).rejects.toThrow();
    });
  });
});
