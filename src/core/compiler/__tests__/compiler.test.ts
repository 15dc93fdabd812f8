/**
 * Compiler tests against a project on disk
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { runCompiler } from "../compiler.js";
import { createConfig } from "../../config/index.js";
import { DiagnosticCode } from "../../source/index.js";
import { CompilerInvariantError, ConfigError, ErrorCode, ProjectCrashError } from "../../errors.js";
import { createNoOpTracer, initTelemetry, MemoryTraceExporter } from "../../telemetry/index.js";
import { DEFAULT_STAGES } from "../../build-project/index.js";
import { ValidatingArtifactWriter } from "../../writer/index.js";
import { TEST_SCHEMA } from "../../__tests__/fixtures.js";

const tracer = createNoOpTracer("test");

describe("runCompiler", () => {
  let root: string;

  async function writeFile(relativePath: string, text: string): Promise<void> {
    await fs.mkdir(path.dirname(path.join(root, relativePath)), { recursive: true });
    await fs.writeFile(path.join(root, relativePath), text);
  }

  function config() {
    return createConfig(
      {
        projects: {
          web: { schema: "schema.graphql", documents: ["src/**/*.graphql"], output: "src/__generated__" },
          admin: { schema: "schema.graphql", documents: ["admin/**/*.graphql"], output: "admin/__generated__" },
        },
      },
      root
    );
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "forge-compiler-"));
    await writeFile("schema.graphql", TEST_SCHEMA);
    await writeFile(
      "src/Profile.graphql",
      "query ProfileQuery { viewer { ...Profile_user } }\nfragment Profile_user on User { name }\n"
    );
    await writeFile("admin/Admin.graphql", "query AdminQuery { viewer { id } }\n");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("builds every project and writes its artifacts", async () => {
    const result = await runCompiler(config(), { tracer });

    expect(result.succeeded).toBe(true);
    expect(result.syntaxErrors).toEqual([]);
    expect(result.outcomes.map((o) => (o.result.ok ? o.result.value.line : o.result.error.message))).toEqual([
      "[web] documents: 2 reader, 1 normalization, 2 operation_text",
      "[admin] documents: 1 reader, 1 normalization, 1 operation_text",
    ]);
    expect((await fs.readdir(path.join(root, "src/__generated__"))).sort()).toEqual([
      "ProfileQuery.normalization.ts",
      "ProfileQuery.params.ts",
      "ProfileQuery.reader.ts",
      "Profile_user.reader.ts",
    ]);
  });

  it("leaves up-to-date artifacts alone", async () => {
    await runCompiler(config(), { tracer, projects: ["web"] });

    const second = await runCompiler(config(), { tracer, projects: ["web"] });
    const check = await runCompiler(config(), { tracer, projects: ["web"], writer: new ValidatingArtifactWriter() });

    const [outcome] = second.outcomes;
    expect(outcome?.result.ok && outcome.result.value.written).toEqual([]);
    expect(outcome?.result.ok && outcome.result.value.unchanged).toHaveLength(4);
    expect(check.succeeded).toBe(true);
  });

  it("builds only the selected projects", async () => {
    const result = await runCompiler(config(), { tracer, projects: ["admin"] });

    expect(result.outcomes.map((o) => o.project)).toEqual(["admin"]);
    await expect(fs.access(path.join(root, "src/__generated__"))).rejects.toThrow();
  });

  it("rejects unknown project names", async () => {
    await expect(runCompiler(config(), { tracer, projects: ["mobile"] })).rejects.toBeInstanceOf(ConfigError);
  });

  it("keeps building other projects when one fails", async () => {
    await writeFile("admin/Admin.graphql", "query AdminQuery { viewer { email } }\n");

    const result = await runCompiler(config(), { tracer });

    expect(result.succeeded).toBe(false);
    const [web, admin] = result.outcomes;
    expect(web?.result.ok).toBe(true);
    expect(admin?.result.ok).toBe(false);
    expect(admin?.result.ok === false && admin.result.error.stage).toBe("build_ir");
  });

  it("reports a build that throws as that project's outcome", async () => {
    const result = await runCompiler(config(), {
      tracer,
      stages: {
        applyTransforms: (program, baseFragmentNames, targets) => {
          if (program.operation("AdminQuery")) throw new CompilerInvariantError("broken transform");
          return DEFAULT_STAGES.applyTransforms(program, baseFragmentNames, targets);
        },
      },
    });

    expect(result.succeeded).toBe(false);
    const [web, admin] = result.outcomes;
    expect(web?.result.ok && web.result.value.line).toBe(
      "[web] documents: 2 reader, 1 normalization, 2 operation_text"
    );
    if (!admin || admin.result.ok) throw new Error("expected admin to fail");
    expect(admin.result.error).toBeInstanceOf(ProjectCrashError);
    expect(admin.result.error.message).toBe("Build of project 'admin' crashed: broken transform");
    expect(admin.result.error.code).toBe(ErrorCode.INVARIANT_VIOLATION);
    expect(admin.result.error.cause).toBeInstanceOf(CompilerInvariantError);
  });

  describe("without a tracer", () => {
    afterEach(() => {
      initTelemetry({ enabled: false, exporter: undefined });
    });

    it("exports the spans of the run when it ends", async () => {
      const exporter = new MemoryTraceExporter();
      initTelemetry({ enabled: true, exporter });

      await runCompiler(config(), { projects: ["admin"] });

      expect(exporter.findByName("build_project admin")).toBeDefined();
      expect(exporter.getSpans()).toHaveLength(8);
    });
  });

  it("reports syntax errors and builds nothing", async () => {
    await writeFile("src/Broken.graphql", "query BrokenQuery {\n");

    const result = await runCompiler(config(), { tracer });

    expect(result.succeeded).toBe(false);
    expect(result.outcomes).toEqual([]);
    expect(result.syntaxErrors).toHaveLength(1);
    expect(result.syntaxErrors[0]?.code).toBe(DiagnosticCode.SYNTAX_ERROR);
    expect(result.syntaxErrors[0]?.locations[0]?.path).toBe("src/Broken.graphql");
    await expect(fs.access(path.join(root, "src/__generated__"))).rejects.toThrow();
  });
});
