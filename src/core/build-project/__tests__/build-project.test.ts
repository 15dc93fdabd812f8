/**
 * Project build pipeline tests
 */

import { describe, it, expect, vi } from "vitest";
import { buildProject, DEFAULT_STAGES, formatSummaryLine, type BuildProjectOptions } from "../build-project.js";
import { InMemoryArtifactWriter, type ArtifactWriter } from "../../writer/index.js";
import { createTracer, MemoryTraceExporter, SpanStatusCode } from "../../telemetry/index.js";
import {
  ArtifactGenerationError,
  ArtifactWriteError,
  BUILD_STAGES,
  CompilerInvariantError,
  SchemaBuildError,
  ValidationErrors,
} from "../../errors.js";
import { DiagnosticCode } from "../../source/index.js";
import type { ProjectConfig } from "../../config/index.js";
import { err } from "../../../types/result.js";
import { testConfig, testDocuments, testProject, testState, TEST_SCHEMA } from "../../__tests__/fixtures.js";

const PROFILE_DOCS = {
  "src/Profile.graphql": "query ProfileQuery { viewer { ...Profile_user } } fragment Profile_user on User { name }",
};

const UNKNOWN_FIELD_DOCS = {
  "src/App.graphql": "query AppQuery {\n  user(id: 1) {\n    id\n    email\n  }\n}\n",
};

function setup(docs: Record<string, string>, schema = TEST_SCHEMA) {
  const project = testProject();
  const documents = testDocuments({ app: docs }, [project]);
  const exporter = new MemoryTraceExporter();
  const tracer = createTracer("test", { exporter });
  const writer = new InMemoryArtifactWriter();

  const build = (options: BuildProjectOptions = {}) =>
    buildProject(testState([project], schema), testConfig([project]), project, documents.astSets, documents.sources, {
      tracer,
      writer,
      ...options,
    });

  return { project, exporter, tracer, writer, build };
}

describe("formatSummaryLine", () => {
  it("lists the document count of every target", () => {
    expect(
      formatSummaryLine("web", [
        { target: "reader", count: 3 },
        { target: "normalization", count: 1 },
      ])
    ).toBe("[web] documents: 3 reader, 1 normalization");
  });
});

describe("buildProject", () => {
  it("runs every stage and reports the documents per target", async () => {
    const { build, writer } = setup(PROFILE_DOCS);

    const result = await build();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.line).toBe("[app] documents: 2 reader, 1 normalization, 2 operation_text");
    expect(result.value.artifacts).toBe(4);
    expect(result.value.written).toEqual([
      "src/__generated__/ProfileQuery.normalization.ts",
      "src/__generated__/ProfileQuery.params.ts",
      "src/__generated__/ProfileQuery.reader.ts",
      "src/__generated__/Profile_user.reader.ts",
    ]);
    expect(result.value.unchanged).toEqual([]);
    expect(Object.keys(result.value.timings)).toEqual([...BUILD_STAGES]);
    expect(writer.calls).toBe(1);
  });

  it("stops at build_ir with the resolved type error", async () => {
    const { build, writer } = setup(UNKNOWN_FIELD_DOCS);
    const stages = {
      buildProgram: vi.fn(DEFAULT_STAGES.buildProgram),
      validate: vi.fn(DEFAULT_STAGES.validate),
      applyTransforms: vi.fn(DEFAULT_STAGES.applyTransforms),
      generateArtifacts: vi.fn(DEFAULT_STAGES.generateArtifacts),
    };

    const result = await build({ stages });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationErrors);
    expect(result.error.stage).toBe("build_ir");
    if (!(result.error instanceof ValidationErrors)) return;
    expect(result.error.errors).toHaveLength(1);
    expect(result.error.errors[0]?.toString()).toBe(
      'src/App.graphql:4:5: [UNKNOWN_FIELD] Cannot query field "email" on type "User".'
    );
    expect(stages.buildProgram).not.toHaveBeenCalled();
    expect(stages.validate).not.toHaveBeenCalled();
    expect(stages.applyTransforms).not.toHaveBeenCalled();
    expect(stages.generateArtifacts).not.toHaveBeenCalled();
    expect(writer.calls).toBe(0);
  });

  it("reports every validation error of the project with its source", async () => {
    const { build, writer } = setup({
      "src/Profile.graphql": "query ProfileQuery($unused: Int) { viewer { id } } fragment Wrong_user on User { id }",
    });
    const stages = {
      applyTransforms: vi.fn(DEFAULT_STAGES.applyTransforms),
      generateArtifacts: vi.fn(DEFAULT_STAGES.generateArtifacts),
    };

    const result = await build({ stages });

    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof ValidationErrors)) throw new Error("expected validation errors");
    expect(result.error.stage).toBe("validate");
    expect(result.error.errors.map((e) => e.code)).toEqual([
      DiagnosticCode.INVALID_MODULE_NAME,
      DiagnosticCode.UNUSED_VARIABLE,
    ]);
    expect(result.error.errors.every((e) => e.locations[0]?.path === "src/Profile.graphql")).toBe(true);
    expect(stages.applyTransforms).not.toHaveBeenCalled();
    expect(stages.generateArtifacts).not.toHaveBeenCalled();
    expect(writer.calls).toBe(0);
  });

  it("fails at build_schema when the schema does not parse", async () => {
    const { build } = setup(PROFILE_DOCS, "type Query {");

    const result = await build();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaBuildError);
    expect(result.error.stage).toBe("build_schema");
  });

  it("writes nothing when generation fails", async () => {
    const { build, writer } = setup(PROFILE_DOCS);
    const failure = new ArtifactGenerationError("Cannot generate reader artifact for Profile_user: boom", {
      target: "reader",
      definitionName: "Profile_user",
    });

    const result = await build({ stages: { generateArtifacts: async () => err(failure) } });

    expect(result).toEqual({ ok: false, error: failure });
    expect(writer.calls).toBe(0);
    expect(writer.files.size).toBe(0);
  });

  it("wraps writer failures", async () => {
    const broken: ArtifactWriter = {
      write: async () => {
        throw new Error("disk full");
      },
    };
    const { build } = setup(PROFILE_DOCS);

    const result = await build({ writer: broken });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ArtifactWriteError);
    expect(result.error.stage).toBe("write_artifacts");
    expect(result.error.message).toBe("Cannot write artifacts of project 'app': disk full");
  });

  it("rethrows internal defects", async () => {
    const { build, writer } = setup(PROFILE_DOCS);

    await expect(
      build({
        stages: {
          applyTransforms: () => {
            throw new CompilerInvariantError("broken transform");
          },
        },
      })
    ).rejects.toBeInstanceOf(CompilerInvariantError);
    expect(writer.calls).toBe(0);
  });
});

describe("buildProject spans", () => {
  const STAGE_SPANS = [
    "build_schema app",
    "build_ir app",
    "build_program app",
    "validate app",
    "apply_transforms app",
    "generate_artifacts app",
    "write_artifacts app",
  ];

  it("records one span per stage under the project span", async () => {
    const { build, exporter, tracer } = setup(PROFILE_DOCS);

    await build();
    await tracer.flush();

    const spans = exporter.getSpans();
    expect(spans.map((s) => s.name)).toEqual([...STAGE_SPANS, "build_project app"]);
    const root = exporter.findByName("build_project app");
    expect(root?.status.code).toBe(SpanStatusCode.OK);
    expect(root?.attributes).toEqual({ project: "app", artifacts: 4, written: 4 });
    for (const span of spans.slice(0, STAGE_SPANS.length)) {
      expect(span.context.parentSpanId).toBe(root?.context.spanId);
      expect(span.attributes).toEqual({ stage: span.name.split(" ")[0], project: "app" });
      expect(span.status.code).toBe(SpanStatusCode.OK);
    }
  });

  it("marks the failed stage and skips the rest", async () => {
    const { build, exporter, tracer } = setup(UNKNOWN_FIELD_DOCS);

    await build();
    await tracer.flush();

    expect(exporter.getSpans().map((s) => s.name)).toEqual(["build_schema app", "build_ir app", "build_project app"]);
    expect(exporter.findByName("build_ir app")?.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "1 error(s) during build_ir:",
    });
    const root = exporter.findByName("build_project app");
    expect(root?.status.code).toBe(SpanStatusCode.ERROR);
    expect(root?.attributes.failed_stage).toBe("build_ir");
  });

  it("ends the span of a stage that throws", async () => {
    const { build, exporter, tracer } = setup(PROFILE_DOCS);

    await expect(
      build({
        stages: {
          applyTransforms: () => {
            throw new CompilerInvariantError("broken transform");
          },
        },
      })
    ).rejects.toThrow("broken transform");
    await tracer.flush();

    expect(exporter.findByName("apply_transforms app")?.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "broken transform",
    });
    expect(exporter.findByName("build_project app")?.status.code).toBe(SpanStatusCode.ERROR);
    expect(exporter.findByName("generate_artifacts app")).toBeUndefined();
  });
});

describe("building several projects", () => {
  const web = testProject("web");
  const admin = testProject("admin", { documents: ["admin/**/*.graphql"], output: "admin/__generated__" });
  const projects: ProjectConfig[] = [web, admin];
  const documents = testDocuments(
    {
      web: { "src/Web.graphql": "query WebQuery { viewer { ...Web_user } } fragment Web_user on User { name }" },
      admin: { "admin/Admin.graphql": "query AdminQuery($id: ID!) { node(id: $id) { id } }" },
    },
    projects
  );

  async function buildAll(concurrent: boolean) {
    const state = testState(projects);
    const config = testConfig(projects);
    const tracer = createTracer("test", { exporter: new MemoryTraceExporter() });
    const writers = new Map(projects.map((p) => [p.name, new InMemoryArtifactWriter()]));
    const run = (project: ProjectConfig) =>
      buildProject(state, config, project, documents.astSets, documents.sources, {
        tracer,
        writer: writers.get(project.name),
      });

    const results = concurrent
      ? await Promise.all(projects.map(run))
      : [await run(web), await run(admin)];
    return {
      lines: results.map((r) => (r.ok ? r.value.line : r.error.message)),
      files: [...writers].map(([name, writer]) => [name, [...writer.files]]),
    };
  }

  it("gives the same results concurrently and one after another", async () => {
    const concurrent = await buildAll(true);
    const sequential = await buildAll(false);

    expect(concurrent.lines).toEqual([
      "[web] documents: 2 reader, 1 normalization, 2 operation_text",
      "[admin] documents: 1 reader, 1 normalization, 1 operation_text",
    ]);
    expect(concurrent).toEqual(sequential);
  });
});
