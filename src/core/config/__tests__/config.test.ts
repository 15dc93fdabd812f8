/**
 * Configuration tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createConfig, loadConfig, selectProjects, CONFIG_FILE } from "../loader.js";
import { ConfigError, ErrorCode } from "../../errors.js";

const minimalProject = {
  schema: "schema.graphql",
  documents: ["src/**/*.graphql"],
  output: "src/__generated__",
};

describe("createConfig", () => {
  it("applies defaults and resolves the root", () => {
    const config = createConfig({ projects: { web: minimalProject } }, "/repo");

    expect(config.root).toBe(path.resolve("/repo"));
    expect(config.header).toEqual([]);
    expect(config.projects.web).toEqual({
      name: "web",
      schema: ["schema.graphql"],
      extensions: [],
      documents: ["src/**/*.graphql"],
      exclude: [],
      base: null,
      output: "src/__generated__",
      persist: null,
    });
  });

  it("fills remote persister defaults", () => {
    const config = createConfig(
      { projects: { web: { ...minimalProject, persist: { kind: "remote", url: "http://localhost:8080/persist" } } } },
      "/repo"
    );

    expect(config.projects.web?.persist).toEqual({
      kind: "remote",
      url: "http://localhost:8080/persist",
      params: {},
      timeoutMs: 15000,
    });
  });

  it("rejects invalid configuration with the offending path", () => {
    expect(() => createConfig({ projects: { web: { ...minimalProject, documents: [] } } }, "/repo")).toThrow(
      /projects\.web\.documents/
    );
  });

  it("rejects an unknown base project", () => {
    try {
      createConfig({ projects: { web: { ...minimalProject, base: "shared" } } }, "/repo");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: ErrorCode.CONFIG_UNKNOWN_PROJECT });
    }
  });

  it("rejects a project that is its own base", () => {
    expect(() => createConfig({ projects: { web: { ...minimalProject, base: "web" } } }, "/repo")).toThrow(
      "Project 'web' cannot be its own base"
    );
  });
});

describe("selectProjects", () => {
  const config = createConfig({ projects: { web: minimalProject, admin: minimalProject } }, "/repo");

  it("selects every project by default", () => {
    expect(selectProjects(config).map((p) => p.name)).toEqual(["web", "admin"]);
  });

  it("selects projects by name", () => {
    expect(selectProjects(config, ["admin"]).map((p) => p.name)).toEqual(["admin"]);
  });

  it("rejects unknown names", () => {
    expect(() => selectProjects(config, ["mobile"])).toThrow("Unknown project 'mobile'");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "forge-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads the config file and resolves paths against its directory", async () => {
    await fs.writeFile(path.join(dir, CONFIG_FILE), JSON.stringify({ projects: { web: minimalProject } }));

    const config = await loadConfig(dir);

    expect(config.root).toBe(dir);
    expect(config.configPath).toBe(path.join(dir, CONFIG_FILE));
    expect(Object.keys(config.projects)).toEqual(["web"]);
  });

  it("reports a missing file", async () => {
    await expect(loadConfig(dir)).rejects.toMatchObject({ code: ErrorCode.CONFIG_NOT_FOUND });
  });

  it("reports malformed JSON", async () => {
    await fs.writeFile(path.join(dir, "custom.json"), "{ not json");

    await expect(loadConfig(dir, "custom.json")).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
  });
});
