/**
 * Shared test fixtures: a small schema, project configs and helpers that
 * run the early stages in memory.
 */

import type { Config, ProjectConfig } from "../config/index.js";
import { buildAstSets, type DocumentSet } from "../documents/index.js";
import { buildSchema, type CompilerSchema } from "../schema/index.js";
import { buildIR } from "../ir/index.js";
import { buildProgram, type Program } from "../program/index.js";
import { createCompilerState, type CompilerState } from "../state/index.js";

export const TEST_SCHEMA = `
type Query {
  user(id: ID!): User
  viewer: User
  node(id: ID!): Node
  search(term: String!): [SearchResult!]!
}

type Mutation {
  rename(id: ID!, name: String!): User
}

interface Node {
  id: ID!
}

type User implements Node {
  id: ID!
  name: String
  friends(first: Int): [User!]!
}

type Page implements Node {
  id: ID!
  title: String
}

union SearchResult = User | Page
`;

export function testProject(name = "app", overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    name,
    schema: ["schema.graphql"],
    extensions: [],
    documents: ["src/**/*.graphql"],
    exclude: [],
    base: null,
    output: "src/__generated__",
    persist: null,
    ...overrides,
  };
}

export function testConfig(projects: readonly ProjectConfig[], root = "/workspace"): Config {
  return {
    root,
    configPath: null,
    header: [],
    projects: Object.fromEntries(projects.map((project) => [project.name, project])),
  };
}

export function testState(
  projects: readonly ProjectConfig[],
  schema = TEST_SCHEMA,
  extensions: Record<string, string> = {}
): CompilerState {
  return createCompilerState(
    Object.fromEntries(projects.map((project) => [project.name, [{ path: "schema.graphql", text: schema }]])),
    Object.fromEntries(
      Object.entries(extensions).map(([project, text]) => [project, [{ path: `${project}.extensions.graphql`, text }]])
    )
  );
}

/**
 * Parses in-memory documents keyed by project, then by path.
 */
export function testDocuments(
  files: Record<string, Record<string, string>>,
  projects: readonly ProjectConfig[]
): DocumentSet {
  const byProject = new Map(
    Object.entries(files).map(([project, docs]) => [
      project,
      Object.entries(docs).map(([path, text]) => ({ path, text })),
    ])
  );
  const result = buildAstSets(byProject, projects);
  if (!result.ok) {
    throw new Error(`Fixture documents do not parse: ${result.error.map(String).join("; ")}`);
  }
  return result.value;
}

export interface CompiledFixture {
  project: ProjectConfig;
  schema: CompilerSchema;
  program: Program;
  baseFragmentNames: ReadonlySet<string>;
  documents: DocumentSet;
}

/**
 * Runs build_schema, build_ir and build_program for one project, failing
 * the test on any error.
 */
export function compileFixture(
  docs: Record<string, string>,
  options: { schema?: string; extensions?: string; baseDocs?: Record<string, string> } = {}
): CompiledFixture {
  const base = options.baseDocs ? testProject("shared") : null;
  const project = testProject("app", { base: base ? base.name : null });
  const files: Record<string, Record<string, string>> = { app: docs };
  if (options.baseDocs) files.shared = options.baseDocs;

  const documents = testDocuments(files, [project]);
  const state = testState([project], options.schema, options.extensions ? { app: options.extensions } : {});
  const schema = buildSchema(state, project);
  if (!schema.ok) throw schema.error;
  const ir = buildIR(project, schema.value, documents.astSets);
  if (!ir.ok) {
    throw new Error(`Fixture documents do not type-check: ${ir.error.map((e) => e.message).join("; ")}`);
  }
  return {
    project,
    schema: schema.value,
    program: buildProgram(schema.value, ir.value.ir),
    baseFragmentNames: ir.value.baseFragmentNames,
    documents,
  };
}
