/**
 * Schema builder tests
 */

import { describe, it, expect } from "vitest";
import { buildSchema } from "../build-schema.js";
import { createCompilerState } from "../../state/index.js";
import { ErrorCode, SchemaBuildError } from "../../errors.js";
import { TEST_SCHEMA, testProject, testState } from "../../__tests__/fixtures.js";

describe("buildSchema", () => {
  const project = testProject();

  it("builds the server schema with the compiler directives", () => {
    const result = buildSchema(testState([project]), project);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const schema = result.value;
    expect(schema.getType("User")).toBeDefined();
    expect(schema.getDirective("relay")?.args.map((a) => a.name)).toEqual(["plural", "mask"]);
    expect(schema.getDirective("inline")).toBeDefined();
    expect(schema.isClientType("User")).toBe(false);
  });

  it("records types and fields declared by client extensions", () => {
    const extensions = `
      extend type User { isSelected: Boolean }
      type Draft { body: String }
      extend type Query { draft: Draft }
    `;
    const result = buildSchema(testState([project], TEST_SCHEMA, { app: extensions }), project);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const schema = result.value;
    expect(schema.isClientField("User", "isSelected")).toBe(true);
    expect(schema.isClientField("User", "name")).toBe(false);
    expect(schema.isClientField("Query", "draft")).toBe(true);
    expect(schema.isClientType("Draft")).toBe(true);
    expect(schema.isClientField("Draft", "body")).toBe(true);
  });

  it("answers type relationship questions", () => {
    const result = buildSchema(testState([project]), project);
    if (!result.ok) throw result.error;
    const schema = result.value;

    expect(schema.isAbstractType("Node")).toBe(true);
    expect(schema.isAbstractType("User")).toBe(false);
    expect(schema.hasIdField("User")).toBe(true);
    expect(schema.hasIdField("Query")).toBe(false);
    expect(schema.getFieldType("User", "friends")).toBe("[User!]!");
    expect(schema.canOverlap("Node", "User")).toBe(true);
    expect(schema.canOverlap("User", "Page")).toBe(false);
    expect(schema.canOverlap("SearchResult", "Node")).toBe(true);
    expect(schema.isSubtype("User", "Node")).toBe(true);
    expect(schema.isSubtype("Node", "User")).toBe(false);
  });

  it("fails when the project has no schema files", () => {
    const result = buildSchema(createCompilerState({}), project);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaBuildError);
    expect(result.error.code).toBe(ErrorCode.SCHEMA_MISSING);
    expect(result.error.stage).toBe("build_schema");
  });

  it("reports schema syntax errors with their file position", () => {
    const state = createCompilerState({ app: [{ path: "schema.graphql", text: "type Query {\n  a: \n}" }] });

    const result = buildSchema(state, project);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details).toHaveLength(1);
    expect(result.error.details[0]).toMatch(/^schema\.graphql:3:1: Syntax Error: Expected Name, found "}"\./);
  });

  it("reports every invalid type reference", () => {
    const state = createCompilerState({
      app: [{ path: "schema.graphql", text: "type Query { a: Missing b: AlsoMissing }" }],
    });

    const result = buildSchema(state, project);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details).toEqual(['Unknown type "Missing".', 'Unknown type "AlsoMissing".']);
  });

  it("rejects extensions of unknown types", () => {
    const result = buildSchema(testState([project], TEST_SCHEMA, { app: "extend type Missing { a: Int }" }), project);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details.join("\n")).toContain('Cannot extend type "Missing" because it is not defined.');
  });
});
