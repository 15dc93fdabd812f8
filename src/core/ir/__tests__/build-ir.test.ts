/**
 * IR builder tests
 */

import { describe, it, expect } from "vitest";
import { buildIR } from "../build-ir.js";
import { buildSchema } from "../../schema/index.js";
import { DiagnosticCode, type ValidationError } from "../../source/index.js";
import { TEST_SCHEMA, testDocuments, testProject, testState } from "../../__tests__/fixtures.js";

function typeCheck(docs: Record<string, string>, options: { baseDocs?: Record<string, string>; schema?: string } = {}) {
  const project = testProject("app", { base: options.baseDocs ? "shared" : null });
  const files: Record<string, Record<string, string>> = { app: docs };
  if (options.baseDocs) files.shared = options.baseDocs;
  const documents = testDocuments(files, [project]);
  const schema = buildSchema(testState([project], options.schema ?? TEST_SCHEMA), project);
  if (!schema.ok) throw schema.error;
  return { result: buildIR(project, schema.value, documents.astSets), sources: documents.sources };
}

function codes(errors: readonly ValidationError[]): DiagnosticCode[] {
  return errors.map((e) => e.code);
}

describe("buildIR", () => {
  it("reports an unknown field at the field name", () => {
    const text = "query AppQuery {\n  user(id: 1) {\n    id\n    email\n  }\n}\n";
    const { result, sources } = typeCheck({ "src/App.graphql": text });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toHaveLength(1);
    const [error] = result.error;
    expect(error?.code).toBe(DiagnosticCode.UNKNOWN_FIELD);
    expect(error?.message).toBe('Cannot query field "email" on type "User".');
    expect(error?.withSources(sources).locations).toEqual([
      {
        path: "src/App.graphql",
        line: 4,
        column: 5,
        endLine: 4,
        endColumn: 10,
        text: "email",
        lineText: "    email",
        lineTextColumn: 5,
      },
    ]);
  });

  it("builds typed selections", () => {
    const { result } = typeCheck({
      "src/App.graphql": `
        query AppQuery($first: Int = 5) {
          viewer {
            name
            friends(first: $first) { id }
          }
          node(id: "1") { ... on User { name } }
        }
      `,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [operation] = result.value.ir;
    if (operation?.kind !== "Operation") throw new Error("expected an operation");
    expect(operation.operation).toBe("query");
    expect(operation.type).toBe("Query");
    expect(operation.variableDefinitions).toMatchObject([
      { name: "first", type: "Int", defaultValue: { value: 5, graphql: "5" } },
    ]);

    const [viewer, node] = operation.selections;
    expect(viewer).toMatchObject({ kind: "LinkedField", name: "viewer", type: "User", concreteType: "User", plural: false });
    if (viewer?.kind !== "LinkedField") return;
    expect(viewer.selections[0]).toMatchObject({ kind: "ScalarField", name: "name", type: "String", parentType: "User" });
    expect(viewer.selections[1]).toMatchObject({
      kind: "LinkedField",
      name: "friends",
      plural: true,
      args: [{ name: "first", value: { kind: "Variable", variableName: "first", type: "Int" } }],
    });
    expect(node).toMatchObject({
      kind: "LinkedField",
      concreteType: null,
      args: [{ name: "id", value: { kind: "Literal", value: "1", graphql: '"1"' } }],
      selections: [{ kind: "InlineFragment", typeCondition: "User" }],
    });
  });

  it("collects every error of every definition", () => {
    const { result } = typeCheck({
      "src/A.graphql": "query AQuery { viewer { nope } }",
      "src/B.graphql": "query BQuery { user { id } search(term: 1) { __typename } }",
      "src/C.graphql": "fragment C_user on Missing { id }",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([
      DiagnosticCode.UNKNOWN_FIELD,
      DiagnosticCode.MISSING_REQUIRED_ARGUMENT,
      DiagnosticCode.INVALID_ARGUMENT_VALUE,
      DiagnosticCode.UNKNOWN_TYPE,
    ]);
    expect(result.error[1]?.message).toBe(
      'Field "Query.user" argument "id" of type "ID!" is required, but it was not provided.'
    );
  });

  it("checks selections against leaf and composite types", () => {
    const { result } = typeCheck({ "src/A.graphql": "query AQuery { viewer { name { x } } user(id: 1) }" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([DiagnosticCode.UNEXPECTED_SELECTION, DiagnosticCode.MISSING_SELECTION]);
  });

  it("rejects unnamed operations and duplicate names", () => {
    const { result } = typeCheck({
      "src/A.graphql": "{ viewer { id } }",
      "src/B.graphql": "fragment B_user on User { id }",
      "src/C.graphql": "fragment B_user on User { name }",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([DiagnosticCode.UNNAMED_OPERATION, DiagnosticCode.DUPLICATE_DEFINITION]);
    expect(result.error[1]?.locations.map((l) => l.sourceKey)).toEqual(["src/B.graphql", "src/C.graphql"]);
  });

  it("reports unknown fragments, impossible spreads and unknown directives", () => {
    const { result } = typeCheck({
      "src/A.graphql": `
        query AQuery {
          viewer { ...Missing ...A_page }
          node(id: 1) @live { id }
        }
        fragment A_page on Page { title }
      `,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([
      DiagnosticCode.UNKNOWN_FRAGMENT,
      DiagnosticCode.INVALID_FRAGMENT_SPREAD,
      DiagnosticCode.UNKNOWN_DIRECTIVE,
    ]);
  });

  it("reports misplaced compiler directives", () => {
    const { result } = typeCheck({ "src/A.graphql": "query AQuery @inline { viewer { id } }" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.map((e) => e.message)).toEqual(['Directive "@inline" may not be used on QUERY.']);
  });

  it("reports fragment cycles without type checking further", () => {
    const { result } = typeCheck({
      "src/A.graphql": "fragment A_a on User { nope ...A_b } fragment A_b on User { ...A_a }",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([DiagnosticCode.FRAGMENT_CYCLE, DiagnosticCode.FRAGMENT_CYCLE]);
  });

  it("reports variables an operation does not define, through fragments", () => {
    const { result } = typeCheck({
      "src/A.graphql": "query AQuery { viewer { ...A_user } } fragment A_user on User { friends(first: $count) { id } }",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.map((e) => e.message)).toEqual(['Variable "$count" is not defined by operation "AQuery".']);
  });

  it("includes the base fragments the project reaches", () => {
    const { result } = typeCheck(
      { "src/A.graphql": "query AQuery { viewer { ...Shared_user } }" },
      {
        baseDocs: {
          "shared/Shared.graphql":
            "fragment Shared_user on User { ...Shared_name } fragment Shared_name on User { name } fragment Shared_unused on User { id }",
        },
      }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.ir.map((d) => d.name)).toEqual(["AQuery", "Shared_user", "Shared_name"]);
    expect([...result.value.baseFragmentNames].sort()).toEqual(["Shared_name", "Shared_user"]);
  });

  it("rejects a local definition that shadows a base fragment", () => {
    const { result } = typeCheck(
      { "src/A.graphql": "fragment Shared_user on User { id }" },
      { baseDocs: { "shared/Shared.graphql": "fragment Shared_user on User { name }" } }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(codes(result.error)).toEqual([DiagnosticCode.DUPLICATE_DEFINITION]);
  });
});
