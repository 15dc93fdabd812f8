/**
 * Source resolution tests
 */

import { describe, it, expect } from "vitest";
import { resolveLocation, fileSource, type SourceText } from "../sources.js";
import { DiagnosticCode, ValidationError } from "../validation-error.js";
import { CompilerInvariantError } from "../../errors.js";

const FILE = "query AppQuery {\n  user {\n    email\n  }\n}\n";

describe("resolveLocation", () => {
  const sources = new Map([["src/App.graphql", fileSource("src/App.graphql", FILE)]]);

  it("resolves a range to 1-based line and column", () => {
    const start = FILE.indexOf("email");
    const resolved = resolveLocation(sources, { sourceKey: "src/App.graphql", start, end: start + 5 });

    expect(resolved).toEqual({
      path: "src/App.graphql",
      line: 3,
      column: 5,
      endLine: 3,
      endColumn: 10,
      text: "email",
      lineText: "    email",
      lineTextColumn: 5,
    });
  });

  it("resolves a range spanning lines", () => {
    const start = FILE.indexOf("user");
    const end = FILE.indexOf("}") + 1;
    const resolved = resolveLocation(sources, { sourceKey: "src/App.graphql", start, end });

    expect(resolved).toMatchObject({ line: 2, column: 3, endLine: 4, endColumn: 4, lineText: "  user {" });
  });

  it("shifts only the first line of an embedded text by the host column", () => {
    const embedded: SourceText = { path: "src/App.ts", text: "query Q {\n  a\n}", line: 5, column: 20 };
    const host = new Map([["src/App.ts#1", embedded]]);

    expect(resolveLocation(host, { sourceKey: "src/App.ts#1", start: 6, end: 7 })).toMatchObject({
      path: "src/App.ts",
      line: 5,
      column: 26,
      lineTextColumn: 7,
    });
    expect(resolveLocation(host, { sourceKey: "src/App.ts#1", start: 12, end: 13 })).toMatchObject({
      line: 6,
      column: 3,
      text: "a",
    });
  });

  it("returns null for unknown sources and ranges outside the text", () => {
    expect(resolveLocation(sources, { sourceKey: "missing.graphql", start: 0, end: 1 })).toBeNull();
    expect(resolveLocation(sources, { sourceKey: "src/App.graphql", start: 0, end: FILE.length + 1 })).toBeNull();
    expect(resolveLocation(sources, { sourceKey: "src/App.graphql", start: 4, end: 2 })).toBeNull();
  });
});

describe("ValidationError", () => {
  const sources = new Map([["a.graphql", fileSource("a.graphql", "query A { b }")]]);

  it("attaches source context to every location", () => {
    const error = new ValidationError(DiagnosticCode.UNKNOWN_FIELD, 'Cannot query field "b" on type "Query".', [
      { sourceKey: "a.graphql", start: 10, end: 11 },
    ]);

    const resolved = error.withSources(sources);

    expect(resolved.code).toBe(DiagnosticCode.UNKNOWN_FIELD);
    expect(resolved.locations).toHaveLength(1);
    expect(resolved.toString()).toBe('a.graphql:1:11: [UNKNOWN_FIELD] Cannot query field "b" on type "Query".');
  });

  it("treats an unresolvable location as a compiler defect", () => {
    const error = new ValidationError(DiagnosticCode.UNKNOWN_FIELD, "x", [{ sourceKey: "b.graphql", start: 0, end: 1 }]);

    expect(() => error.withSources(sources)).toThrow(CompilerInvariantError);
  });

  it("treats an error without locations as a compiler defect", () => {
    const error = new ValidationError(DiagnosticCode.UNKNOWN_FIELD, "x", []);

    expect(() => error.withSources(sources)).toThrow(CompilerInvariantError);
  });
});
