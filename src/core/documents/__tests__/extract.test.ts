/**
 * Tagged template extraction tests
 */

import { describe, it, expect } from "vitest";
import { extractGraphQLTemplates } from "../extract.js";

describe("extractGraphQLTemplates", () => {
  it("returns the body and its host position", () => {
    const host = "import x from 'y';\nconst q = graphql`\n  query AppQuery { viewer }\n`;\n";

    const [template, ...rest] = extractGraphQLTemplates(host);

    expect(rest).toHaveLength(0);
    expect(template).toEqual({
      text: "\n  query AppQuery { viewer }\n",
      offset: 37,
      line: 2,
      column: 19,
      interpolationOffset: null,
    });
  });

  it("finds every template in source order", () => {
    const host = "const a = graphql`fragment A_user on User { id }`;\nconst b = graphql `query B { viewer }`;";

    expect(extractGraphQLTemplates(host).map((t) => t.text)).toEqual([
      "fragment A_user on User { id }",
      "query B { viewer }",
    ]);
  });

  it("reports the first interpolation", () => {
    const [template] = extractGraphQLTemplates("graphql`query A { ${x} }`");

    expect(template?.interpolationOffset).toBe(18);
  });

  it("ignores identifiers that only end in graphql", () => {
    expect(extractGraphQLTemplates("const q = notgraphql`query A { a }`;")).toEqual([]);
  });

  it("stops at an unterminated template", () => {
    expect(extractGraphQLTemplates("graphql`query A { a }")).toEqual([]);
  });
});
