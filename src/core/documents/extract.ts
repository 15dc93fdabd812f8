/**
 * Tagged Template Extraction
 *
 * Finds `graphql` tagged template literals in TypeScript and JavaScript
 * modules. Templates must be static: interpolations are reported, not
 * evaluated.
 *
 * @module
 */

export interface ExtractedTemplate {
  /** Template body, without the backticks */
  text: string;
  /** Offset of the body in the host text */
  offset: number;
  /** 1-based line of the body start in the host text */
  line: number;
  /** 1-based column of the body start in the host text */
  column: number;
  /** Offset of the first `${` in the host text, if any */
  interpolationOffset: number | null;
}

const TAG_PATTERN = /\bgraphql\s*`/g;

function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

/**
 * Extracts every `graphql` tagged template of a module, in source order.
 * An unterminated template ends the scan.
 */
export function extractGraphQLTemplates(text: string): ExtractedTemplate[] {
  const templates: ExtractedTemplate[] = [];
  TAG_PATTERN.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = TAG_PATTERN.exec(text)) !== null) {
    const bodyStart = match.index + match[0].length;
    let cursor = bodyStart;
    let interpolationOffset: number | null = null;

    while (cursor < text.length && text[cursor] !== "`") {
      if (text[cursor] === "\\") {
        cursor += 2;
        continue;
      }
      if (interpolationOffset === null && text[cursor] === "$" && text[cursor + 1] === "{") {
        interpolationOffset = cursor;
      }
      cursor++;
    }
    if (cursor >= text.length) break;

    templates.push({
      text: text.slice(bodyStart, cursor),
      offset: bodyStart,
      ...lineAndColumn(text, bodyStart),
      interpolationOffset,
    });
    TAG_PATTERN.lastIndex = cursor + 1;
  }

  return templates;
}
