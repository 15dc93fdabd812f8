/**
 * Source Text Set
 *
 * The text every document was parsed from, keyed by source key. Documents
 * embedded in a TypeScript module keep their position in the host file so
 * resolved locations point into the file the user edits.
 *
 * @module
 */

import { Source } from "graphql";

/**
 * One unit of parsed text.
 */
export interface SourceText {
  /** Path of the file holding the text, relative to the config root */
  path: string;
  /** The text handed to the parser */
  text: string;
  /** 1-based line of the first character of `text` inside `path` */
  line: number;
  /** 1-based column of the first character of `text` inside `path` */
  column: number;
}

export type Sources = ReadonlyMap<string, SourceText>;

/**
 * Abstract reference into a source unit: a character range of one source's
 * text. Resolved to file/line/column only when an error is surfaced.
 */
export interface Location {
  readonly sourceKey: string;
  readonly start: number;
  readonly end: number;
}

/**
 * A location with literal file context attached.
 */
export interface ResolvedLocation {
  path: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  endLine: number;
  endColumn: number;
  /** Exact text of the range */
  text: string;
  /** Full text of the first line of the range, for snippets */
  lineText: string;
  /** 1-based column of the range start within `lineText` */
  lineTextColumn: number;
}

/**
 * Builds a graphql-js Source for a source unit. The source name is the
 * source key, so every AST location carries it.
 */
export function toGraphQLSource(sourceKey: string, sourceText: SourceText): Source {
  return new Source(sourceText.text, sourceKey, { line: sourceText.line, column: sourceText.column });
}

/**
 * Creates a source unit for a whole file.
 */
export function fileSource(path: string, text: string): SourceText {
  return { path, text, line: 1, column: 1 };
}

function positionAt(text: string, offset: number): { line: number; column: number; lineStart: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1, lineStart };
}

/**
 * Resolves an abstract location, or returns null when the source is unknown
 * or the range lies outside its text.
 */
export function resolveLocation(sources: Sources, location: Location): ResolvedLocation | null {
  const source = sources.get(location.sourceKey);
  if (!source) return null;
  const { text } = source;
  if (location.start < 0 || location.end < location.start || location.end > text.length) {
    return null;
  }

  const start = positionAt(text, location.start);
  const end = positionAt(text, location.end);
  const lineEnd = text.indexOf("\n", start.lineStart);

  // Only the first line of an embedded text is shifted by the host column.
  const shiftColumn = (pos: { line: number; column: number }): number =>
    pos.line === 1 ? pos.column + source.column - 1 : pos.column;

  return {
    path: source.path,
    line: start.line + source.line - 1,
    column: shiftColumn(start),
    endLine: end.line + source.line - 1,
    endColumn: shiftColumn(end),
    text: text.slice(location.start, location.end),
    lineText: text.slice(start.lineStart, lineEnd === -1 ? text.length : lineEnd),
    lineTextColumn: start.column,
  };
}
