export { extractGraphQLTemplates, type ExtractedTemplate } from "./extract.js";
export { parseDocumentFile, isGraphQLFile, type DocumentFile, type ParsedFile } from "./parse.js";
export { buildAstSets, type AstSets, type ProjectAsts, type DocumentSet } from "./ast-sets.js";
export { loadDocuments } from "./loader.js";
