/**
 * Configuration Schemas
 *
 * Zod schemas for `graphql-forge.config.json`. Types are inferred from the
 * schemas; `Config` and `ProjectConfig` are the resolved forms the compiler
 * works with.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Persistence
// =============================================================================

export const PersistConfigSchema = z.discriminatedUnion("kind", [
  z.object({
    /** Content-addressed ids computed locally */
    kind: z.literal("hash"),
  }),
  z.object({
    /** POST the operation text to a persisted-query service */
    kind: z.literal("remote"),
    url: z.string().url(),
    /** Extra fields sent with every request */
    params: z.record(z.string()).default({}),
    /** Request timeout in milliseconds */
    timeoutMs: z.number().int().positive().default(15000),
  }),
]);

export type PersistConfig = z.infer<typeof PersistConfigSchema>;

// =============================================================================
// Project Configuration Schema
// =============================================================================

const PathListSchema = z.union([z.string().min(1), z.array(z.string().min(1))]).transform((value) =>
  Array.isArray(value) ? value : [value]
);

export const ProjectConfigSchema = z.object({
  /** Schema files, relative to the config root */
  schema: PathListSchema,
  /** Client extension files (globs), relative to the config root */
  extensions: z.array(z.string().min(1)).default([]),
  /** Document globs: `.graphql` files and modules with graphql tagged templates */
  documents: z.array(z.string().min(1)).min(1),
  /** Globs excluded from `documents` */
  exclude: z.array(z.string()).default([]),
  /** Project whose fragments this project may spread */
  base: z.string().min(1).nullable().default(null),
  /** Output directory for artifacts, relative to the config root */
  output: z.string().min(1),
  persist: PersistConfigSchema.nullable().default(null),
});

export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

export const ConfigSchema = z.object({
  /** Root every relative path resolves against (default: the config file's directory) */
  root: z.string().optional(),
  /** Extra lines placed in every artifact header */
  header: z.array(z.string()).default([]),
  projects: z.record(z.string().regex(/^[A-Za-z][\w-]*$/, "Project names are identifiers"), ProjectConfigSchema),
});

export type ConfigInput = z.input<typeof ConfigSchema>;

// =============================================================================
// Resolved configuration
// =============================================================================

export interface ProjectConfig extends z.infer<typeof ProjectConfigSchema> {
  name: string;
}

export interface Config {
  /** Absolute root directory */
  root: string;
  /** Absolute path of the loaded config file, null for in-memory configs */
  configPath: string | null;
  header: string[];
  projects: Record<string, ProjectConfig>;
}
