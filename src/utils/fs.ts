/**
 * File System Utilities
 * File discovery, hashing and writes used by document loading and artifact persistence
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Read a text file, UTF-8 by default
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Read a text file, or null when it does not exist
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Calculate MD5 hash from string content
 */
export function calculateContentHash(content: string): string {
  return crypto.createHash("md5").update(content).digest("hex");
}

/**
 * Find files matching glob patterns, sorted for a stable order
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/.git/**", "**/dist/**", "**/__generated__/**", ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Normalize a path to forward slashes
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
