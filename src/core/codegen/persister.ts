/**
 * Operation Persisters
 *
 * @module
 */

import { z } from "zod";
import type { PersistConfig } from "../config/index.js";
import { ForgeError, ErrorCode, errorMessage } from "../errors.js";
import { calculateContentHash } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import type { OperationPersister } from "./types.js";

const logger = createLogger("persister");

/**
 * Content-addressed ids: the md5 of the operation text.
 */
export class HashPersister implements OperationPersister {
  async persist(text: string): Promise<string> {
    return calculateContentHash(text);
  }
}

const PersistResponseSchema = z.object({ id: z.string().min(1) });

export interface RemotePersisterOptions {
  url: string;
  /** Extra fields sent with every request */
  params?: Record<string, string>;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * POSTs `{ text, ...params }` as JSON and reads `{ id }` from the response.
 */
export class RemotePersister implements OperationPersister {
  private readonly url: string;
  private readonly params: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RemotePersisterOptions) {
    this.url = options.url;
    this.params = options.params ?? {};
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async persist(text: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text, ...this.params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ForgeError(`Persist request to ${this.url} failed: ${errorMessage(error)}`, ErrorCode.ARTIFACT_PERSIST_FAILED, {
        url: this.url,
      });
    }

    if (!response.ok) {
      throw new ForgeError(`Persist request to ${this.url} returned ${response.status}`, ErrorCode.ARTIFACT_PERSIST_FAILED, {
        url: this.url,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ForgeError(`Persist response from ${this.url} is not JSON: ${errorMessage(error)}`, ErrorCode.ARTIFACT_PERSIST_FAILED, {
        url: this.url,
      });
    }

    const parsed = PersistResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ForgeError(`Persist response from ${this.url} has no id`, ErrorCode.ARTIFACT_PERSIST_FAILED, {
        url: this.url,
      });
    }
    logger.debug({ url: this.url, id: parsed.data.id }, "Operation persisted");
    return parsed.data.id;
  }
}

/**
 * The persister a project's `persist` setting asks for.
 */
export function createPersister(config: PersistConfig | null): OperationPersister | null {
  if (!config) return null;
  switch (config.kind) {
    case "hash":
      return new HashPersister();
    case "remote":
      return new RemotePersister({ url: config.url, params: config.params, timeoutMs: config.timeoutMs });
  }
}
