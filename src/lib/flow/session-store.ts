import { promises as fs } from "fs";
import * as path from "path";
import type { ConversationState } from "./types";
import { ConversationStateSchema } from "./types";
import { SessionStoreError, errorMessage } from "./errors";

/**
 * Durable home of a conversation between turns. `load` runs at turn start and
 * `save` only after a turn succeeds.
 */
export interface SessionStore {
  load(sessionId: string): Promise<ConversationState | null>;
  save(sessionId: string, state: ConversationState): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function assertValidSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new SessionStoreError(`Invalid session id: "${sessionId}"`);
  }
}

export function serializeState(state: ConversationState): string {
  return JSON.stringify(state, null, 2);
}

export function deserializeState(raw: string): ConversationState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SessionStoreError(`Stored session is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const validation = ConversationStateSchema.safeParse(parsed);
  if (!validation.success) {
    throw new SessionStoreError(`Stored session failed validation: ${JSON.stringify(validation.error.issues)}`);
  }
  return validation.data;
}

/** Keeps serialized snapshots in memory. Used by tests and short-lived processes. */
export class InMemorySessionStore implements SessionStore {
  private snapshots = new Map<string, string>();

  async load(sessionId: string): Promise<ConversationState | null> {
    const raw = this.snapshots.get(sessionId);
    return raw === undefined ? null : deserializeState(raw);
  }

  async save(sessionId: string, state: ConversationState): Promise<void> {
    this.snapshots.set(sessionId, serializeState(state));
  }

  async delete(sessionId: string): Promise<void> {
    this.snapshots.delete(sessionId);
  }

  /** Raw stored form, for comparing snapshots byte for byte. */
  snapshot(sessionId: string): string | undefined {
    return this.snapshots.get(sessionId);
  }
}

function isMissingFile(error: unknown): boolean {
  // fs errors may come from another realm, so no instanceof check
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** One JSON file per session under `directory`. */
export class FileSessionStore implements SessionStore {
  private directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  private filePath(sessionId: string): string {
    assertValidSessionId(sessionId);
    return path.join(this.directory, `${sessionId}.json`);
  }

  async load(sessionId: string): Promise<ConversationState | null> {
    const file = this.filePath(sessionId);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new SessionStoreError(`Failed to read session ${sessionId}: ${errorMessage(error)}`, { cause: error });
    }
    return deserializeState(raw);
  }

  async save(sessionId: string, state: ConversationState): Promise<void> {
    const file = this.filePath(sessionId);
    // Write-then-rename so a crash never leaves a half-written session
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tmp, serializeState(state), "utf8");
      await fs.rename(tmp, file);
    } catch (error) {
      throw new SessionStoreError(`Failed to write session ${sessionId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async delete(sessionId: string): Promise<void> {
    const file = this.filePath(sessionId);
    try {
      await fs.rm(file, { force: true });
    } catch (error) {
      throw new SessionStoreError(`Failed to delete session ${sessionId}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
