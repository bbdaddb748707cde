import { createHash } from "node:crypto";
import { readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType, Logger } from "@wayfinder/schemas";
import { isJournalEvent, silentLogger, validateJournalEventData } from "@wayfinder/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
  /** Clock for event timestamps. */
  now?: () => Date;
}

export class JournalIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JournalIntegrityError";
  }
}

function parseLine(line: string): JournalEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isJournalEvent(parsed) ? parsed : null;
}

/**
 * Append-only JSONL record of decision cycles. Every event carries the
 * SHA-256 of the previous line, so edits or truncation in the middle of
 * the file are detectable. Writes are serialized through one lock chain.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private recovery: "truncate" | "strict";
  private logger: Logger;
  private now: () => Date;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger ?? silentLogger;
    this.now = options?.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (last !== undefined && parseLine(last) === null) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      this.logger.warn("Truncated incomplete last journal line", { path: this.filePath });
    }

    let prevHash: string | undefined;
    let maxSeq = -1;
    const index = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]!;
      const event = parseLine(line);
      if (!event || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new JournalIntegrityError(`Journal integrity violation at event ${i}: hash chain broken`);
        }
        const tmpPath = `${this.filePath}.tmp`;
        const valid = lines.slice(0, i);
        await writeFile(tmpPath, valid.length > 0 ? valid.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        this.logger.error("Recovered journal from corruption", {
          path: this.filePath, brokenAt: i, dropped: lines.length - i,
        });
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = index;
    this.lastHash = prevHash;
    this.nextSeq = maxSeq + 1;
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent> {
    let releaseLock: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: this.now().toISOString(),
        session_id: sessionId,
        type,
        payload,
        hash_prev: this.lastHash,
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      const fh = await open(this.filePath, "a");
      try {
        await fh.write(line + "\n", undefined, "utf-8");
        if (this.fsync) await fh.sync();
      } finally {
        await fh.close();
      }

      // In-memory state moves only after the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);
      return event;
    } finally {
      releaseLock!();
    }
  }

  /** Like emit, but a failed write is logged and yields null. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      this.logger.error("Journal write failed", { type, error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: JournalEvent[] = [];
    for (const line of content.split("\n").filter(Boolean)) {
      const event = parseLine(line);
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  /** Session IDs in the order their first event was written. */
  listSessions(): string[] {
    return [...this.sessionIndex.keys()];
  }

  readSession(sessionId: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.sessionIndex.get(sessionId) ?? [];
    const start = options?.offset ?? 0;
    const end = options?.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  getSessionEventCount(sessionId: string): number {
    return (this.sessionIndex.get(sessionId) ?? []).length;
  }

  /** Recomputes the hash chain over the file as written. */
  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]!;
      const event = parseLine(line);
      if (!event || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Waits for pending writes. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}
