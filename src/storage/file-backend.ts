import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { Mutex } from "async-mutex";

import { ShareIdTakenError } from "../errors";
import type { Logger } from "../logger";
import type { AnalyticsEventRecord, CuppingSession } from "../types/session";
import type { SessionMutator, StorageBackend } from "./backend";
import { decodeEvent, decodeSession, encodeEvent, encodeSession } from "./record-codec";

/**
 * Flat-file store.
 *
 * Layout under `dataDir`:
 *   sessions/<sessionId>.json   one current-version record per file
 *   share-ids/<shareId>.json    share id -> session id index, never removed
 *   events.jsonl                append-only interaction log
 *
 * Writers hold a mutex per physical file and replace files by write-then-rename,
 * so readers (which take no lock) see either the old or the new record. Share
 * ids are reserved with an exclusive hard link, which holds across processes
 * sharing the directory.
 */
export class FileStorageBackend implements StorageBackend {
  private readonly sessionsDir: string;
  private readonly shareIndexDir: string;
  private readonly eventsFile: string;
  private readonly locks = new Map<string, Mutex>();
  private ready: Promise<void> | null = null;

  constructor(
    readonly dataDir: string,
    private readonly logger: Logger,
  ) {
    this.sessionsDir = path.join(dataDir, "sessions");
    this.shareIndexDir = path.join(dataDir, "share-ids");
    this.eventsFile = path.join(dataDir, "events.jsonl");
  }

  async put(record: CuppingSession): Promise<void> {
    await this.ensureDirs();

    // Reserve the share id before the record becomes visible.
    await this.reserveShareId(record.shareId, record.sessionId);

    const recordPath = this.sessionPath(record.sessionId);
    await this.withLock(recordPath, () => writeRecord(recordPath, record));
  }

  async get(sessionId: string): Promise<CuppingSession | null> {
    const raw = await readJsonIfPresent(this.sessionPath(sessionId));
    return raw === null ? null : decodeSession(raw);
  }

  async getByShareId(shareId: string): Promise<CuppingSession | null> {
    const sessionId = await this.readShareIndex(shareId);
    if (!sessionId) return null;
    const record = await this.get(sessionId);
    return record && record.shareId === shareId ? record : null;
  }

  async listAll(): Promise<CuppingSession[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.sessionsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const records: CuppingSession[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json"))) {
      const raw = await readJsonIfPresent(path.join(this.sessionsDir, name));
      if (raw !== null) records.push(decodeSession(raw));
    }
    return records.sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.sessionId.localeCompare(b.sessionId),
    );
  }

  async exists(shareId: string): Promise<boolean> {
    return (await this.readShareIndex(shareId)) !== null;
  }

  async update(sessionId: string, mutator: SessionMutator): Promise<CuppingSession | null> {
    const recordPath = this.sessionPath(sessionId);
    return this.withLock(recordPath, async () => {
      const current = await this.get(sessionId);
      if (!current) return null;
      const next = mutator(current);
      if (next.sessionId !== current.sessionId || next.shareId !== current.shareId) {
        throw new Error("session and share ids are immutable");
      }
      await writeRecord(recordPath, next);
      return next;
    });
  }

  async appendEvent(event: AnalyticsEventRecord): Promise<void> {
    await this.ensureDirs();
    await this.withLock(this.eventsFile, () => fs.appendFile(this.eventsFile, encodeEvent(event) + "\n", "utf-8"));
  }

  async listEvents(shareId: string): Promise<AnalyticsEventRecord[]> {
    let contents: string;
    try {
      contents = await fs.readFile(this.eventsFile, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const events: AnalyticsEventRecord[] = [];
    let unreadable = 0;
    for (const line of contents.split("\n")) {
      if (!line.trim()) continue;
      const event = decodeEvent(line);
      if (!event) {
        unreadable += 1;
        continue;
      }
      if (event.shareId === shareId) events.push(event);
    }
    if (unreadable) this.logger.warn({ file: this.eventsFile, unreadable }, "skipped unreadable event lines");
    return events;
  }

  async close(): Promise<void> {
    this.locks.clear();
  }

  // Files with a writer holding or waiting on their lock.
  get lockedFiles(): number {
    return this.locks.size;
  }

  private ensureDirs(): Promise<void> {
    this.ready ??= Promise.all([
      fs.mkdir(this.sessionsDir, { recursive: true }),
      fs.mkdir(this.shareIndexDir, { recursive: true }),
    ]).then(
      () => undefined,
      (error: unknown) => {
        this.ready = null;
        throw error;
      },
    );
    return this.ready;
  }

  // Locks exist only while in use, so the map does not grow with every file touched.
  private async withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(filePath);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(filePath, lock);
    }
    try {
      return await lock.runExclusive(fn);
    } finally {
      if (!lock.isLocked() && this.locks.get(filePath) === lock) this.locks.delete(filePath);
    }
  }

  // The index entry is written to a temp file and hard-linked into place; link
  // fails with EEXIST when any process got there first.
  private async reserveShareId(shareId: string, sessionId: string): Promise<void> {
    const owner = await this.readShareIndex(shareId);
    if (owner === sessionId) return;
    if (owner) throw new ShareIdTakenError(shareId);

    const indexPath = this.shareIndexPath(shareId);
    const tempPath = tempPathFor(indexPath);
    await fs.writeFile(tempPath, JSON.stringify({ sessionId }) + "\n", "utf-8");
    try {
      await fs.link(tempPath, indexPath);
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) throw error;
      if ((await this.readShareIndex(shareId)) !== sessionId) throw new ShareIdTakenError(shareId);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  private async readShareIndex(shareId: string): Promise<string | null> {
    const raw = await readJsonIfPresent(this.shareIndexPath(shareId));
    if (raw === null) return null;
    if (typeof raw === "object" && raw !== null && "sessionId" in raw && typeof raw.sessionId === "string") {
      return raw.sessionId;
    }
    throw new Error(`corrupt share index entry for ${shareId}`);
  }

  private sessionPath(sessionId: string): string {
    return path.join(this.sessionsDir, `${encodeURIComponent(sessionId)}.json`);
  }

  private shareIndexPath(shareId: string): string {
    return path.join(this.shareIndexDir, `${encodeURIComponent(shareId)}.json`);
  }
}

function writeRecord(recordPath: string, record: CuppingSession): Promise<void> {
  return writeFileAtomic(recordPath, JSON.stringify(encodeSession(record), null, 2) + "\n");
}

// Temp file + rename: a crash mid-write leaves at most a stray .tmp file.
async function writeFileAtomic(target: string, contents: string): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    await fs.writeFile(tempPath, contents, "utf-8");
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

async function readJsonIfPresent(filePath: string): Promise<unknown> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
    return parsed;
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function tempPathFor(target: string): string {
  return `${target}.${process.pid}.${randomUUID()}.tmp`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isMissingFile(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}
