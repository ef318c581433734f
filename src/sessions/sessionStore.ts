import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { SANDBOX_MODES, SessionNotFoundError, type SandboxMode } from "../codex/errors.js";
import type { StructuredLogger } from "../logger.js";
import { errnoCode } from "../nodePrimitives.js";

const MS_PER_HOUR = 3_600_000;

/**
 * Lightweight asynchronous mutex serialising access to the session table.
 * Each caller waits for the previous holder before running.
 */
class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}

export interface SessionTurn {
  role: string;
  content: string;
  timestamp: string;
}

/** Conversation state kept for one Codex thread. */
export interface SessionRecord {
  threadId: string;
  createdAt: string;
  lastActive: string;
  workingDirectory: string;
  sandboxMode: SandboxMode;
  model: string | null;
  turnCount: number;
  history: SessionTurn[];
}

export interface CreateSessionInput {
  readonly threadId: string;
  readonly workingDirectory: string;
  readonly sandboxMode: SandboxMode;
  readonly model?: string | null;
}

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "expected an ISO-8601 timestamp",
});

/** On-disk layout of a session file. */
const persistedSessionSchema = z.object({
  thread_id: z.string().min(1),
  created_at: isoTimestamp,
  last_active: isoTimestamp,
  cwd: z.string().default(""),
  sandbox: z.enum(SANDBOX_MODES).default("read-only"),
  model: z.string().nullable().default(null),
  turn_count: z.number().int().nonnegative().default(0),
  history: z
    .array(z.object({ role: z.string(), content: z.string(), timestamp: z.string() }))
    .default([]),
});

type PersistedSession = z.input<typeof persistedSessionSchema>;

function toPersisted(record: SessionRecord): PersistedSession {
  return {
    thread_id: record.threadId,
    created_at: record.createdAt,
    last_active: record.lastActive,
    cwd: record.workingDirectory,
    sandbox: record.sandboxMode,
    model: record.model,
    turn_count: record.turnCount,
    history: record.history,
  };
}

function fromPersisted(raw: unknown): SessionRecord {
  const parsed = persistedSessionSchema.parse(raw);
  return {
    threadId: parsed.thread_id,
    createdAt: parsed.created_at,
    lastActive: parsed.last_active,
    workingDirectory: parsed.cwd,
    sandboxMode: parsed.sandbox,
    model: parsed.model,
    turnCount: parsed.turn_count,
    history: parsed.history,
  };
}

/**
 * Maps a thread id onto a file name safe on every platform. Ids that needed
 * rewriting get a `~` and a digest of the raw id appended; `~` never survives
 * the rewrite, so distinct ids never share a file.
 */
export function sessionFileName(threadId: string): string {
  const safe = threadId.replace(/[^A-Za-z0-9._-]/g, "_");
  if (safe === threadId) {
    return `${safe}.json`;
  }
  const digest = createHash("sha256").update(threadId).digest("hex").slice(0, 8);
  return `${safe}~${digest}.json`;
}

/** Operations available inside {@link FileSessionStore.transact}. */
export interface SessionTransaction {
  exists(threadId: string): boolean;
  get(threadId: string): SessionRecord;
  create(input: CreateSessionInput): Promise<SessionRecord>;
  update(record: SessionRecord): Promise<SessionRecord>;
  delete(threadId: string): Promise<boolean>;
}

export interface FileSessionStoreOptions {
  /** Directory holding one JSON file per session. */
  readonly directory: string;
  /** Clock used for deterministic testing. */
  readonly clock?: () => number;
  readonly logger?: Pick<StructuredLogger, "info" | "warn">;
}

/**
 * File-backed session table. Every record lives in memory after
 * {@link initialise} and is written back on create, update and delete.
 * Callers receive copies; changes only land through {@link update}.
 */
export class FileSessionStore {
  private readonly directory: string;
  private readonly clock: () => number;
  private readonly logger: Pick<StructuredLogger, "info" | "warn"> | undefined;
  private readonly mutex = new AsyncMutex();
  private readonly records = new Map<string, SessionRecord>();
  private ready: Promise<void> | null = null;

  constructor(options: FileSessionStoreOptions) {
    this.directory = options.directory;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger;
  }

  /** Creates the directory and loads every readable session file. */
  initialise(): Promise<void> {
    if (!this.ready) {
      this.ready = this.mutex.runExclusive(() => this.loadAll());
      // A failed load may be retried by the next call.
      this.ready.catch(() => {
        this.ready = null;
      });
    }
    return this.ready;
  }

  async exists(threadId: string): Promise<boolean> {
    return this.locked((tx) => tx.exists(threadId));
  }

  /** Returns a copy of the record; throws {@link SessionNotFoundError} when unknown. */
  async get(threadId: string): Promise<SessionRecord> {
    return this.locked((tx) => tx.get(threadId));
  }

  async create(input: CreateSessionInput): Promise<SessionRecord> {
    return this.locked((tx) => tx.create(input));
  }

  /** Persists `record` and bumps its `lastActive` timestamp. */
  async update(record: SessionRecord): Promise<SessionRecord> {
    return this.locked((tx) => tx.update(record));
  }

  /** Removes the record and its file. Resolves `false` when the id was unknown. */
  async delete(threadId: string): Promise<boolean> {
    return this.locked((tx) => tx.delete(threadId));
  }

  /** Snapshot of every record, most recently active first. */
  async list(): Promise<SessionRecord[]> {
    return this.locked(() =>
      [...this.records.values()]
        .sort((a, b) => Date.parse(b.lastActive) - Date.parse(a.lastActive))
        .map((record) => structuredClone(record)),
    );
  }

  /**
   * Removes every session idle for at least `maxAgeHours` and returns how
   * many were removed.
   */
  async sweep(maxAgeHours: number): Promise<number> {
    const removed = await this.locked(async (tx) => {
      const now = this.clock();
      const expired = [...this.records.values()]
        .filter((record) => (now - Date.parse(record.lastActive)) / MS_PER_HOUR >= maxAgeHours)
        .map((record) => record.threadId);
      for (const threadId of expired) {
        await tx.delete(threadId);
      }
      return expired.length;
    });
    if (removed > 0) {
      this.logger?.info("sessions_swept", { removed, max_age_hours: maxAgeHours });
    }
    return removed;
  }

  /** Runs a read-modify-write sequence while holding the store lock. */
  async transact<T>(operation: (tx: SessionTransaction) => Promise<T> | T): Promise<T> {
    return this.locked(operation);
  }

  /**
   * Appends one turn to `record` in place, incrementing the turn count and
   * bumping `lastActive`. Nothing is persisted until {@link update}.
   */
  appendTurn(record: SessionRecord, role: string, content: string): SessionRecord {
    const timestamp = this.now();
    record.history.push({ role, content, timestamp });
    record.turnCount += 1;
    record.lastActive = timestamp;
    return record;
  }

  private async locked<T>(operation: (tx: SessionTransaction) => Promise<T> | T): Promise<T> {
    await this.initialise();
    return this.mutex.runExclusive(() => operation(this.transaction));
  }

  private readonly transaction: SessionTransaction = {
    exists: (threadId) => this.records.has(threadId),
    get: (threadId) => {
      const record = this.records.get(threadId);
      if (!record) {
        throw new SessionNotFoundError(threadId);
      }
      return structuredClone(record);
    },
    create: async (input) => {
      const timestamp = this.now();
      const record: SessionRecord = {
        threadId: input.threadId,
        createdAt: timestamp,
        lastActive: timestamp,
        workingDirectory: input.workingDirectory,
        sandboxMode: input.sandboxMode,
        model: input.model ?? null,
        turnCount: 0,
        history: [],
      };
      await this.persist(record);
      this.records.set(record.threadId, record);
      this.logger?.info("session_created", { thread_id: record.threadId });
      return structuredClone(record);
    },
    update: async (record) => {
      const stored: SessionRecord = { ...structuredClone(record), lastActive: this.now() };
      await this.persist(stored);
      this.records.set(stored.threadId, stored);
      return structuredClone(stored);
    },
    delete: async (threadId) => {
      if (!this.records.delete(threadId)) {
        return false;
      }
      await fs.rm(this.filePath(threadId), { force: true });
      this.logger?.info("session_deleted", { thread_id: threadId });
      return true;
    },
  };

  private now(): string {
    return new Date(this.clock()).toISOString();
  }

  private filePath(threadId: string): string {
    return path.join(this.directory, sessionFileName(threadId));
  }

  private async persist(record: SessionRecord): Promise<void> {
    const target = this.filePath(record.threadId);
    const tempPath = `${target}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(toPersisted(record), null, 2)}\n`, "utf8");
    await fs.rename(tempPath, target);
  }

  private async loadAll(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const entries = await fs.readdir(this.directory);
    for (const entry of entries) {
      if (!entry.endsWith(".json")) {
        continue;
      }
      const file = path.join(this.directory, entry);
      try {
        const record = fromPersisted(JSON.parse(await fs.readFile(file, "utf8")));
        this.records.set(record.threadId, record);
      } catch (error) {
        if (errnoCode(error) === "ENOENT") {
          continue;
        }
        this.logger?.warn("session_file_skipped", {
          file,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
