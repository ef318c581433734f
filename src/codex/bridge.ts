import process from "node:process";

import type { BridgeSettings } from "../config/settings.js";
import type { StructuredLogger } from "../logger.js";
import type { FileSessionStore, SessionRecord } from "../sessions/sessionStore.js";
import { buildCodexArgs } from "./commandLine.js";
import { InvalidSandboxModeError, isSandboxMode, SessionNotFoundError, type SandboxMode } from "./errors.js";
import type { AggregateResult } from "./events.js";
import type { SupervisorRunOptions } from "./processSupervisor.js";
import { executeWithRetry } from "./retryPolicy.js";

export const DEFAULT_SANDBOX_MODE: SandboxMode = "read-only";

/** Anything able to run one Codex child; the supervisor in production. */
export interface CodexRunner {
  run(options: SupervisorRunOptions): Promise<AggregateResult>;
}

/** Fully specified invocation handed to the runner. */
export interface InvocationRequest {
  readonly prompt: string;
  readonly workingDirectory: string;
  readonly sandboxMode: string;
  readonly model?: string | null;
  readonly timeoutMs: number;
  /** Thread to resume; absent for a new session. */
  readonly continuationId?: string;
}

/** Shape returned to MCP clients for a successful invocation. */
export interface InvocationResult {
  success: true;
  threadId?: string;
  agent_messages: string;
  reasoning: string[];
  completed: boolean;
  errors?: string[];
}

export interface StartSessionInput {
  readonly prompt: string;
  readonly cwd?: string;
  readonly sandbox?: string;
  readonly model?: string;
  readonly timeoutSec?: number;
}

export interface ReplyInput {
  readonly threadId: string;
  readonly prompt: string;
  readonly timeoutSec?: number;
}

/** Listing entry of `codex-sessions`. */
export interface SessionSummary {
  threadId: string;
  createdAt: string;
  lastActive: string;
  cwd: string;
  sandbox: SandboxMode;
  model: string | null;
  turnCount: number;
}

export type BridgeSettingsSubset = Pick<
  BridgeSettings,
  "codexPath" | "timeoutSec" | "maxRetries" | "retryDelayMs" | "strictSessions"
>;

export interface CodexBridgeOptions {
  readonly settings: BridgeSettingsSubset;
  readonly sessions: FileSessionStore;
  readonly runner: CodexRunner;
  readonly logger?: Pick<StructuredLogger, "info" | "warn">;
  /** Directory used when a call names none (defaults to the server's cwd). */
  readonly defaultCwd?: () => string;
}

function toInvocationResult(result: AggregateResult, fallbackThreadId?: string): InvocationResult {
  const threadId = result.threadId ?? fallbackThreadId;
  return {
    success: true,
    ...(threadId !== undefined ? { threadId } : {}),
    agent_messages: result.responseText(),
    reasoning: [...result.reasoning],
    completed: result.completed,
    ...(result.errors.length > 0 ? { errors: [...result.errors] } : {}),
  };
}

function toSummary(record: SessionRecord): SessionSummary {
  return {
    threadId: record.threadId,
    createdAt: record.createdAt,
    lastActive: record.lastActive,
    cwd: record.workingDirectory,
    sandbox: record.sandboxMode,
    model: record.model,
    turnCount: record.turnCount,
  };
}

/**
 * Invocation layer between the MCP tools and the Codex CLI. Validates
 * requests, runs them through the retry policy and keeps the session store
 * in step with the conversation.
 */
export class CodexBridge {
  private readonly settings: BridgeSettingsSubset;
  private readonly sessions: FileSessionStore;
  private readonly runner: CodexRunner;
  private readonly logger: Pick<StructuredLogger, "info" | "warn"> | undefined;
  private readonly defaultCwd: () => string;

  constructor(options: CodexBridgeOptions) {
    this.settings = options.settings;
    this.sessions = options.sessions;
    this.runner = options.runner;
    this.logger = options.logger;
    this.defaultCwd = options.defaultCwd ?? (() => process.cwd());
  }

  /** Starts a new Codex thread and records it when a thread id comes back. */
  async startSession(input: StartSessionInput): Promise<InvocationResult> {
    const workingDirectory = input.cwd ?? this.defaultCwd();
    const sandboxMode = input.sandbox ?? DEFAULT_SANDBOX_MODE;
    const model = input.model ?? null;

    const result = await this.execute({
      prompt: input.prompt,
      workingDirectory,
      sandboxMode,
      model,
      timeoutMs: this.timeoutMs(input.timeoutSec),
    });

    const threadId = result.threadId;
    if (threadId !== undefined && isSandboxMode(sandboxMode)) {
      await this.sessions.transact(async (tx) => {
        const record = await tx.create({ threadId, workingDirectory, sandboxMode, model });
        this.sessions.appendTurn(record, "user", input.prompt);
        this.sessions.appendTurn(record, "assistant", result.responseText());
        await tx.update(record);
      });
    }

    return toInvocationResult(result);
  }

  /**
   * Continues `threadId`. A stored session supplies cwd, sandbox and model;
   * an unknown id runs with defaults unless strict sessions are enabled.
   */
  async replyToSession(input: ReplyInput): Promise<InvocationResult> {
    const known = await this.sessions.exists(input.threadId);
    if (!known && this.settings.strictSessions) {
      throw new SessionNotFoundError(input.threadId);
    }
    const stored = known ? await this.sessions.get(input.threadId) : undefined;
    if (!known) {
      this.logger?.warn("codex_reply_unknown_thread", { thread_id: input.threadId });
    }

    const result = await this.execute({
      prompt: input.prompt,
      workingDirectory: stored?.workingDirectory || this.defaultCwd(),
      sandboxMode: stored?.sandboxMode ?? DEFAULT_SANDBOX_MODE,
      model: stored?.model ?? null,
      timeoutMs: this.timeoutMs(input.timeoutSec),
      continuationId: input.threadId,
    });

    if (stored) {
      await this.sessions.transact(async (tx) => {
        if (!tx.exists(input.threadId)) {
          return;
        }
        const record = tx.get(input.threadId);
        this.sessions.appendTurn(record, "user", input.prompt);
        this.sessions.appendTurn(record, "assistant", result.responseText());
        await tx.update(record);
      });
    }

    return toInvocationResult(result, input.threadId);
  }

  async listSessions(): Promise<SessionSummary[]> {
    const records = await this.sessions.list();
    return records.map(toSummary);
  }

  /** Deletes a stored session; throws {@link SessionNotFoundError} for unknown ids. */
  async deleteSession(threadId: string): Promise<void> {
    const deleted = await this.sessions.delete(threadId);
    if (!deleted) {
      throw new SessionNotFoundError(threadId);
    }
  }

  /**
   * Validates `request` and runs it under the retry policy. Invalid sandbox
   * modes are rejected before any process is spawned.
   */
  async execute(request: InvocationRequest): Promise<AggregateResult> {
    const sandboxMode = request.sandboxMode;
    if (!isSandboxMode(sandboxMode)) {
      throw new InvalidSandboxModeError(sandboxMode);
    }

    const args = buildCodexArgs({
      sandboxMode,
      model: request.model ?? null,
      ...(request.continuationId !== undefined ? { continuationId: request.continuationId } : {}),
    });
    this.logger?.info("codex_invocation", {
      resume: request.continuationId !== undefined,
      sandbox: sandboxMode,
      model: request.model ?? null,
      cwd: request.workingDirectory,
      timeout_ms: request.timeoutMs,
      prompt_preview: request.prompt.slice(0, 200),
    });

    return executeWithRetry(
      () =>
        this.runner.run({
          command: this.settings.codexPath,
          args,
          cwd: request.workingDirectory,
          input: request.prompt,
          timeoutMs: request.timeoutMs,
        }),
      {
        maxRetries: this.settings.maxRetries,
        retryDelayMs: this.settings.retryDelayMs,
        ...(this.logger !== undefined ? { logger: this.logger } : {}),
      },
    );
  }

  private timeoutMs(timeoutSec: number | undefined): number {
    return (timeoutSec ?? this.settings.timeoutSec) * 1000;
  }
}
