import type { ChildProcess } from "node:child_process";
import type { Writable } from "node:stream";

import { createChildProcessGateway, type ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { createProcessTreeTerminator, type ProcessTreeTerminator } from "../process/treeKill.js";
import { runtimeTimers } from "../runtime/timers.js";
import { CodexBridgeError, CodexExecutionError, CodexTimeoutError } from "./errors.js";
import { CodexEventParser } from "./eventParser.js";
import type { AggregateResult } from "./events.js";
import { readCodexStreams, type StreamReadOutcome } from "./streamReader.js";

/** Grace window between the polite and the forced termination request. */
export const DEFAULT_SHUTDOWN_GRACE_MS = 500;

export type SupervisorLogger = Pick<StructuredLogger, "debug" | "info" | "warn" | "error">;

/** One Codex CLI invocation. */
export interface SupervisorRunOptions {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  /** Environment overrides applied on top of the server's environment. */
  readonly env?: Record<string, string | undefined>;
  /** Prompt written to stdin as UTF-8. */
  readonly input: string;
  readonly timeoutMs: number;
}

export interface ProcessSupervisorOptions {
  readonly gateway?: ChildProcessGateway;
  readonly terminator?: ProcessTreeTerminator;
  readonly logger?: SupervisorLogger;
  readonly shutdownGraceMs?: number;
  /** Forwarded to the stream reader's stderr loop. */
  readonly pollIntervalMs?: number;
}

/** Settled state of a child; the watcher never rejects. */
type ExitOutcome =
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "error"; error: Error };

interface ExitWatch {
  readonly promise: Promise<ExitOutcome>;
  settled(): boolean;
}

function watchExit(child: ChildProcess): ExitWatch {
  let done = false;
  const promise = new Promise<ExitOutcome>((resolve) => {
    child.once("exit", (code, signal) => {
      done = true;
      resolve({ kind: "exit", code, signal });
    });
    // Persistent so a late failure (a refused kill, say) never goes unhandled.
    child.on("error", (error) => {
      done = true;
      resolve({ kind: "error", error });
    });
  });
  return { promise, settled: () => done };
}

/** Resolves with the exit outcome, or `undefined` when `ms` elapses first. */
function raceExit(watch: ExitWatch, ms: number): Promise<ExitOutcome | undefined> {
  return new Promise<ExitOutcome | undefined>((resolve) => {
    const timer = runtimeTimers.setTimeout(() => resolve(undefined), ms);
    void watch.promise.then((outcome) => {
      runtimeTimers.clearTimeout(timer);
      resolve(outcome);
    });
  });
}

/**
 * Writes the prompt and closes stdin. Resolves early when `signal` aborts so
 * a child that never reads cannot outlive the deadline.
 */
function writeInput(stdin: Writable, input: string, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      stdin.off("error", onError);
      stdin.off("finish", onFinish);
      signal.removeEventListener("abort", onAbort);
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const onFinish = () => {
      cleanup();
      resolve();
    };
    const onAbort = () => {
      cleanup();
      resolve();
    };
    stdin.once("error", onError);
    stdin.once("finish", onFinish);
    signal.addEventListener("abort", onAbort, { once: true });
    stdin.end(input, "utf8");
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one Codex CLI child to completion: spawn, feed the prompt, drain both
 * output channels under the deadline, then tear the process tree down.
 */
export class CodexProcessSupervisor {
  private readonly gateway: ChildProcessGateway;
  private readonly terminator: ProcessTreeTerminator;
  private readonly logger: SupervisorLogger | undefined;
  private readonly shutdownGraceMs: number;
  private readonly pollIntervalMs: number | undefined;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.terminator = options.terminator ?? createProcessTreeTerminator();
    this.logger = options.logger;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.pollIntervalMs = options.pollIntervalMs;
  }

  async run(options: SupervisorRunOptions): Promise<AggregateResult> {
    const parser = new CodexEventParser(this.logger);

    let child: ChildProcess;
    try {
      child = this.gateway.spawn({
        command: options.command,
        args: options.args,
        stdio: "pipe",
        processGroup: true,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        ...(options.env !== undefined ? { extraEnv: options.env } : {}),
      });
    } catch (error) {
      throw new CodexExecutionError(`Failed to start Codex: ${errorMessage(error)}`, { cause: error });
    }

    const exit = watchExit(child);
    const termination = new TreeTermination(child, exit, this.terminator, this.shutdownGraceMs, this.logger);
    const deadline = new AbortController();
    const deadlineTimer = runtimeTimers.setTimeout(() => deadline.abort(), options.timeoutMs);

    try {
      if (child.pid === undefined) {
        const outcome = await exit.promise;
        const reason = outcome.kind === "error" ? outcome.error.message : "no process id assigned";
        throw new CodexExecutionError(`Failed to start Codex (${options.command}): ${reason}`);
      }
      this.logger?.info("codex_spawned", { pid: child.pid, args: options.args, cwd: options.cwd ?? null });

      const { stdin, stdout, stderr } = child;
      if (!stdin || !stdout || !stderr) {
        throw new CodexExecutionError("Codex process was spawned without piped stdio");
      }
      stdin.on("error", (error: Error) => {
        this.logger?.debug("codex_stdin_error", { message: error.message });
      });

      try {
        await writeInput(stdin, options.input, deadline.signal);
      } catch (error) {
        throw new CodexExecutionError(`Failed to write prompt to Codex: ${errorMessage(error)}`, { cause: error });
      }

      const outcome: StreamReadOutcome = deadline.signal.aborted
        ? { stdoutLines: [], stderrLines: [], completed: false, aborted: true, stdoutEnded: false }
        : await readCodexStreams({
            stdout,
            stderr,
            parser,
            signal: deadline.signal,
            logger: this.logger,
            ...(this.pollIntervalMs !== undefined ? { pollIntervalMs: this.pollIntervalMs } : {}),
          });

      if (outcome.aborted) {
        this.logger?.warn("codex_timeout", { pid: child.pid, timeout_ms: options.timeoutMs });
        await termination.run({ force: true });
        throw new CodexTimeoutError(options.timeoutMs, outcome.stdoutLines.join("\n"));
      }

      if (outcome.stdoutEnded && !outcome.completed) {
        await raceExit(exit, this.shutdownGraceMs);
      }
      await termination.run({ force: false });

      const status: ExitOutcome = (await raceExit(exit, this.shutdownGraceMs)) ?? { kind: "exit", code: null, signal: null };
      const result = parser.result;
      const stderrText = outcome.stderrLines.join("\n");

      if (status.kind === "error") {
        throw new CodexExecutionError(`Codex process failed: ${status.error.message}`, {
          stderr: stderrText,
          cause: status.error,
        });
      }
      const cleanExit = status.code === 0 || (result.completed && termination.signalled);
      if (cleanExit) {
        return result;
      }

      const exitLabel = status.code ?? status.signal ?? "unknown";
      this.logger?.warn("codex_exit_unclean", {
        exit_code: status.code,
        signal: status.signal,
        stderr: stderrText,
      });
      if (result.hasUsefulOutput()) {
        return result;
      }
      throw new CodexExecutionError(`Codex exited with code ${exitLabel}`, {
        exitCode: status.code,
        stderr: stderrText,
      });
    } catch (error) {
      if (error instanceof CodexBridgeError) {
        throw error;
      }
      this.logger?.error("codex_run_failed", { message: errorMessage(error) });
      throw new CodexExecutionError(errorMessage(error), { cause: error });
    } finally {
      runtimeTimers.clearTimeout(deadlineTimer);
      await termination.run({ force: true });
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();
    }
  }
}

/**
 * Idempotent teardown of one child's process tree. The first call decides the
 * escalation; later calls only await it.
 */
class TreeTermination {
  private pending: Promise<void> | null = null;
  /** Whether a signal was sent while the leader was still running. */
  signalled = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly exit: ExitWatch,
    private readonly terminator: ProcessTreeTerminator,
    private readonly graceMs: number,
    private readonly logger: SupervisorLogger | undefined,
  ) {}

  run(options: { force: boolean }): Promise<void> {
    if (!this.pending) {
      this.pending = this.terminate(options.force);
    }
    return this.pending;
  }

  private async terminate(forceFirst: boolean): Promise<void> {
    const pid = this.child.pid;
    if (pid === undefined) {
      return;
    }
    const leaderRunning = !this.exit.settled();
    if (!leaderRunning && this.terminator.isTreeAlive(pid) !== true) {
      return;
    }
    this.signalled = leaderRunning;

    try {
      await this.terminator.signalTree(pid, forceFirst);
      if (forceFirst) {
        this.logger?.info("codex_tree_killed", { pid, forced: true });
        await raceExit(this.exit, this.graceMs);
        return;
      }
      const exited = await raceExit(this.exit, this.graceMs);
      if (exited === undefined || this.terminator.isTreeAlive(pid) === true) {
        await this.terminator.signalTree(pid, true);
        await raceExit(this.exit, this.graceMs);
      }
      this.logger?.info("codex_tree_terminated", { pid, forced: exited === undefined });
    } catch (error) {
      this.logger?.warn("codex_tree_termination_failed", { pid, message: errorMessage(error) });
      if (!this.exit.settled()) {
        this.child.kill("SIGKILL");
      }
    }
  }
}
