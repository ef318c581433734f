/** Sandbox policies accepted by `codex exec --sandbox`. */
export const SANDBOX_MODES = ["read-only", "workspace-write", "danger-full-access"] as const;

export type SandboxMode = (typeof SANDBOX_MODES)[number];

export function isSandboxMode(value: string): value is SandboxMode {
  return SANDBOX_MODES.some((mode) => mode === value);
}

/**
 * Base class of every failure raised by the bridge. Subclasses expose a
 * machine readable `code`, a `hint` and structured `details` that the MCP
 * layer forwards to the logs.
 */
export abstract class CodexBridgeError extends Error {
  public abstract readonly code: string;
  public abstract readonly hint: string;
  public abstract readonly details: Record<string, unknown>;
}

/** Raised when the Codex CLI fails or exits with an unexpected status. */
export class CodexExecutionError extends CodexBridgeError {
  public readonly code = "E-CODEX-EXEC";
  public readonly hint = "codex_execution_failed";
  public readonly exitCode: number | null;
  public readonly stderr: string;
  public readonly details: { exit_code: number | null; stderr_bytes: number };

  constructor(message: string, options: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CodexExecutionError";
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? "";
    this.details = { exit_code: this.exitCode, stderr_bytes: this.stderr.length };
  }
}

/** Raised when an invocation exceeds its deadline. */
export class CodexTimeoutError extends CodexBridgeError {
  public readonly code = "E-CODEX-TIMEOUT";
  public readonly hint = "increase_timeout";
  public readonly timeoutMs: number;
  /** Raw stdout lines collected before the deadline, joined by newlines. */
  public readonly partialOutput: string;
  public readonly details: { timeout_ms: number; partial_output_bytes: number };

  constructor(timeoutMs: number, partialOutput = "") {
    super(`Codex execution timed out after ${formatSeconds(timeoutMs)} seconds`);
    this.name = "CodexTimeoutError";
    this.timeoutMs = timeoutMs;
    this.partialOutput = partialOutput;
    this.details = { timeout_ms: timeoutMs, partial_output_bytes: partialOutput.length };
  }
}

/** Raised when a thread id has no stored session. */
export class SessionNotFoundError extends CodexBridgeError {
  public readonly code = "E-SESSION-NOTFOUND";
  public readonly hint = "start_new_session";
  public readonly threadId: string;
  public readonly details: { thread_id: string };

  constructor(threadId: string) {
    super(`Session not found: ${threadId}`);
    this.name = "SessionNotFoundError";
    this.threadId = threadId;
    this.details = { thread_id: threadId };
  }
}

/** Raised before spawning when the requested sandbox policy is unknown. */
export class InvalidSandboxModeError extends CodexBridgeError {
  public readonly code = "E-SANDBOX-INVALID";
  public readonly hint = "invalid_sandbox_mode";
  public readonly mode: string;
  public readonly validModes: readonly SandboxMode[] = SANDBOX_MODES;
  public readonly details: { mode: string; valid_modes: readonly SandboxMode[] };

  constructor(mode: string) {
    super(`Invalid sandbox mode: '${mode}'. Valid modes: ${SANDBOX_MODES.join(", ")}`);
    this.name = "InvalidSandboxModeError";
    this.mode = mode;
    this.details = { mode, valid_modes: SANDBOX_MODES };
  }
}

/** Renders a millisecond duration as whole seconds, keeping fractions when present. */
export function formatSeconds(durationMs: number): string {
  const seconds = durationMs / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
}
