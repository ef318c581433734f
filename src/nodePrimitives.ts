import process from "node:process";

/**
 * Runtime-dependent types derived from the Node.js globals that the bridge
 * manipulates often (environment snapshots, signals, errno-flavoured errors).
 */
export type ProcessEnv = typeof process.env;

/** Signals the supervisor sends to a child process group. */
export type TerminationSignal = "SIGTERM" | "SIGKILL";

/**
 * Returns the errno code (`ENOENT`, `ESRCH`, ...) attached to a thrown value,
 * or `undefined` when the value does not carry one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}
