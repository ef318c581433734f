import type { SandboxMode } from "./errors.js";

/** Inputs shaping the `codex exec` argument vector. */
export interface CommandLineOptions {
  readonly sandboxMode?: SandboxMode;
  readonly model?: string | null;
  /** Thread to resume; starts a new session when absent. */
  readonly continuationId?: string;
}

/**
 * Builds the arguments passed after the executable. The prompt always travels
 * on stdin, hence the `-` placeholder. A resumed thread keeps the sandbox and
 * model it was created with, so those flags only apply to new sessions.
 */
export function buildCodexArgs(options: CommandLineOptions): string[] {
  if (options.continuationId !== undefined) {
    return ["exec", "resume", "--json", "--skip-git-repo-check", options.continuationId, "-"];
  }

  const args = ["exec", "-", "--json", "--skip-git-repo-check"];
  if (options.sandboxMode) {
    args.push("--sandbox", options.sandboxMode);
  }
  if (options.model) {
    args.push("--model", options.model);
  }
  return args;
}
