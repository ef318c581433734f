/**
 * Gateway responsible for spawning the Codex CLI and its helpers. The factory
 * validates the command line, composes the environment and applies the
 * platform-specific process-group settings so supervisors interact with a
 * predictable API.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import process from "node:process";

import type { ProcessEnv } from "../nodePrimitives.js";

/**
 * Options accepted by {@link ChildProcessGateway.spawn}.
 */
export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to {@link nodeSpawn}. */
  readonly args?: readonly string[];
  /** Optional working directory of the child process. */
  readonly cwd?: string;
  /** Snapshot of environment variables to inherit (defaults to {@link process.env}). */
  readonly inheritEnv?: ProcessEnv;
  /** Overrides applied on top of the inherited snapshot; `undefined` removes a key. */
  readonly extraEnv?: Record<string, string | undefined>;
  /** Spawn stdio configuration (defaults to `pipe`). */
  readonly stdio?: SpawnOptions["stdio"];
  /**
   * Starts the child as the leader of a new process group on POSIX so the
   * whole tree can be signalled at once. Ignored on Windows.
   */
  readonly processGroup?: boolean;
}

/**
 * Error raised when the requested command name is invalid.
 */
export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

/**
 * Error raised when an argument is not a valid string.
 */
export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is ${typeof value}.`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/**
 * Contract exposed by the child process gateway.
 */
export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): ChildProcess;
}

/** Internal dependencies accepted by {@link createChildProcessGateway}. */
export interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: typeof nodeSpawn;
  /** Platform used to pick process-group settings (defaults to {@link process.platform}). */
  readonly platform?: NodeJS.Platform;
}

/**
 * Factory returning the child process gateway. Tests can inject a mock
 * {@link spawnImpl} to observe the wiring without launching real commands.
 */
export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
  platform = process.platform,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): ChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args);
      const env = buildEnv(options.inheritEnv ?? process.env, options.extraEnv ?? {});
      const isWindows = platform === "win32";

      const spawnOptions: SpawnOptions = {
        env,
        stdio: options.stdio ?? "pipe",
        shell: false,
        windowsVerbatimArguments: false,
        windowsHide: true,
        detached: !isWindows && options.processGroup === true,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      };

      return spawnImpl(command, [...args], spawnOptions);
    },
  };
}

/**
 * Ensures the argument list exclusively contains strings while returning a
 * copy to avoid mutation by the consumer after spawning the process.
 */
function normaliseArgs(args: SpawnChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }

  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

/**
 * Produces a new environment object from the inherited snapshot and the
 * overrides.
 */
function buildEnv(inheritEnv: ProcessEnv, extraEnv: Record<string, string | undefined>): ProcessEnv {
  const env: ProcessEnv = { ...inheritEnv };
  for (const [key, value] of Object.entries(extraEnv)) {
    if (value === undefined) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }
  return env;
}
