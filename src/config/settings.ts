import { homedir } from "node:os";
import path from "node:path";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readBool, readInt, readOptionalEnum, readOptionalString, type EnvSource } from "./env.js";

/** Runtime configuration of the bridge, resolved once at startup. */
export interface BridgeSettings {
  /** Executable used to launch the Codex CLI. */
  codexPath: string;
  sessionsDir: string;
  /** Mirror file for the structured log, `null` when disabled. */
  logFile: string | null;
  logLevel: LogLevel;
  /** Default per-invocation deadline when a tool call sets none. */
  timeoutSec: number;
  maxRetries: number;
  retryDelayMs: number;
  shutdownGraceMs: number;
  sessionMaxAgeHours: number;
  /** Reject replies to thread ids the store does not know. */
  strictSessions: boolean;
}

export const DEFAULT_TIMEOUT_SEC = 600;

/** Tokens that disable the log mirror when used as `CODEX_MCP_LOG_FILE`. */
const DISABLED_PATH_TOKENS = new Set(["none", "off", "false", "0"]);

/** Expands a leading `~` to the user's home directory. */
export function expandHome(value: string, home: string = homedir()): string {
  if (value === "~") {
    return home;
  }
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(home, value.slice(2));
  }
  return value;
}

/** Interprets a log-file setting: disable tokens map to `null`. */
export function resolveLogFile(raw: string, home: string = homedir()): string | null {
  return DISABLED_PATH_TOKENS.has(raw.trim().toLowerCase()) ? null : expandHome(raw.trim(), home);
}

/**
 * Reads every `CODEX_EXE_PATH` / `CODEX_MCP_*` variable, falling back to the
 * defaults for unset or malformed values.
 */
export function loadBridgeSettings(env: EnvSource = process.env, home: string = homedir()): BridgeSettings {
  const rawLogFile = readOptionalString("CODEX_MCP_LOG_FILE", env);
  return {
    codexPath: expandHome(readOptionalString("CODEX_EXE_PATH", env) ?? "codex", home),
    sessionsDir: expandHome(readOptionalString("CODEX_MCP_SESSIONS_DIR", env) ?? "~/.codex-mcp-sessions", home),
    logFile: rawLogFile === undefined ? path.join(home, ".codex-mcp-server.log") : resolveLogFile(rawLogFile, home),
    logLevel: readOptionalEnum("CODEX_MCP_LOG_LEVEL", LOG_LEVELS, env) ?? "info",
    timeoutSec: readInt("CODEX_MCP_TIMEOUT_SEC", DEFAULT_TIMEOUT_SEC, { min: 1 }, env),
    maxRetries: readInt("CODEX_MCP_MAX_RETRIES", 3, { min: 0, max: 20 }, env),
    retryDelayMs: readInt("CODEX_MCP_RETRY_DELAY_MS", 2000, { min: 0 }, env),
    shutdownGraceMs: readInt("CODEX_MCP_SHUTDOWN_GRACE_MS", 500, { min: 0 }, env),
    sessionMaxAgeHours: readInt("CODEX_MCP_SESSION_MAX_AGE_HOURS", 24, { min: 0 }, env),
    strictSessions: readBool("CODEX_MCP_STRICT_SESSIONS", false, env),
  };
}
