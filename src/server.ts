#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { access } from "node:fs/promises";
import { isAbsolute } from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { CodexBridge, type CodexRunner } from "./codex/bridge.js";
import { CodexProcessSupervisor } from "./codex/processSupervisor.js";
import type { BridgeSettings } from "./config/settings.js";
import { StructuredLogger } from "./logger.js";
import { runtimeTimers } from "./runtime/timers.js";
import { registerCodexTools } from "./server/tools.js";
import { resolveBridgeSettings } from "./serverOptions.js";
import { FileSessionStore } from "./sessions/sessionStore.js";

export const SERVER_NAME = "codex-exec-mcp";
export const SERVER_VERSION = "0.1.0";

const SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export interface CodexServerDeps {
  readonly settings: BridgeSettings;
  readonly logger: StructuredLogger;
  /** Overrides the process supervisor; tests inject a scripted runner. */
  readonly runner?: CodexRunner;
  readonly sessions?: FileSessionStore;
}

export interface CodexServerRuntime {
  readonly server: McpServer;
  readonly bridge: CodexBridge;
  readonly sessions: FileSessionStore;
  /** Sweeps stale sessions now and then hourly; returns the stop function. */
  startHousekeeping(): () => void;
}

/** Wires the MCP server, the bridge and the session store together. */
export function createCodexServer(deps: CodexServerDeps): CodexServerRuntime {
  const { settings, logger } = deps;
  const sessions = deps.sessions ?? new FileSessionStore({ directory: settings.sessionsDir, logger });
  const runner =
    deps.runner ??
    new CodexProcessSupervisor({
      logger,
      shutdownGraceMs: settings.shutdownGraceMs,
    });
  const bridge = new CodexBridge({ settings, sessions, runner, logger });
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerCodexTools(server, bridge, logger);

  const sweep = async () => {
    try {
      await sessions.sweep(settings.sessionMaxAgeHours);
    } catch (error) {
      logger.warn("session_sweep_failed", { message: error instanceof Error ? error.message : String(error) });
    }
  };

  return {
    server,
    bridge,
    sessions,
    startHousekeeping(): () => void {
      void sweep();
      const handle = runtimeTimers.setInterval(() => {
        void sweep();
      }, SWEEP_INTERVAL_MS);
      handle.unref();
      return () => runtimeTimers.clearInterval(handle);
    },
  };
}

/** Warns when an absolute Codex path does not point at an existing file. */
async function checkCodexPath(codexPath: string, logger: StructuredLogger): Promise<void> {
  if (!isAbsolute(codexPath)) {
    return;
  }
  try {
    await access(codexPath);
  } catch {
    logger.warn("codex_executable_missing", { path: codexPath });
  }
}

/**
 * Bootstraps the server when the module is executed directly via the CLI:
 * resolves settings, connects the stdio transport and registers shutdown
 * hooks.
 */
async function main(): Promise<void> {
  let settings: BridgeSettings;
  try {
    settings = resolveBridgeSettings(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger().error("cli_options_invalid", { message });
    process.exit(1);
  }

  const logger = new StructuredLogger({ logFile: settings.logFile, level: settings.logLevel });
  logger.info("runtime_starting", {
    codex_path: settings.codexPath,
    sessions_dir: settings.sessionsDir,
    timeout_sec: settings.timeoutSec,
    max_retries: settings.maxRetries,
  });
  await checkCodexPath(settings.codexPath, logger);

  const runtime = createCodexServer({ settings, logger });
  await runtime.sessions.initialise();
  const stopHousekeeping = runtime.startHousekeeping();

  const transport = new StdioServerTransport();
  await runtime.server.connect(transport);
  logger.info("stdio_listening");

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.warn("shutdown_signal", { signal });
    stopHousekeeping();
    try {
      await runtime.server.close();
    } catch (error) {
      logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    await logger.flush();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`fatal: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });
}
