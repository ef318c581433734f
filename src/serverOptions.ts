import { homedir } from "node:os";

import { expandHome, loadBridgeSettings, resolveLogFile, type BridgeSettings } from "./config/settings.js";
import type { EnvSource } from "./config/env.js";
import { isLogLevel, LOG_LEVELS } from "./logger.js";

/** Settings overridden from the command line; absent keys keep the env value. */
export type CliOverrides = Partial<BridgeSettings>;

const FLAG_WITH_VALUE = new Set([
  "--codex-path",
  "--sessions-dir",
  "--log-file",
  "--log-level",
  "--timeout-sec",
  "--max-retries",
  "--retry-delay-ms",
  "--shutdown-grace-ms",
  "--session-max-age-hours",
]);

/**
 * Ensures a provided numeric string can be converted to an integer no lower
 * than `min`.
 */
function parseInteger(value: string, flag: string, min: number): number {
  const num = Number(value);
  if (value.trim() === "" || !Number.isInteger(num) || num < min) {
    throw new Error(`The value ${value} for ${flag} must be an integer >= ${min}.`);
  }
  return num;
}

function parseNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`The flag ${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept both `--flag value` and
 * `--flag=value`; positional arguments and unknown flags are ignored.
 */
export function parseCliOverrides(argv: readonly string[], home: string = homedir()): CliOverrides {
  const overrides: CliOverrides = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }
    const raw = value ?? "";

    switch (flag) {
      case "--codex-path":
        overrides.codexPath = expandHome(parseNonEmpty(raw, flag), home);
        break;
      case "--sessions-dir":
        overrides.sessionsDir = expandHome(parseNonEmpty(raw, flag), home);
        break;
      case "--log-file":
        overrides.logFile = resolveLogFile(parseNonEmpty(raw, flag), home);
        break;
      case "--log-level": {
        const level = raw.trim().toLowerCase();
        if (!isLogLevel(level)) {
          throw new Error(`The flag ${flag} expects one of ${LOG_LEVELS.join(", ")}.`);
        }
        overrides.logLevel = level;
        break;
      }
      case "--timeout-sec":
        overrides.timeoutSec = parseInteger(raw, flag, 1);
        break;
      case "--max-retries":
        overrides.maxRetries = parseInteger(raw, flag, 0);
        break;
      case "--retry-delay-ms":
        overrides.retryDelayMs = parseInteger(raw, flag, 0);
        break;
      case "--shutdown-grace-ms":
        overrides.shutdownGraceMs = parseInteger(raw, flag, 0);
        break;
      case "--session-max-age-hours":
        overrides.sessionMaxAgeHours = parseInteger(raw, flag, 0);
        break;
      case "--strict-sessions":
        overrides.strictSessions = value === undefined ? true : !["0", "false", "no", "off"].includes(raw.toLowerCase());
        break;
      default:
        break;
    }
  }

  return overrides;
}

/** Environment settings with command-line overrides applied on top. */
export function resolveBridgeSettings(
  argv: readonly string[],
  env: EnvSource = process.env,
  home: string = homedir(),
): BridgeSettings {
  return { ...loadBridgeSettings(env, home), ...parseCliOverrides(argv, home) };
}
