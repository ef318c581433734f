/**
 * Environment variable readers shared by the bridge settings. Every reader
 * trims the raw value, treats blank strings as "unset" and falls back to the
 * supplied default when the literal cannot be coerced.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Source of raw variables; defaults to {@link process.env}. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if `name` is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

/** Reads `name` as a boolean ("1/true/yes/on" or "0/false/no/off"). */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Inclusive bounds applied to numeric variables. */
export interface NumberBounds {
  readonly min?: number;
  readonly max?: number;
}

function withinBounds(value: number, bounds: NumberBounds | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds?.min !== undefined && value < bounds.min) {
    return false;
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when `name` holds a base-10 literal within bounds. */
export function readOptionalInt(
  name: string,
  bounds?: NumberBounds,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, bounds) ? value : undefined;
}

/** Reads `name` as an integer, falling back to `defaultValue`. */
export function readInt(
  name: string,
  defaultValue: number,
  bounds?: NumberBounds,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, bounds, env) ?? defaultValue;
}

/** Returns the trimmed value of `name`, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower);
}
