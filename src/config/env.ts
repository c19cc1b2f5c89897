/**
 * Helpers reading environment variables with predictable coercion rules:
 * values are trimmed, blank values count as unset and unparsable values fall
 * back to the caller's default. Every reader takes the variable source as an
 * optional last argument so tests can pass a plain record instead of mutating
 * {@link process.env}.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Variable source consulted by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Reads a boolean literal ("1/true/yes/on" or "0/false/no/off"). */
export function readBool(name: string, defaultValue: boolean, source: EnvSource = process.env): boolean {
  return readOptionalBool(name, source) ?? defaultValue;
}

export function readOptionalBool(name: string, source: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(source[name]);
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

/** Returns the trimmed value, or `undefined` when the variable is unset or blank. */
export function readOptionalString(name: string, source: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(source[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  source: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(source[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  source: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, source) ?? defaultValue;
}
