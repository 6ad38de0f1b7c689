import { InvalidInputError } from "../errors.js";

/**
 * Where a sanitized string ends up:
 * - `graphLiteral`: inside a single-quoted Cypher string literal
 * - `regexFragment`: inside a Flux `/.../` regex, matched literally
 * - `fluxString`: inside a double-quoted Flux string literal
 */
export type SanitizeContext = "graphLiteral" | "regexFragment" | "fluxString";

export interface SafeString<C extends SanitizeContext = SanitizeContext> {
  readonly context: C;
  /** Trimmed input, for display and in-process comparison. */
  readonly raw: string;
  /** Value ready to be placed between the context's delimiters. */
  readonly escaped: string;
}

export const MAX_INPUT_LENGTH = 256;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const REGEX_META = /[\\^$.|?*+()[\]{}/]/g;

function countOf(value: string, ch: string): number {
  let n = 0;
  for (const c of value) if (c === ch) n += 1;
  return n;
}

function reject(context: SanitizeContext, raw: string, problem: string): never {
  throw new InvalidInputError(`Input ${JSON.stringify(raw.slice(0, 64))} rejected for ${context}: ${problem}`, {
    context
  });
}

function escapeGraphLiteral(value: string): string {
  if (value.includes(";")) reject("graphLiteral", value, "statement separators are not allowed");
  if (countOf(value, '"') % 2 === 1) reject("graphLiteral", value, "unterminated double quote");
  if (countOf(value, "`") % 2 === 1) reject("graphLiteral", value, "unterminated backtick");
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/"/g, '\\"');
}

function escapeRegexFragment(value: string): string {
  return value.replace(REGEX_META, (ch) => `\\${ch}`);
}

function escapeFluxString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\$\{/g, "\\${");
}

export function sanitize<C extends SanitizeContext>(raw: string, context: C): SafeString<C> {
  const value = raw.trim();
  if (value.length === 0) reject(context, raw, "empty value");
  if (value.length > MAX_INPUT_LENGTH) reject(context, value, `longer than ${MAX_INPUT_LENGTH} characters`);
  if (CONTROL_CHARS.test(value)) reject(context, value, "control characters are not allowed");

  let escaped: string;
  switch (context) {
    case "graphLiteral":
      escaped = escapeGraphLiteral(value);
      break;
    case "regexFragment":
      escaped = escapeRegexFragment(value);
      break;
    default:
      escaped = escapeFluxString(value);
  }
  return { context, raw: value, escaped };
}

/** Optional parameters: blank strings count as absent. */
export function sanitizeOptional<C extends SanitizeContext>(
  raw: string | number | null | undefined,
  context: C
): SafeString<C> | undefined {
  if (raw === null || raw === undefined) return undefined;
  const text = String(raw);
  if (!text.trim()) return undefined;
  return sanitize(text, context);
}

const DURATION = /^-(?:\d+(?:ns|us|µs|ms|mo|s|m|h|d|w|y))+$/;

/** Relative Flux duration such as `-1h` or `-1h30m`. */
export function parseTimeRange(raw: string): string {
  const value = raw.trim();
  if (!DURATION.test(value)) {
    throw new InvalidInputError(
      `Time range ${JSON.stringify(raw.slice(0, 32))} is not a relative duration like -1h or -30m`,
      { timeRange: raw }
    );
  }
  return value;
}
