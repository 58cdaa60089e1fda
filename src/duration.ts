import { ConfigError } from "./errors";

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

// longer units first so "ms" wins over "m"
const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h|d)/y;

/**
 * Parse a duration such as `30s`, `1h30m`, `1.5h` or `2d` into milliseconds.
 * A bare `0` is zero. Signs are accepted; range checks belong to the caller.
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (text === "") throw new ConfigError("invalid duration: empty string");

  let pos = 0;
  let sign = 1;
  if (text[0] === "+" || text[0] === "-") {
    sign = text[0] === "-" ? -1 : 1;
    pos = 1;
  }
  if (text.slice(pos) === "0") return 0;

  let total = 0;
  let segments = 0;
  while (pos < text.length) {
    SEGMENT.lastIndex = pos;
    const m = SEGMENT.exec(text);
    if (!m) {
      throw new ConfigError(`invalid duration "${input}"`);
    }
    const [, value, unit] = m;
    total += parseFloat(value) * UNIT_MS[unit];
    pos = SEGMENT.lastIndex;
    segments++;
  }
  if (segments === 0) throw new ConfigError(`invalid duration "${input}"`);
  return sign * total;
}

export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  const parts: string[] = [];
  let rest = ms;
  for (const [unit, size] of [
    ["h", 3_600_000],
    ["m", 60_000],
    ["s", 1_000],
  ] as const) {
    const n = Math.floor(rest / size);
    if (n > 0) {
      parts.push(`${n}${unit}`);
      rest -= n * size;
    }
  }
  if (rest > 0) parts.push(`${rest}ms`);
  return parts.join("");
}
