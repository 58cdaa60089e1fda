import ipaddr from "ipaddr.js";
import { PrefixParseError, errorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { NetworkPrefix } from "./types";

// dotted quad only: no octal, hex or short forms
const FOUR_PART_DECIMAL = /^(0|[1-9]\d*)(\.(0|[1-9]\d*)){3}$/;

function isIPv6(ip: string): boolean {
  return ip.includes(":");
}

/** Bare addresses become single-host prefixes. */
function fixIP(ip: string): string {
  if (!ip.includes("/")) {
    return isIPv6(ip) ? `${ip}/128` : `${ip}/32`;
  }
  return ip;
}

/**
 * Parse one CIDR expression (`1.2.3.0/24`, `2001:db8::/32`, or a bare
 * address). Host bits are not masked off; IPv6 addresses are stored in
 * their compressed lowercase form. Zoned addresses are rejected.
 */
export function parsePrefix(expr: string): NetworkPrefix {
  const fixed = fixIP(expr.trim());
  const invalid = (cause?: unknown) =>
    new PrefixParseError(expr, `invalid CIDR expression "${expr}"`, cause);

  const written = fixed.slice(0, fixed.lastIndexOf("/"));
  if (written.includes("%")) throw invalid();

  let parsed: ReturnType<typeof ipaddr.parseCIDR>;
  try {
    parsed = ipaddr.parseCIDR(fixed);
  } catch (err) {
    throw invalid(err);
  }
  const [addr, bits] = parsed;
  const version = addr.kind() === "ipv6" ? 6 : 4;
  if (version === 4 && !FOUR_PART_DECIMAL.test(written)) throw invalid();

  const prefix: NetworkPrefix = { address: addr.toString(), bits, version };
  return Object.freeze(prefix);
}

export function formatPrefix(prefix: NetworkPrefix): string {
  return `${prefix.address}/${prefix.bits}`;
}

function canonicalAddress(address: string): string {
  return ipaddr.isValid(address)
    ? ipaddr.parse(address).toNormalizedString()
    : address.toLowerCase();
}

/** Same block: same address value and same length, however it was written. */
export function prefixEquals(a: NetworkPrefix, b: NetworkPrefix): boolean {
  return (
    a.bits === b.bits &&
    a.version === b.version &&
    canonicalAddress(a.address) === canonicalAddress(b.address)
  );
}

/**
 * Parse CIDR lines from a range list body. Blank lines and `#` comments are
 * skipped; a malformed line is logged and skipped, never fatal. Input order
 * and duplicates are kept.
 */
export function parseRangesFromContent(
  content: string,
  logger: Logger = silentLogger
): NetworkPrefix[] {
  const prefixes: NetworkPrefix[] = [];
  content.split(/\r?\n/).forEach((line) => {
    const t = line.trim();
    if (!t || t.startsWith("#")) return;
    try {
      prefixes.push(parsePrefix(t));
    } catch (err) {
      logger.warn("failed to parse IP range", {
        line: t,
        error: errorMessage(err),
      });
    }
  });
  return prefixes;
}

/** Range list file body: commented header, then one CIDR per line. */
export function formatRangesForFile(
  ranges: readonly NetworkPrefix[],
  sourceNames: readonly string[],
  at: Date = new Date()
): string {
  return (
    [
      `# CDN IP ranges (${sourceNames.join(", ")})`,
      "# " + at.toISOString(),
      "",
      ...ranges.map(formatPrefix),
    ].join("\n") + "\n"
  );
}
