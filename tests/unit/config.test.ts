import { describe, expect, it } from "vitest";
import { DEFAULT_INTERVAL_MS, resolveOptions } from "../../src/config";
import { parseDirectiveBlock } from "../../src/directives";
import { ConfigError } from "../../src/errors";
import { DEFAULT_SOURCE } from "../../src/fetch";

describe("resolveOptions", () => {
  it("fills defaults for a minimal configuration", () => {
    expect(resolveOptions()).toEqual({
      intervalMs: 3_600_000,
      timeoutMs: 0,
      sources: [DEFAULT_SOURCE],
    });
  });

  it("treats a zero interval as unset", () => {
    expect(resolveOptions({ interval: 0 }).intervalMs).toBe(DEFAULT_INTERVAL_MS);
  });

  it("takes values from a directive block", () => {
    const block = parseDirectiveBlock("parspack {\n interval 2h\n timeout 30s\n}");
    const options = resolveOptions({ interval: block.interval, timeout: block.timeout });
    expect(options.intervalMs).toBe(7_200_000);
    expect(options.timeoutMs).toBe(30_000);
  });

  it("rounds sub-millisecond durations up to whole milliseconds", () => {
    const block = parseDirectiveBlock("parspack {\n timeout 1.5ms\n}");
    expect(resolveOptions({ timeout: block.timeout }).timeoutMs).toBe(2);
    expect(resolveOptions({ timeout: 2.5, interval: 0.2 })).toMatchObject({
      timeoutMs: 3,
      intervalMs: 1,
    });
  });

  it("rejects negative durations", () => {
    expect(() => resolveOptions({ interval: -1 })).toThrow(ConfigError);
    expect(() => resolveOptions({ timeout: -60_000 })).toThrow(ConfigError);
  });

  it("rejects intervals a timer cannot hold", () => {
    expect(() => resolveOptions({ interval: 30 * 86_400_000 })).toThrow(ConfigError);
  });

  it("validates source descriptors", () => {
    expect(() => resolveOptions({ sources: [] })).toThrow(ConfigError);
    expect(() => resolveOptions({ sources: [{ name: "x", url: "not a url" }] })).toThrow(
      /sources\.0\.url/
    );
  });

  it("returns frozen options", () => {
    const options = resolveOptions();
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.sources)).toBe(true);
  });
});
