import { describe, expect, it } from "vitest";
import { parseDirectiveBlock } from "../../src/directives";
import { ConfigError } from "../../src/errors";

describe("parseDirectiveBlock", () => {
  it("accepts a bare module name", () => {
    expect(parseDirectiveBlock("parspack")).toEqual({ name: "parspack" });
  });

  it("reads interval and timeout", () => {
    const block = parseDirectiveBlock(`parspack {
      interval 2h
      timeout 30s
    }`);
    expect(block).toEqual({ name: "parspack", interval: 7_200_000, timeout: 30_000 });
  });

  it("ignores comments", () => {
    const block = parseDirectiveBlock("parspack { # refresh settings\n  interval 15m # often\n}");
    expect(block).toEqual({ name: "parspack", interval: 900_000 });
  });

  it("accepts an empty block", () => {
    expect(parseDirectiveBlock("parspack {\n}")).toEqual({ name: "parspack" });
  });

  it("rejects an unknown directive", () => {
    expect(() => parseDirectiveBlock("parspack { invalid_option }")).toThrow(ConfigError);
    expect(() => parseDirectiveBlock("parspack { invalid_option }")).toThrow(
      'line 1: unrecognized directive "invalid_option"'
    );
  });

  it("rejects same-line arguments after the module name", () => {
    expect(() => parseDirectiveBlock("parspack extra")).toThrow(
      'line 1: unexpected argument "extra": parspack takes no arguments'
    );
  });

  it("rejects a directive without its argument", () => {
    expect(() => parseDirectiveBlock("parspack {\n  interval\n}")).toThrow(
      "line 2: interval takes exactly one argument, got 0"
    );
  });

  it("rejects extra arguments on a directive line", () => {
    expect(() => parseDirectiveBlock("parspack {\n  timeout 30s 1m\n}")).toThrow(
      "line 2: timeout takes exactly one argument, got 2"
    );
  });

  it("rejects a malformed duration", () => {
    expect(() => parseDirectiveBlock("parspack {\n  interval soon\n}")).toThrow(
      'line 2: invalid interval duration: invalid duration "soon"'
    );
  });

  it("rejects an unterminated block", () => {
    expect(() => parseDirectiveBlock("parspack {\n  interval 2h\n")).toThrow(
      'missing "}" for parspack block'
    );
  });

  it("rejects input after the block", () => {
    expect(() => parseDirectiveBlock("parspack {\n}\nmore")).toThrow(
      'line 3: unexpected "more" after block'
    );
  });

  it("rejects empty input", () => {
    expect(() => parseDirectiveBlock("  \n ")).toThrow("missing module name");
  });
});
