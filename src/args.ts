import * as fs from "fs";
import type { RefreshOptionsInput } from "./config";
import { parseDirectiveBlock } from "./directives";
import { parseDuration } from "./duration";
import type { RangeSourceDescriptor } from "./types";

export type CliArgs = Record<string, string | boolean>;

const LONG_TO_SHORT: Record<string, string> = {
  help: "help",
  version: "version",
  config: "c",
  interval: "i",
  timeout: "t",
  url: "u",
  output: "o",
  once: "once",
};

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  const flagKeys = ["once"];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-h" || a === "--help") {
      args.help = true;
      continue;
    }
    if (a === "-v" || a === "--version") {
      args.version = true;
      continue;
    }
    let key: string;
    if (a.startsWith("--")) {
      key = a.slice(2).replace(/-/g, "");
      key = LONG_TO_SHORT[key] ?? key;
    } else if (a.startsWith("-")) {
      key = a.slice(1).replace(/-/g, "");
    } else {
      continue;
    }
    if (flagKeys.includes(key)) {
      args[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("-")) {
      args[key] = next;
      i++;
    }
  }
  return args;
}

function sourcesFromUrls(raw: string): RangeSourceDescriptor[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((url) => {
      let name = url;
      try {
        name = new URL(url).hostname;
      } catch {
        // left for config validation to report
      }
      return { name, url };
    });
}

/** Directive file first, then command-line overrides. */
export function buildOptions(
  args: CliArgs,
  readFile: (path: string) => string = (p) => fs.readFileSync(p, "utf-8")
): RefreshOptionsInput {
  const input: RefreshOptionsInput = {};
  if (typeof args.c === "string") {
    const block = parseDirectiveBlock(readFile(args.c));
    input.interval = block.interval;
    input.timeout = block.timeout;
  }
  if (typeof args.i === "string") input.interval = parseDuration(args.i);
  if (typeof args.t === "string") input.timeout = parseDuration(args.t);
  if (typeof args.u === "string") input.sources = sourcesFromUrls(args.u);
  return input;
}
