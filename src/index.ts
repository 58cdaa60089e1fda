#!/usr/bin/env node

import * as fs from "fs";
import { buildOptions, parseArgs } from "./args";
import {
  resolveOptions,
  type RefreshOptionsInput,
  type ResolvedRefreshOptions,
} from "./config";
import { errorMessage, toAppError } from "./errors";
import { formatPrefix, formatRangesForFile } from "./ip";
import { createLogger, logLevelFromEnv } from "./logger";
import { CdnRangeSource } from "./range-source";
import { RefreshScheduler } from "./scheduler";
import { SnapshotStore } from "./store";
import { cli } from "./utils";

const VERSION = "1.0.0";

const HELP = `
  cdn-ranges ${VERSION}
  Keep a CDN's published IP ranges fresh.

  USAGE
    cdn-ranges --once
    cdn-ranges -c ranges.conf -o cdn-ips.txt

  OPTIONS
    -c, --config <path>     Directive block, e.g. "parspack { interval 2h }"
    -i, --interval <dur>    Time between refreshes (default: 1h)
    -t, --timeout <dur>     Per-fetch timeout (default: none)
    -u, --url <urls>        Comma-separated range list URLs (default: ParsPack IPv4)
    -o, --output <path>     Rewrite this file after each refresh
    --once                  Fetch once, print ranges to stdout, exit

  ENV
    LOG_LEVEL               debug | info | warn | error | silent (default: info)

  MISC
    -v, --version           Show version
    -h, --help              Show this help
`;

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (args.version) {
    console.log("  cdn-ranges " + VERSION);
    process.exit(0);
  }

  const logger = createLogger({
    level: logLevelFromEnv(),
    service: "cdn-ranges",
    pretty: process.env.NODE_ENV !== "production",
  });

  let input: RefreshOptionsInput;
  let options: ResolvedRefreshOptions;
  try {
    input = buildOptions(args);
    options = resolveOptions(input);
  } catch (err) {
    console.error(cli.red("  " + toAppError(err).message));
    process.exit(2);
  }

  if (args.once) {
    const store = new SnapshotStore();
    const scheduler = new RefreshScheduler(store, options, { logger });
    const ok = await scheduler.refreshNow();
    if (!ok) process.exit(1);
    for (const prefix of store.read()) console.log(formatPrefix(prefix));
    return;
  }

  const outPath = typeof args.o === "string" ? args.o : "";
  const names = options.sources.map((s) => s.name);
  const source = new CdnRangeSource(input, {
    logger,
    onRefresh: (snapshot) => {
      if (!outPath) return;
      try {
        fs.writeFileSync(outPath, formatRangesForFile(snapshot, names), "utf-8");
        logger.info("wrote range list", { path: outPath, count: snapshot.length });
      } catch (err) {
        logger.error("failed to write range list", {
          path: outPath,
          error: errorMessage(err),
        });
      }
    },
  });

  const shutdown = () => {
    logger.info("shutting down");
    source.cleanup();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  source.provision();
  await source.stopped;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
