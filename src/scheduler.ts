/**
 * Background refresh loop.
 *
 * One cycle runs right after `start()`, then one per interval until `stop()`.
 * The interval wait and the stop signal are raced, so `stop()` ends the loop
 * without waiting out the timer; a fetch already in flight is left to finish
 * (or hit its own timeout) and its result is discarded.
 *
 * Cycles never overlap: the next wait begins when the previous cycle ends.
 */

import type { ResolvedRefreshOptions } from "./config";
import { errorMessage } from "./errors";
import { fetchRanges } from "./fetch";
import { silentLogger, withFields, type Logger } from "./logger";
import type { SnapshotStore } from "./store";
import type { FetchLike, NetworkPrefix, PrefixSnapshot } from "./types";

export type SchedulerState = "created" | "running" | "stopped";

export type RefreshListener = (snapshot: PrefixSnapshot) => void;

export type SchedulerDeps = {
  logger?: Logger;
  fetchImpl?: FetchLike;
  onRefresh?: RefreshListener;
};

export type SchedulerStatus = {
  state: SchedulerState;
  cycles: number;
  failures: number;
  prefixCount: number;
  lastSuccessAt?: Date;
  lastError?: string;
};

export class RefreshScheduler {
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;
  private readonly onRefresh?: RefreshListener;
  private readonly controller = new AbortController();

  private state: SchedulerState = "created";
  private loop: Promise<void> | undefined;
  private inFlight: Promise<boolean> | undefined;
  private cycles = 0;
  private failures = 0;
  private lastError: string | undefined;

  constructor(
    private readonly store: SnapshotStore,
    private readonly options: ResolvedRefreshOptions,
    deps: SchedulerDeps = {}
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.fetchImpl = deps.fetchImpl;
    this.onRefresh = deps.onRefresh;
  }

  start(): void {
    if (this.state !== "created") return;
    this.state = "running";
    this.loop = this.run();
  }

  /** Safe before `start()` and safe to repeat. */
  stop(): void {
    if (this.state === "stopped") return;
    this.state = "stopped";
    this.controller.abort();
  }

  /** Resolves once the background loop has exited. */
  get stopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /**
   * Run one cycle now, or join the one already running. Resolves true when
   * a new snapshot was installed.
   */
  refreshNow(): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      failures: this.failures,
      prefixCount: this.store.read().length,
      lastSuccessAt: this.store.updatedAt,
      lastError: this.lastError,
    };
  }

  private async run(): Promise<void> {
    await this.refreshNow();
    while (!this.controller.signal.aborted) {
      const ticked = await this.wait(this.options.intervalMs);
      if (!ticked) break;
      await this.refreshNow();
    }
    this.logger.debug("refresh loop stopped");
  }

  /** Resolves true when the interval elapses, false on stop. */
  private wait(ms: number): Promise<boolean> {
    const signal = this.controller.signal;
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve(false);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve(true);
      }, ms);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private async cycle(): Promise<boolean> {
    this.cycles++;
    const { sources, timeoutMs } = this.options;
    let results: NetworkPrefix[][];
    try {
      results = await Promise.all(
        sources.map((source) =>
          fetchRanges(source, {
            timeoutMs,
            fetchImpl: this.fetchImpl,
            logger: withFields(this.logger, { source: source.name }),
          })
        )
      );
    } catch (err) {
      this.failures++;
      this.lastError = errorMessage(err);
      this.logger.error("refresh cycle failed", {
        error: this.lastError,
        initial: this.cycles === 1,
      });
      return false;
    }

    if (this.state === "stopped") {
      this.logger.debug("discarding ranges fetched after stop");
      return false;
    }

    const snapshot = this.store.replace(results.flat());
    this.lastError = undefined;
    if (snapshot.length === 0) {
      this.logger.warn("range list is empty", {
        sources: sources.map((s) => s.name),
      });
    }
    this.logger.info("successfully fetched IP ranges", {
      count: snapshot.length,
    });

    if (this.onRefresh) {
      try {
        this.onRefresh(snapshot);
      } catch (err) {
        this.logger.error("refresh listener failed", {
          error: errorMessage(err),
        });
      }
    }
    return true;
  }
}
