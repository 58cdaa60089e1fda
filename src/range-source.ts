import {
  resolveOptions,
  type RefreshOptionsInput,
  type ResolvedRefreshOptions,
} from "./config";
import { parseDirectiveBlock } from "./directives";
import { formatDuration } from "./duration";
import { silentLogger } from "./logger";
import { RefreshScheduler, type SchedulerDeps, type SchedulerStatus } from "./scheduler";
import { SnapshotStore } from "./store";
import type { LifecycleState, PrefixSnapshot } from "./types";

/**
 * Host-facing adapter: provision once, read from any request handler,
 * clean up once.
 */
export class CdnRangeSource {
  private readonly store = new SnapshotStore();
  private scheduler: RefreshScheduler | undefined;
  private resolved: ResolvedRefreshOptions | undefined;
  private lifecycle: LifecycleState = "uninitialized";

  constructor(
    private readonly config: RefreshOptionsInput = {},
    private readonly deps: SchedulerDeps = {}
  ) {}

  /** Build from a `<name> { interval …; timeout … }` block. */
  static fromDirectives(text: string, deps: SchedulerDeps = {}): CdnRangeSource {
    const block = parseDirectiveBlock(text);
    return new CdnRangeSource(
      { interval: block.interval, timeout: block.timeout },
      deps
    );
  }

  /**
   * Fill defaults, validate, and start refreshing in the background. Only a
   * bad configuration throws; a failing first fetch is logged and leaves the
   * range list empty.
   */
  provision(): void {
    if (this.lifecycle !== "uninitialized") return;
    const options = resolveOptions(this.config);
    const logger = this.deps.logger ?? silentLogger;

    this.resolved = options;
    this.scheduler = new RefreshScheduler(this.store, options, this.deps);
    this.lifecycle = "running";
    logger.info("starting IP range refresh", {
      interval: formatDuration(options.intervalMs),
      timeout: options.timeoutMs > 0 ? formatDuration(options.timeoutMs) : "none",
      sources: options.sources.map((s) => s.name),
    });
    this.scheduler.start();
  }

  /** Current ranges; empty until the first successful refresh. */
  getIPRanges(): PrefixSnapshot {
    return this.store.read();
  }

  /** Safe without `provision()` and safe to repeat. */
  cleanup(): void {
    if (this.lifecycle !== "running") return;
    this.lifecycle = "stopped";
    this.scheduler?.stop();
  }

  get state(): LifecycleState {
    return this.lifecycle;
  }

  get options(): ResolvedRefreshOptions | undefined {
    return this.resolved;
  }

  /** Resolves once the background loop has exited. */
  get stopped(): Promise<void> {
    return this.scheduler?.stopped ?? Promise.resolve();
  }

  /** Resolves true when a new snapshot was installed. */
  refreshNow(): Promise<boolean> {
    return this.scheduler?.refreshNow() ?? Promise.resolve(false);
  }

  status(): SchedulerStatus | undefined {
    return this.scheduler?.status();
  }
}
