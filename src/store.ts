import type { NetworkPrefix, PrefixSnapshot } from "./types";

const EMPTY: PrefixSnapshot = Object.freeze([]);

/**
 * Holds the authoritative prefix list. Writers install a frozen copy by
 * swapping a single reference, so a reader always gets a complete snapshot
 * from one `replace` call (or the empty initial one) and never waits on a
 * fetch in progress.
 */
export class SnapshotStore {
  private current: PrefixSnapshot = EMPTY;
  private lastReplacedAt: Date | undefined;

  read(): PrefixSnapshot {
    return this.current;
  }

  replace(snapshot: readonly NetworkPrefix[], at: Date = new Date()): PrefixSnapshot {
    const next: PrefixSnapshot = Object.freeze([...snapshot]);
    this.current = next;
    this.lastReplacedAt = at;
    return next;
  }

  get updatedAt(): Date | undefined {
    return this.lastReplacedAt;
  }
}
