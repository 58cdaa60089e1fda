export interface NetworkPrefix {
  readonly address: string;
  readonly bits: number;
  readonly version: 4 | 6;
}

/** Complete set of prefixes installed by one successful refresh cycle. */
export type PrefixSnapshot = readonly NetworkPrefix[];

export interface RangeSourceDescriptor {
  readonly name: string;
  readonly url: string;
}

export type FetchLike = (
  input: string | URL | Request,
  init?: RequestInit
) => Promise<Response>;

export type LifecycleState = "uninitialized" | "running" | "stopped";
