import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_SOURCE } from "./fetch";
import type { RangeSourceDescriptor } from "./types";

export const DEFAULT_INTERVAL_MS = 60 * 60 * 1000;

// setTimeout fires immediately for delays above this
const MAX_TIMER_MS = 2_147_483_647;

export const RangeSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

// Durations may carry sub-millisecond parts (`1.5ms`, `2500us`); timers
// only take whole milliseconds, so they are rounded up.
export const RefreshOptionsSchema = z.object({
  /** 0 or unset: one hour. */
  interval: z
    .number()
    .nonnegative()
    .max(MAX_TIMER_MS)
    .optional()
    .transform((v) => (v ? Math.ceil(v) : DEFAULT_INTERVAL_MS)),
  /** 0 or unset: no timeout. */
  timeout: z
    .number()
    .nonnegative()
    .max(MAX_TIMER_MS)
    .optional()
    .transform((v) => Math.ceil(v ?? 0)),
  sources: z
    .array(RangeSourceSchema)
    .min(1)
    .optional()
    .transform((v): RangeSourceDescriptor[] => v ?? [DEFAULT_SOURCE]),
});

/** Options as they arrive from a host or a directive block, durations in ms. */
export type RefreshOptionsInput = z.input<typeof RefreshOptionsSchema>;

export type ResolvedRefreshOptions = {
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly sources: readonly RangeSourceDescriptor[];
};

export function resolveOptions(
  input: RefreshOptionsInput = {}
): ResolvedRefreshOptions {
  const parsed = RefreshOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`, parsed.error);
  }
  return Object.freeze({
    intervalMs: parsed.data.interval,
    timeoutMs: parsed.data.timeout,
    sources: Object.freeze([...parsed.data.sources]),
  });
}
