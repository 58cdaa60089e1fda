import { FetchError, errorMessage } from "./errors";
import { parseRangesFromContent } from "./ip";
import { silentLogger, type Logger } from "./logger";
import type { FetchLike, NetworkPrefix, RangeSourceDescriptor } from "./types";

export const PARSPACK_IPS_V4 = "https://parspack.com/cdnips.txt";

export const DEFAULT_SOURCE: RangeSourceDescriptor = {
  name: "parspack",
  url: PARSPACK_IPS_V4,
};

export type FetchOptions = {
  /** Bound on the whole request, body included. 0 = wait forever. */
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

function isTimeout(err: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === "TimeoutError";
}

/** One GET of a range list; resolves with the raw body. */
export async function fetchRangesText(
  url: string,
  opts: FetchOptions
): Promise<string> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  let signal: AbortSignal | undefined;

  try {
    // timers take whole milliseconds
    signal =
      opts.timeoutMs > 0 ? AbortSignal.timeout(Math.ceil(opts.timeoutMs)) : undefined;
    const res = await fetchImpl(url, { method: "GET", signal });
    if (!res.ok) {
      await res.body?.cancel();
      throw new FetchError({
        message: `unexpected status code: ${res.status}`,
        url,
        statusCode: res.status,
      });
    }
    return await res.text();
  } catch (err) {
    if (err instanceof FetchError) throw err;
    const timedOut = isTimeout(err, signal);
    throw new FetchError({
      message: timedOut
        ? `failed to fetch ${url}: timed out after ${opts.timeoutMs}ms`
        : `failed to fetch ${url}: ${errorMessage(err)}`,
      url,
      timedOut,
      cause: err,
    });
  }
}

export async function fetchRanges(
  source: RangeSourceDescriptor,
  opts: FetchOptions & { logger?: Logger }
): Promise<NetworkPrefix[]> {
  const logger = opts.logger ?? silentLogger;
  const text = await fetchRangesText(source.url, opts);
  return parseRangesFromContent(text, logger);
}
