import type { FetchLike } from "../src/types";

export type Route = string | number | Error | (() => Promise<Response>);

/** In-process stand-in for the range list endpoints, keyed by URL. */
export function fakeFetch(routes: Record<string, Route | Route[]>): FetchLike & {
  calls: string[];
} {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const impl = async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    const entry = routes[url];
    if (entry === undefined) return new Response("not found", { status: 404 });

    // a list of routes is served in order, the last one repeating
    const n = served.get(url) ?? 0;
    served.set(url, n + 1);
    const route = Array.isArray(entry) ? entry[Math.min(n, entry.length - 1)] : entry;

    if (typeof route === "string") return new Response(route, { status: 200 });
    if (typeof route === "number") return new Response("", { status: route });
    if (route instanceof Error) throw route;
    return route();
  };

  return Object.assign(impl, { calls });
}

/** Fetch that never answers until its signal aborts. */
export const hangingFetch: FetchLike = (_input, init) =>
  new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason));
  });

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Let pending promise chains settle (setImmediate is left unfaked). */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((r) => setImmediate(r));
  }
}
