import { describe, expect, it } from "vitest";
import { parsePrefix } from "../../src/ip";
import { SnapshotStore } from "../../src/store";

describe("SnapshotStore", () => {
  it("starts empty", () => {
    const store = new SnapshotStore();
    expect(store.read()).toEqual([]);
    expect(store.updatedAt).toBeUndefined();
  });

  it("returns exactly what was installed", () => {
    const store = new SnapshotStore();
    const next = [parsePrefix("1.2.3.0/24"), parsePrefix("5.6.7.0/16")];
    const at = new Date("2026-05-01T00:00:00.000Z");
    store.replace(next, at);
    expect(store.read()).toEqual(next);
    expect(store.updatedAt).toBe(at);
  });

  it("never changes a snapshot a reader already holds", () => {
    const store = new SnapshotStore();
    const source = [parsePrefix("1.2.3.0/24")];
    store.replace(source);
    const held = store.read();

    source.push(parsePrefix("9.9.9.0/24"));
    store.replace([parsePrefix("5.6.7.0/16")]);

    expect(held.map((p) => p.address)).toEqual(["1.2.3.0"]);
    expect(Object.isFrozen(held)).toBe(true);
    expect(store.read().map((p) => p.address)).toEqual(["5.6.7.0"]);
  });

  it("gives every reader between two replaces the same snapshot", () => {
    const store = new SnapshotStore();
    store.replace([parsePrefix("1.2.3.0/24")]);
    const reads = Array.from({ length: 50 }, () => store.read());
    expect(new Set(reads).size).toBe(1);
  });
});
