import { describe, expect, it } from "vitest";

import { TtlCache } from "../src/domain/ttl-cache.js";

describe("ttl cache expiry", () => {
  it("returns values until their lifetime ends", () => {
    let now = 0;
    const cache = new TtlCache<string>(10, () => now);

    cache.set("matrix", "tmdb:603");
    now = 9_999;
    expect(cache.get("matrix")).toBe("tmdb:603");

    now = 10_000;
    expect(cache.has("matrix")).toBe(false);
    expect(cache.size).toBe(0);
  });

  it("sweeps expired entries of other keys on write", () => {
    let now = 0;
    const cache = new TtlCache<number>(1, () => now);

    cache.set("a", 1);
    cache.set("b", 2);
    now = 1_500;
    cache.set("c", 3);

    expect(cache.size).toBe(1);
    expect(cache.get("c")).toBe(3);
  });

  it("keeps null as a cached value", () => {
    const cache = new TtlCache<string | null>(60, () => 0);

    cache.set("missing", null);

    expect(cache.has("missing")).toBe(true);
    expect(cache.get("missing")).toBeNull();
  });
});
