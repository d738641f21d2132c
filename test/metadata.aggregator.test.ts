import { describe, expect, it } from "vitest";

import { CliAppError } from "../src/core/index.js";
import { MetadataAggregator } from "../src/domain/metadata.js";
import type {
  DiscoveryRequest,
  MetadataProviderId,
  MetadataQuery,
  MetadataRecord,
  MetadataSource,
  SeriesRecord,
} from "../src/domain/types.js";

interface FakeSource extends MetadataSource {
  calls: MetadataQuery[];
}

function fakeSource(
  id: MetadataProviderId,
  lookup: (query: MetadataQuery) => Promise<MetadataRecord | undefined>,
  genres: string[] = [],
): FakeSource {
  const calls: MetadataQuery[] = [];
  return {
    calls,
    descriptor: {
      id,
      name: id,
      kind: "api",
      capabilities: {
        lookup: true,
        genres: genres.length > 0,
        series: false,
        discovery: false,
        doctor: false,
      },
    },
    async lookup(query) {
      calls.push(query);
      return lookup(query);
    },
    async listGenres() {
      return genres;
    },
  };
}

function record(provider: MetadataProviderId, title = "Matrix"): MetadataRecord {
  return { title, genres: ["Sci-Fi"], provider };
}

const MATRIX: MetadataQuery = { title: "Matrix", contentType: "movie", year: 1999 };

describe("metadata aggregator", () => {
  it("returns the first provider record without asking the next one", async () => {
    const tmdb = fakeSource("tmdb", async () => record("tmdb"));
    const csfd = fakeSource("csfd", async () => record("csfd"));
    const aggregator = new MetadataAggregator([tmdb, csfd]);

    await expect(aggregator.lookup(MATRIX)).resolves.toEqual(record("tmdb"));
    expect(csfd.calls).toHaveLength(0);
    expect(aggregator.providerIds).toEqual(["tmdb", "csfd"]);
  });

  it("falls back to the next provider when one fails or has an empty title", async () => {
    const tmdb = fakeSource("tmdb", async () => {
      throw new CliAppError({ code: "E_UPSTREAM_NETWORK", message: "offline" });
    });
    const blank = fakeSource("csfd", async () => record("csfd", "  "));
    const csfd = fakeSource("csfd", async () => record("csfd"));
    const aggregator = new MetadataAggregator([tmdb, blank, csfd]);

    await expect(aggregator.lookup(MATRIX)).resolves.toEqual(record("csfd"));
    expect(blank.calls).toHaveLength(1);
  });

  it("serves repeated lookups of the same key from cache", async () => {
    const tmdb = fakeSource("tmdb", async () => record("tmdb"));
    const aggregator = new MetadataAggregator([tmdb]);

    await aggregator.lookup(MATRIX);
    await aggregator.lookup({ title: "  matrix ", contentType: "movie", year: 1999 });

    expect(tmdb.calls).toHaveLength(1);
  });

  it("caches a definitive miss but not a miss caused by a failure", async () => {
    const empty = fakeSource("tmdb", async () => undefined);
    const cleanMiss = new MetadataAggregator([empty]);
    await expect(cleanMiss.lookup(MATRIX)).resolves.toBeUndefined();
    await expect(cleanMiss.lookup(MATRIX)).resolves.toBeUndefined();
    expect(empty.calls).toHaveLength(1);

    const failing = fakeSource("tmdb", async () => {
      throw new Error("boom");
    });
    const failedMiss = new MetadataAggregator([failing]);
    await expect(failedMiss.lookup(MATRIX)).resolves.toBeUndefined();
    await expect(failedMiss.lookup(MATRIX)).resolves.toBeUndefined();
    expect(failing.calls).toHaveLength(2);
  });

  it("expires cached entries after the configured ttl", async () => {
    let now = 0;
    const tmdb = fakeSource("tmdb", async () => record("tmdb"));
    const aggregator = new MetadataAggregator([tmdb], { cacheTtlSeconds: 60, clock: () => now });

    await aggregator.lookup(MATRIX);
    now = 59_999;
    await aggregator.lookup(MATRIX);
    now = 60_000;
    await aggregator.lookup(MATRIX);

    expect(tmdb.calls).toHaveLength(2);
  });

  it("shares one provider call between concurrent lookups", async () => {
    let release: (value: MetadataRecord) => void = () => undefined;
    const pending = new Promise<MetadataRecord>((resolve) => {
      release = resolve;
    });
    const tmdb = fakeSource("tmdb", async () => pending);
    const aggregator = new MetadataAggregator([tmdb]);

    const first = aggregator.lookup(MATRIX);
    const second = aggregator.lookup(MATRIX);
    release(record("tmdb"));

    await expect(Promise.all([first, second])).resolves.toEqual([record("tmdb"), record("tmdb")]);
    expect(tmdb.calls).toHaveLength(1);
  });

  it("skips lookups with no sources or an empty title", async () => {
    const tmdb = fakeSource("tmdb", async () => record("tmdb"));

    await expect(new MetadataAggregator([]).lookup(MATRIX)).resolves.toBeUndefined();
    await expect(
      new MetadataAggregator([tmdb]).lookup({ title: " ", contentType: "movie" }),
    ).resolves.toBeUndefined();
    expect(tmdb.calls).toHaveLength(0);
  });

  it("lists genres from the first provider that has any", async () => {
    const csfd = fakeSource("csfd", async () => undefined);
    const tmdb = fakeSource("tmdb", async () => undefined, ["Akční", "Drama"]);
    const aggregator = new MetadataAggregator([csfd, tmdb]);

    await expect(aggregator.listGenres("movie")).resolves.toEqual(["Akční", "Drama"]);
  });

  it("forgets cached records on clearCache", async () => {
    const tmdb = fakeSource("tmdb", async () => record("tmdb"));
    const aggregator = new MetadataAggregator([tmdb]);

    await aggregator.lookup(MATRIX);
    aggregator.clearCache();
    await aggregator.lookup(MATRIX);

    expect(tmdb.calls).toHaveLength(2);
  });
});

const DARK: SeriesRecord = {
  title: "Dark",
  seasons: [{ seasonNumber: 1, episodeCount: 10 }],
  provider: "tmdb",
  providerRef: "70523",
};

describe("metadata aggregator series and discovery", () => {
  it("caches a series record under its title key", async () => {
    const titles: string[] = [];
    const tmdb: MetadataSource = {
      ...fakeSource("tmdb", async () => undefined),
      async searchSeries(title) {
        titles.push(title);
        return DARK;
      },
    };
    const aggregator = new MetadataAggregator([tmdb]);

    await expect(aggregator.searchSeries("Dark")).resolves.toEqual(DARK);
    await expect(aggregator.searchSeries("  DARK ")).resolves.toEqual(DARK);
    await expect(aggregator.searchSeries(" ")).resolves.toBeUndefined();
    expect(titles).toEqual(["Dark"]);
  });

  it("does not remember a series miss after a provider failure", async () => {
    let calls = 0;
    const tmdb: MetadataSource = {
      ...fakeSource("tmdb", async () => undefined),
      async searchSeries() {
        calls += 1;
        if (calls === 1) {
          throw new CliAppError({ code: "E_UPSTREAM_TIMEOUT", message: "tmdb upstream request timed out" });
        }
        return undefined;
      },
    };
    const aggregator = new MetadataAggregator([tmdb]);

    await expect(aggregator.searchSeries("Dark")).resolves.toBeUndefined();
    await expect(aggregator.searchSeries("Dark")).resolves.toBeUndefined();
    await expect(aggregator.searchSeries("Dark")).resolves.toBeUndefined();
    expect(calls).toBe(2);
  });

  it("asks the owning provider for episodes and yields none on failure", async () => {
    const requested: Array<[string, number]> = [];
    const tmdb: MetadataSource = {
      ...fakeSource("tmdb", async () => undefined),
      async seasonEpisodes(providerRef, season) {
        requested.push([providerRef, season]);
        if (season > 1) {
          throw new CliAppError({ code: "E_UPSTREAM_NETWORK", message: "offline" });
        }
        return [{ episodeNumber: 1, name: "Secrets" }];
      },
    };
    const aggregator = new MetadataAggregator([fakeSource("csfd", async () => undefined), tmdb]);

    await expect(aggregator.seasonEpisodes("tmdb", "70523", 1)).resolves.toEqual([
      { episodeNumber: 1, name: "Secrets" },
    ]);
    await expect(aggregator.seasonEpisodes("tmdb", "70523", 2)).resolves.toEqual([]);
    await expect(aggregator.seasonEpisodes("csfd", "70523", 1)).resolves.toEqual([]);
    expect(requested).toEqual([
      ["70523", 1],
      ["70523", 2],
    ]);
  });

  it("falls back to an empty discovery page when the list is unavailable", async () => {
    const requests: DiscoveryRequest[] = [];
    const tmdb: MetadataSource = {
      ...fakeSource("tmdb", async () => undefined),
      async discover(request) {
        requests.push(request);
        if (request.list === "upcoming") {
          throw new CliAppError({ code: "E_ARG_INVALID", message: "List upcoming is not available for series" });
        }
        throw new CliAppError({ code: "E_UPSTREAM_BAD_RESPONSE", message: "tmdb returned 503" });
      },
    };
    const aggregator = new MetadataAggregator([tmdb]);

    await expect(aggregator.discover({ contentType: "movie", list: "popular", page: 4 })).resolves.toEqual({
      items: [],
      page: 4,
      totalPages: 0,
    });
    await expect(
      aggregator.discover({ contentType: "series", list: "upcoming", page: 1 }),
    ).rejects.toMatchObject({ code: "E_ARG_INVALID" });
    await expect(
      new MetadataAggregator([fakeSource("csfd", async () => undefined)]).discover({
        contentType: "movie",
        page: 1,
      }),
    ).resolves.toEqual({ items: [], page: 1, totalPages: 0 });
    expect(requests).toHaveLength(2);
  });
});
