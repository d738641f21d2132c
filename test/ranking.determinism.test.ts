import { describe, expect, it } from "vitest";

import { parseFilename } from "../src/domain/filename-parser.js";
import { rankResults } from "../src/domain/ranking.js";
import { tokenize } from "../src/domain/request-normalization.js";
import type { EnrichedResult, SearchResult } from "../src/domain/types.js";

function candidate(result: SearchResult, withMetadata = false): EnrichedResult {
  return {
    result,
    attributes: parseFilename(result.name),
    ...(withMetadata
      ? { metadata: { title: "Matrix", genres: ["Sci-Fi"], provider: "tmdb" as const } }
      : {}),
  };
}

const CANDIDATES: EnrichedResult[] = [
  candidate({ ident: "uhd", name: "Matrix.1999.2160p.CZ.mkv", passwordProtected: false }),
  candidate({
    ident: "hd",
    name: "Matrix.1999.1080p.CZ.mkv",
    positiveVotes: 99,
    negativeVotes: 0,
    passwordProtected: false,
  }),
  candidate({ ident: "sd", name: "Matrix.1999.DVDRip.mkv", passwordProtected: false }, true),
  candidate({
    ident: "other",
    name: "Other.Film.2001.1080p.mkv",
    positiveVotes: 0,
    negativeVotes: 9,
    passwordProtected: false,
  }),
];

describe("query tokens + ranking determinism", () => {
  it("tokenizes queries into a stable sorted set", () => {
    expect(tokenize("  The   Matrix  matrix ")).toEqual(["matrix", "the"]);
    expect(tokenize("Pelíšky")).toEqual(["pelisky"]);
    expect(tokenize("   ")).toEqual([]);
  });

  it("returns deterministic ranking independent of candidate order", () => {
    const tokens = tokenize("matrix");
    const rankingA = rankResults(tokens, [...CANDIDATES]);
    const rankingB = rankResults(tokens, [...CANDIDATES].reverse());

    expect(rankingA.map((item) => item.result.ident)).toEqual(["hd", "uhd", "sd", "other"]);
    expect(rankingB.map((item) => item.result.ident)).toEqual(rankingA.map((item) => item.result.ident));
    expect(rankingA.map((item) => item.rank)).toEqual([1, 2, 3, 4]);
  });

  it("explains each score component", () => {
    const [top, , third, last] = rankResults(tokenize("matrix"), [...CANDIDATES]);

    expect(top?.score).toBe(79);
    expect(top?.reasons).toEqual(["query-overlap:1.000", "quality:HD:+9", "votes:+10.000"]);
    expect(third?.score).toBe(69);
    expect(third?.reasons).toEqual(["query-overlap:1.000", "quality:SD:+4", "metadata:tmdb"]);
    expect(last?.score).toBe(4);
    expect(last?.reasons).toEqual(["query-overlap:0.000", "quality:HD:+9", "votes:-5.000"]);
  });

  it("breaks score ties by sort title and then ident", () => {
    const tied = [
      candidate({ ident: "b", name: "Beta.2001.mkv", passwordProtected: false }),
      candidate({ ident: "z", name: "Alpha.2001.mkv", passwordProtected: false }),
      candidate({ ident: "a", name: "Alpha.2001.mkv", passwordProtected: false }),
    ];

    expect(rankResults([], tied).map((item) => item.result.ident)).toEqual(["a", "z", "b"]);
  });
});
