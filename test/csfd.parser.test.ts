import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { createCsfdSource } from "../src/domain/providers/csfd.js";
import { parseCsfdDetailPage, parseCsfdSearchPage } from "../src/domain/providers/csfd-parser.js";

async function readFixture(name: string): Promise<string> {
  return readFile(fileURLToPath(new URL(`./fixtures/csfd/${name}`, import.meta.url)), "utf8");
}

describe("ČSFD parser", () => {
  it("reads the first film hit from the search page", async () => {
    const html = await readFixture("search.html");

    expect(parseCsfdSearchPage(html, "movie")).toEqual({
      title: "Matrix",
      href: "/film/9499-matrix/",
      year: 1999,
      poster: "https://image.pmgstatic.com/files/images/film/posters/matrix.jpg",
      genres: ["Sci-Fi", "Akční"],
    });
  });

  it("reads the series section for series lookups", async () => {
    const html = await readFixture("search.html");

    expect(parseCsfdSearchPage(html, "series")).toEqual({
      title: "Matrix seriál",
      href: "/film/1234-matrix-serial/",
      year: 2005,
      poster: undefined,
      genres: ["Animovaný"],
    });
  });

  it("returns undefined when the section is absent", () => {
    expect(parseCsfdSearchPage("<html><body><p>Nic nenalezeno</p></body></html>", "movie")).toBeUndefined();
  });

  it("prefers JSON-LD fields on the detail page", async () => {
    const html = await readFixture("detail.html");

    expect(parseCsfdDetailPage(html)).toEqual({
      title: "Matrix",
      description: "Thomas Anderson vede dvojí život.",
      plot: "Thomas Anderson vede dvojí život: ve dne programátor, v noci hacker Neo.",
      year: 1999,
      rating: 9,
      votes: 61234,
      poster: "https://image.pmgstatic.com/files/images/film/posters/matrix-detail.jpg",
      origin: "USA, 1999, 136 min",
      genres: ["Akční", "Sci-Fi"],
    });
  });

  it("falls back to the rating badge and origin line", async () => {
    const html = await readFixture("detail-without-jsonld.html");
    const detail = parseCsfdDetailPage(html);

    expect(detail.title).toBeUndefined();
    expect(detail.rating).toBe(9.1);
    expect(detail.year).toBe(1999);
    expect(detail.votes).toBeUndefined();
    expect(detail.genres).toEqual(["Komedie", "Drama"]);
  });
});

describe("ČSFD metadata source", () => {
  it("follows the first hit to its detail page", async () => {
    const searchHtml = await readFixture("search.html");
    const detailHtml = await readFixture("detail.html");
    const requested: string[] = [];

    const source = createCsfdSource({
      baseUrl: "https://csfd.test/",
      fetchImpl: async (input, init) => {
        const url = new URL(new Request(input, init).url);
        requested.push(`${url.pathname}${url.search}`);
        return new Response(url.pathname === "/hledat/" ? searchHtml : detailHtml, { status: 200 });
      },
    });

    const record = await source.lookup({ title: "Matrix", contentType: "movie", year: 1999 });

    expect(requested).toEqual(["/hledat/?q=Matrix", "/film/9499-matrix/"]);
    expect(record).toEqual({
      title: "Matrix",
      overview: "Thomas Anderson vede dvojí život: ve dne programátor, v noci hacker Neo.",
      poster: "https://image.pmgstatic.com/files/images/film/posters/matrix-detail.jpg",
      fanart: "https://image.pmgstatic.com/files/images/film/posters/matrix-detail.jpg",
      rating: 9,
      votes: 61234,
      year: 1999,
      genres: ["Akční", "Sci-Fi"],
      provider: "csfd",
      providerRef: "/film/9499-matrix/",
      url: "https://csfd.test/film/9499-matrix/",
    });
  });

  it("reports an active anti-bot challenge from the health check", async () => {
    const source = createCsfdSource({
      baseUrl: "https://csfd.test/",
      fetchImpl: async () =>
        new Response("<html><title>Just a moment...</title></html>", { status: 200 }),
    });

    await expect(source.doctor?.()).resolves.toMatchObject({
      ok: false,
      details: { classification: "anti-bot" },
    });
  });
});
