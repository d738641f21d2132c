import { describe, expect, it } from "vitest";

import { createSilentLogger, parseAddonConfig } from "../src/core/index.js";
import {
  decodeRequest,
  encodeRequest,
  routeRequest,
  type AddonRequest,
} from "../src/domain/router.js";
import { AddonSession } from "../src/domain/session.js";

type FetchImpl = typeof fetch;

function xml(body: string): Response {
  return new Response(`<?xml version="1.0" encoding="UTF-8"?><response>${body}</response>`, {
    status: 200,
  });
}

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

const SEARCH_XML = [
  "<status>OK</status>",
  "<total>2</total>",
  "<file><ident>hd1</ident><name>Matrix.1999.1080p.mkv</name><size>4294967296</size></file>",
  "<file><ident>sd1</ident><name>Matrix.1999.DVDRip.mkv</name><size>2147483648</size></file>",
].join("");

function createSession(): { session: AddonSession; endpoints: string[] } {
  const endpoints: string[] = [];
  const fetchImpl: FetchImpl = async (input, init) => {
    const endpoint = new URL(new Request(input, init).url).pathname.replace(/^\/api/u, "");
    endpoints.push(endpoint);
    switch (endpoint) {
      case "/search/":
        return xml(SEARCH_XML);
      case "/salt/":
        return xml("<status>OK</status><salt>abcdefgh</salt>");
      case "/login/":
        return xml("<status>OK</status><token>token-fresh</token>");
      case "/file_link/":
        return xml("<status>OK</status><link>https://cdn.webshare.test/hd1</link>");
      default:
        return xml("<status>OK</status>");
    }
  };

  const config = parseAddonConfig({
    webshare: {
      username: "tester",
      password: "test-secret",
      token: "token-held",
      baseUrl: "https://webshare.test/api/",
    },
    metadata: { provider: "none" },
    filters: { quality: "hd" },
  });

  return {
    session: new AddonSession({ config, fetchImpl, logger: createSilentLogger() }),
    endpoints,
  };
}

describe("plugin URL encoding", () => {
  it("round-trips a filtered search request", () => {
    const request: AddonRequest = {
      action: "search",
      scope: "movie",
      query: "Matrix",
      filters: { minQuality: "HD", audioLanguages: ["CZ"], requireSubtitles: true },
      page: 2,
    };

    const encoded = encodeRequest(request);

    expect(encoded).toBe("?action=search&scope=movie&query=Matrix&quality=hd&audio=cz&subtitles=1&page=2");
    expect(decodeRequest(encoded)).toEqual(request);
  });

  it("encodes cleared defaults as any", () => {
    const encoded = encodeRequest({
      action: "browse",
      scope: "series",
      filters: { minQuality: "unknown", audioLanguages: [], letter: "0-9" },
    });

    expect(encoded).toBe("?action=browse&scope=series&quality=any&audio=any&letter=0-9");
    expect(decodeRequest(encoded)).toEqual({
      action: "browse",
      scope: "series",
      filters: { minQuality: "unknown", audioLanguages: [], letter: "0-9" },
    });
  });

  it("accepts full plugin URLs and scope aliases", () => {
    expect(decodeRequest("plugin://tvstream/?action=play&ident=abc")).toEqual({
      action: "play",
      ident: "abc",
    });
    expect(decodeRequest("?action=genres&scope=tvshow")).toEqual({ action: "genres", scope: "series" });
  });

  it("rejects malformed requests", () => {
    expect(captureError(() => decodeRequest("?action=search&scope=movie"))).toMatchObject({
      code: "E_ARG_MISSING",
    });
    expect(captureError(() => decodeRequest("?action=rewind"))).toMatchObject({
      code: "E_ARG_INVALID",
      message: "Unknown action: rewind",
    });
    expect(
      captureError(() => decodeRequest("?action=search&scope=movie&query=x&audio=de")),
    ).toMatchObject({ code: "E_ARG_INVALID" });
    expect(captureError(() => decodeRequest("?action=browse&scope=movie&page=0"))).toMatchObject({
      code: "E_ARG_INVALID",
    });
  });
});

describe("series and discovery requests", () => {
  it("round-trips discovery and episode requests", () => {
    const discover: AddonRequest = { action: "discover", scope: "series", list: "on_the_air", page: 2 };
    const episodes: AddonRequest = {
      action: "episodes",
      title: "Dark",
      season: 2,
      filters: { minQuality: "UHD", audioLanguages: ["CZ"] },
    };

    expect(encodeRequest(discover)).toBe("?action=discover&scope=series&list=on_the_air&page=2");
    expect(decodeRequest(encodeRequest(discover))).toEqual(discover);
    expect(encodeRequest({ action: "seasons", title: "Hra o trůny" })).toBe(
      "?action=seasons&title=Hra+o+tr%C5%AFny",
    );
    expect(decodeRequest(encodeRequest(episodes))).toEqual(episodes);
  });

  it("normalizes list names and keeps genre discovery", () => {
    expect(decodeRequest("?action=discover&scope=movie&list=Top-Rated")).toEqual({
      action: "discover",
      scope: "movie",
      list: "top_rated",
    });
    expect(decodeRequest("?action=discover&scope=tvshow&genre=Drama")).toEqual({
      action: "discover",
      scope: "series",
      genre: "Drama",
    });
  });

  it("rejects malformed series and discovery requests", () => {
    expect(captureError(() => decodeRequest("?action=discover&scope=movie&list=popular&genre=Drama"))).toMatchObject({
      code: "E_ARG_CONFLICT",
      message: "discover takes either a list or a genre",
    });
    expect(captureError(() => decodeRequest("?action=discover&scope=series&list=upcoming"))).toMatchObject({
      code: "E_ARG_INVALID",
      message: "Unknown series list: upcoming",
    });
    expect(captureError(() => decodeRequest("?action=seasons&title=%20"))).toMatchObject({
      code: "E_ARG_MISSING",
      message: "seasons requires a series title",
    });
    expect(captureError(() => decodeRequest("?action=episodes&title=Dark"))).toMatchObject({
      code: "E_ARG_MISSING",
      message: "episodes requires a season",
    });
    expect(captureError(() => decodeRequest("?action=episodes&title=Dark&season=two"))).toMatchObject({
      code: "E_ARG_INVALID",
      message: "season must be a whole number",
    });
  });

  it("falls back to season 1 when no filenames match the series", async () => {
    const { session, endpoints } = createSession();

    await expect(routeRequest(session, { action: "seasons", title: "Dark" })).resolves.toEqual({
      action: "seasons",
      result: { title: "Dark", source: "search", seasons: [{ seasonNumber: 1 }] },
    });
    expect(endpoints).toEqual(["/search/", "/search/", "/search/"]);
  });

  it("defaults discovery to the popular list", async () => {
    const { session, endpoints } = createSession();

    await expect(routeRequest(session, { action: "discover", scope: "movie" })).resolves.toEqual({
      action: "discover",
      scope: "movie",
      list: "popular",
      result: { items: [], page: 1, totalPages: 0 },
    });
    expect(endpoints).toEqual([]);
  });
});

describe("request dispatch", () => {
  it("applies configured default filters to searches", async () => {
    const { session } = createSession();

    const response = await routeRequest(session, { action: "search", scope: "movie", query: "Matrix" });

    expect(response.action).toBe("search");
    if (response.action === "search") {
      expect(response.result.items.map((item) => item.result.ident)).toEqual(["hd1"]);
    }
  });

  it("lets a request clear the configured quality", async () => {
    const { session } = createSession();

    const response = await routeRequest(session, {
      action: "browse",
      scope: "movie",
      query: "Matrix",
      filters: { minQuality: "unknown" },
    });

    if (response.action !== "browse") {
      throw new Error(`unexpected action ${response.action}`);
    }
    expect(response.result.items.map((item) => item.result.ident)).toEqual(["hd1", "sd1"]);
  });

  it("resolves a playback link through the session", async () => {
    const { session, endpoints } = createSession();

    await expect(routeRequest(session, { action: "play", ident: "hd1" })).resolves.toEqual({
      action: "play",
      stream: { ident: "hd1", url: "https://cdn.webshare.test/hd1" },
    });
    expect(endpoints).toEqual(["/user_data/", "/file_link/"]);
  });

  it("logs in afresh and logs out", async () => {
    const { session, endpoints } = createSession();

    await expect(routeRequest(session, { action: "login" })).resolves.toEqual({
      action: "login",
      loggedIn: true,
      token: "token-fresh",
    });
    await expect(routeRequest(session, { action: "logout" })).resolves.toEqual({
      action: "logout",
      loggedIn: false,
    });
    expect(endpoints).toEqual(["/salt/", "/login/", "/logout/"]);
    expect(session.webshare.token).toBeUndefined();
  });

  it("reports no providers and no genres when metadata is disabled", async () => {
    const { session } = createSession();

    await expect(routeRequest(session, { action: "providers" })).resolves.toEqual({
      action: "providers",
      providers: [],
    });
    await expect(routeRequest(session, { action: "genres", scope: "movie" })).resolves.toEqual({
      action: "genres",
      scope: "movie",
      genres: [],
    });
  });

  it("merges request filters over configuration defaults", () => {
    const { session } = createSession();

    expect(session.defaultFilters({ audioLanguages: ["EN"], letter: "m" })).toEqual({
      minQuality: "HD",
      audioLanguages: ["EN"],
      requireSubtitles: undefined,
      subtitleLanguages: undefined,
      genre: undefined,
      letter: "m",
    });
  });
});
