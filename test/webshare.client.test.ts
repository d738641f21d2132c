import { describe, expect, it } from "vitest";

import { hashWebsharePassword } from "../src/domain/providers/md5crypt.js";
import { WebshareClient } from "../src/domain/providers/webshare.js";

type FetchImpl = typeof fetch;

interface RecordedCall {
  endpoint: string;
  form: URLSearchParams;
}

function xml(body: string): Response {
  return new Response(`<?xml version="1.0" encoding="UTF-8"?><response>${body}</response>`, {
    status: 200,
    headers: { "content-type": "text/xml; charset=UTF-8" },
  });
}

function createWebshareStub(
  handler: (endpoint: string, form: URLSearchParams) => Response | Promise<Response>,
): { fetchImpl: FetchImpl; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchImpl = async (input, init) => {
    const request = new Request(input, init);
    const endpoint = new URL(request.url).pathname.replace(/^\/api/u, "");
    const form = new URLSearchParams(await request.text());
    calls.push({ endpoint, form });
    return handler(endpoint, form);
  };

  return { fetchImpl, calls };
}

const BASE_URL = "https://webshare.test/api/";

describe("Webshare client session", () => {
  it("falls back to the plain password when the salted hash is rejected", async () => {
    const { fetchImpl, calls } = createWebshareStub((endpoint, form) => {
      if (endpoint === "/salt/") {
        return xml("<status>OK</status><salt>abcdefgh</salt>");
      }
      if (endpoint === "/login/" && form.get("password") === "test-secret") {
        return xml("<status>OK</status><token>token-plain</token>");
      }
      return xml(
        "<status>FATAL</status><code>LOGIN_FATAL_1</code><message>Bad credentials</message>",
      );
    });

    const client = new WebshareClient({
      baseUrl: BASE_URL,
      username: "tester",
      password: "test-secret",
      fetchImpl,
    });

    await expect(client.login()).resolves.toBe("token-plain");
    expect(client.token).toBe("token-plain");
    expect(calls.map((call) => call.endpoint)).toEqual(["/salt/", "/login/", "/login/"]);
    expect(calls[1]?.form.get("password")).toBe(hashWebsharePassword("test-secret", "abcdefgh"));
    expect(calls[1]?.form.get("keep_logged_in")).toBe("1");
    expect(calls[2]?.form.get("username_or_email")).toBe("tester");
  });

  it("raises E_AUTH_INVALID when every login attempt is rejected", async () => {
    const { fetchImpl } = createWebshareStub((endpoint) =>
      endpoint === "/salt/"
        ? xml("<status>OK</status><salt>abcdefgh</salt>")
        : xml("<status>FATAL</status><code>LOGIN_FATAL_1</code><message>Bad credentials</message>"),
    );

    const client = new WebshareClient({
      baseUrl: BASE_URL,
      username: "tester",
      password: "wrong-secret",
      fetchImpl,
    });

    await expect(client.login()).rejects.toMatchObject({
      code: "E_AUTH_INVALID",
      message: "webshare /login/: Bad credentials",
    });
    expect(client.token).toBeUndefined();
  });

  it("requires credentials before contacting the service", async () => {
    const { fetchImpl, calls } = createWebshareStub(() => xml("<status>OK</status>"));
    const client = new WebshareClient({ baseUrl: BASE_URL, fetchImpl });

    await expect(client.login()).rejects.toMatchObject({ code: "E_AUTH_REQUIRED" });
    expect(calls).toEqual([]);
  });

  it("re-verifies a held token only after the check interval", async () => {
    let now = 1_000;
    const { fetchImpl, calls } = createWebshareStub((endpoint) =>
      endpoint === "/file_link/"
        ? xml("<status>OK</status><link>https://cdn.webshare.test/stream/abc</link>")
        : xml("<status>OK</status><username>tester</username>"),
    );

    const client = new WebshareClient({
      baseUrl: BASE_URL,
      token: "token-held",
      fetchImpl,
      clock: () => now,
    });

    await client.fileLink("abc");
    now += 60_000;
    await client.fileLink("abc");
    now += 10 * 60 * 1000;
    await expect(client.fileLink("abc")).resolves.toBe("https://cdn.webshare.test/stream/abc");

    expect(calls.map((call) => call.endpoint)).toEqual([
      "/user_data/",
      "/file_link/",
      "/file_link/",
      "/user_data/",
      "/file_link/",
    ]);
    expect(calls[1]?.form.get("wst")).toBe("token-held");
    expect(calls[1]?.form.get("download_type")).toBe("video_stream");
    expect(calls[1]?.form.get("force_https")).toBe("1");
  });

  it("logs in again when the held token has expired", async () => {
    const { fetchImpl, calls } = createWebshareStub((endpoint) => {
      switch (endpoint) {
        case "/user_data/":
          return xml(
            "<status>FATAL</status><code>USER_DATA_FATAL_1</code><message>Not logged in</message>",
          );
        case "/salt/":
          return xml("<status>OK</status><salt>abcdefgh</salt>");
        case "/login/":
          return xml("<status>OK</status><token>token-fresh</token>");
        default:
          return xml("<status>OK</status><link>https://cdn.webshare.test/stream/xyz</link>");
      }
    });

    const client = new WebshareClient({
      baseUrl: BASE_URL,
      username: "tester",
      password: "test-secret",
      token: "token-stale",
      fetchImpl,
    });

    await expect(client.fileLink("xyz")).resolves.toBe("https://cdn.webshare.test/stream/xyz");
    expect(calls.map((call) => call.endpoint)).toEqual([
      "/user_data/",
      "/salt/",
      "/login/",
      "/file_link/",
    ]);
    expect(calls[3]?.form.get("wst")).toBe("token-fresh");
  });

  it("reports an expired session when no credentials are configured", async () => {
    const { fetchImpl } = createWebshareStub(() =>
      xml("<status>FATAL</status><code>USER_DATA_FATAL_1</code><message>Not logged in</message>"),
    );
    const client = new WebshareClient({ baseUrl: BASE_URL, token: "token-stale", fetchImpl });

    await expect(client.fileLink("xyz")).rejects.toMatchObject({
      code: "E_AUTH_INVALID",
      message: "Webshare session expired",
    });
    expect(client.token).toBeUndefined();
  });

  it("clears the token even when the logout request fails", async () => {
    const client = new WebshareClient({
      baseUrl: BASE_URL,
      token: "token-held",
      retries: 0,
      fetchImpl: async () => {
        throw new TypeError("network down");
      },
    });

    await expect(client.logout()).resolves.toBeUndefined();
    expect(client.token).toBeUndefined();
  });
});

describe("Webshare client search and links", () => {
  it("normalizes a single <file> element into one result", async () => {
    const { fetchImpl, calls } = createWebshareStub(() =>
      xml(
        [
          "<status>OK</status>",
          "<total>1</total>",
          "<file>",
          "<ident>id1</ident>",
          "<name>Matrix.1999.1080p.CZ.mkv</name>",
          "<type>mkv</type>",
          "<img></img>",
          "<size>2147483648</size>",
          "<positive_votes>12</positive_votes>",
          "<negative_votes>1</negative_votes>",
          "<password>0</password>",
          "</file>",
        ].join(""),
      ),
    );
    const client = new WebshareClient({ baseUrl: BASE_URL, fetchImpl });

    const page = await client.search({ what: "matrix", limit: 500, offset: -3 });

    expect(page).toEqual({
      total: 1,
      files: [
        {
          ident: "id1",
          name: "Matrix.1999.1080p.CZ.mkv",
          size: 2147483648,
          extension: "mkv",
          previewImage: undefined,
          positiveVotes: 12,
          negativeVotes: 1,
          passwordProtected: false,
        },
      ],
    });
    expect(calls[0]?.endpoint).toBe("/search/");
    expect(calls[0]?.form.get("limit")).toBe("100");
    expect(calls[0]?.form.get("offset")).toBe("0");
    expect(calls[0]?.form.get("category")).toBe("video");
    expect(calls[0]?.form.has("wst")).toBe(false);
  });

  it("falls back to the file count when total is missing", async () => {
    const { fetchImpl } = createWebshareStub(() =>
      xml(
        "<status>OK</status><file><ident>a</ident><name>A.mkv</name></file><file><ident>b</ident><name>B.mkv</name></file><file><name>no ident</name></file>",
      ),
    );
    const client = new WebshareClient({ baseUrl: BASE_URL, fetchImpl });

    const page = await client.search({ what: "x" });

    expect(page.total).toBe(2);
    expect(page.files.map((file) => file.ident)).toEqual(["a", "b"]);
  });

  it("returns file details as a flat field map", async () => {
    const { fetchImpl, calls } = createWebshareStub((endpoint) =>
      endpoint === "/file_info/"
        ? xml(
            "<status>OK</status><name>Matrix.1999.1080p.mkv</name><size>4294967296</size><type>mkv</type>",
          )
        : xml("<status>OK</status>"),
    );
    const client = new WebshareClient({ baseUrl: BASE_URL, token: "token-held", fetchImpl });

    await expect(client.fileInfo("abc")).resolves.toEqual({
      name: "Matrix.1999.1080p.mkv",
      size: "4294967296",
      type: "mkv",
    });
    expect(calls.at(-1)?.form.get("ident")).toBe("abc");
  });

  it("fails when file_link carries no link", async () => {
    const { fetchImpl } = createWebshareStub(() => xml("<status>OK</status>"));
    const client = new WebshareClient({ baseUrl: BASE_URL, token: "token-held", fetchImpl, clock: () => 0 });

    await expect(client.fileLink("abc")).rejects.toMatchObject({
      code: "E_UPSTREAM_BAD_RESPONSE",
      message: "webshare did not return a playback link",
      details: { provider: "webshare", ident: "abc" },
    });
  });

  it("rejects responses that are not XML", async () => {
    const { fetchImpl } = createWebshareStub(
      () => new Response("service unavailable", { status: 200 }),
    );
    const client = new WebshareClient({ baseUrl: BASE_URL, fetchImpl });

    await expect(client.search({ what: "x" })).rejects.toMatchObject({
      code: "E_UPSTREAM_BAD_RESPONSE",
      message: "webshare returned malformed XML",
    });
  });
});
