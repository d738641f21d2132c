import type { Logger } from "../../core/index.js";
import type {
  MetadataQuery,
  MetadataRecord,
  MetadataSource,
  MetadataSourceDescriptor,
} from "../types.js";
import { parseCsfdDetailPage, parseCsfdSearchPage } from "./csfd-parser.js";
import { looksLikeAntiBotChallenge, UpstreamClient } from "./upstream-client.js";

export const CSFD_BASE_URL = "https://www.csfd.cz/";

export interface CsfdSourceOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const CSFD_DESCRIPTOR: MetadataSourceDescriptor = {
  id: "csfd",
  name: "ČSFD",
  kind: "scrape",
  capabilities: {
    lookup: true,
    genres: false,
    series: false,
    discovery: false,
    doctor: true,
  },
};

const HTML_HEADERS = {
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "cs,en-US;q=0.7,en;q=0.3",
};

export function createCsfdSource(options: CsfdSourceOptions = {}): MetadataSource {
  const baseUrl = options.baseUrl ?? CSFD_BASE_URL;
  const logger = options.logger?.child({ component: "csfd" });
  const client = new UpstreamClient({
    providerId: "csfd",
    baseUrl,
    timeoutMs: options.timeoutMs,
    retries: options.retries,
    backoffMs: options.backoffMs,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep,
    userAgent: options.userAgent,
    logger,
  });

  return {
    descriptor: CSFD_DESCRIPTOR,

    async lookup(query: MetadataQuery): Promise<MetadataRecord | undefined> {
      if (query.title.trim().length === 0) {
        return undefined;
      }

      const searchHtml = await client.requestText({
        pathOrUrl: "hledat/",
        headers: HTML_HEADERS,
        query: { q: query.title },
      });

      const hit = parseCsfdSearchPage(searchHtml, query.contentType);
      if (hit === undefined) {
        logger?.debug({ title: query.title }, "no csfd search hit");
        return undefined;
      }

      const detailHtml = await client.requestText({ pathOrUrl: hit.href, headers: HTML_HEADERS });
      const detail = parseCsfdDetailPage(detailHtml);
      const poster = detail.poster ?? hit.poster;

      return {
        title: detail.title ?? hit.title,
        overview: detail.plot ?? detail.description,
        poster,
        fanart: poster,
        rating: detail.rating,
        votes: detail.votes,
        year: detail.year ?? hit.year,
        genres: detail.genres.length > 0 ? detail.genres : hit.genres,
        provider: "csfd",
        providerRef: hit.href,
        url: new URL(hit.href, baseUrl).toString(),
      };
    },

    async doctor() {
      try {
        const html = await client.requestText({ pathOrUrl: "/", headers: HTML_HEADERS });

        if (looksLikeAntiBotChallenge(html)) {
          return {
            ok: false,
            message: "ČSFD reachable, but anti-bot challenge is active.",
            details: {
              provider: "csfd",
              baseUrl,
              classification: "anti-bot",
            },
          };
        }

        return {
          ok: true,
          message: "ČSFD is reachable.",
          details: {
            provider: "csfd",
            baseUrl,
          },
        };
      } catch (error) {
        return {
          ok: false,
          message: `ČSFD check failed: ${error instanceof Error ? error.message : String(error)}`,
          details: {
            provider: "csfd",
            baseUrl,
          },
        };
      }
    },
  };
}
