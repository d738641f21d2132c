import { z } from "zod";

import { CliAppError, type Logger } from "../../core/index.js";
import { DISCOVERY_LISTS } from "../metadata.js";
import { normalizeTitleKey } from "../request-normalization.js";
import type {
  ContentType,
  DiscoveryList,
  DiscoveryPage,
  DiscoveryRequest,
  EpisodeRecord,
  MetadataQuery,
  MetadataRecord,
  MetadataSource,
  MetadataSourceDescriptor,
  SeriesRecord,
} from "../types.js";
import { UpstreamClient } from "./upstream-client.js";

export const TMDB_BASE_URL = "https://api.themoviedb.org/3/";
const TMDB_IMAGE_BASE = "https://image.tmdb.org/t/p/";
const POSTER_SIZE = "w500";
const FANART_SIZE = "w780";
const FALLBACK_LANGUAGE = "en-US";

// Release-date lists are regional; the rest ignore the parameter.
const REGIONAL_LISTS = new Set<DiscoveryList>(["now_playing", "upcoming"]);

export interface TmdbSourceOptions {
  apiKey: string;
  baseUrl?: string;
  language?: string;
  region?: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const TMDB_DESCRIPTOR: MetadataSourceDescriptor = {
  id: "tmdb",
  name: "The Movie Database",
  kind: "api",
  capabilities: {
    lookup: true,
    genres: true,
    series: true,
    discovery: true,
    doctor: true,
  },
};

const searchCandidateSchema = z.object({
  id: z.number().int(),
  title: z.string().nullish(),
  name: z.string().nullish(),
  release_date: z.string().nullish(),
  first_air_date: z.string().nullish(),
});

const searchResponseSchema = z.object({
  results: z.array(searchCandidateSchema).default([]),
});

const genreSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
});

const detailsSchema = z.object({
  id: z.number().int(),
  title: z.string().nullish(),
  name: z.string().nullish(),
  original_title: z.string().nullish(),
  original_name: z.string().nullish(),
  overview: z.string().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  release_date: z.string().nullish(),
  first_air_date: z.string().nullish(),
  vote_average: z.number().nullish(),
  vote_count: z.number().int().nullish(),
  genres: z.array(genreSchema).nullish(),
});

const genreListSchema = z.object({
  genres: z.array(genreSchema).default([]),
});

const seriesDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  overview: z.string().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  first_air_date: z.string().nullish(),
  seasons: z
    .array(
      z.object({
        season_number: z.number().int(),
        episode_count: z.number().int().nullish(),
        name: z.string().nullish(),
        poster_path: z.string().nullish(),
        air_date: z.string().nullish(),
      }),
    )
    .default([]),
});

const seasonDetailsSchema = z.object({
  episodes: z
    .array(
      z.object({
        episode_number: z.number().int(),
        name: z.string().nullish(),
        overview: z.string().nullish(),
        still_path: z.string().nullish(),
        air_date: z.string().nullish(),
        runtime: z.number().int().nullish(),
        vote_average: z.number().nullish(),
      }),
    )
    .default([]),
});

const listItemSchema = z.object({
  id: z.number().int(),
  title: z.string().nullish(),
  name: z.string().nullish(),
  original_title: z.string().nullish(),
  original_name: z.string().nullish(),
  overview: z.string().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  release_date: z.string().nullish(),
  first_air_date: z.string().nullish(),
  vote_average: z.number().nullish(),
  vote_count: z.number().int().nullish(),
  genre_ids: z.array(z.number().int()).default([]),
});

const listResponseSchema = z.object({
  page: z.number().int().default(1),
  total_pages: z.number().int().default(0),
  results: z.array(listItemSchema).default([]),
});

type SearchCandidate = z.infer<typeof searchCandidateSchema>;
type Genre = z.infer<typeof genreSchema>;
type ListItem = z.infer<typeof listItemSchema>;

export function createTmdbSource(options: TmdbSourceOptions): MetadataSource {
  const language = options.language ?? "cs-CZ";
  const region = options.region !== undefined && options.region.length > 0 ? options.region : undefined;
  const logger = options.logger?.child({ component: "tmdb" });
  const genreCache = new Map<ContentType, Genre[]>();
  const client = new UpstreamClient({
    providerId: "tmdb",
    baseUrl: options.baseUrl ?? TMDB_BASE_URL,
    timeoutMs: options.timeoutMs,
    retries: options.retries,
    backoffMs: options.backoffMs,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep,
    logger,
  });

  async function get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params: Record<string, string | number | undefined> = {},
  ): Promise<z.infer<S>> {
    const payload = await client.requestJson({
      pathOrUrl: path,
      headers: { accept: "application/json" },
      query: { api_key: options.apiKey, language, ...params },
    });

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new CliAppError({
        code: "E_UPSTREAM_BAD_RESPONSE",
        message: `tmdb ${path} returned an unexpected payload`,
        details: {
          provider: "tmdb",
          path,
          issues: parsed.error.issues.map((issue) => issue.path.join(".")),
        },
      });
    }

    return parsed.data;
  }

  async function genresFor(contentType: ContentType): Promise<Genre[]> {
    const cached = genreCache.get(contentType);
    if (cached !== undefined) {
      return cached;
    }

    const response = await get(
      contentType === "movie" ? "genre/movie/list" : "genre/tv/list",
      genreListSchema,
    );
    if (response.genres.length > 0) {
      genreCache.set(contentType, response.genres);
    }
    return response.genres;
  }

  function toListRecord(item: ListItem, contentType: ContentType, genres: Genre[]): MetadataRecord {
    const title = item.title ?? item.name ?? "";
    const originalTitle = item.original_title ?? item.original_name ?? undefined;
    const media = contentType === "movie" ? "movie" : "tv";

    return {
      title,
      originalTitle: originalTitle === title ? undefined : originalTitle,
      overview: nonEmpty(item.overview),
      poster: buildImage(item.poster_path, POSTER_SIZE),
      fanart: buildImage(item.backdrop_path, FANART_SIZE),
      rating: item.vote_average ?? undefined,
      votes: item.vote_count ?? undefined,
      year: parseYear(item.release_date ?? item.first_air_date),
      genres: collectGenreNames(genres.filter((genre) => item.genre_ids.includes(genre.id))),
      provider: "tmdb",
      providerRef: String(item.id),
      url: `https://www.themoviedb.org/${media}/${item.id}`,
    };
  }

  return {
    descriptor: TMDB_DESCRIPTOR,

    async lookup(query: MetadataQuery): Promise<MetadataRecord | undefined> {
      if (query.title.trim().length === 0) {
        return undefined;
      }

      const isMovie = query.contentType === "movie";
      const search = await get(isMovie ? "search/movie" : "search/tv", searchResponseSchema, {
        query: query.title,
        include_adult: "false",
        region,
        year: isMovie ? query.year : undefined,
        first_air_date_year: isMovie ? undefined : query.year,
      });

      const candidate = pickBestCandidate(query, search.results);
      if (candidate === undefined) {
        logger?.debug({ title: query.title }, "no tmdb candidates");
        return undefined;
      }

      const details = await get(`${isMovie ? "movie" : "tv"}/${candidate.id}`, detailsSchema);
      const title = details.title ?? details.name ?? candidateTitle(candidate) ?? query.title;
      const originalTitle = details.original_title ?? details.original_name ?? undefined;

      return {
        title,
        originalTitle: originalTitle === title ? undefined : originalTitle,
        overview: nonEmpty(details.overview),
        poster: buildImage(details.poster_path, POSTER_SIZE),
        fanart: buildImage(details.backdrop_path, FANART_SIZE),
        rating: details.vote_average ?? undefined,
        votes: details.vote_count ?? undefined,
        year: parseYear(details.release_date ?? details.first_air_date),
        genres: collectGenreNames(details.genres ?? []),
        provider: "tmdb",
        providerRef: String(details.id),
        url: `https://www.themoviedb.org/${isMovie ? "movie" : "tv"}/${details.id}`,
      };
    },

    async listGenres(contentType: ContentType): Promise<string[]> {
      return collectGenreNames(await genresFor(contentType));
    },

    async searchSeries(title: string): Promise<SeriesRecord | undefined> {
      const query = title.trim();
      if (query.length === 0) {
        return undefined;
      }

      const params = { query, include_adult: "false", region };
      let search = await get("search/tv", searchResponseSchema, params);
      if (search.results.length === 0 && language !== FALLBACK_LANGUAGE) {
        logger?.debug({ title: query, language }, "no tmdb series, retrying in english");
        search = await get("search/tv", searchResponseSchema, { ...params, language: FALLBACK_LANGUAGE });
      }

      const [first] = search.results;
      if (first === undefined) {
        return undefined;
      }

      const details = await get(`tv/${first.id}`, seriesDetailsSchema);
      // Specials (season 0) only count when nothing else exists.
      const seasons =
        details.seasons.length > 1
          ? details.seasons.filter((season) => season.season_number !== 0)
          : details.seasons;

      return {
        title: details.name ?? first.name ?? query,
        overview: nonEmpty(details.overview),
        poster: buildImage(details.poster_path, POSTER_SIZE),
        fanart: buildImage(details.backdrop_path, FANART_SIZE),
        year: parseYear(details.first_air_date),
        seasons: seasons.map((season) => ({
          seasonNumber: season.season_number,
          episodeCount: season.episode_count ?? undefined,
          name: nonEmpty(season.name),
          poster: buildImage(season.poster_path, POSTER_SIZE),
          airDate: nonEmpty(season.air_date),
        })),
        provider: "tmdb",
        providerRef: String(details.id),
      };
    },

    async seasonEpisodes(providerRef: string, season: number): Promise<EpisodeRecord[]> {
      const details = await get(`tv/${encodeURIComponent(providerRef)}/season/${season}`, seasonDetailsSchema);

      return details.episodes.map((episode) => ({
        episodeNumber: episode.episode_number,
        name: nonEmpty(episode.name) ?? `Episode ${episode.episode_number}`,
        overview: nonEmpty(episode.overview),
        still: buildImage(episode.still_path, FANART_SIZE),
        airDate: nonEmpty(episode.air_date),
        runtime: episode.runtime ?? undefined,
        rating: episode.vote_average ?? undefined,
      }));
    },

    async discover(request: DiscoveryRequest): Promise<DiscoveryPage> {
      const { contentType, page } = request;
      const media = contentType === "movie" ? "movie" : "tv";
      const genres = await genresFor(contentType);

      let response: z.infer<typeof listResponseSchema>;
      if (request.genre !== undefined) {
        const wanted = normalizeTitleKey(request.genre);
        const genre = genres.find((item) => normalizeTitleKey(item.name ?? "") === wanted);
        if (genre === undefined) {
          logger?.debug({ genre: request.genre, contentType }, "unknown tmdb genre");
          return { items: [], page, totalPages: 0 };
        }

        response = await get(`discover/${media}`, listResponseSchema, {
          with_genres: genre.id,
          sort_by: "popularity.desc",
          page,
          region: contentType === "movie" ? region : undefined,
        });
      } else {
        const list = request.list ?? "popular";
        if (!DISCOVERY_LISTS[contentType].includes(list)) {
          throw new CliAppError({
            code: "E_ARG_INVALID",
            message: `List ${list} is not available for ${contentType}`,
            details: { allowed: DISCOVERY_LISTS[contentType] },
          });
        }

        response = await get(`${media}/${list}`, listResponseSchema, {
          page,
          region: REGIONAL_LISTS.has(list) ? region : undefined,
        });
      }

      return {
        items: response.results
          .map((item) => toListRecord(item, contentType, genres))
          .filter((item) => item.title.trim().length > 0),
        page: response.page,
        totalPages: response.total_pages,
      };
    },

    async doctor() {
      try {
        const response = await get("genre/movie/list", genreListSchema);
        return {
          ok: true,
          message: "TMDb API is reachable.",
          details: {
            provider: "tmdb",
            genres: response.genres.length,
          },
        };
      } catch (error) {
        const appError = error instanceof CliAppError ? error : undefined;
        return {
          ok: false,
          message: `TMDb check failed: ${error instanceof Error ? error.message : String(error)}`,
          details: {
            provider: "tmdb",
            code: appError?.code ?? "E_UNKNOWN",
          },
        };
      }
    },
  };
}

/** Exact normalized title +80, containment +50; year within one +30, otherwise -20. */
export function scoreCandidate(query: MetadataQuery, title: string, year: number | undefined): number {
  const wanted = normalizeTitleKey(query.title);
  const found = normalizeTitleKey(title);
  let score = 0;

  if (wanted.length > 0 && wanted === found) {
    score += 80;
  } else if (wanted.length > 0 && found.length > 0 && (found.includes(wanted) || wanted.includes(found))) {
    score += 50;
  }

  if (query.year !== undefined && year !== undefined) {
    score += Math.abs(query.year - year) <= 1 ? 30 : -20;
  }

  return score;
}

function pickBestCandidate(
  query: MetadataQuery,
  candidates: SearchCandidate[],
): SearchCandidate | undefined {
  let best: { candidate: SearchCandidate; score: number } | undefined;

  for (const candidate of candidates) {
    const score = scoreCandidate(
      query,
      candidateTitle(candidate) ?? "",
      parseYear(candidate.release_date ?? candidate.first_air_date),
    );
    // Ties keep the earlier (more popular) result.
    if (best === undefined || score > best.score) {
      best = { candidate, score };
    }
  }

  return best?.candidate;
}

function candidateTitle(candidate: SearchCandidate): string | undefined {
  return candidate.title ?? candidate.name ?? undefined;
}

function collectGenreNames(genres: Genre[]): string[] {
  const names: string[] = [];
  for (const genre of genres) {
    const name = genre.name?.trim();
    if (name !== undefined && name.length > 0 && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function buildImage(path: string | null | undefined, size: string): string | undefined {
  if (path === null || path === undefined || path.length === 0) {
    return undefined;
  }

  return `${TMDB_IMAGE_BASE}${size}${path}`;
}

export function parseYear(value: string | null | undefined): number | undefined {
  const match = value === null || value === undefined ? null : /^(\d{4})/u.exec(value);
  return match?.[1] === undefined ? undefined : Number.parseInt(match[1], 10);
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed.length === 0 ? undefined : trimmed;
}
