import { CliAppError } from "../core/index.js";
import type { CataloguePage, SeasonEpisodes, SeriesSeasons } from "./catalogue.js";
import { isValidLetter } from "./filters.js";
import { DISCOVERY_LISTS } from "./metadata.js";
import { listMetadataSources } from "./providers.js";
import { normalizeLanguage, normalizeLanguages } from "./request-normalization.js";
import type { AddonSession } from "./session.js";
import type {
  ContentType,
  DiscoveryList,
  DiscoveryPage,
  FilterCriteria,
  LanguageTag,
  MetadataSourceDescriptor,
  QualityTier,
  StreamLink,
} from "./types.js";

interface ListingRequest {
  scope: ContentType;
  filters?: FilterCriteria;
  sort?: string;
  page?: number;
  pageSize?: number;
}

export type AddonRequest =
  | ({ action: "search"; query: string } & ListingRequest)
  | ({ action: "browse"; query?: string } & ListingRequest)
  | { action: "genres"; scope: ContentType }
  | { action: "discover"; scope: ContentType; list?: DiscoveryList; genre?: string; page?: number }
  | { action: "seasons"; title: string }
  | { action: "episodes"; title: string; season: number; filters?: FilterCriteria }
  | { action: "play"; ident: string }
  | { action: "login" }
  | { action: "logout" }
  | { action: "providers" };

export type AddonAction = AddonRequest["action"];

export type AddonResponse =
  | { action: "search" | "browse"; scope: ContentType; query: string; result: CataloguePage }
  | { action: "genres"; scope: ContentType; genres: string[] }
  | {
      action: "discover";
      scope: ContentType;
      list?: DiscoveryList;
      genre?: string;
      result: DiscoveryPage;
    }
  | { action: "seasons"; result: SeriesSeasons }
  | { action: "episodes"; result: SeasonEpisodes }
  | { action: "play"; stream: StreamLink }
  | { action: "login"; loggedIn: true; token: string }
  | { action: "logout"; loggedIn: false }
  | { action: "providers"; providers: MetadataSourceDescriptor[] };

export const ADDON_ACTIONS: readonly AddonAction[] = [
  "search",
  "browse",
  "genres",
  "discover",
  "seasons",
  "episodes",
  "play",
  "login",
  "logout",
  "providers",
];

const QUALITY_PARAM: Record<Exclude<QualityTier, "unknown">, string> = {
  CAM: "cam",
  SD: "sd",
  HD: "hd",
  UHD: "uhd",
};

// "any" clears a configured default.
const QUALITY_BY_PARAM = new Map<string, QualityTier>([
  ["any", "unknown"],
  ["cam", "CAM"],
  ["sd", "SD"],
  ["hd", "HD"],
  ["uhd", "UHD"],
]);

/** Single dispatch point from a decoded request to the session. */
export async function routeRequest(
  session: AddonSession,
  request: AddonRequest,
): Promise<AddonResponse> {
  session.logger?.debug({ action: request.action }, "routing request");

  switch (request.action) {
    case "search":
    case "browse": {
      const query = request.query ?? "";
      const result = await session.catalogue.resolve({
        query,
        scope: request.scope,
        filters: session.defaultFilters(request.filters),
        sort: request.sort,
        page: request.page,
        pageSize: request.pageSize,
      });
      return { action: request.action, scope: request.scope, query, result };
    }
    case "genres":
      return {
        action: "genres",
        scope: request.scope,
        genres: await session.catalogue.genres(request.scope),
      };
    case "discover": {
      const list = request.genre === undefined ? (request.list ?? "popular") : undefined;
      const result = await session.catalogue.discover({
        contentType: request.scope,
        list,
        genre: request.genre,
        page: request.page ?? 1,
      });
      return {
        action: "discover",
        scope: request.scope,
        ...(list === undefined ? {} : { list }),
        ...(request.genre === undefined ? {} : { genre: request.genre }),
        result,
      };
    }
    case "seasons":
      return { action: "seasons", result: await session.catalogue.seasons(request.title) };
    case "episodes":
      return {
        action: "episodes",
        result: await session.catalogue.episodes(
          request.title,
          request.season,
          session.defaultFilters(request.filters),
        ),
      };
    case "play":
      return { action: "play", stream: await session.catalogue.resolveStream(request.ident) };
    case "login": {
      session.webshare.setToken(undefined);
      const token = await session.webshare.login();
      return { action: "login", loggedIn: true, token };
    }
    case "logout":
      await session.close();
      return { action: "logout", loggedIn: false };
    case "providers":
      return { action: "providers", providers: listMetadataSources(session.sources) };
  }
}

/** Plugin URL query string (`?action=…`) for a request. */
export function encodeRequest(request: AddonRequest): string {
  const params = new URLSearchParams();
  params.set("action", request.action);

  switch (request.action) {
    case "search":
    case "browse":
      params.set("scope", request.scope);
      if (request.query !== undefined && request.query.length > 0) {
        params.set("query", request.query);
      }
      appendFilters(params, request.filters);
      setIfPresent(params, "sort", request.sort);
      setIfPresent(params, "page", request.page);
      setIfPresent(params, "page_size", request.pageSize);
      break;
    case "genres":
      params.set("scope", request.scope);
      break;
    case "discover":
      params.set("scope", request.scope);
      setIfPresent(params, "list", request.list);
      setIfPresent(params, "genre", request.genre);
      setIfPresent(params, "page", request.page);
      break;
    case "seasons":
      params.set("title", request.title);
      break;
    case "episodes":
      params.set("title", request.title);
      params.set("season", String(request.season));
      appendFilters(params, request.filters);
      break;
    case "play":
      params.set("ident", request.ident);
      break;
    case "login":
    case "logout":
    case "providers":
      break;
  }

  return `?${params.toString()}`;
}

export function decodeRequest(input: string | URLSearchParams): AddonRequest {
  const params =
    typeof input === "string" ? new URLSearchParams(input.replace(/^[^?]*\?/u, "")) : input;
  const action = params.get("action") ?? "";

  switch (action) {
    case "search": {
      const query = params.get("query")?.trim() ?? "";
      if (query.length === 0) {
        throw new CliAppError({
          code: "E_ARG_MISSING",
          message: "search requires a non-empty query",
          details: { param: "query" },
        });
      }
      return { action: "search", query, ...decodeListing(params) };
    }
    case "browse": {
      const query = params.get("query")?.trim();
      return {
        action: "browse",
        ...(query === undefined || query.length === 0 ? {} : { query }),
        ...decodeListing(params),
      };
    }
    case "genres":
      return { action: "genres", scope: decodeScope(params.get("scope")) };
    case "discover":
      return decodeDiscover(params);
    case "seasons":
      return { action: "seasons", title: requireTitle(params) };
    case "episodes": {
      const title = requireTitle(params);
      const season = params.get("season");
      if (season === null || season.trim().length === 0) {
        throw new CliAppError({
          code: "E_ARG_MISSING",
          message: "episodes requires a season",
          details: { param: "season" },
        });
      }
      const filters = decodeFilters(params);
      return {
        action: "episodes",
        title,
        season: decodeSeason(season),
        ...(Object.keys(filters).length > 0 ? { filters } : {}),
      };
    }
    case "play": {
      const ident = params.get("ident")?.trim() ?? "";
      if (ident.length === 0) {
        throw new CliAppError({
          code: "E_ARG_MISSING",
          message: "play requires an ident",
          details: { param: "ident" },
        });
      }
      return { action: "play", ident };
    }
    case "login":
      return { action: "login" };
    case "logout":
      return { action: "logout" };
    case "providers":
      return { action: "providers" };
    default:
      throw new CliAppError({
        code: "E_ARG_INVALID",
        message: action.length === 0 ? "Missing action" : `Unknown action: ${action}`,
        details: { allowed: ADDON_ACTIONS },
      });
  }
}

export function decodeScope(value: string | null | undefined): ContentType {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (normalized === "movie" || normalized === "movies" || normalized === "film") {
    return "movie";
  }

  if (normalized === "series" || normalized === "tvshow" || normalized === "tv") {
    return "series";
  }

  throw new CliAppError({
    code: "E_ARG_INVALID",
    message: normalized.length === 0 ? "Missing scope" : `Unknown scope: ${normalized}`,
    details: { allowed: ["movie", "series"] },
  });
}

export function decodeQuality(value: string): QualityTier {
  const normalized = value.trim().toLowerCase();
  const match = QUALITY_BY_PARAM.get(normalized);
  if (match === undefined) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `Unknown quality: ${value}`,
      details: { allowed: [...QUALITY_BY_PARAM.keys()] },
    });
  }

  return match;
}

export function decodeLanguageList(value: string, param: string): LanguageTag[] {
  if (value.trim().toLowerCase() === "any") {
    return [];
  }

  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  const unsupported = items.filter((item) => normalizeLanguage(item) === undefined);

  if (items.length === 0 || unsupported.length > 0) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `Unsupported language in ${param}: ${value}`,
      details: { param, allowed: ["cz", "sk", "en"] },
    });
  }

  return normalizeLanguages(items);
}

export function decodeLetter(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!isValidLetter(normalized)) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `Invalid letter: ${value}`,
      details: { allowed: "a-z or 0-9" },
    });
  }

  return normalized;
}

export function decodeSeason(value: string): number {
  if (!/^\d{1,3}$/u.test(value.trim())) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: "season must be a whole number",
      details: { param: "season", value },
    });
  }

  return Number.parseInt(value, 10);
}

export function decodeDiscoveryList(value: string, scope: ContentType): DiscoveryList {
  const normalized = value.trim().toLowerCase().replace(/-/gu, "_");
  const allowed = DISCOVERY_LISTS[scope];
  const match = allowed.find((item) => item === normalized);
  if (match === undefined) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `Unknown ${scope} list: ${value}`,
      details: { param: "list", allowed },
    });
  }

  return match;
}

export function decodePositiveInt(value: string, param: string): number {
  if (!/^\d+$/u.test(value.trim()) || Number.parseInt(value, 10) < 1) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: `${param} must be a positive integer`,
      details: { param, value },
    });
  }

  return Number.parseInt(value, 10);
}

function decodeDiscover(params: URLSearchParams): AddonRequest {
  const scope = decodeScope(params.get("scope"));
  const list = params.get("list")?.trim();
  const genre = params.get("genre")?.trim();
  const page = params.get("page");
  const hasList = list !== undefined && list.length > 0;
  const hasGenre = genre !== undefined && genre.length > 0;

  if (hasList && hasGenre) {
    throw new CliAppError({
      code: "E_ARG_CONFLICT",
      message: "discover takes either a list or a genre",
      details: { params: ["list", "genre"] },
    });
  }

  return {
    action: "discover",
    scope,
    ...(hasList ? { list: decodeDiscoveryList(list, scope) } : {}),
    ...(hasGenre ? { genre } : {}),
    ...(page === null ? {} : { page: decodePositiveInt(page, "page") }),
  };
}

function requireTitle(params: URLSearchParams): string {
  const title = params.get("title")?.trim() ?? "";
  if (title.length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: `${params.get("action") ?? "request"} requires a series title`,
      details: { param: "title" },
    });
  }
  return title;
}

function decodeListing(params: URLSearchParams): ListingRequest {
  const filters = decodeFilters(params);
  const page = params.get("page");
  const pageSize = params.get("page_size");
  const sort = params.get("sort")?.trim();

  return {
    scope: decodeScope(params.get("scope")),
    ...(Object.keys(filters).length > 0 ? { filters } : {}),
    ...(sort === undefined || sort.length === 0 ? {} : { sort }),
    ...(page === null ? {} : { page: decodePositiveInt(page, "page") }),
    ...(pageSize === null ? {} : { pageSize: decodePositiveInt(pageSize, "page_size") }),
  };
}

function decodeFilters(params: URLSearchParams): FilterCriteria {
  const filters: FilterCriteria = {};
  const quality = params.get("quality");
  if (quality !== null && quality.length > 0) {
    filters.minQuality = decodeQuality(quality);
  }

  const audio = params.get("audio");
  if (audio !== null && audio.length > 0) {
    filters.audioLanguages = decodeLanguageList(audio, "audio");
  }

  if (params.get("subtitles") === "1") {
    filters.requireSubtitles = true;
  }

  const subtitleLanguages = params.get("subtitle_lang");
  if (subtitleLanguages !== null && subtitleLanguages.length > 0) {
    filters.subtitleLanguages = decodeLanguageList(subtitleLanguages, "subtitle_lang");
  }

  const genre = params.get("genre")?.trim();
  if (genre !== undefined && genre.length > 0) {
    filters.genre = genre;
  }

  const letter = params.get("letter");
  if (letter !== null && letter.length > 0) {
    filters.letter = decodeLetter(letter);
  }

  return filters;
}

function appendFilters(params: URLSearchParams, filters: FilterCriteria | undefined): void {
  if (filters === undefined) {
    return;
  }

  if (filters.minQuality !== undefined) {
    params.set(
      "quality",
      filters.minQuality === "unknown" ? "any" : QUALITY_PARAM[filters.minQuality],
    );
  }
  if (filters.audioLanguages !== undefined) {
    params.set("audio", encodeLanguageList(filters.audioLanguages));
  }
  if (filters.requireSubtitles === true) {
    params.set("subtitles", "1");
  }
  if (filters.subtitleLanguages !== undefined) {
    params.set("subtitle_lang", encodeLanguageList(filters.subtitleLanguages));
  }
  setIfPresent(params, "genre", filters.genre);
  setIfPresent(params, "letter", filters.letter);
}

function encodeLanguageList(languages: LanguageTag[]): string {
  return languages.length === 0 ? "any" : languages.map((item) => item.toLowerCase()).join(",");
}

function setIfPresent(params: URLSearchParams, key: string, value: string | number | undefined): void {
  if (value !== undefined && String(value).length > 0) {
    params.set(key, String(value));
  }
}
