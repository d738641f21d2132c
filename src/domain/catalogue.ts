import { CliAppError, describeError, isUpstreamFailure, type Logger } from "../core/index.js";
import { parseFilename } from "./filename-parser.js";
import { applyFilters } from "./filters.js";
import type { MetadataAggregator } from "./metadata.js";
import type { FileLinkOptions, WebshareClient, WebshareSearchPage } from "./providers/webshare.js";
import { rankResults } from "./ranking.js";
import { buildMetadataKey, normalizeTitleKey, tokenize } from "./request-normalization.js";
import type {
  ContentType,
  DiscoveryPage,
  DiscoveryRequest,
  EnrichedResult,
  EpisodeRecord,
  FilterCriteria,
  MetadataQuery,
  MetadataRecord,
  RankedResult,
  SeasonSummary,
  SearchResult,
  SeriesRecord,
  StreamLink,
} from "./types.js";

const MIB = 1024 * 1024;
const MIN_SIZE_BYTES: Record<ContentType, number> = {
  movie: 100 * MIB,
  series: 50 * MIB,
};
const API_PAGE_LIMIT = 100;
const MIN_MOVIE_TITLE_LENGTH = 3;
const SEASON_SAMPLE_LIMIT = 20;
const SEASON_SAMPLE_TARGET = 3;
const EPISODE_SAMPLE_LIMIT = 50;
const EPISODE_SAMPLE_TARGET = 20;

export type CatalogueSearchBackend = Pick<WebshareClient, "search" | "fileLink">;
export type CatalogueMetadata = Pick<
  MetadataAggregator,
  "lookup" | "listGenres" | "searchSeries" | "seasonEpisodes" | "discover"
>;

export interface CatalogueOptions {
  backend: CatalogueSearchBackend;
  metadata: CatalogueMetadata;
  pageSize?: number;
  maxCandidates?: number;
  linkOptions?: FileLinkOptions;
  logger?: Logger;
}

export interface CatalogueRequest {
  query: string;
  scope: ContentType;
  filters?: FilterCriteria;
  sort?: string;
  page?: number;
  pageSize?: number;
}

export interface SeriesSeasons {
  title: string;
  /** `metadata` when a source knew the series, `search` when seasons were read off filenames. */
  source: "metadata" | "search";
  series?: SeriesRecord;
  seasons: SeasonSummary[];
}

export interface SeasonEpisodes {
  title: string;
  season: number;
  items: RankedResult[];
  episodes: EpisodeRecord[];
}

export interface CataloguePage {
  items: RankedResult[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasMore: boolean;
  scanned: number;
}

/**
 * Turns a query and filter criteria into a ranked, paginated list of playable
 * results enriched with metadata.
 */
export class Catalogue {
  private readonly backend: CatalogueSearchBackend;
  private readonly metadata: CatalogueMetadata;
  private readonly pageSize: number;
  private readonly maxCandidates: number;
  private readonly linkOptions: FileLinkOptions;
  private readonly logger?: Logger;

  public constructor(options: CatalogueOptions) {
    this.backend = options.backend;
    this.metadata = options.metadata;
    this.pageSize = options.pageSize ?? 40;
    this.maxCandidates = options.maxCandidates ?? 100;
    this.linkOptions = options.linkOptions ?? {};
    this.logger = options.logger?.child({ component: "catalogue" });
  }

  public async resolve(request: CatalogueRequest): Promise<CataloguePage> {
    const raw = await this.gather(request.query, request.sort);
    const candidates = this.selectCandidates(raw, request.scope);
    const enriched = await this.enrich(candidates, request.scope);
    const filtered = applyFilters(enriched, request.filters ?? {});
    const ranked = rankResults(tokenize(request.query), filtered);

    const pageSize = Math.max(1, Math.floor(request.pageSize ?? this.pageSize));
    const page = Math.max(1, Math.floor(request.page ?? 1));
    const start = (page - 1) * pageSize;
    const totalPages = Math.ceil(ranked.length / pageSize);

    this.logger?.info(
      {
        query: request.query,
        scope: request.scope,
        scanned: raw.length,
        candidates: candidates.length,
        matched: ranked.length,
      },
      "catalogue resolved",
    );

    return {
      items: ranked.slice(start, start + pageSize),
      page,
      pageSize,
      totalItems: ranked.length,
      totalPages,
      hasMore: page < totalPages,
      scanned: raw.length,
    };
  }

  public async resolveStream(ident: string): Promise<StreamLink> {
    const normalized = ident.trim();
    if (normalized.length === 0) {
      throw new CliAppError({
        code: "E_ARG_MISSING",
        message: "A file ident is required to resolve a stream",
      });
    }

    const url = await this.backend.fileLink(normalized, this.linkOptions);
    return { ident: normalized, url };
  }

  public async genres(scope: ContentType): Promise<string[]> {
    return this.metadata.listGenres(scope);
  }

  public async discover(request: DiscoveryRequest): Promise<DiscoveryPage> {
    return this.metadata.discover(request);
  }

  /**
   * Seasons of a series. Metadata wins; otherwise a few sample searches read
   * season numbers off matching filenames, falling back to season 1.
   */
  public async seasons(title: string): Promise<SeriesSeasons> {
    const name = requireSeriesTitle(title);
    const series = await this.metadata.searchSeries(name);
    if (series !== undefined && series.seasons.length > 0) {
      return { title: name, source: "metadata", series, seasons: series.seasons };
    }

    const found = new Set<number>();
    for (const query of [name, `${name} S01`, `${name} série`]) {
      const results = await this.sampleSearch(query, SEASON_SAMPLE_LIMIT);
      for (const candidate of this.selectCandidates(results, "series")) {
        if (isSameSeries(candidate.attributes.title, name)) {
          found.add(candidate.attributes.season ?? 1);
        }
      }
      if (found.size >= SEASON_SAMPLE_TARGET) {
        break;
      }
    }

    const numbers = found.size === 0 ? [1] : [...found].sort((left, right) => left - right);
    return {
      title: name,
      source: "search",
      ...(series === undefined ? {} : { series }),
      seasons: numbers.map((seasonNumber) => ({ seasonNumber })),
    };
  }

  /** Playable files of one season, ordered by episode and then by relevance. */
  public async episodes(
    title: string,
    season: number,
    filters: FilterCriteria = {},
  ): Promise<SeasonEpisodes> {
    const name = requireSeriesTitle(title);
    const padded = String(season).padStart(2, "0");
    const queries = new Set([
      `${name} S${padded}`,
      `${name} S${season}`,
      `${name} série ${season}`,
      `${name} season ${season}`,
    ]);

    const seen = new Set<string>();
    const matched: EnrichedResult[] = [];
    for (const query of queries) {
      const results = await this.sampleSearch(query, EPISODE_SAMPLE_LIMIT);
      for (const candidate of this.selectCandidates(results, "series")) {
        if (
          !seen.has(candidate.result.ident) &&
          isSameSeries(candidate.attributes.title, name) &&
          (candidate.attributes.season ?? 1) === season
        ) {
          seen.add(candidate.result.ident);
          matched.push(candidate);
        }
      }
      if (matched.length >= EPISODE_SAMPLE_TARGET) {
        break;
      }
    }

    // Episode files carry no metadata, so a genre criterion cannot apply.
    const filtered = applyFilters(matched, { ...filters, genre: undefined });
    const items = rankResults(tokenize(name), filtered)
      .sort((left, right) => (left.attributes.episode ?? 0) - (right.attributes.episode ?? 0))
      .map((item, index) => ({ ...item, rank: index + 1 }));

    const series = await this.metadata.searchSeries(name);
    const episodes =
      series === undefined
        ? []
        : await this.metadata.seasonEpisodes(series.provider, series.providerRef, season);

    this.logger?.info({ title: name, season, matched: matched.length, returned: items.length }, "season resolved");

    return { title: name, season, items, episodes };
  }

  private async sampleSearch(query: string, limit: number): Promise<SearchResult[]> {
    try {
      const page = await this.backend.search({ what: query, category: "video", limit, offset: 0 });
      return page.files;
    } catch (error) {
      if (!isUpstreamFailure(error)) {
        throw error;
      }
      this.logger?.warn({ query, ...describeError(error) }, "sample search failed");
      return [];
    }
  }

  private async gather(query: string, sort: string | undefined): Promise<SearchResult[]> {
    const collected: SearchResult[] = [];
    let offset = 0;

    while (collected.length < this.maxCandidates) {
      const limit = Math.min(API_PAGE_LIMIT, this.maxCandidates - collected.length);
      let page: WebshareSearchPage;
      try {
        page = await this.backend.search({ what: query, category: "video", sort, limit, offset });
      } catch (error) {
        // A failed first page has nothing to fall back on.
        if (offset === 0 || !isUpstreamFailure(error)) {
          throw error;
        }
        this.logger?.warn(
          { query, offset, collected: collected.length, ...describeError(error) },
          "search page failed, keeping partial results",
        );
        break;
      }

      if (page.files.length === 0) {
        break;
      }

      collected.push(...page.files.slice(0, limit));
      offset += page.files.length;
      if (offset >= page.total) {
        break;
      }
    }

    return collected;
  }

  private selectCandidates(
    results: SearchResult[],
    scope: ContentType,
  ): Array<Omit<EnrichedResult, "metadata">> {
    const seen = new Set<string>();
    const selected: Array<Omit<EnrichedResult, "metadata">> = [];

    for (const result of results) {
      if (seen.has(result.ident)) {
        continue;
      }
      seen.add(result.ident);

      const attributes = parseFilename(result.name);
      if (attributes.kind !== scope) {
        continue;
      }

      if (result.size !== undefined && result.size < MIN_SIZE_BYTES[scope]) {
        continue;
      }

      if (scope === "movie" && attributes.title.trim().length < MIN_MOVIE_TITLE_LENGTH) {
        continue;
      }

      selected.push({ result, attributes });
    }

    return selected;
  }

  private async enrich(
    candidates: Array<Omit<EnrichedResult, "metadata">>,
    scope: ContentType,
  ): Promise<EnrichedResult[]> {
    const queries = new Map<string, MetadataQuery>();
    const keys = candidates.map((candidate) => {
      const query: MetadataQuery = {
        title: candidate.attributes.title,
        contentType: scope,
        year: candidate.attributes.year,
      };
      const key = buildMetadataKey(query);
      if (!queries.has(key)) {
        queries.set(key, query);
      }
      return key;
    });

    const entries = await Promise.all(
      [...queries.entries()].map(
        async ([key, query]): Promise<[string, MetadataRecord | undefined]> => [
          key,
          await this.metadata.lookup(query),
        ],
      ),
    );
    const records = new Map(entries);

    return candidates.map((candidate, index) => {
      const key = keys[index];
      const metadata = key === undefined ? undefined : records.get(key);
      return metadata === undefined ? { ...candidate } : { ...candidate, metadata };
    });
  }
}

function requireSeriesTitle(title: string): string {
  const name = title.trim();
  if (name.length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "A series title is required",
      details: { param: "title" },
    });
  }
  return name;
}

function isSameSeries(parsedTitle: string, wanted: string): boolean {
  return normalizeTitleKey(parsedTitle) === normalizeTitleKey(wanted);
}
