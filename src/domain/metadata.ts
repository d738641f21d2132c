import { describeError, isArgumentFailure, type Logger } from "../core/index.js";
import { buildMetadataKey, normalizeTitleKey } from "./request-normalization.js";
import { TtlCache } from "./ttl-cache.js";
import type {
  ContentType,
  DiscoveryList,
  DiscoveryPage,
  DiscoveryRequest,
  EpisodeRecord,
  MetadataProviderId,
  MetadataQuery,
  MetadataRecord,
  MetadataSource,
  SeriesRecord,
} from "./types.js";

export interface MetadataAggregatorOptions {
  cacheTtlSeconds?: number;
  clock?: () => number;
  logger?: Logger;
}

export const DISCOVERY_LISTS: Record<ContentType, readonly DiscoveryList[]> = {
  movie: ["popular", "top_rated", "now_playing", "upcoming"],
  series: ["popular", "top_rated", "airing_today", "on_the_air"],
};

// `null` marks a cached definitive miss.
type CachedLookup = MetadataRecord | null;

/**
 * Tries metadata sources in priority order and caches the outcome per
 * `type|title|year` key. The first non-empty record wins as-is.
 */
export class MetadataAggregator {
  private readonly sources: MetadataSource[];
  private readonly cache: TtlCache<CachedLookup>;
  private readonly seriesCache: TtlCache<SeriesRecord | null>;
  private readonly inFlight = new Map<string, Promise<MetadataRecord | undefined>>();
  private readonly logger?: Logger;

  public constructor(sources: MetadataSource[], options: MetadataAggregatorOptions = {}) {
    this.sources = sources;
    this.cache = new TtlCache<CachedLookup>(options.cacheTtlSeconds ?? 3600, options.clock);
    this.seriesCache = new TtlCache<SeriesRecord | null>(options.cacheTtlSeconds ?? 3600, options.clock);
    this.logger = options.logger?.child({ component: "metadata" });
  }

  public get providerIds(): string[] {
    return this.sources.map((source) => source.descriptor.id);
  }

  public async lookup(query: MetadataQuery): Promise<MetadataRecord | undefined> {
    if (this.sources.length === 0 || query.title.trim().length === 0) {
      return undefined;
    }

    const key = buildMetadataKey(query);
    if (this.cache.has(key)) {
      return this.cache.get(key) ?? undefined;
    }

    const pending = this.inFlight.get(key);
    if (pending !== undefined) {
      return pending;
    }

    const request = this.resolve(key, query).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  public async listGenres(contentType: ContentType): Promise<string[]> {
    for (const source of this.sources) {
      if (source.listGenres === undefined) {
        continue;
      }

      try {
        const genres = await source.listGenres(contentType);
        if (genres.length > 0) {
          return genres;
        }
      } catch (error) {
        this.logger?.warn(
          { provider: source.descriptor.id, ...describeError(error) },
          "genre list unavailable",
        );
      }
    }

    return [];
  }

  /** Season layout of a series from the first source that knows it. */
  public async searchSeries(title: string): Promise<SeriesRecord | undefined> {
    const key = normalizeTitleKey(title);
    if (key.length === 0) {
      return undefined;
    }
    if (this.seriesCache.has(key)) {
      return this.seriesCache.get(key) ?? undefined;
    }

    let failed = false;
    for (const source of this.sources) {
      if (source.searchSeries === undefined) {
        continue;
      }

      try {
        const series = await source.searchSeries(title);
        if (series !== undefined) {
          this.seriesCache.set(key, series);
          return series;
        }
      } catch (error) {
        failed = true;
        this.logger?.warn(
          { provider: source.descriptor.id, title, ...describeError(error) },
          "series lookup unavailable",
        );
      }
    }

    if (!failed) {
      this.seriesCache.set(key, null);
    }
    return undefined;
  }

  public async seasonEpisodes(
    provider: MetadataProviderId,
    providerRef: string,
    season: number,
  ): Promise<EpisodeRecord[]> {
    const source = this.sources.find((item) => item.descriptor.id === provider);
    if (source === undefined || source.seasonEpisodes === undefined) {
      return [];
    }

    try {
      return await source.seasonEpisodes(providerRef, season);
    } catch (error) {
      this.logger?.warn({ provider, providerRef, season, ...describeError(error) }, "episode list unavailable");
      return [];
    }
  }

  public async discover(request: DiscoveryRequest): Promise<DiscoveryPage> {
    for (const source of this.sources) {
      if (source.discover === undefined) {
        continue;
      }

      try {
        return await source.discover(request);
      } catch (error) {
        if (isArgumentFailure(error)) {
          throw error;
        }
        this.logger?.warn(
          { provider: source.descriptor.id, list: request.list, genre: request.genre, ...describeError(error) },
          "discovery list unavailable",
        );
      }
    }

    return { items: [], page: request.page, totalPages: 0 };
  }

  public clearCache(): void {
    this.cache.clear();
    this.seriesCache.clear();
  }

  private async resolve(key: string, query: MetadataQuery): Promise<MetadataRecord | undefined> {
    let failed = false;

    for (const source of this.sources) {
      try {
        const record = await source.lookup(query);
        if (record !== undefined && record.title.trim().length > 0) {
          this.cache.set(key, record);
          return record;
        }
      } catch (error) {
        failed = true;
        this.logger?.warn(
          { provider: source.descriptor.id, title: query.title, ...describeError(error) },
          "metadata provider unavailable",
        );
      }
    }

    if (!failed) {
      this.cache.set(key, null);
    }

    return undefined;
  }
}
