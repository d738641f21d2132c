import type { AddonConfig, Logger } from "../core/index.js";
import { Catalogue } from "./catalogue.js";
import { filtersFromConfig } from "./filters.js";
import { MetadataAggregator } from "./metadata.js";
import { createMetadataSources } from "./providers.js";
import { WebshareClient } from "./providers/webshare.js";
import type { FilterCriteria, MetadataSource } from "./types.js";

export interface AddonSessionOptions {
  config: AddonConfig;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  logger?: Logger;
  /** Overrides the sources derived from `config.metadata`. */
  sources?: MetadataSource[];
}

/**
 * Everything one add-on invocation needs: the Webshare session, the metadata
 * aggregator with its cache, and the catalogue built on top of both.
 */
export class AddonSession {
  public readonly config: AddonConfig;
  public readonly webshare: WebshareClient;
  public readonly sources: MetadataSource[];
  public readonly metadata: MetadataAggregator;
  public readonly catalogue: Catalogue;
  public readonly logger?: Logger;

  public constructor(options: AddonSessionOptions) {
    const { config, fetchImpl, sleep, clock, logger } = options;
    this.config = config;
    this.logger = logger;

    this.webshare = new WebshareClient({
      baseUrl: config.webshare.baseUrl,
      username: config.webshare.username,
      password: config.webshare.password,
      token: config.webshare.token,
      keepLoggedIn: config.webshare.keepLoggedIn,
      timeoutMs: config.network.timeoutMs,
      retries: config.network.retries,
      backoffMs: config.network.backoffMs,
      fetchImpl,
      sleep,
      clock,
      logger,
    });

    this.sources = options.sources ?? createMetadataSources(config, { fetchImpl, sleep, logger });
    this.metadata = new MetadataAggregator(this.sources, {
      cacheTtlSeconds: config.metadata.cacheTtlSeconds,
      clock,
      logger,
    });

    this.catalogue = new Catalogue({
      backend: this.webshare,
      metadata: this.metadata,
      pageSize: config.catalogue.pageSize,
      maxCandidates: config.catalogue.maxCandidates,
      linkOptions: {
        downloadType: config.webshare.downloadType,
        forceHttps: config.webshare.forceHttps,
      },
      logger,
    });
  }

  /** Filter criteria from configuration, overridden field by field. */
  public defaultFilters(overrides: FilterCriteria = {}): FilterCriteria {
    const defaults = filtersFromConfig(this.config.filters);
    return {
      minQuality: overrides.minQuality ?? defaults.minQuality,
      audioLanguages: overrides.audioLanguages ?? defaults.audioLanguages,
      requireSubtitles: overrides.requireSubtitles ?? defaults.requireSubtitles,
      subtitleLanguages: overrides.subtitleLanguages ?? defaults.subtitleLanguages,
      genre: overrides.genre,
      letter: overrides.letter,
    };
  }

  public async close(): Promise<void> {
    await this.webshare.logout();
    this.metadata.clearCache();
  }
}
