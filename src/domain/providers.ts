import type { AddonConfig, Logger, MetadataProviderOrder } from "../core/index.js";
import { createCsfdSource } from "./providers/csfd.js";
import { createTmdbSource } from "./providers/tmdb.js";
import type { MetadataProviderId, MetadataSource, MetadataSourceDescriptor } from "./types.js";

export interface MetadataSourceDeps {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const PROVIDER_ORDER: Record<MetadataProviderOrder, MetadataProviderId[]> = {
  tmdb_first: ["tmdb", "csfd"],
  csfd_first: ["csfd", "tmdb"],
  tmdb_only: ["tmdb"],
  csfd_only: ["csfd"],
  none: [],
};

/**
 * Builds the metadata sources in priority order. TMDb is skipped when no API
 * key is configured.
 */
export function createMetadataSources(
  config: AddonConfig,
  deps: MetadataSourceDeps = {},
): MetadataSource[] {
  const network = {
    timeoutMs: config.network.timeoutMs,
    retries: config.network.retries,
    backoffMs: config.network.backoffMs,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
    logger: deps.logger,
  };

  const sources: MetadataSource[] = [];
  for (const id of PROVIDER_ORDER[config.metadata.provider]) {
    if (id === "tmdb") {
      if (config.metadata.tmdbApiKey.length === 0) {
        deps.logger?.debug("tmdb disabled: no API key configured");
        continue;
      }

      sources.push(
        createTmdbSource({
          ...network,
          apiKey: config.metadata.tmdbApiKey,
          baseUrl: config.metadata.tmdbBaseUrl,
          language: config.metadata.language,
          region: config.metadata.region,
        }),
      );
      continue;
    }

    sources.push(
      createCsfdSource({
        ...network,
        baseUrl: config.metadata.csfdBaseUrl,
        userAgent: config.metadata.csfdUserAgent,
      }),
    );
  }

  return sources;
}

export function listMetadataSources(sources: MetadataSource[]): MetadataSourceDescriptor[] {
  return sources.map((source) => source.descriptor);
}
