export { runCli, type TvstreamCliDeps } from "./cli.js";
export * from "./core/index.js";
export {
  Catalogue,
  type CataloguePage,
  type CatalogueRequest,
  type SeasonEpisodes,
  type SeriesSeasons,
} from "./domain/catalogue.js";
export { parseFilename } from "./domain/filename-parser.js";
export { applyFilters, matchesFilters } from "./domain/filters.js";
export { DISCOVERY_LISTS, MetadataAggregator } from "./domain/metadata.js";
export { createMetadataSources } from "./domain/providers.js";
export { createCsfdSource } from "./domain/providers/csfd.js";
export { createTmdbSource } from "./domain/providers/tmdb.js";
export { WebshareClient } from "./domain/providers/webshare.js";
export { rankResults } from "./domain/ranking.js";
export {
  decodeRequest,
  encodeRequest,
  routeRequest,
  type AddonRequest,
  type AddonResponse,
} from "./domain/router.js";
export { AddonSession } from "./domain/session.js";
export type * from "./domain/types.js";
