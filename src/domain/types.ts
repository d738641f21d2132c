export type QualityTier = "CAM" | "SD" | "HD" | "UHD" | "unknown";

export type LanguageTag = "CZ" | "SK" | "EN";

export type MediaKind = "movie" | "series" | "other";

export type ContentType = "movie" | "series";

/** A raw file listing as returned by the streaming service search. */
export type SearchResult = Readonly<{
  ident: string;
  name: string;
  size?: number;
  extension?: string;
  previewImage?: string;
  positiveVotes?: number;
  negativeVotes?: number;
  passwordProtected: boolean;
}>;

export interface ParsedAttributes {
  quality: QualityTier;
  resolution?: string;
  audioLanguages: LanguageTag[];
  subtitles: boolean;
  subtitleLanguages: LanguageTag[];
  season?: number;
  episode?: number;
  year?: number;
  title: string;
  sortTitle: string;
  kind: MediaKind;
}

export type MetadataProviderId = "tmdb" | "csfd";

export interface MetadataRecord {
  title: string;
  originalTitle?: string;
  overview?: string;
  poster?: string;
  fanart?: string;
  rating?: number;
  votes?: number;
  year?: number;
  genres: string[];
  provider: MetadataProviderId;
  providerRef?: string;
  url?: string;
}

export interface MetadataQuery {
  title: string;
  contentType: ContentType;
  year?: number;
}

export interface SeasonSummary {
  seasonNumber: number;
  episodeCount?: number;
  name?: string;
  poster?: string;
  airDate?: string;
}

/** A series as known to a metadata source, with its season layout. */
export interface SeriesRecord {
  title: string;
  overview?: string;
  poster?: string;
  fanart?: string;
  year?: number;
  seasons: SeasonSummary[];
  provider: MetadataProviderId;
  providerRef: string;
}

export interface EpisodeRecord {
  episodeNumber: number;
  name: string;
  overview?: string;
  still?: string;
  airDate?: string;
  runtime?: number;
  rating?: number;
}

export type DiscoveryList =
  | "popular"
  | "top_rated"
  | "now_playing"
  | "upcoming"
  | "airing_today"
  | "on_the_air";

/** Either a curated list or a genre; `genre` wins when both are set. */
export interface DiscoveryRequest {
  contentType: ContentType;
  list?: DiscoveryList;
  genre?: string;
  page: number;
}

export interface DiscoveryPage {
  items: MetadataRecord[];
  page: number;
  totalPages: number;
}

export interface FilterCriteria {
  minQuality?: QualityTier;
  audioLanguages?: LanguageTag[];
  requireSubtitles?: boolean;
  subtitleLanguages?: LanguageTag[];
  genre?: string;
  letter?: string;
}

export interface EnrichedResult {
  result: SearchResult;
  attributes: ParsedAttributes;
  metadata?: MetadataRecord;
}

export interface RankedResult extends EnrichedResult {
  rank: number;
  score: number;
  reasons: string[];
}

export interface MetadataSourceDoctor {
  ok: boolean;
  message: string;
  details?: unknown;
}

export interface MetadataSourceDescriptor {
  id: MetadataProviderId;
  name: string;
  kind: "api" | "scrape";
  capabilities: {
    lookup: boolean;
    genres: boolean;
    series: boolean;
    discovery: boolean;
    doctor: boolean;
  };
}

/** One metadata backend. `lookup` resolves to `undefined` when the title is unknown to it. */
export interface MetadataSource {
  descriptor: MetadataSourceDescriptor;
  lookup(query: MetadataQuery): Promise<MetadataRecord | undefined>;
  listGenres?(contentType: ContentType): Promise<string[]>;
  searchSeries?(title: string): Promise<SeriesRecord | undefined>;
  seasonEpisodes?(providerRef: string, season: number): Promise<EpisodeRecord[]>;
  discover?(request: DiscoveryRequest): Promise<DiscoveryPage>;
  doctor?(): Promise<MetadataSourceDoctor>;
}

export interface StreamLink {
  ident: string;
  url: string;
}
