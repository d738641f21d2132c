import { encodeRequest, type AddonResponse } from "../domain/router.js";
import type { ContentType, LanguageTag, QualityTier, RankedResult } from "../domain/types.js";

type ListingResponse = Extract<AddonResponse, { action: "search" | "browse" }>;

export interface SearchItemView {
  rank: number;
  ident: string;
  name: string;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  quality: QualityTier;
  resolution?: string;
  audioLanguages: LanguageTag[];
  subtitles: boolean;
  subtitleLanguages: LanguageTag[];
  size?: number;
  score: number;
  reasons: string[];
  metadata?: {
    provider: string;
    title: string;
    year?: number;
    rating?: number;
    genres: string[];
    poster?: string;
    overview?: string;
  };
  playUrl: string;
}

export interface SearchCommandOutput {
  action: "search" | "browse";
  scope: ContentType;
  query: string;
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasMore: boolean;
  returned: number;
  items: SearchItemView[];
}

export function presentSearchResponse(response: ListingResponse): SearchCommandOutput {
  const { result } = response;

  return {
    action: response.action,
    scope: response.scope,
    query: response.query,
    page: result.page,
    pageSize: result.pageSize,
    totalItems: result.totalItems,
    totalPages: result.totalPages,
    hasMore: result.hasMore,
    returned: result.items.length,
    items: result.items.map(toItemView),
  };
}

export function renderSearchOutput(output: SearchCommandOutput): string {
  if (output.items.length === 0) {
    return output.query.length > 0
      ? `No ${output.scope} results for "${output.query}".`
      : `No ${output.scope} results.`;
  }

  const lines: string[] = [
    `Scope: ${output.scope}`,
    ...(output.query.length > 0 ? [`Query: ${output.query}`] : []),
    `Page: ${output.page}/${output.totalPages} (${output.returned} of ${output.totalItems})`,
  ];

  for (const item of output.items) {
    const episode =
      item.season !== undefined || item.episode !== undefined
        ? ` S${pad(item.season)}E${pad(item.episode)}`
        : "";
    const year = item.year === undefined ? "" : ` (${item.year})`;
    const languages = item.audioLanguages.length > 0 ? item.audioLanguages.join("/") : "-";
    const subtitles = item.subtitles
      ? `tit:${item.subtitleLanguages.length > 0 ? item.subtitleLanguages.join("/") : "yes"}`
      : "tit:no";
    const genres =
      item.metadata !== undefined && item.metadata.genres.length > 0
        ? ` | ${item.metadata.genres.join(", ")}`
        : "";

    lines.push(
      `${item.rank}. ${item.ident} | ${item.title}${year}${episode} | ${item.quality} | ${languages} | ${subtitles} | ${formatSize(item.size)}${genres} | score:${item.score.toFixed(3)}`,
    );
  }

  if (output.hasMore) {
    lines.push(`More results: --page ${output.page + 1}`);
  }

  return lines.join("\n");
}

export function toItemView(item: RankedResult): SearchItemView {
  const { attributes, result, metadata } = item;

  return {
    rank: item.rank,
    ident: result.ident,
    name: result.name,
    title: metadata?.title ?? attributes.title,
    year: metadata?.year ?? attributes.year,
    season: attributes.season,
    episode: attributes.episode,
    quality: attributes.quality,
    resolution: attributes.resolution,
    audioLanguages: attributes.audioLanguages,
    subtitles: attributes.subtitles,
    subtitleLanguages: attributes.subtitleLanguages,
    size: result.size,
    score: item.score,
    reasons: item.reasons,
    metadata:
      metadata === undefined
        ? undefined
        : {
            provider: metadata.provider,
            title: metadata.title,
            year: metadata.year,
            rating: metadata.rating,
            genres: metadata.genres,
            poster: metadata.poster,
            overview: metadata.overview,
          },
    playUrl: encodeRequest({ action: "play", ident: result.ident }),
  };
}

function pad(value: number | undefined): string {
  return value === undefined ? "??" : String(value).padStart(2, "0");
}

export function formatSize(bytes: number | undefined): string {
  if (bytes === undefined) {
    return "size:?";
  }

  const gib = bytes / 1024 ** 3;
  if (gib >= 1) {
    return `${gib.toFixed(2)} GiB`;
  }

  return `${(bytes / 1024 ** 2).toFixed(0)} MiB`;
}
