import { encodeRequest, type AddonResponse } from "../domain/router.js";
import type { ContentType, DiscoveryList } from "../domain/types.js";

export interface DiscoverItemView {
  title: string;
  originalTitle?: string;
  year?: number;
  rating?: number;
  genres: string[];
  poster?: string;
  overview?: string;
  provider: string;
  providerRef?: string;
  /** Webshare search for the title, in the same scope. */
  searchUrl: string;
}

export interface DiscoverCommandOutput {
  scope: ContentType;
  list?: DiscoveryList;
  genre?: string;
  page: number;
  totalPages: number;
  returned: number;
  items: DiscoverItemView[];
}

export function presentDiscoverResponse(
  response: Extract<AddonResponse, { action: "discover" }>,
): DiscoverCommandOutput {
  const { result, scope } = response;

  return {
    scope,
    list: response.list,
    genre: response.genre,
    page: result.page,
    totalPages: result.totalPages,
    returned: result.items.length,
    items: result.items.map((item) => ({
      title: item.title,
      originalTitle: item.originalTitle,
      year: item.year,
      rating: item.rating,
      genres: item.genres,
      poster: item.poster,
      overview: item.overview,
      provider: item.provider,
      providerRef: item.providerRef,
      searchUrl:
        scope === "series"
          ? encodeRequest({ action: "seasons", title: item.title })
          : encodeRequest({ action: "search", scope, query: item.title }),
    })),
  };
}

export function renderDiscoverOutput(output: DiscoverCommandOutput): string {
  const label = output.genre === undefined ? (output.list ?? "popular") : `genre ${output.genre}`;
  if (output.items.length === 0) {
    return `No ${output.scope} titles in ${label}.`;
  }

  return [
    `${output.scope} / ${label} (page ${output.page}/${output.totalPages})`,
    ...output.items.map((item, index) => {
      const year = item.year === undefined ? "" : ` (${item.year})`;
      const rating = item.rating === undefined ? "" : ` | ${item.rating.toFixed(1)}`;
      const genres = item.genres.length > 0 ? ` | ${item.genres.join(", ")}` : "";
      return `${index + 1}. ${item.title}${year}${rating}${genres}`;
    }),
  ].join("\n");
}
