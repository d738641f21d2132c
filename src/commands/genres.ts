import type { AddonResponse } from "../domain/router.js";
import type { ContentType } from "../domain/types.js";

export interface GenresCommandOutput {
  scope: ContentType;
  total: number;
  genres: string[];
  browseUrls: Record<string, string>;
}

export function presentGenresResponse(
  response: Extract<AddonResponse, { action: "genres" }>,
  browseUrl: (genre: string) => string,
): GenresCommandOutput {
  return {
    scope: response.scope,
    total: response.genres.length,
    genres: response.genres,
    browseUrls: Object.fromEntries(response.genres.map((genre) => [genre, browseUrl(genre)])),
  };
}

export function renderGenresOutput(output: GenresCommandOutput): string {
  if (output.genres.length === 0) {
    return `No genres available for ${output.scope}.`;
  }

  return [
    `Genres (${output.scope}): ${output.total}`,
    ...output.genres.map((genre) => `- ${genre}`),
  ].join("\n");
}
