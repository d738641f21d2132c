import { encodeRequest, type AddonResponse } from "../domain/router.js";
import type { EpisodeRecord, SeasonSummary } from "../domain/types.js";
import { formatSize, toItemView, type SearchItemView } from "./search.js";

export interface SeasonsCommandOutput {
  title: string;
  source: "metadata" | "search";
  provider?: string;
  overview?: string;
  total: number;
  seasons: Array<SeasonSummary & { episodesUrl: string }>;
}

export interface EpisodeItemView extends SearchItemView {
  label: string;
  episodeName?: string;
}

export interface EpisodesCommandOutput {
  title: string;
  season: number;
  returned: number;
  items: EpisodeItemView[];
}

export function presentSeasonsResponse(
  response: Extract<AddonResponse, { action: "seasons" }>,
): SeasonsCommandOutput {
  const { result } = response;

  return {
    title: result.title,
    source: result.source,
    provider: result.series?.provider,
    overview: result.series?.overview,
    total: result.seasons.length,
    seasons: result.seasons.map((season) => ({
      ...season,
      episodesUrl: encodeRequest({
        action: "episodes",
        title: result.title,
        season: season.seasonNumber,
      }),
    })),
  };
}

export function renderSeasonsOutput(output: SeasonsCommandOutput): string {
  return [
    `${output.title}: ${output.total} season(s) from ${output.source}`,
    ...output.seasons.map((season) => {
      const episodes = season.episodeCount === undefined ? "" : ` | ${season.episodeCount} episodes`;
      return `- Season ${season.seasonNumber}${episodes}`;
    }),
  ].join("\n");
}

export function presentEpisodesResponse(
  response: Extract<AddonResponse, { action: "episodes" }>,
): EpisodesCommandOutput {
  const { result } = response;
  const names = new Map<number, EpisodeRecord>(
    result.episodes.map((episode) => [episode.episodeNumber, episode]),
  );

  return {
    title: result.title,
    season: result.season,
    returned: result.items.length,
    items: result.items.map((item) => {
      const view = toItemView(item);
      const episode = view.episode === undefined ? undefined : names.get(view.episode);
      return {
        ...view,
        label: view.episode === undefined ? view.title : `Episode ${view.episode}`,
        ...(episode === undefined ? {} : { episodeName: episode.name }),
      };
    }),
  };
}

export function renderEpisodesOutput(output: EpisodesCommandOutput): string {
  if (output.items.length === 0) {
    return `No episodes found for ${output.title} season ${output.season}.`;
  }

  return [
    `${output.title} - season ${output.season}`,
    ...output.items.map((item) => {
      const name = item.episodeName === undefined ? "" : ` - ${item.episodeName}`;
      return `${item.rank}. ${item.ident} | ${item.label}${name} | ${item.quality} | ${formatSize(item.size)}`;
    }),
  ].join("\n");
}
