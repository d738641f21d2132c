import type { AddonConfig, LanguageOption, QualityOption } from "../core/index.js";
import { QUALITY_RANK } from "./filename-parser.js";
import { normalizeLanguage, normalizeTitleKey } from "./request-normalization.js";
import type { EnrichedResult, FilterCriteria, LanguageTag, QualityTier } from "./types.js";

const QUALITY_OPTIONS: Record<Exclude<QualityOption, "any">, QualityTier> = {
  cam: "CAM",
  sd: "SD",
  hd: "HD",
  uhd: "UHD",
};

export function matchesFilters(item: EnrichedResult, criteria: FilterCriteria): boolean {
  const { attributes } = item;

  if (criteria.minQuality !== undefined && criteria.minQuality !== "unknown") {
    if (attributes.quality === "unknown") {
      return false;
    }
    if (QUALITY_RANK[attributes.quality] < QUALITY_RANK[criteria.minQuality]) {
      return false;
    }
  }

  if (criteria.audioLanguages !== undefined && criteria.audioLanguages.length > 0) {
    const wanted = criteria.audioLanguages;
    if (!attributes.audioLanguages.some((language) => wanted.includes(language))) {
      return false;
    }
  }

  if (criteria.requireSubtitles === true && !attributes.subtitles) {
    return false;
  }

  if (criteria.subtitleLanguages !== undefined && criteria.subtitleLanguages.length > 0) {
    const wanted = criteria.subtitleLanguages;
    if (!attributes.subtitleLanguages.some((language) => wanted.includes(language))) {
      return false;
    }
  }

  if (criteria.genre !== undefined && criteria.genre.trim().length > 0) {
    const genre = criteria.genre.trim().toLowerCase();
    const genres = item.metadata?.genres ?? [];
    if (!genres.some((entry) => entry.toLowerCase() === genre)) {
      return false;
    }
  }

  if (criteria.letter !== undefined && criteria.letter.length > 0) {
    const first = normalizeTitleKey(attributes.sortTitle).charAt(0);
    const letter = criteria.letter.toLowerCase();
    if (letter === "0-9" ? !/^\d$/u.test(first) : first !== letter) {
      return false;
    }
  }

  return true;
}

export function applyFilters(items: EnrichedResult[], criteria: FilterCriteria): EnrichedResult[] {
  return items.filter((item) => matchesFilters(item, criteria));
}

export function qualityFromOption(option: QualityOption | undefined): QualityTier | undefined {
  return option === undefined || option === "any" ? undefined : QUALITY_OPTIONS[option];
}

export function languageFromOption(option: LanguageOption | undefined): LanguageTag | undefined {
  return option === undefined || option === "any" ? undefined : normalizeLanguage(option);
}

/** Default criteria taken from the `filters` section of the configuration. */
export function filtersFromConfig(filters: AddonConfig["filters"]): FilterCriteria {
  const audio = languageFromOption(filters.audio);
  const subtitles = languageFromOption(filters.subtitles);

  return {
    minQuality: qualityFromOption(filters.quality),
    audioLanguages: audio === undefined ? undefined : [audio],
    subtitleLanguages: subtitles === undefined ? undefined : [subtitles],
  };
}

export function isValidLetter(value: string): boolean {
  return value === "0-9" || /^[a-z]$/iu.test(value);
}
