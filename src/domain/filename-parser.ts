import { collapseWhitespace, makeSortTitle } from "./request-normalization.js";
import type { LanguageTag, MediaKind, ParsedAttributes, QualityTier } from "./types.js";

export const QUALITY_RANK: Record<QualityTier, number> = {
  unknown: 0,
  CAM: 1,
  SD: 2,
  HD: 3,
  UHD: 4,
};

const LANGUAGE_ORDER: LanguageTag[] = ["CZ", "SK", "EN"];

const VIDEO_EXTENSION = /\.(mkv|avi|mp4|m4v|wmv|mov|mpe?g|m2ts|ts|webm|flv|vob|iso|divx)$/iu;
const TOKEN_SEPARATOR = /[\s._\-[\](){}+,]+/u;

const QUALITY_RULES: Array<{ tier: Exclude<QualityTier, "unknown">; pattern: RegExp }> = [
  { tier: "UHD", pattern: /\b(2160p|4k|uhd|hdr|hdr10|dolby vision|dovi)\b/u },
  {
    tier: "HD",
    pattern:
      /\b(1080p|1080i|720p|fhd|hd|web dl|webdl|webrip|bluray|blu ray|bdrip|brrip|hdtv|remux)\b/u,
  },
  { tier: "SD", pattern: /\b(576p|480p|360p|sd|dvdrip|dvd|dvdscr|tvrip|xvid|divx)\b/u },
  { tier: "CAM", pattern: /\b(cam|camrip|hdcam|ts|hdts|telesync|tc|telecine|workprint)\b/u },
];

const RESOLUTION_TOKEN = /^(\d{3,4})[pi]$/u;
const YEAR_TOKEN = /^(19|20)\d{2}$/u;

const SEASON_EPISODE = /(?<![\p{L}\p{N}])s(\d{1,2})[\s._-]*e(\d{1,3})(?!\p{N})/iu;
const ALT_SEASON_EPISODE = /(?<![\p{L}\p{N}])(\d{1,2})x(\d{2,3})(?![\p{L}\p{N}])/iu;
const SEASON_ONLY = /(?<![\p{L}\p{N}])(?:s(\d{1,2})|(?:season|s[ée]rie|s[ée]rii)[\s._-]*(\d{1,2}))(?![\p{L}\p{N}])/iu;
const EPISODE_ONLY = /(?<![\p{L}\p{N}])(?:e|ep|episode|d[ií]l)[\s._-]*(\d{1,3})(?!\p{N})/iu;

const LANGUAGE_TOKENS: Record<string, LanguageTag> = {
  cz: "CZ",
  cze: "CZ",
  ces: "CZ",
  czech: "CZ",
  cesky: "CZ",
  sk: "SK",
  slk: "SK",
  slovak: "SK",
  en: "EN",
  eng: "EN",
  english: "EN",
};

const AUDIO_COMPOUND_TOKENS: Record<string, LanguageTag> = {
  czdab: "CZ",
  czdabing: "CZ",
  czdub: "CZ",
  czaudio: "CZ",
  skdab: "SK",
  skdabing: "SK",
  skdub: "SK",
};

const SUBTITLE_COMPOUND_TOKENS: Record<string, LanguageTag> = {
  cztit: "CZ",
  czsub: "CZ",
  czsubs: "CZ",
  cztitulky: "CZ",
  sktit: "SK",
  sksub: "SK",
  sksubs: "SK",
  sktitulky: "SK",
  entit: "EN",
  ensub: "EN",
  ensubs: "EN",
  engsub: "EN",
  engsubs: "EN",
};

const SUBTITLE_MARKERS = new Set(["tit", "titulky", "sub", "subs", "subtitles"]);
const GENERIC_SUBTITLE_TOKENS = new Set([
  ...SUBTITLE_MARKERS,
  "subbed",
  "hardsub",
  "softsub",
  "multisub",
  "forced",
]);

const RELEASE_NOISE_TOKENS = new Set([
  "x264",
  "x265",
  "h264",
  "h265",
  "hevc",
  "avc",
  "aac",
  "ac3",
  "dts",
  "truehd",
  "atmos",
  "dd5",
  "ddp5",
  "10bit",
  "web",
  "dl",
  "blu",
  "dolby",
  "multi",
  "dual",
  "dabing",
  "dub",
  "proper",
  "repack",
  "remastered",
  "extended",
  "unrated",
  "internal",
  "limited",
  "nf",
  "amzn",
  "hmax",
  "dsnp",
  "season",
  "serie",
  "série",
]);

const OTHER_TOKENS = new Set([
  "trailer",
  "teaser",
  "sample",
  "promo",
  "featurette",
  "extras",
  "bonus",
  "interview",
  "soundtrack",
  "ost",
  "clip",
  "excerpt",
  "outtakes",
  "readme",
  "nfo",
]);

const MULTIPART_TOKEN = /^(part|cd|disc|pt)\d+$/u;

/**
 * Derives quality, language, subtitle and episode hints from a raw filename.
 * Pure and total: unmatched fields fall back to `unknown` or empty values.
 */
export function parseFilename(rawName: string): ParsedAttributes {
  const name = collapseWhitespace(rawName).replace(VIDEO_EXTENSION, "");
  const tokens = name.split(TOKEN_SEPARATOR).filter((token) => token.length > 0);
  const lowerTokens = tokens.map((token) => token.toLowerCase());
  const joined = ` ${lowerTokens.join(" ")} `;

  const resolution = detectResolution(lowerTokens);
  const quality = detectQuality(joined, resolution);
  const languages = detectLanguages(lowerTokens);
  const { season, episode } = detectSeasonEpisode(name);
  const year = detectYear(lowerTokens);
  const title = extractTitle(tokens, lowerTokens) || name;

  return {
    quality,
    resolution: resolution === undefined ? undefined : `${resolution}p`,
    audioLanguages: languages.audio,
    subtitles: languages.subtitles,
    subtitleLanguages: languages.subtitleLanguages,
    season,
    episode,
    year,
    title,
    sortTitle: makeSortTitle(title),
    kind: classifyKind(name, lowerTokens, season, episode),
  };
}

export function compareQuality(left: QualityTier, right: QualityTier): number {
  return QUALITY_RANK[left] - QUALITY_RANK[right];
}

function detectResolution(tokens: string[]): number | undefined {
  let best: number | undefined;

  for (const token of tokens) {
    const match = RESOLUTION_TOKEN.exec(token);
    const value = match?.[1] !== undefined ? Number.parseInt(match[1], 10) : token === "4k" ? 2160 : undefined;
    if (value !== undefined && (best === undefined || value > best)) {
      best = value;
    }
  }

  return best;
}

function detectQuality(joined: string, resolution: number | undefined): QualityTier {
  let best: QualityTier = "unknown";

  for (const rule of QUALITY_RULES) {
    if (rule.pattern.test(joined) && QUALITY_RANK[rule.tier] > QUALITY_RANK[best]) {
      best = rule.tier;
    }
  }

  const fromResolution = tierFromResolution(resolution);
  return QUALITY_RANK[fromResolution] > QUALITY_RANK[best] ? fromResolution : best;
}

function tierFromResolution(resolution: number | undefined): QualityTier {
  if (resolution === undefined) {
    return "unknown";
  }

  if (resolution >= 2160) {
    return "UHD";
  }

  return resolution >= 720 ? "HD" : "SD";
}

function detectLanguages(tokens: string[]): {
  audio: LanguageTag[];
  subtitles: boolean;
  subtitleLanguages: LanguageTag[];
} {
  const audio = new Set<LanguageTag>();
  const subtitleLanguages = new Set<LanguageTag>();
  let subtitles = false;

  tokens.forEach((token, index) => {
    const subtitleCompound = SUBTITLE_COMPOUND_TOKENS[token];
    if (subtitleCompound !== undefined) {
      subtitleLanguages.add(subtitleCompound);
      subtitles = true;
      return;
    }

    const audioCompound = AUDIO_COMPOUND_TOKENS[token];
    if (audioCompound !== undefined) {
      audio.add(audioCompound);
      return;
    }

    if (GENERIC_SUBTITLE_TOKENS.has(token)) {
      subtitles = true;
      return;
    }

    const language = LANGUAGE_TOKENS[token];
    if (language === undefined) {
      return;
    }

    const next = tokens[index + 1];
    const previous = tokens[index - 1];
    const marksSubtitles =
      (next !== undefined && SUBTITLE_MARKERS.has(next)) ||
      previous === "tit" ||
      previous === "titulky";

    if (marksSubtitles) {
      subtitleLanguages.add(language);
      subtitles = true;
    } else {
      audio.add(language);
    }
  });

  return {
    audio: LANGUAGE_ORDER.filter((language) => audio.has(language)),
    subtitles,
    subtitleLanguages: LANGUAGE_ORDER.filter((language) => subtitleLanguages.has(language)),
  };
}

function detectSeasonEpisode(name: string): { season?: number; episode?: number } {
  const match = SEASON_EPISODE.exec(name) ?? ALT_SEASON_EPISODE.exec(name);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return {
      season: Number.parseInt(match[1], 10),
      episode: Number.parseInt(match[2], 10),
    };
  }

  const seasonMatch = SEASON_ONLY.exec(name);
  const seasonDigits = seasonMatch?.[1] ?? seasonMatch?.[2];
  const episodeMatch = EPISODE_ONLY.exec(name);

  return {
    season: seasonDigits === undefined ? undefined : Number.parseInt(seasonDigits, 10),
    episode: episodeMatch?.[1] === undefined ? undefined : Number.parseInt(episodeMatch[1], 10),
  };
}

// The leading token is never treated as a year so titles such as "1917" survive.
function detectYear(tokens: string[]): number | undefined {
  const token = tokens.find((item, index) => index > 0 && YEAR_TOKEN.test(item));
  return token === undefined ? undefined : Number.parseInt(token, 10);
}

function extractTitle(tokens: string[], lowerTokens: string[]): string {
  const stopIndex = lowerTokens.findIndex((token, index) => index > 0 && isMarkerToken(token));
  const titleTokens = stopIndex < 0 ? tokens : tokens.slice(0, stopIndex);
  return collapseWhitespace(titleTokens.join(" "));
}

function isMarkerToken(token: string): boolean {
  return (
    YEAR_TOKEN.test(token) ||
    RESOLUTION_TOKEN.test(token) ||
    /^s\d{1,2}(e\d{1,3})?$/u.test(token) ||
    /^e\d{1,3}$/u.test(token) ||
    /^\d{1,2}x\d{2,3}$/u.test(token) ||
    QUALITY_RULES.some((rule) => rule.pattern.test(` ${token} `)) ||
    LANGUAGE_TOKENS[token] !== undefined ||
    AUDIO_COMPOUND_TOKENS[token] !== undefined ||
    SUBTITLE_COMPOUND_TOKENS[token] !== undefined ||
    GENERIC_SUBTITLE_TOKENS.has(token) ||
    RELEASE_NOISE_TOKENS.has(token) ||
    MULTIPART_TOKEN.test(token)
  );
}

function classifyKind(
  name: string,
  tokens: string[],
  season: number | undefined,
  episode: number | undefined,
): MediaKind {
  if (season !== undefined || episode !== undefined) {
    return "series";
  }

  if (tokens.some((token) => OTHER_TOKENS.has(token))) {
    return "other";
  }

  if (/making[\s._-]?of|behind[\s._-]?the[\s._-]?scenes|deleted[\s._-]?scenes?/iu.test(name)) {
    return "other";
  }

  const multipart = tokens.some((token) => MULTIPART_TOKEN.test(token));
  if (multipart && !tokens.includes("movie") && !tokens.includes("film")) {
    return "other";
  }

  return "movie";
}
