import { load } from "cheerio";
import { z } from "zod";

import { collapseWhitespace } from "../request-normalization.js";
import type { ContentType } from "../types.js";

export interface CsfdSearchHit {
  title: string;
  href: string;
  year?: number;
  poster?: string;
  genres: string[];
}

export interface CsfdDetail {
  title?: string;
  description?: string;
  plot?: string;
  year?: number;
  rating?: number;
  votes?: number;
  poster?: string;
  origin?: string;
  genres: string[];
}

const jsonLdSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  dateCreated: z.union([z.string(), z.number()]).optional(),
  datePublished: z.union([z.string(), z.number()]).optional(),
  image: z.string().optional(),
  aggregateRating: z
    .object({
      ratingValue: z.union([z.number(), z.string()]).optional(),
      ratingCount: z.union([z.number(), z.string()]).optional(),
    })
    .optional(),
});

/** First hit of the films (or series) section on a search results page. */
export function parseCsfdSearchPage(html: string, contentType: ContentType): CsfdSearchHit | undefined {
  const $ = load(html);
  const section = contentType === "movie" ? "films" : "series";
  const article = $(`section.main-box[data-search-results="${section}"] article`).first();
  if (article.length === 0) {
    return undefined;
  }

  const link = article.find("a.film-title-name").first();
  const title = collapseWhitespace(link.text());
  const href = link.attr("href");
  if (title.length === 0 || href === undefined || href.length === 0) {
    return undefined;
  }

  const yearText = article.find(".info").first().text();
  const yearMatch = /\((\d{4})\)/u.exec(yearText);

  return {
    title,
    href,
    year: yearMatch?.[1] === undefined ? undefined : Number.parseInt(yearMatch[1], 10),
    poster: absolutizeImage(article.find("img").first().attr("src")),
    genres: splitGenres(article.find("p.film-origins-genres .info").first().text()),
  };
}

export function parseCsfdDetailPage(html: string): CsfdDetail {
  const $ = load(html);
  const detail: CsfdDetail = { genres: [] };

  const jsonLd = readJsonLd($('script[type="application/ld+json"]').first().text());
  if (jsonLd !== undefined) {
    detail.title = nonEmpty(jsonLd.name);
    detail.description = nonEmpty(jsonLd.description);
    detail.year = parseYearPrefix(jsonLd.dateCreated ?? jsonLd.datePublished);
    detail.poster = absolutizeImage(jsonLd.image);

    const ratingValue = toNumber(jsonLd.aggregateRating?.ratingValue);
    if (ratingValue !== undefined) {
      detail.rating = roundRating(ratingValue / 10);
    }
    detail.votes = toNumber(jsonLd.aggregateRating?.ratingCount);
  }

  if (detail.rating === undefined) {
    const percent = /(\d+)\s*%/u.exec($(".film-rating-average").first().text());
    if (percent?.[1] !== undefined) {
      detail.rating = roundRating(Number.parseInt(percent[1], 10) / 10);
    }
  }

  const origin = collapseWhitespace($(".origin").first().text());
  if (origin.length > 0) {
    detail.origin = origin;
    if (detail.year === undefined) {
      const yearMatch = /\b((?:19|20)\d{2})\b/u.exec(origin);
      detail.year = yearMatch?.[1] === undefined ? undefined : Number.parseInt(yearMatch[1], 10);
    }
  }

  const plot = collapseWhitespace($(".plot-preview").first().text());
  if (plot.length > 0) {
    detail.plot = plot;
  }

  detail.genres = splitGenres($(".genres").first().text());
  return detail;
}

function readJsonLd(raw: string): z.infer<typeof jsonLdSchema> | undefined {
  if (raw.trim().length === 0) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = jsonLdSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function splitGenres(text: string): string[] {
  return text
    .split("/")
    .map((part) => collapseWhitespace(part))
    .filter((part) => part.length > 0);
}

function absolutizeImage(src: string | undefined): string | undefined {
  if (src === undefined || src.trim().length === 0) {
    return undefined;
  }

  const trimmed = src.trim();
  return trimmed.startsWith("//") ? `https:${trimmed}` : trimmed;
}

function parseYearPrefix(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const match = /^(\d{4})/u.exec(String(value));
  return match?.[1] === undefined ? undefined : Number.parseInt(match[1], 10);
}

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function roundRating(value: number): number {
  return Math.round(value * 10) / 10;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed.length === 0 ? undefined : trimmed;
}
