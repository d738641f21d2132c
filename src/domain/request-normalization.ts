import type { LanguageTag, MetadataQuery } from "./types.js";

const LANGUAGE_ALIAS_MAP: Record<string, LanguageTag> = {
  cz: "CZ",
  cs: "CZ",
  ces: "CZ",
  cze: "CZ",
  czech: "CZ",
  cesky: "CZ",
  sk: "SK",
  slk: "SK",
  slo: "SK",
  slovak: "SK",
  en: "EN",
  eng: "EN",
  english: "EN",
};

const LEADING_ARTICLES = ["the ", "a ", "an ", "der ", "die ", "das ", "le ", "la ", "los ", "las ", "el "];

export function normalizeLanguage(value: string): LanguageTag | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized.length === 0) {
    return undefined;
  }

  return LANGUAGE_ALIAS_MAP[normalized];
}

export function normalizeLanguages(values: string[]): LanguageTag[] {
  const deduped = new Set<LanguageTag>();

  for (const value of values) {
    const normalized = normalizeLanguage(value);
    if (normalized !== undefined) {
      deduped.add(normalized);
    }
  }

  return [...deduped];
}

export function tokenize(text: string): string[] {
  if (text.trim().length === 0) {
    return [];
  }

  const items = foldDiacritics(text)
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  const deduped = new Set(items);
  return [...deduped].sort((a, b) => a.localeCompare(b));
}

/** Lowercase, diacritic-free, alphanumeric-only form used for title comparisons. */
export function normalizeTitleKey(title: string): string {
  return foldDiacritics(title)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "");
}

export function makeSortTitle(title: string): string {
  const lower = collapseWhitespace(title).toLowerCase();

  for (const article of LEADING_ARTICLES) {
    if (lower.startsWith(article)) {
      const rest = lower.slice(article.length).trim();
      return rest.length > 0 ? rest : lower;
    }
  }

  return lower;
}

export function buildMetadataKey(query: MetadataQuery): string {
  return [query.contentType, normalizeTitleKey(query.title), String(query.year ?? "")].join("|");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function foldDiacritics(value: string): string {
  return value.normalize("NFD").replace(/\p{M}+/gu, "");
}
