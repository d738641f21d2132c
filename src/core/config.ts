import { readFile } from "node:fs/promises";

import { z } from "zod";

import { CliAppError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";

export const METADATA_PROVIDER_ORDERS = [
  "tmdb_first",
  "csfd_first",
  "tmdb_only",
  "csfd_only",
  "none",
] as const;

export type MetadataProviderOrder = (typeof METADATA_PROVIDER_ORDERS)[number];

const qualityOptionSchema = z.enum(["any", "cam", "sd", "hd", "uhd"]);
const languageOptionSchema = z.enum(["any", "cz", "sk", "en"]);

const webshareSchema = z
  .object({
    username: z.string().trim().default(""),
    password: z.string().default(""),
    token: z.string().trim().optional(),
    keepLoggedIn: z.boolean().default(true),
    baseUrl: z.string().url().default("https://webshare.cz/api/"),
    downloadType: z.enum(["video_stream", "file_download"]).default("video_stream"),
    forceHttps: z.boolean().default(true),
  })
  .default({});

const filtersSchema = z
  .object({
    quality: qualityOptionSchema.default("any"),
    audio: languageOptionSchema.default("any"),
    subtitles: languageOptionSchema.default("any"),
  })
  .default({});

const metadataSchema = z
  .object({
    provider: z.enum(METADATA_PROVIDER_ORDERS).default("tmdb_first"),
    tmdbApiKey: z.string().trim().default(""),
    tmdbBaseUrl: z.string().url().default("https://api.themoviedb.org/3/"),
    language: z.string().trim().min(2).default("cs-CZ"),
    region: z.string().trim().default("CZ"),
    csfdBaseUrl: z.string().url().default("https://www.csfd.cz/"),
    csfdUserAgent: z
      .string()
      .trim()
      .min(1)
      .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)"),
    cacheTtlSeconds: z.number().int().positive().default(3600),
  })
  .default({});

const networkSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(15_000),
    retries: z.number().int().min(0).max(1).default(1),
    backoffMs: z.number().int().positive().default(500),
  })
  .default({});

const catalogueSchema = z
  .object({
    pageSize: z.number().int().min(20).max(100).default(40),
    maxCandidates: z.number().int().min(1).max(500).default(100),
  })
  .default({});

export const addonConfigSchema = z.object({
  webshare: webshareSchema,
  filters: filtersSchema,
  metadata: metadataSchema,
  network: networkSchema,
  catalogue: catalogueSchema,
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type AddonConfig = z.infer<typeof addonConfigSchema>;
export type AddonConfigInput = z.input<typeof addonConfigSchema>;
export type QualityOption = z.infer<typeof qualityOptionSchema>;
export type LanguageOption = z.infer<typeof languageOptionSchema>;

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  readText?: (path: string) => Promise<string>;
}

export function parseAddonConfig(input: unknown): AddonConfig {
  const result = addonConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  throw new CliAppError({
    code: "E_CONFIG_INVALID",
    message: "Configuration is invalid",
    details: result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/**
 * Reads the JSON settings file (when one is given) and overlays the recognized
 * environment variables on top of it.
 */
export async function loadAddonConfig(options: LoadConfigOptions = {}): Promise<AddonConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? nonEmpty(env.TVSTREAM_CONFIG);
  const readText = options.readText ?? ((file: string) => readFile(file, "utf8"));

  const fileConfig = path === undefined ? {} : await readConfigFile(path, readText);
  return parseAddonConfig(applyEnvironment(fileConfig, env));
}

async function readConfigFile(
  path: string,
  readText: (path: string) => Promise<string>,
): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readText(path);
  } catch (error) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Unable to read configuration file: ${path}`,
      details: { path, reason: error instanceof Error ? error.message : String(error) },
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Configuration file is not valid JSON: ${path}`,
      details: { path },
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Configuration file must contain a JSON object: ${path}`,
      details: { path },
    });
  }

  return parsed;
}

function applyEnvironment(
  base: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const webshare = { ...readSection(base, "webshare") };
  const metadata = { ...readSection(base, "metadata") };

  assignIfPresent(webshare, "username", env.WEBSHARE_USERNAME);
  assignIfPresent(webshare, "password", env.WEBSHARE_PASSWORD);
  assignIfPresent(webshare, "token", env.WEBSHARE_TOKEN);
  assignIfPresent(metadata, "tmdbApiKey", env.TMDB_API_KEY);
  assignIfPresent(metadata, "provider", env.METADATA_PROVIDER);
  assignIfPresent(metadata, "language", env.METADATA_LANGUAGE);

  const merged: Record<string, unknown> = { ...base, webshare, metadata };
  const logLevel = nonEmpty(env.LOG_LEVEL);
  if (logLevel !== undefined) {
    merged.logLevel = logLevel;
  }

  return merged;
}

function readSection(base: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = base[key];
  return isRecord(value) ? value : {};
}

function assignIfPresent(
  target: Record<string, unknown>,
  key: string,
  value: string | undefined,
): void {
  const normalized = nonEmpty(value);
  if (normalized !== undefined) {
    target[key] = normalized;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }

  return value.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
