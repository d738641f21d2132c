import { Parser } from "xml2js";
import { z } from "zod";

import { CliAppError } from "../../core/index.js";
import type { SearchResult } from "../types.js";

/** Flat view of a Webshare `<response>` element: child tag → value. */
export type WebshareResponse = Record<string, unknown>;

const responseSchema = z
  .object({
    status: z.string(),
    code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const fileEntrySchema = z.record(z.unknown());

export async function parseWebshareXml(xml: string, endpoint: string): Promise<WebshareResponse> {
  const parser = new Parser({ explicitArray: false, explicitRoot: false, trim: true });

  let parsed: unknown;
  try {
    parsed = await parser.parseStringPromise(xml);
  } catch (error) {
    throw new CliAppError({
      code: "E_UPSTREAM_BAD_RESPONSE",
      message: "webshare returned malformed XML",
      details: { provider: "webshare", endpoint },
      cause: error,
    });
  }

  const result = responseSchema.safeParse(parsed);
  if (!result.success) {
    throw new CliAppError({
      code: "E_UPSTREAM_BAD_RESPONSE",
      message: "webshare response is missing a status",
      details: { provider: "webshare", endpoint },
    });
  }

  const response = result.data;
  if (response.status !== "OK") {
    const code = response.code ?? "";
    const message = response.message ?? (response.status || "Unknown error");
    throw new CliAppError({
      code: code.startsWith("LOGIN") ? "E_AUTH_INVALID" : "E_UPSTREAM_BAD_RESPONSE",
      message: `webshare ${endpoint}: ${message}`,
      details: { provider: "webshare", endpoint, status: response.status, code },
    });
  }

  return response;
}

export function readText(response: WebshareResponse, key: string): string | undefined {
  const value = response[key];
  if (typeof value !== "string") {
    return undefined;
  }

  return value.length > 0 ? value : undefined;
}

/** Child elements that are plain text, as a string map. */
export function readTextFields(response: WebshareResponse): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(response)) {
    if (key !== "status" && typeof value === "string") {
      fields[key] = value;
    }
  }
  return fields;
}

// A single <file> collapses to an object instead of a one-element array.
export function readFileEntries(response: WebshareResponse): SearchResult[] {
  const raw = response.file;
  const entries = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
  const results: SearchResult[] = [];

  for (const entry of entries) {
    const parsed = fileEntrySchema.safeParse(entry);
    if (!parsed.success) {
      continue;
    }

    const result = toSearchResult(parsed.data);
    if (result !== undefined) {
      results.push(result);
    }
  }

  return results;
}

export function toSearchResult(entry: Record<string, unknown>): SearchResult | undefined {
  const ident = readText(entry, "ident")?.trim();
  const name = readText(entry, "name")?.trim();
  if (ident === undefined || ident.length === 0 || name === undefined || name.length === 0) {
    return undefined;
  }

  return {
    ident,
    name,
    size: readInteger(entry, "size"),
    extension: readText(entry, "type"),
    previewImage: readText(entry, "img"),
    positiveVotes: readInteger(entry, "positive_votes"),
    negativeVotes: readInteger(entry, "negative_votes"),
    passwordProtected: readText(entry, "password") === "1",
  };
}

export function readInteger(response: WebshareResponse, key: string): number | undefined {
  const text = readText(response, key);
  if (text === undefined || !/^\d+$/u.test(text)) {
    return undefined;
  }

  return Number.parseInt(text, 10);
}
