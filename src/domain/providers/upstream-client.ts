import { CliAppError, type Logger } from "../../core/index.js";
import { collapseWhitespace } from "../request-normalization.js";

export interface UpstreamClientOptions {
  providerId: string;
  baseUrl: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  fetchImpl?: typeof fetch;
  userAgent?: string;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface UpstreamRequestOptions {
  pathOrUrl: string;
  method?: "GET" | "POST";
  headers?: RequestInit["headers"];
  body?: RequestInit["body"];
  query?: Record<string, string | number | undefined>;
}

export interface ClassifiedResponseErrorDetails {
  provider: string;
  url: string;
  status: number;
  classification: "rate-limit" | "anti-bot" | "not-found" | "bad-response";
  snippet?: string;
}

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

export class UpstreamClient {
  private readonly providerId: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  public constructor(options: UpstreamClientOptions) {
    this.providerId = options.providerId;
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = normalizePositiveInt(options.timeoutMs, 15_000);
    this.retries = normalizeNonNegativeInt(options.retries, 1);
    this.backoffMs = normalizePositiveInt(options.backoffMs, 500);
    this.maxBackoffMs = normalizePositiveInt(options.maxBackoffMs, 4_000);
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.userAgent = options.userAgent ?? "tvstream/0.1";
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;

    if (typeof this.fetchImpl !== "function") {
      throw new CliAppError({
        code: "E_UNKNOWN",
        message: "Global fetch is unavailable. Use Node 20+ or provide fetchImpl.",
      });
    }
  }

  public async requestText(options: UpstreamRequestOptions): Promise<string> {
    return this.request(options, async (response) => response.text());
  }

  /** Parsed JSON body; callers validate its shape. */
  public async requestJson(options: UpstreamRequestOptions): Promise<unknown> {
    const text = await this.requestText(options);

    try {
      const payload: unknown = JSON.parse(text);
      return payload;
    } catch (error) {
      throw new CliAppError({
        code: "E_UPSTREAM_BAD_RESPONSE",
        message: `${this.providerId} upstream returned invalid JSON`,
        details: {
          provider: this.providerId,
          url: redactUrl(this.resolve(options)),
          classification: "bad-response",
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    }
  }

  /**
   * Runs the request with retries. Each attempt, body read included, runs
   * under one deadline of `timeoutMs`.
   */
  public async request<T>(
    options: UpstreamRequestOptions,
    readBody: (response: Response) => Promise<T>,
  ): Promise<T> {
    const url = this.resolve(options);
    const maxAttempts = this.retries + 1;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt += 1;

      try {
        const outcome = await this.attempt(url, options, readBody);
        if (outcome.ok) {
          return outcome.value;
        }

        if (attempt < maxAttempts && RETRYABLE_STATUS.has(outcome.status)) {
          await this.backoff(attempt, outcome.error);
          continue;
        }

        throw outcome.error;
      } catch (error) {
        const mapped = mapFetchError(error, this.providerId, url, this.timeoutMs);
        if (
          attempt < maxAttempts &&
          (mapped.code === "E_UPSTREAM_NETWORK" || mapped.code === "E_UPSTREAM_TIMEOUT")
        ) {
          await this.backoff(attempt, mapped);
          continue;
        }

        throw mapped;
      }
    }

    throw new CliAppError({
      code: "E_UNKNOWN",
      message: `${this.providerId} upstream request failed unexpectedly`,
      details: {
        provider: this.providerId,
        url: redactUrl(url),
      },
    });
  }

  private resolve(options: UpstreamRequestOptions): URL {
    const url = resolveUrl(this.baseUrl, options.pathOrUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async backoff(attempt: number, cause: CliAppError): Promise<void> {
    const delayMs = computeBackoff(this.backoffMs, this.maxBackoffMs, attempt);
    this.logger?.debug(
      { provider: this.providerId, attempt, delayMs, code: cause.code },
      "retrying upstream request",
    );
    await this.sleep(delayMs);
  }

  private async attempt<T>(
    url: URL,
    options: UpstreamRequestOptions,
    readBody: (response: Response) => Promise<T>,
  ): Promise<AttemptOutcome<T>> {
    const headers = new Headers(options.headers);
    if (!headers.has("user-agent")) {
      headers.set("user-agent", this.userAgent);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await untilAborted(
        this.fetchImpl(url, {
          method: options.method ?? "GET",
          headers,
          body: options.body,
          signal: controller.signal,
        }),
        controller.signal,
      );

      if (!response.ok) {
        const snippet = await untilAborted(readSnippet(response), controller.signal);
        return {
          ok: false,
          status: response.status,
          error: classifyResponseError(this.providerId, url, response.status, snippet),
        };
      }

      return { ok: true, value: await untilAborted(readBody(response), controller.signal) };
    } finally {
      clearTimeout(timeout);
    }
  }
}

type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; status: number; error: CliAppError };

// Stub or stalled bodies may ignore the signal, so the deadline is raced as well.
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      const error = new Error("Upstream request aborted");
      error.name = "AbortError";
      reject(error);
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export function classifyResponseError(
  providerId: string,
  url: URL,
  status: number,
  snippet: string,
): CliAppError {
  const classification = classifyResponse(status, snippet);

  return new CliAppError({
    code: "E_UPSTREAM_BAD_RESPONSE",
    message: `${providerId} upstream returned HTTP ${status}`,
    details: {
      provider: providerId,
      url: redactUrl(url),
      status,
      classification,
      snippet,
    } satisfies ClassifiedResponseErrorDetails,
  });
}

export function classifyResponse(
  status: number,
  snippet: string,
): ClassifiedResponseErrorDetails["classification"] {
  if (status === 429 || /too\s+many\s+requests|rate\s*limit/iu.test(snippet)) {
    return "rate-limit";
  }

  if (status === 403 || status === 401 || looksLikeAntiBotChallenge(snippet)) {
    return "anti-bot";
  }

  if (status === 404) {
    return "not-found";
  }

  return "bad-response";
}

export function looksLikeAntiBotChallenge(text: string): boolean {
  const snippet = text.toLowerCase();
  return [
    "challenge-platform",
    "cloudflare",
    "cf-challenge",
    "captcha",
    "attention required",
    "just a moment",
  ].some((needle) => snippet.includes(needle));
}

// Query strings may carry API keys.
function redactUrl(url: URL): string {
  const copy = new URL(url.toString());
  if (copy.searchParams.has("api_key")) {
    copy.searchParams.set("api_key", "***");
  }
  return copy.toString();
}

function mapFetchError(
  error: unknown,
  providerId: string,
  url: URL,
  timeoutMs: number,
): CliAppError {
  if (error instanceof CliAppError) {
    return error;
  }

  if (isAbortError(error)) {
    return new CliAppError({
      code: "E_UPSTREAM_TIMEOUT",
      message: `${providerId} upstream request timed out after ${timeoutMs}ms`,
      details: {
        provider: providerId,
        url: redactUrl(url),
        timeoutMs,
      },
      cause: error,
    });
  }

  return new CliAppError({
    code: "E_UPSTREAM_NETWORK",
    message: `Failed to reach ${providerId} upstream`,
    details: {
      provider: providerId,
      url: redactUrl(url),
      reason: error instanceof Error ? error.message : String(error),
    },
    cause: error,
  });
}

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return error.name === "AbortError" || error.name === "TimeoutError";
}

function normalizeBaseUrl(value: string): string {
  const normalized = value.trim();
  if (normalized.length === 0) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: "Upstream base URL is empty",
    });
  }

  return normalized.endsWith("/") ? normalized : `${normalized}/`;
}

function resolveUrl(baseUrl: string, pathOrUrl: string): URL {
  if (/^https?:\/\//iu.test(pathOrUrl)) {
    return new URL(pathOrUrl);
  }

  return new URL(pathOrUrl.replace(/^\/+/u, ""), baseUrl);
}

function normalizePositiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
}

function normalizeNonNegativeInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return fallback;
  }

  return Math.floor(value);
}

function computeBackoff(baseMs: number, maxMs: number, attempt: number): number {
  const multiplier = Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(maxMs, baseMs * multiplier);
}

async function readSnippet(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return collapseWhitespace(text).slice(0, 320);
  } catch {
    return "";
  }
}

async function defaultSleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}
