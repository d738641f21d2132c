import { CliAppError, isAuthFailure, type Logger } from "../../core/index.js";
import type { SearchResult } from "../types.js";
import { hashWebsharePassword } from "./md5crypt.js";
import { UpstreamClient } from "./upstream-client.js";
import {
  parseWebshareXml,
  readFileEntries,
  readInteger,
  readText,
  readTextFields,
  type WebshareResponse,
} from "./webshare-xml.js";

export const WEBSHARE_BASE_URL = "https://webshare.cz/api/";

const TOKEN_CHECK_INTERVAL_MS = 10 * 60 * 1000;
const MAX_SEARCH_LIMIT = 100;

export type WebshareDownloadType = "video_stream" | "file_download";

export interface WebshareClientOptions {
  baseUrl?: string;
  username?: string;
  password?: string;
  token?: string;
  keepLoggedIn?: boolean;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  logger?: Logger;
}

export interface WebshareSearchParams {
  what: string;
  category?: string;
  sort?: string;
  limit?: number;
  offset?: number;
}

export interface WebshareSearchPage {
  total: number;
  files: SearchResult[];
}

export interface FileLinkOptions {
  downloadType?: WebshareDownloadType;
  forceHttps?: boolean;
  password?: string;
}

type FormFields = Record<string, string | number | undefined>;

/**
 * Client for the Webshare XML API. Holds the session token (`wst`) and
 * re-verifies it lazily before token-bound calls.
 */
export class WebshareClient {
  private readonly upstream: UpstreamClient;
  private readonly username: string;
  private readonly password: string;
  private readonly keepLoggedIn: boolean;
  private readonly clock: () => number;
  private readonly logger?: Logger;
  private currentToken?: string;
  private verifiedAt?: number;

  public constructor(options: WebshareClientOptions = {}) {
    this.logger = options.logger?.child({ component: "webshare" });
    this.upstream = new UpstreamClient({
      providerId: "webshare",
      baseUrl: options.baseUrl ?? WEBSHARE_BASE_URL,
      timeoutMs: options.timeoutMs,
      retries: options.retries,
      backoffMs: options.backoffMs,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
      logger: this.logger,
    });
    this.username = options.username ?? "";
    this.password = options.password ?? "";
    this.keepLoggedIn = options.keepLoggedIn ?? true;
    this.clock = options.clock ?? Date.now;
    this.setToken(options.token);
  }

  public get token(): string | undefined {
    return this.currentToken;
  }

  public get hasCredentials(): boolean {
    return this.username.length > 0 && this.password.length > 0;
  }

  public setToken(token: string | undefined): void {
    const normalized = token?.trim();
    this.currentToken = normalized === undefined || normalized.length === 0 ? undefined : normalized;
    this.verifiedAt = undefined;
  }

  public async login(
    username: string = this.username,
    password: string = this.password,
    keepLoggedIn: boolean = this.keepLoggedIn,
  ): Promise<string> {
    if (username.length === 0 || password.length === 0) {
      throw new CliAppError({
        code: "E_AUTH_REQUIRED",
        message: "Webshare credentials are missing",
        details: { hint: "Set WEBSHARE_USERNAME and WEBSHARE_PASSWORD or webshare.* in the config file." },
      });
    }

    const hashed = await this.hashPassword(username, password);
    const attempts = hashed === undefined ? [password] : [hashed, password];
    let lastError: CliAppError | undefined;

    for (const candidate of attempts) {
      try {
        const response = await this.post("/login/", {
          username_or_email: username,
          password: candidate,
          keep_logged_in: keepLoggedIn ? 1 : 0,
        });
        const token = readText(response, "token");
        if (token === undefined) {
          throw new CliAppError({
            code: "E_AUTH_INVALID",
            message: "webshare login response carries no token",
          });
        }

        this.setToken(token);
        this.verifiedAt = this.clock();
        this.logger?.info({ username }, "logged in");
        return token;
      } catch (error) {
        if (!(error instanceof CliAppError) || !isAuthFailure(error)) {
          throw error;
        }
        lastError = error;
      }
    }

    throw new CliAppError({
      code: "E_AUTH_INVALID",
      message: lastError?.message ?? "webshare login failed",
      details: { username },
      cause: lastError,
    });
  }

  /** Current token, logging in or re-verifying as needed. */
  public async ensureLoggedIn(): Promise<string> {
    const token = this.currentToken;
    if (token === undefined) {
      return this.login();
    }

    const now = this.clock();
    if (this.verifiedAt !== undefined && now - this.verifiedAt < TOKEN_CHECK_INTERVAL_MS) {
      return token;
    }

    try {
      await this.post("/user_data/", { wst: token });
      this.verifiedAt = now;
      return token;
    } catch (error) {
      if (!(error instanceof CliAppError) || isTransportFailure(error)) {
        throw error;
      }

      this.logger?.info({ code: error.code }, "session token rejected, dropping it");
      this.setToken(undefined);
      if (this.hasCredentials) {
        return this.login();
      }

      throw new CliAppError({
        code: "E_AUTH_INVALID",
        message: "Webshare session expired",
        cause: error,
      });
    }
  }

  public async search(params: WebshareSearchParams): Promise<WebshareSearchPage> {
    const limit = Math.max(1, Math.min(MAX_SEARCH_LIMIT, Math.floor(params.limit ?? 40)));
    const offset = Math.max(0, Math.floor(params.offset ?? 0));

    const response = await this.post("/search/", {
      what: params.what,
      category: params.category ?? "video",
      sort: params.sort,
      limit,
      offset,
      wst: this.currentToken,
    });

    const files = readFileEntries(response);
    this.logger?.debug({ what: params.what, offset, count: files.length }, "search page");
    return {
      total: readInteger(response, "total") ?? files.length,
      files,
    };
  }

  public async fileInfo(ident: string): Promise<Record<string, string>> {
    const token = await this.ensureLoggedIn();
    const response = await this.post("/file_info/", { ident, wst: token });
    return readTextFields(response);
  }

  public async fileLink(ident: string, options: FileLinkOptions = {}): Promise<string> {
    const token = await this.ensureLoggedIn();
    const response = await this.post("/file_link/", {
      ident,
      download_type: options.downloadType ?? "video_stream",
      force_https: (options.forceHttps ?? true) ? 1 : 0,
      password: options.password,
      wst: token,
    });

    const link = readText(response, "link");
    if (link === undefined) {
      throw new CliAppError({
        code: "E_UPSTREAM_BAD_RESPONSE",
        message: "webshare did not return a playback link",
        details: { provider: "webshare", ident },
      });
    }

    return link;
  }

  /** Ends the remote session. The local token is cleared even if the call fails. */
  public async logout(): Promise<void> {
    const token = this.currentToken;
    if (token === undefined) {
      return;
    }

    try {
      await this.post("/logout/", { wst: token });
    } catch (error) {
      this.logger?.warn(
        { reason: error instanceof Error ? error.message : String(error) },
        "logout request failed",
      );
    } finally {
      this.setToken(undefined);
    }
  }

  private async hashPassword(username: string, password: string): Promise<string | undefined> {
    try {
      const response = await this.post("/salt/", { username_or_email: username });
      const salt = readText(response, "salt");
      return salt === undefined ? undefined : hashWebsharePassword(password, salt);
    } catch (error) {
      if (!(error instanceof CliAppError) || isTransportFailure(error)) {
        throw error;
      }

      this.logger?.warn({ code: error.code }, "unable to fetch password salt");
      return undefined;
    }
  }

  private async post(endpoint: string, fields: FormFields): Promise<WebshareResponse> {
    const body = new URLSearchParams();
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        body.set(key, String(value));
      }
    }

    const xml = await this.upstream.requestText({
      pathOrUrl: endpoint,
      method: "POST",
      headers: {
        accept: "text/xml; charset=UTF-8",
        "content-type": "application/x-www-form-urlencoded; charset=UTF-8",
      },
      body,
    });

    return parseWebshareXml(xml, endpoint);
  }
}

function isTransportFailure(error: CliAppError): boolean {
  return error.code === "E_UPSTREAM_NETWORK" || error.code === "E_UPSTREAM_TIMEOUT";
}
