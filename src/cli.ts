import { readFileSync } from "node:fs";

import { z } from "zod";

import {
  CliAppError,
  createCommandContext,
  createErrorEnvelope,
  createLogger,
  createSuccessEnvelope,
  EXIT_CODES,
  loadAddonConfig,
  mapErrorCodeToExitCode,
  toCliAppError,
  type AddonConfig,
  type Logger,
} from "./core/index.js";

import { getDoctorFailureCode, renderDoctorOutput, runDoctorCommand } from "./commands/doctor.js";
import { presentDiscoverResponse, renderDiscoverOutput } from "./commands/discover.js";
import { presentGenresResponse, renderGenresOutput } from "./commands/genres.js";
import { presentSessionResponse, renderLoginOutput } from "./commands/login.js";
import { presentPlayResponse, renderPlayOutput } from "./commands/play.js";
import { renderProvidersOutput, runProvidersCommand } from "./commands/providers.js";
import { presentSearchResponse, renderSearchOutput } from "./commands/search.js";
import {
  presentEpisodesResponse,
  presentSeasonsResponse,
  renderEpisodesOutput,
  renderSeasonsOutput,
} from "./commands/series.js";
import {
  decodeDiscoveryList,
  decodeLanguageList,
  decodeLetter,
  decodeQuality,
  decodeRequest,
  decodeScope,
  decodeSeason,
  encodeRequest,
  routeRequest,
  type AddonRequest,
  type AddonResponse,
} from "./domain/router.js";
import { AddonSession } from "./domain/session.js";
import type { FilterCriteria } from "./domain/types.js";

type FlagValue = string | string[] | boolean;

interface WritableLike {
  write(chunk: string): unknown;
}

export interface TvstreamCliDeps {
  stdout?: WritableLike;
  stderr?: WritableLike;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
  env?: NodeJS.ProcessEnv;
  readText?: (path: string) => Promise<string>;
  logger?: Logger;
  nodeVersion?: string;
}

interface ParsedArgs {
  command: string | undefined;
  flags: Map<string, FlagValue>;
  positional: string[];
}

interface HelpTarget {
  command?: string;
}

interface VersionInfo {
  name: string;
  version: string;
}

interface DispatchResult {
  data: unknown;
  humanOutput: string;
}

interface DispatchDeps {
  config: AddonConfig;
  session: AddonSession;
  nodeVersion?: string;
}

const SHORT_FLAG_ALIASES: Record<string, string> = {
  "-h": "help",
  "-V": "version",
  "-v": "verbose",
};

const SESSION_COMMANDS = [
  "search",
  "browse",
  "discover",
  "seasons",
  "episodes",
  "play",
  "genres",
  "login",
  "logout",
  "route",
] as const;

type SessionCommand = Exclude<(typeof SESSION_COMMANDS)[number], "route">;
const MAX_PAGE_SIZE = 100;

export async function runCli(argv: string[], deps: TvstreamCliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const parsed = parseArgs(argv);
  const json = getBooleanFlag(parsed.flags, "json");
  const verbose = getBooleanFlag(parsed.flags, "verbose");

  if (hasFlag(parsed.flags, "version") || parsed.command === "version") {
    const context = createCommandContext({
      clock: deps.clock,
      now: deps.now,
      requestIdFactory: deps.requestIdFactory,
      verbose,
    });
    const versionInfo = loadVersionInfo();
    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(versionInfo, context.toMeta()))}\n`);
    } else {
      stdout.write(`${versionInfo.name} ${versionInfo.version}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  if (parsed.command === undefined || parsed.command === "help" || hasFlag(parsed.flags, "help")) {
    const context = createCommandContext({
      clock: deps.clock,
      now: deps.now,
      requestIdFactory: deps.requestIdFactory,
      verbose,
    });
    const helpTarget = resolveHelpTarget(parsed);
    const help = renderHelp(helpTarget.command);
    if (json) {
      const payload: Record<string, unknown> = {
        help,
      };
      if (helpTarget.command) {
        payload.command = helpTarget.command;
      }
      stdout.write(`${JSON.stringify(createSuccessEnvelope(payload, context.toMeta()))}\n`);
    } else {
      stdout.write(`${help}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  try {
    const config = await loadAddonConfig({
      path: getOptionalString(parsed.flags, "config"),
      env: deps.env,
      readText: deps.readText,
    });
    const logger = deps.logger ?? createLogger({ level: verbose ? "debug" : config.logLevel });
    const context = createCommandContext({
      clock: deps.clock,
      now: deps.now,
      requestIdFactory: deps.requestIdFactory,
      verbose,
      logger,
    });

    const session = new AddonSession({
      config,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
      clock: deps.clock,
      logger: context.logger,
    });

    const result = await dispatch(parsed, { config, session, nodeVersion: deps.nodeVersion });

    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(result.data, context.toMeta()))}\n`);
    } else {
      stdout.write(`${result.humanOutput}\n`);
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const appError = toCliAppError(error);
    const exitCode = mapErrorCodeToExitCode(appError.code);

    if (json) {
      stdout.write(
        `${JSON.stringify(createErrorEnvelope(appError.code, appError.message, appError.details))}\n`,
      );
    } else {
      stderr.write(formatHumanError(appError));
    }

    return exitCode;
  }
}

async function dispatch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  if (parsed.command !== "route" && parsed.positional.length > 0) {
    throw createArgumentError(
      "E_ARG_UNSUPPORTED",
      `${parsed.command ?? "command"} does not accept positional arguments`,
      {
        positional: parsed.positional,
      },
    );
  }

  switch (parsed.command) {
    case "providers":
      return presentResponse(await routeRequest(deps.session, { action: "providers" }));
    case "doctor":
      return dispatchDoctor(deps);
    case "search":
    case "browse":
    case "discover":
    case "seasons":
    case "episodes":
    case "play":
    case "genres":
    case "login":
    case "logout":
      return presentResponse(await routeRequest(deps.session, buildRequest(parsed.command, parsed)));
    case "route":
      return dispatchRoute(parsed, deps);
    default:
      throw createArgumentError("E_ARG_UNSUPPORTED", `Unknown command: ${parsed.command}`, {
        command: parsed.command,
        allowed: [...SESSION_COMMANDS, "providers", "doctor", "version", "help"],
      });
  }
}

async function dispatchDoctor(deps: DispatchDeps): Promise<DispatchResult> {
  const output = await runDoctorCommand({
    config: deps.config,
    sources: deps.session.sources,
    nodeVersion: deps.nodeVersion,
  });

  const failureCode = getDoctorFailureCode(output);
  if (failureCode !== undefined) {
    throw new CliAppError({
      code: failureCode,
      message: `Doctor found ${output.summary.errors} error(s).`,
      details: output,
    });
  }

  return {
    data: output,
    humanOutput: renderDoctorOutput(output),
  };
}

async function dispatchRoute(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const url = parsed.positional[0] ?? getOptionalString(parsed.flags, "url");
  if (url === undefined || parsed.positional.length > 1) {
    throw createArgumentError("E_ARG_MISSING", "route expects exactly one plugin URL", {
      arg: "url",
      positional: parsed.positional,
    });
  }

  return presentResponse(await routeRequest(deps.session, decodeRequest(url)));
}

function presentResponse(response: AddonResponse): DispatchResult {
  switch (response.action) {
    case "search":
    case "browse": {
      const output = presentSearchResponse(response);
      return { data: output, humanOutput: renderSearchOutput(output) };
    }
    case "genres": {
      const { scope } = response;
      const output = presentGenresResponse(response, (genre) =>
        encodeRequest({ action: "browse", scope, filters: { genre } }),
      );
      return { data: output, humanOutput: renderGenresOutput(output) };
    }
    case "discover": {
      const output = presentDiscoverResponse(response);
      return { data: output, humanOutput: renderDiscoverOutput(output) };
    }
    case "seasons": {
      const output = presentSeasonsResponse(response);
      return { data: output, humanOutput: renderSeasonsOutput(output) };
    }
    case "episodes": {
      const output = presentEpisodesResponse(response);
      return { data: output, humanOutput: renderEpisodesOutput(output) };
    }
    case "play": {
      const output = presentPlayResponse(response);
      return { data: output, humanOutput: renderPlayOutput(output) };
    }
    case "login":
    case "logout": {
      const output = presentSessionResponse(response);
      return { data: output, humanOutput: renderLoginOutput(output) };
    }
    case "providers": {
      const output = runProvidersCommand(response.providers);
      return { data: output, humanOutput: renderProvidersOutput(output) };
    }
  }
}

function buildRequest(command: SessionCommand, parsed: ParsedArgs): AddonRequest {
  switch (command) {
    case "search":
      return {
        action: "search",
        query: getRequiredString(parsed.flags, "query").trim(),
        ...readListingFlags(parsed.flags),
      };
    case "browse": {
      const query = getOptionalString(parsed.flags, "query")?.trim();
      return {
        action: "browse",
        ...(query === undefined ? {} : { query }),
        ...readListingFlags(parsed.flags),
      };
    }
    case "discover":
      return readDiscoverFlags(parsed.flags);
    case "seasons":
      return { action: "seasons", title: getRequiredString(parsed.flags, "title").trim() };
    case "episodes": {
      const filters = readFilterFlags(parsed.flags);
      return {
        action: "episodes",
        title: getRequiredString(parsed.flags, "title").trim(),
        season: decodeSeason(getRequiredString(parsed.flags, "season")),
        ...(Object.keys(filters).length > 0 ? { filters } : {}),
      };
    }
    case "play":
      return { action: "play", ident: getRequiredString(parsed.flags, "ident").trim() };
    case "genres":
      return { action: "genres", scope: decodeScope(getOptionalString(parsed.flags, "type") ?? "movie") };
    case "login":
      return { action: "login" };
    case "logout":
      return { action: "logout" };
  }
}

function readDiscoverFlags(flags: Map<string, FlagValue>): AddonRequest {
  const scope = decodeScope(getOptionalString(flags, "type") ?? "movie");
  const list = getOptionalString(flags, "list");
  const genre = getOptionalString(flags, "genre")?.trim();
  if (list !== undefined && genre !== undefined) {
    throw createArgumentError("E_ARG_CONFLICT", "--list and --genre cannot be combined", {
      args: ["list", "genre"],
    });
  }

  const page = getOptionalPositiveInteger(flags, "page");
  return {
    action: "discover",
    scope,
    ...(list === undefined ? {} : { list: decodeDiscoveryList(list, scope) }),
    ...(genre === undefined || genre.length === 0 ? {} : { genre }),
    ...(page === undefined ? {} : { page }),
  };
}

function readListingFlags(flags: Map<string, FlagValue>): {
  scope: "movie" | "series";
  filters?: FilterCriteria;
  sort?: string;
  page?: number;
  pageSize?: number;
} {
  const filters = readFilterFlags(flags);

  const pageSize = getOptionalPositiveInteger(flags, "page-size");
  if (pageSize !== undefined && pageSize > MAX_PAGE_SIZE) {
    throw createArgumentError("E_ARG_INVALID", `--page-size must be at most ${MAX_PAGE_SIZE}`, {
      arg: "page-size",
      value: pageSize,
    });
  }

  const page = getOptionalPositiveInteger(flags, "page");
  const sort = getOptionalString(flags, "sort");

  return {
    scope: decodeScope(getOptionalString(flags, "type") ?? "movie"),
    ...(Object.keys(filters).length > 0 ? { filters } : {}),
    ...(sort === undefined ? {} : { sort }),
    ...(page === undefined ? {} : { page }),
    ...(pageSize === undefined ? {} : { pageSize }),
  };
}

function readFilterFlags(flags: Map<string, FlagValue>): FilterCriteria {
  const filters: FilterCriteria = {};

  const quality = getOptionalString(flags, "quality");
  if (quality !== undefined) {
    filters.minQuality = decodeQuality(quality);
  }

  const audio = splitCommaSeparated(getStringValues(flags, "audio"));
  if (audio.length > 0) {
    filters.audioLanguages = decodeLanguageList(audio.join(","), "audio");
  }

  if (getBooleanFlag(flags, "subtitles")) {
    filters.requireSubtitles = true;
  }

  const subtitleLanguages = splitCommaSeparated(getStringValues(flags, "subtitle-lang"));
  if (subtitleLanguages.length > 0) {
    filters.subtitleLanguages = decodeLanguageList(subtitleLanguages.join(","), "subtitle-lang");
  }

  const genre = getOptionalString(flags, "genre");
  if (genre !== undefined) {
    filters.genre = genre.trim();
  }

  const letter = getOptionalString(flags, "letter");
  if (letter !== undefined) {
    filters.letter = decodeLetter(letter);
  }

  return filters;
}

function parseArgs(argv: string[]): ParsedArgs {
  let command: string | undefined;
  const flags = new Map<string, FlagValue>();
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      continue;
    }

    const shortAlias = SHORT_FLAG_ALIASES[token];
    if (shortAlias !== undefined) {
      flags.set(shortAlias, true);
      continue;
    }

    if (token.startsWith("--")) {
      const stripped = token.slice(2);
      const eqIndex = stripped.indexOf("=");
      if (eqIndex >= 0) {
        const key = stripped.slice(0, eqIndex);
        const value = stripped.slice(eqIndex + 1);
        appendFlagValue(flags, key, value);
        continue;
      }

      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith("-")) {
        appendFlagValue(flags, stripped, next);
        index += 1;
        continue;
      }

      flags.set(stripped, true);
      continue;
    }

    if (command === undefined) {
      command = token;
      continue;
    }

    positional.push(token);
  }

  return {
    command,
    flags,
    positional,
  };
}

function hasFlag(flags: Map<string, FlagValue>, key: string): boolean {
  return flags.has(key);
}

function appendFlagValue(flags: Map<string, FlagValue>, key: string, value: string): void {
  const previous = flags.get(key);
  if (previous === undefined) {
    flags.set(key, value);
    return;
  }

  if (Array.isArray(previous)) {
    flags.set(key, [...previous, value]);
    return;
  }

  if (typeof previous === "string") {
    flags.set(key, [previous, value]);
    return;
  }

  flags.set(key, value);
}

function getBooleanFlag(flags: Map<string, FlagValue>, key: string): boolean {
  const value = flags.get(key);
  if (value === undefined) {
    return false;
  }

  if (typeof value === "boolean") {
    return value;
  }

  const candidate = Array.isArray(value) ? value.at(-1) : value;
  if (candidate === "true") {
    return true;
  }

  if (candidate === "false") {
    return false;
  }

  throw createArgumentError("E_ARG_INVALID", `--${key} must be true or false`, {
    arg: key,
    value: candidate,
  });
}

function getRequiredString(flags: Map<string, FlagValue>, key: string): string {
  const value = getOptionalString(flags, key);
  if (value === undefined || value.trim().length === 0) {
    throw createArgumentError("E_ARG_MISSING", `--${key} is required`, {
      arg: key,
    });
  }

  return value;
}

function getOptionalString(flags: Map<string, FlagValue>, key: string): string | undefined {
  const value = flags.get(key);

  if (value === undefined || typeof value === "boolean") {
    return undefined;
  }

  if (Array.isArray(value)) {
    const candidate = value.at(-1);
    return candidate !== undefined && candidate.trim().length > 0 ? candidate : undefined;
  }

  return value.trim().length > 0 ? value : undefined;
}

function getStringValues(flags: Map<string, FlagValue>, key: string): string[] {
  const value = flags.get(key);

  if (value === undefined || typeof value === "boolean") {
    return [];
  }

  const values = Array.isArray(value) ? value : [value];
  return values.filter((item) => item.trim().length > 0);
}

function getOptionalPositiveInteger(
  flags: Map<string, FlagValue>,
  key: string,
): number | undefined {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/u.test(value.trim()) || !Number.isFinite(parsed) || parsed <= 0) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a positive integer`, {
      arg: key,
      value,
    });
  }

  return parsed;
}

function splitCommaSeparated(values: string[]): string[] {
  return values
    .flatMap((item) => item.split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function resolveHelpTarget(parsed: ParsedArgs): HelpTarget {
  if (parsed.command === "help") {
    return {
      command: parsed.positional[0],
    };
  }

  if (hasFlag(parsed.flags, "help")) {
    return {
      command: parsed.command,
    };
  }

  return {};
}

const FILTER_USAGE =
  "[--type movie|series] [--quality any|cam|sd|hd|uhd] [--audio cz,sk,en] [--subtitles] [--subtitle-lang cz,sk,en] [--genre <name>] [--letter a-z|0-9] [--page <n>] [--page-size <n>] [--sort <order>]";

const DISCOVER_USAGE = "[--type movie|series] [--list <name> | --genre <name>] [--page <n>]";

const EPISODE_FILTER_USAGE =
  "[--quality any|cam|sd|hd|uhd] [--audio cz,sk,en] [--subtitles] [--subtitle-lang cz,sk,en] [--letter a-z|0-9]";

function renderHelp(command?: string): string {
  if (command === "search") {
    return [
      "tvstream search",
      "",
      "Usage:",
      `  tvstream search --query <text> ${FILTER_USAGE} [--config <path>] [--json]`,
      "Notes:",
      "  Filters default to the filters.* section of the configuration.",
    ].join("\n");
  }

  if (command === "browse") {
    return [
      "tvstream browse",
      "",
      "Usage:",
      `  tvstream browse [--query <text>] ${FILTER_USAGE} [--config <path>] [--json]`,
    ].join("\n");
  }

  if (command === "discover") {
    return [
      "tvstream discover",
      "",
      "Usage:",
      `  tvstream discover ${DISCOVER_USAGE} [--config <path>] [--json]`,
      "Notes:",
      "  Movie lists: popular, top_rated, now_playing, upcoming.",
      "  Series lists: popular, top_rated, airing_today, on_the_air.",
    ].join("\n");
  }

  if (command === "seasons" || command === "episodes") {
    return [
      "tvstream seasons|episodes",
      "",
      "Usage:",
      "  tvstream seasons --title <series> [--config <path>] [--json]",
      `  tvstream episodes --title <series> --season <n> ${EPISODE_FILTER_USAGE} [--config <path>] [--json]`,
    ].join("\n");
  }

  if (command === "play") {
    return [
      "tvstream play",
      "",
      "Usage:",
      "  tvstream play --ident <webshare-ident> [--config <path>] [--json]",
    ].join("\n");
  }

  if (command === "genres") {
    return ["tvstream genres", "", "Usage:", "  tvstream genres [--type movie|series] [--json]"].join(
      "\n",
    );
  }

  if (command === "route") {
    return [
      "tvstream route",
      "",
      "Usage:",
      '  tvstream route "?action=search&scope=movie&query=<text>" [--json]',
      "Notes:",
      "  Dispatches a plugin URL the way a media-center host would.",
    ].join("\n");
  }

  if (command === "login" || command === "logout") {
    return ["tvstream login|logout", "", "Usage:", "  tvstream login [--json]", "  tvstream logout [--json]"].join(
      "\n",
    );
  }

  if (command === "doctor") {
    return ["tvstream doctor", "", "Usage:", "  tvstream doctor [--config <path>] [--json]"].join("\n");
  }

  if (command === "providers") {
    return ["tvstream providers", "", "Usage:", "  tvstream providers [--json]"].join("\n");
  }

  if (command === "version") {
    return ["tvstream version", "", "Usage:", "  tvstream version [--json]"].join("\n");
  }

  return [
    "tvstream CLI",
    "",
    "Usage:",
    "  tvstream [--help|-h] [--version|-V]",
    "  tvstream help [command]",
    "  tvstream version [--json]",
    "  tvstream providers [--json]",
    "  tvstream doctor [--json]",
    `  tvstream search --query <text> ${FILTER_USAGE} [--json]`,
    `  tvstream browse [--query <text>] ${FILTER_USAGE} [--json]`,
    `  tvstream discover ${DISCOVER_USAGE} [--json]`,
    "  tvstream seasons --title <series> [--json]",
    `  tvstream episodes --title <series> --season <n> ${EPISODE_FILTER_USAGE} [--json]`,
    "  tvstream genres [--type movie|series] [--json]",
    "  tvstream play --ident <webshare-ident> [--json]",
    "  tvstream login|logout [--json]",
    '  tvstream route "<plugin-url>" [--json]',
    "",
    "Flags:",
    "  -h, --help        Show help",
    "  -V, --version     Show CLI version",
    "  --json            Output CliEnvelope JSON",
    "  --config <path>   JSON settings file (or TVSTREAM_CONFIG)",
    "  -v, --verbose     Debug logging on stderr",
  ].join("\n");
}

const packageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

function loadVersionInfo(): VersionInfo {
  // Sources run from src/, the build from dist/src/.
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const raw: unknown = JSON.parse(readFileSync(new URL(candidate, import.meta.url), "utf8"));
      const parsed = packageInfoSchema.safeParse(raw);
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      if (isMissingFile(error) || error instanceof SyntaxError) {
        continue;
      }
      throw error;
    }
  }

  return {
    name: "tvstream",
    version: "0.0.0",
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function createArgumentError(
  code: "E_ARG_INVALID" | "E_ARG_MISSING" | "E_ARG_CONFLICT" | "E_ARG_UNSUPPORTED",
  message: string,
  details?: unknown,
): CliAppError {
  return new CliAppError({
    code,
    message,
    details,
  });
}

function formatHumanError(error: CliAppError): string {
  const details = error.details === undefined ? "" : `\nDetails: ${JSON.stringify(error.details)}`;
  return `Error (${error.code}): ${error.message}${details}\n`;
}
