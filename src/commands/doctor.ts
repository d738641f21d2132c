import { CliAppError, type AddonConfig, type CliErrorCode } from "../core/index.js";

import type { MetadataSource } from "../domain/types.js";

type DoctorLevel = "info" | "warn" | "error";

export interface DoctorCheck {
  id: string;
  level: DoctorLevel;
  ok: boolean;
  message: string;
  details?: unknown;
  errorCode?: CliErrorCode;
}

export interface DoctorSummary {
  total: number;
  infos: number;
  warnings: number;
  errors: number;
}

export interface DoctorCommandOutput {
  checks: DoctorCheck[];
  summary: DoctorSummary;
}

export interface DoctorCommandInput {
  config: AddonConfig;
  sources: MetadataSource[];
  nodeVersion?: string;
}

const MIN_NODE_VERSION = "20.0.0";

export async function runDoctorCommand(input: DoctorCommandInput): Promise<DoctorCommandOutput> {
  const checks: DoctorCheck[] = [];

  checks.push(checkNodeVersion(input.nodeVersion ?? process.versions.node));
  checks.push(checkWebshareCredentials(input.config));

  if (input.sources.length === 0) {
    checks.push({
      id: "metadata-providers",
      level: "warn",
      ok: false,
      message: "No metadata providers enabled; results will not be enriched.",
      details: { provider: input.config.metadata.provider },
    });
  }

  for (const source of input.sources) {
    checks.push(await checkSource(source));
  }

  return {
    checks,
    summary: summarizeChecks(checks),
  };
}

export function getDoctorFailureCode(report: DoctorCommandOutput): CliErrorCode | undefined {
  const errorCheck = report.checks.find((check) => check.level === "error");
  return errorCheck?.errorCode ?? (errorCheck ? "E_UNKNOWN" : undefined);
}

export function renderDoctorOutput(output: DoctorCommandOutput): string {
  const lines = [
    `Doctor summary: ${output.summary.errors} error(s), ${output.summary.warnings} warning(s), ${output.summary.infos} info`,
    ...output.checks.map((check) => `[${check.level}] ${check.id}: ${check.message}`),
  ];

  return lines.join("\n");
}

async function checkSource(source: MetadataSource): Promise<DoctorCheck> {
  const id = `provider-health:${source.descriptor.id}`;

  if (source.doctor === undefined) {
    return {
      id,
      level: "warn",
      ok: false,
      message: "Provider does not expose a health check.",
    };
  }

  try {
    const report = await source.doctor();
    // A metadata outage degrades results but does not block playback.
    return {
      id,
      level: report.ok ? "info" : "warn",
      ok: report.ok,
      message: report.message,
      details: report.details,
    };
  } catch (error) {
    const appError = toCliError(error, "E_UPSTREAM_NETWORK");
    return {
      id,
      level: "warn",
      ok: false,
      message: appError.message,
      details: appError.details,
      errorCode: appError.code,
    };
  }
}

function checkWebshareCredentials(config: AddonConfig): DoctorCheck {
  const { username, password, token } = config.webshare;

  if (token !== undefined && token.length > 0) {
    return {
      id: "webshare-credentials",
      level: "info",
      ok: true,
      message: "Webshare session token is configured.",
    };
  }

  if (username.length > 0 && password.length > 0) {
    return {
      id: "webshare-credentials",
      level: "info",
      ok: true,
      message: `Webshare credentials are configured for ${username}.`,
    };
  }

  return {
    id: "webshare-credentials",
    level: "error",
    ok: false,
    message: "Webshare credentials are missing; playback links cannot be resolved.",
    errorCode: "E_AUTH_REQUIRED",
  };
}

function checkNodeVersion(current: string): DoctorCheck {
  if (compareSemver(current, MIN_NODE_VERSION) >= 0) {
    return {
      id: "node-version",
      level: "info",
      ok: true,
      message: `Node.js ${current} satisfies >= ${MIN_NODE_VERSION}`,
    };
  }

  return {
    id: "node-version",
    level: "error",
    ok: false,
    message: `Node.js ${current} is below required >= ${MIN_NODE_VERSION}`,
    errorCode: "E_UNKNOWN",
  };
}

function compareSemver(left: string, right: string): number {
  const leftParts = parseSemver(left);
  const rightParts = parseSemver(right);

  for (let index = 0; index < 3; index += 1) {
    const delta = (leftParts[index] ?? 0) - (rightParts[index] ?? 0);
    if (delta !== 0) {
      return delta > 0 ? 1 : -1;
    }
  }

  return 0;
}

function parseSemver(value: string): number[] {
  return value
    .replace(/^v/u, "")
    .split(".")
    .slice(0, 3)
    .map((part) => Number.parseInt(part, 10))
    .map((part) => (Number.isFinite(part) ? part : 0));
}

function summarizeChecks(checks: DoctorCheck[]): DoctorSummary {
  let infos = 0;
  let warnings = 0;
  let errors = 0;

  for (const check of checks) {
    if (check.level === "info") {
      infos += 1;
      continue;
    }

    if (check.level === "warn") {
      warnings += 1;
      continue;
    }

    errors += 1;
  }

  return {
    total: checks.length,
    infos,
    warnings,
    errors,
  };
}

function toCliError(error: unknown, fallbackCode: CliErrorCode): CliAppError {
  if (error instanceof CliAppError) {
    return error;
  }

  return new CliAppError({
    code: fallbackCode,
    message: error instanceof Error ? error.message : "Unknown error",
    details: error instanceof Error ? { name: error.name } : error,
    cause: error,
  });
}
