import { describe, expect, it } from "vitest";

import { runCli } from "../src/cli.js";
import { createSilentLogger } from "../src/core/index.js";

class BufferWriter {
  public chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public read(): string {
    return this.chunks.join("");
  }
}

const unreachable: typeof fetch = async () => {
  throw new TypeError("network disabled in tests");
};

async function run(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const stdout = new BufferWriter();
  const stderr = new BufferWriter();
  const exitCode = await runCli(argv, {
    stdout,
    stderr,
    env,
    fetchImpl: unreachable,
    sleep: async () => undefined,
    logger: createSilentLogger(),
    readText: async (path) => {
      if (path === "bad.json") {
        return '{"metadata":{"provider":"imdb"}}';
      }
      throw new Error(`ENOENT: ${path}`);
    },
  });

  return { exitCode, stdout: stdout.read(), stderr: stderr.read() };
}

describe("CLI argument validation", () => {
  it("fails when --query is missing for search", async () => {
    const result = await run(["search"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe('Error (E_ARG_MISSING): --query is required\nDetails: {"arg":"query"}\n');
    expect(result.stdout).toBe("");
  });

  it("fails when quality is unknown", async () => {
    const result = await run(["search", "--query", "matrix", "--quality", "ultra"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain("E_ARG_INVALID");
  });

  it("fails when a language is unsupported", async () => {
    const result = await run(["browse", "--audio", "cz,de"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain("Unsupported language in audio: cz,de");
  });

  it("caps the page size", async () => {
    const result = await run(["browse", "--page-size", "500"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain("--page-size must be at most 100");
  });

  it("rejects a non-numeric page", async () => {
    const result = await run(["browse", "--page", "two"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain("--page must be a positive integer");
  });

  it("rejects unknown commands and stray positionals", async () => {
    expect((await run(["rewind"])).stderr).toContain("E_ARG_UNSUPPORTED");
    expect((await run(["search", "matrix"])).stderr).toContain(
      "search does not accept positional arguments",
    );
  });

  it("requires a plugin URL for route", async () => {
    const result = await run(["route"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain("route expects exactly one plugin URL");
  });

  it("fails with a config error for invalid settings", async () => {
    const result = await run(["providers", "--config", "bad.json"]);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toContain("E_CONFIG_INVALID");
  });

  it("fails with an auth error when playback has no session", async () => {
    const result = await run(["play", "--ident", "abc"], { METADATA_PROVIDER: "none" });

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toContain("E_AUTH_REQUIRED");
  });

  it("maps unreachable services to the upstream exit code", async () => {
    const result = await run(["search", "--query", "matrix"], { METADATA_PROVIDER: "none" });

    expect(result.exitCode).toBe(5);
    expect(result.stderr).toContain("E_UPSTREAM_NETWORK");
  });

  it("prints command help without loading configuration", async () => {
    const result = await run(["help", "play", "--config", "missing.json"]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(
      "tvstream play\n\nUsage:\n  tvstream play --ident <webshare-ident> [--config <path>] [--json]\n",
    );
  });
});
