import { ConfigError } from "../types/errors";
import { DEFAULT_API_URL } from "./github";

export interface SyncConfig {
  token: string;
  repo?: { owner: string; repo: string }; // overrides the origin remote
  apiUrl: string;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const TOKEN_VARS = ["CRS_GITHUB_TOKEN", "GITHUB_TOKEN", "GH_TOKEN"];

export function isDebugEnabled(env: Env = process.env): boolean {
  return ["1", "t", "true"].includes((env["CRS_DEBUG"] || "").toLowerCase());
}

/**
 * Reads settings from the environment. The token is required; the first
 * non-empty of CRS_GITHUB_TOKEN, GITHUB_TOKEN and GH_TOKEN wins.
 */
export function loadConfig(env: Env = process.env): SyncConfig {
  const token = TOKEN_VARS.map((name) => env[name]).find((v) => !!v);
  if (!token) {
    throw new ConfigError(
      `Expected a GitHub token in $${TOKEN_VARS.join(", $")}`,
    );
  }

  const ownerRepo = env["CRS_REPO"] || env["GITHUB_REPOSITORY"];
  let repo: SyncConfig["repo"];
  if (ownerRepo) {
    const m = /^([^/\s]+)\/([^/\s]+)$/.exec(ownerRepo);
    if (!m) {
      throw new ConfigError(
        `Expected owner/repo in $CRS_REPO or $GITHUB_REPOSITORY, got '${ownerRepo}'`,
      );
    }
    repo = { owner: m[1], repo: m[2] };
  }

  return {
    token,
    repo,
    apiUrl: env["CRS_GITHUB_API_URL"] || DEFAULT_API_URL,
    debug: isDebugEnabled(env),
  };
}
