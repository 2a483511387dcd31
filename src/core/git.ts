import { execSync } from "node:child_process";
import { ConfigError } from "../types/errors";

export interface GitHubRepoRef {
  host: string;
  owner: string;
  repo: string;
}

// git@github.com:owner/repo.git, https://github.com/owner/repo, ssh://git@github.com/owner/repo.git
const REMOTE_PATTERNS = [
  /^git@([^:]+):([^/]+)\/(.+?)(?:\.git)?\/?$/,
  /^(?:https?|ssh|git):\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/([^/]+)\/(.+?)(?:\.git)?\/?$/,
];

export function parseGitHubRemote(url: string): GitHubRepoRef | undefined {
  for (const pattern of REMOTE_PATTERNS) {
    const m = pattern.exec(url.trim());
    if (m) return { host: m[1], owner: m[2], repo: m[3] };
  }
  return undefined;
}

export function findRepositoryRoot(cwd: string = process.cwd()): string {
  try {
    return git(cwd, "rev-parse --show-toplevel").trim();
  } catch {
    throw new ConfigError("Not in a git repository");
  }
}

export function findOriginRepository(
  cwd: string = process.cwd(),
): GitHubRepoRef {
  let remoteUrl: string;
  try {
    remoteUrl = git(cwd, "remote get-url origin").trim();
  } catch {
    throw new ConfigError("There is no git remote named origin");
  }
  const ref = parseGitHubRemote(remoteUrl);
  if (!ref || ref.host !== "github.com") {
    throw new ConfigError(`Not a GitHub repository: ${remoteUrl}`);
  }
  return ref;
}

/**
 * The checked-out branch, or undefined on a detached HEAD, in a repository
 * without commits, or outside a checkout.
 */
export function findCurrentBranch(
  cwd: string = process.cwd(),
): string | undefined {
  let head: string;
  try {
    head = git(cwd, "rev-parse --abbrev-ref HEAD").trim();
  } catch {
    return undefined;
  }
  return head && head !== "HEAD" ? head : undefined;
}

function git(cwd: string, command: string): string {
  return execSync(`git ${command}`, {
    cwd,
    stdio: ["ignore", "pipe", "pipe"],
  }).toString();
}
