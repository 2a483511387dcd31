import type {
  CreateReleaseInput,
  Release,
  ReleaseService,
  UpdateReleaseInput,
} from "./release-sync";
import { ApiError } from "../types/errors";

export const DEFAULT_API_URL = "https://api.github.com";

const RELEASES_PER_PAGE = 100;

export interface GitHubReleaseServiceOptions {
  owner: string;
  repo: string;
  token: string;
  apiUrl?: string;
  fetchImpl?: typeof fetch; // replaced by an in-process fake in tests
}

interface GitHubReleasePayload {
  id: number;
  tag_name: string;
  name?: string | null;
  body?: string | null;
  html_url: string;
}

interface GitHubResponse {
  status: number;
  data: unknown;
}

/**
 * ReleaseService over the GitHub REST API.
 * https://docs.github.com/en/rest/releases/releases
 */
export class GitHubReleaseService implements ReleaseService {
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: GitHubReleaseServiceOptions) {
    const apiUrl = (opts.apiUrl || DEFAULT_API_URL).replace(/\/+$/, "");
    this.base = `${apiUrl}/repos/${opts.owner}/${opts.repo}`;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async tagExists(tag: string): Promise<boolean> {
    const res = await this.request(
      "GET",
      `/git/ref/tags/${encodeRef(tag)}`,
      undefined,
      [200, 404],
    );
    return res.status === 200;
  }

  async getRelease(tag: string): Promise<Release | null> {
    const res = await this.request(
      "GET",
      `/releases/tags/${encodeRef(tag)}`,
      undefined,
      [200, 404],
    );
    if (res.status === 200) return toRelease(res.data);
    // draft releases only show up in the release list
    return this.findListedRelease(tag);
  }

  async createRelease(input: CreateReleaseInput): Promise<Release> {
    const res = await this.request("POST", "/releases", {
      tag_name: input.tag,
      name: input.title,
      body: input.body,
      ...(input.targetCommitish
        ? { target_commitish: input.targetCommitish }
        : {}),
    });
    return toRelease(res.data);
  }

  async updateRelease(id: number, input: UpdateReleaseInput): Promise<Release> {
    const res = await this.request("PATCH", `/releases/${id}`, {
      name: input.title,
      body: input.body,
    });
    return toRelease(res.data);
  }

  private async findListedRelease(tag: string): Promise<Release | null> {
    for (let page = 1; ; page++) {
      const res = await this.request(
        "GET",
        `/releases?per_page=${RELEASES_PER_PAGE}&page=${page}`,
      );
      if (!Array.isArray(res.data)) {
        throw new ApiError("Unexpected release list payload from GitHub");
      }
      const releases: unknown[] = res.data;
      const match = releases.find(
        (r) => isReleasePayload(r) && r.tag_name === tag,
      );
      if (match !== undefined) return toRelease(match);
      if (releases.length < RELEASES_PER_PAGE) return null;
    }
  }

  private async request(
    method: string,
    endpoint: string,
    payload?: Record<string, unknown>,
    accept: number[] = [200, 201],
  ): Promise<GitHubResponse> {
    const url = this.base + endpoint;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: {
          Accept: "application/vnd.github+json",
          Authorization: `Bearer ${this.opts.token}`,
          "User-Agent": "changelog-release-sync",
          ...(payload ? { "Content-Type": "application/json" } : {}),
        },
        body: payload ? JSON.stringify(payload) : undefined,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiError(`${method} ${url}: ${reason}`, undefined, err);
    }

    let data: unknown = null;
    try {
      data = await res.json();
    } catch {
      data = null; // 204s and HTML error pages carry no JSON
    }
    if (!accept.includes(res.status)) {
      const detail = messageOf(data) ?? res.statusText;
      throw new ApiError(
        `${method} ${url} returned ${res.status}${detail ? `: ${detail}` : ""}`,
        res.status,
      );
    }
    return { status: res.status, data };
  }
}

// "release/1.0" stays a two-segment path
function encodeRef(ref: string): string {
  return ref.split("/").map(encodeURIComponent).join("/");
}

function messageOf(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "message" in data) {
    const { message } = data;
    if (typeof message === "string") return message;
  }
  return undefined;
}

function isReleasePayload(data: unknown): data is GitHubReleasePayload {
  return (
    typeof data === "object" &&
    data !== null &&
    "id" in data &&
    typeof data.id === "number" &&
    "tag_name" in data &&
    typeof data.tag_name === "string" &&
    "html_url" in data &&
    typeof data.html_url === "string"
  );
}

function toRelease(data: unknown): Release {
  if (!isReleasePayload(data)) {
    throw new ApiError("Unexpected release payload from GitHub");
  }
  return {
    id: data.id,
    tagName: data.tag_name,
    name: typeof data.name === "string" ? data.name : "",
    body: typeof data.body === "string" ? data.body : "",
    htmlUrl: data.html_url,
  };
}
