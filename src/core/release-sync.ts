import type { ChangelogEntry } from "./changelog";
import {
  ApiError,
  RemoteCallError,
  RemoteTagMissingError,
} from "../types/errors";

export interface Release {
  id: number;
  tagName: string;
  name: string;
  body: string;
  htmlUrl: string;
}

export interface CreateReleaseInput {
  tag: string;
  title: string;
  body: string;
  targetCommitish?: string;
}

export interface UpdateReleaseInput {
  title: string;
  body: string;
}

/** The remote side of a sync: a repository's tags and releases. */
export interface ReleaseService {
  tagExists(tag: string): Promise<boolean>;
  getRelease(tag: string): Promise<Release | null>;
  createRelease(input: CreateReleaseInput): Promise<Release>;
  updateRelease(id: number, input: UpdateReleaseInput): Promise<Release>;
}

export type SyncOutcome =
  | { status: "created"; tag: string; release?: Release; dryRun: boolean }
  | { status: "updated"; tag: string; release?: Release; dryRun: boolean }
  | { status: "skipped-exists"; tag: string; release: Release }
  | { status: "skipped-missing-tag"; tag: string; error: RemoteTagMissingError }
  | { status: "skipped-invalid-tag"; tag: string }
  | { status: "failed"; tag: string; error: RemoteCallError };

export type SyncStatus = SyncOutcome["status"];

export interface ReleaseSyncerOptions {
  dryRun?: boolean;
  targetCommitish?: string; // branch the created release's tag points at
}

export class ReleaseSyncer {
  constructor(
    private readonly service: ReleaseService,
    private readonly options: ReleaseSyncerOptions = {},
  ) {}

  /**
   * Reconciles one changelog entry with the remote. Never creates a release
   * for a tag the remote does not have, and issues at most one create or
   * update. Remote failures come back as a `failed` outcome.
   */
  async sync(entry: ChangelogEntry, overwrite: boolean): Promise<SyncOutcome> {
    const { tag, body } = entry;
    if (!tag) return { status: "skipped-invalid-tag", tag };
    const dryRun = this.options.dryRun ?? false;

    try {
      if (!(await this.service.tagExists(tag))) {
        return {
          status: "skipped-missing-tag",
          tag,
          error: new RemoteTagMissingError(tag),
        };
      }

      const existing = await this.service.getRelease(tag);
      if (!existing) {
        if (dryRun) return { status: "created", tag, dryRun };
        const release = await this.service.createRelease({
          tag,
          title: tag,
          body,
          targetCommitish: this.options.targetCommitish,
        });
        return { status: "created", tag, release, dryRun };
      }

      if (!overwrite) {
        return { status: "skipped-exists", tag, release: existing };
      }
      if (dryRun) return { status: "updated", tag, dryRun };
      const release = await this.service.updateRelease(existing.id, {
        title: tag,
        body,
      });
      return { status: "updated", tag, release, dryRun };
    } catch (err) {
      return { status: "failed", tag, error: toRemoteCallError(tag, err) };
    }
  }
}

function toRemoteCallError(tag: string, err: unknown): RemoteCallError {
  const reason = err instanceof Error ? err.message : String(err);
  const status = err instanceof ApiError ? err.status : undefined;
  return new RemoteCallError(
    `Syncing '${tag}' failed: ${reason}`,
    tag,
    status,
    err,
  );
}
