import { listTags, type ChangelogEntry } from "./changelog";
import type { Logger } from "./logger";
import type { ReleaseSyncer, SyncOutcome } from "./release-sync";
import { selectEntries, type Selection } from "./selection";

export interface RunSyncOptions {
  entries: readonly ChangelogEntry[];
  syncer: Pick<ReleaseSyncer, "sync">;
  selection: Selection;
  overwrite: boolean;
  logger: Logger;
}

export interface RunReport {
  mode: Selection["mode"];
  outcomes: SyncOutcome[];
  pushed: number;
  planned: number; // dry-run creates and updates
  failures: SyncOutcome[];
}

/**
 * Whether an outcome fails the run. A skip only fails when the user asked
 * for that one entry; in `all` mode it is a warning.
 */
export function isFailure(
  outcome: SyncOutcome,
  mode: Selection["mode"],
): boolean {
  switch (outcome.status) {
    case "failed":
      return true;
    case "skipped-missing-tag":
    case "skipped-invalid-tag":
      return mode !== "all";
    default:
      return false;
  }
}

export async function runSync(opts: RunSyncOptions): Promise<RunReport> {
  const { entries, syncer, selection, overwrite, logger } = opts;
  const selected = selectEntries(entries, selection);

  if (selection.mode === "all") {
    const untagged = entries.length - selected.length;
    if (untagged > 0) {
      logger.warn(`${untagged} changelog heading(s) without a tag skipped`);
    }
  }

  const report: RunReport = {
    mode: selection.mode,
    outcomes: [],
    pushed: 0,
    planned: 0,
    failures: [],
  };

  for (const entry of selected) {
    logger.info(`Syncing '${entry.tag}' to GitHub...`);
    const outcome = await syncer.sync(entry, overwrite);
    report.outcomes.push(outcome);
    logOutcome(logger, outcome);

    if (outcome.status === "created" || outcome.status === "updated") {
      if (outcome.dryRun) report.planned++;
      else report.pushed++;
    }
    if (isFailure(outcome, selection.mode)) report.failures.push(outcome);
  }

  logger.info(`${report.pushed} changelog entries pushed to GitHub`);
  if (report.planned > 0) {
    logger.info(
      `${report.planned} changelog entries would be pushed (dry run)`,
    );
  }
  if (report.failures.length) {
    logger.error(
      `${report.failures.length} failed: ${report.failures
        .map((o) => o.tag || "<untagged>")
        .join(", ")}`,
    );
  }
  return report;
}

/**
 * Prints the changelog's tags, one per line, in document order. Touches
 * neither the token nor the remote. Returns the exit code.
 */
export function runList(
  entries: readonly ChangelogEntry[],
  logger: Logger,
  print: (line: string) => void = console.log,
): number {
  const tags = listTags(entries);
  if (!tags.length) {
    logger.error("No tags in changelog");
    return 1;
  }
  for (const tag of tags) {
    if (tag) print(tag);
    else logger.warn("Changelog heading without a tag");
  }
  return 0;
}

export function exitCodeFor(report: RunReport): number {
  return report.failures.length ? 1 : 0;
}

function logOutcome(logger: Logger, outcome: SyncOutcome): void {
  const tag = `'${outcome.tag}'`;
  switch (outcome.status) {
    case "created":
    case "updated":
      if (outcome.release) {
        logger.info(`${tag} ${outcome.status}, see ${outcome.release.htmlUrl}`);
      } else {
        logger.info(`${tag} would be ${outcome.status} (dry run)`);
      }
      break;
    case "skipped-exists":
      logger.warn(
        `GitHub release ${tag} already exists, use --overwrite to replace it`,
      );
      break;
    case "skipped-missing-tag":
      logger.warn(outcome.error.message);
      break;
    case "skipped-invalid-tag":
      logger.warn("Changelog heading has no tag, skipped");
      break;
    case "failed":
      logger.error(outcome.error.message);
      logger.debug(outcome.error.stack ?? "");
      break;
  }
}
