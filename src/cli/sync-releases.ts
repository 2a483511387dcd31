#!/usr/bin/env node
import "dotenv/config";
import * as path from "node:path";
import { Command } from "commander";
import { readChangelog } from "../core/changelog";
import { isDebugEnabled, loadConfig } from "../core/config";
import {
  findCurrentBranch,
  findOriginRepository,
  findRepositoryRoot,
} from "../core/git";
import { GitHubReleaseService } from "../core/github";
import { createLogger } from "../core/logger";
import { ReleaseSyncer } from "../core/release-sync";
import { exitCodeFor, runList, runSync } from "../core/run";
import { resolveSelection } from "../core/selection";

type CliOptions = {
  all?: boolean;
  overwrite?: boolean;
  list?: boolean;
  dryRun?: boolean;
  file?: string;
};

const logger = createLogger({ debug: isDebugEnabled() });

async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name("changelog-release-sync")
    .description("Sync GitHub release notes with your project's changelog")
    .version("0.1.0")
    .argument(
      "[tag]",
      "changelog entry to sync; the latest entry when omitted",
    )
    .option("-a, --all", "sync every changelog entry")
    .option("-o, --overwrite", "overwrite GitHub releases that already exist")
    .option("-l, --list", "list tags present in the changelog, and exit")
    .option("--dry-run", "check everything but write nothing to GitHub")
    .option("-f, --file <path>", "changelog file (default: CHANGELOG.md at the repo root)")
    .parse(argv);

  const opts = program.opts<CliOptions>();
  const tag: string | undefined = program.args[0];

  const file =
    opts.file ?? path.join(findRepositoryRoot(), "CHANGELOG.md");
  logger.debug(`reading ${file}`);
  const entries = await readChangelog(file);

  if (opts.list) return runList(entries, logger);

  const selection = resolveSelection({ tag, all: opts.all });
  const config = loadConfig();
  const { owner, repo } = config.repo ?? findOriginRepository();
  logger.debug(`syncing to ${owner}/${repo} via ${config.apiUrl}`);

  const service = new GitHubReleaseService({
    owner,
    repo,
    token: config.token,
    apiUrl: config.apiUrl,
  });
  const syncer = new ReleaseSyncer(service, {
    dryRun: opts.dryRun,
    targetCommitish: findCurrentBranch(),
  });

  const report = await runSync({
    entries,
    syncer,
    selection,
    overwrite: !!opts.overwrite,
    logger,
  });
  return exitCodeFor(report);
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`failed: ${message}`);
    if (err instanceof Error && err.stack) logger.debug(err.stack);
    process.exit(1);
  });
