import { expect } from "chai";
import { parseChangelog } from "../../src/core/changelog";
import { ReleaseSyncer, type Release } from "../../src/core/release-sync";
import {
  exitCodeFor,
  isFailure,
  runList,
  runSync,
} from "../../src/core/run";
import { ApiError, NotFoundError } from "../../src/types/errors";
import { FakeReleaseService } from "../helpers/fake-release-service";
import { createMemoryLogger } from "../helpers/memory-logger";

const CHANGELOG = [
  "# Changelog",
  "",
  "## 2.60.1 (2020-05-23)",
  "- fixed a thing",
  "",
  "## 2.60.0 (2020-05-20)",
  "- added a thing",
].join("\n");

// rejects lookups for one tag, as an expired token or rate limit would
class FlakyReleaseService extends FakeReleaseService {
  constructor(
    tags: Set<string>,
    private readonly failingTag: string,
  ) {
    super(tags);
  }

  async getRelease(tag: string): Promise<Release | null> {
    if (tag === this.failingTag) {
      throw new ApiError("API rate limit exceeded", 403);
    }
    return super.getRelease(tag);
  }
}

describe("runSync", () => {
  it("--all: creates what it can and skips tags missing at the remote", async () => {
    const entries = parseChangelog(CHANGELOG);
    const service = new FakeReleaseService(new Set(["2.60.1"]));
    const logger = createMemoryLogger();
    const report = await runSync({
      entries,
      syncer: new ReleaseSyncer(service),
      selection: { mode: "all" },
      overwrite: false,
      logger,
    });

    expect(report.outcomes.map((o) => o.status)).to.deep.equal([
      "created",
      "skipped-missing-tag",
    ]);
    expect(report.pushed).to.equal(1);
    expect(report.failures).to.have.length(0);
    expect(exitCodeFor(report)).to.equal(0);
    expect(logger.lines).to.deep.equal([
      "info Syncing '2.60.1' to GitHub...",
      "info '2.60.1' created, see https://github.example/releases/tag/2.60.1",
      "info Syncing '2.60.0' to GitHub...",
      "warn Tag '2.60.0' does not exist at the remote",
      "info 1 changelog entries pushed to GitHub",
    ]);
  });

  it("--all: a remote failure does not stop the remaining entries", async () => {
    const entries = parseChangelog(CHANGELOG);
    const service = new FlakyReleaseService(
      new Set(["2.60.1", "2.60.0"]),
      "2.60.1",
    );
    const report = await runSync({
      entries,
      syncer: new ReleaseSyncer(service),
      selection: { mode: "all" },
      overwrite: false,
      logger: createMemoryLogger(),
    });

    expect(report.outcomes.map((o) => o.status)).to.deep.equal([
      "failed",
      "created",
    ]);
    expect(report.pushed).to.equal(1);
    expect(report.failures.map((o) => o.tag)).to.deep.equal(["2.60.1"]);
    expect(exitCodeFor(report)).to.equal(1);
  });

  it("--all: warns about headings without a tag and never syncs them", async () => {
    const entries = parseChangelog("## \nstray notes\n## 1.0.0\nnotes");
    const service = new FakeReleaseService(new Set(["1.0.0"]));
    const logger = createMemoryLogger();
    const report = await runSync({
      entries,
      syncer: new ReleaseSyncer(service),
      selection: { mode: "all" },
      overwrite: false,
      logger,
    });

    expect(report.outcomes.map((o) => o.tag)).to.deep.equal(["1.0.0"]);
    expect(logger.lines[0]).to.equal(
      "warn 1 changelog heading(s) without a tag skipped",
    );
    expect(service.calls.some((c) => c.args[0] === "")).to.equal(false);
  });

  it("named tag missing at the remote fails the run", async () => {
    const report = await runSync({
      entries: parseChangelog(CHANGELOG),
      syncer: new ReleaseSyncer(new FakeReleaseService()),
      selection: { mode: "named", tag: "2.60.0" },
      overwrite: false,
      logger: createMemoryLogger(),
    });

    expect(report.outcomes.map((o) => o.status)).to.deep.equal([
      "skipped-missing-tag",
    ]);
    expect(report.pushed).to.equal(0);
    expect(exitCodeFor(report)).to.equal(1);
  });

  it("named tag absent from the changelog makes no remote calls", async () => {
    const service = new FakeReleaseService(new Set(["9.9.9"]));
    let caught: unknown;
    try {
      await runSync({
        entries: parseChangelog(CHANGELOG),
        syncer: new ReleaseSyncer(service),
        selection: { mode: "named", tag: "9.9.9" },
        overwrite: false,
        logger: createMemoryLogger(),
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).to.be.instanceOf(NotFoundError);
    expect(service.calls).to.have.length(0);
  });

  it("latest: an existing release is a warning, not a failure", async () => {
    const service = new FakeReleaseService(new Set(["2.60.1"]));
    service.addRelease("2.60.1");
    const logger = createMemoryLogger();
    const report = await runSync({
      entries: parseChangelog(CHANGELOG),
      syncer: new ReleaseSyncer(service),
      selection: { mode: "latest" },
      overwrite: false,
      logger,
    });

    expect(report.outcomes.map((o) => o.status)).to.deep.equal([
      "skipped-exists",
    ]);
    expect(exitCodeFor(report)).to.equal(0);
    expect(logger.lines).to.include(
      "warn GitHub release '2.60.1' already exists, use --overwrite to replace it",
    );
  });

  it("dry run: counts planned pushes apart from real ones", async () => {
    const service = new FakeReleaseService(new Set(["2.60.1", "2.60.0"]));
    const logger = createMemoryLogger();
    const report = await runSync({
      entries: parseChangelog(CHANGELOG),
      syncer: new ReleaseSyncer(service, { dryRun: true }),
      selection: { mode: "all" },
      overwrite: false,
      logger,
    });

    expect(report.pushed).to.equal(0);
    expect(report.planned).to.equal(2);
    expect(service.mutatingCalls).to.have.length(0);
    expect(logger.lines.slice(-2)).to.deep.equal([
      "info 0 changelog entries pushed to GitHub",
      "info 2 changelog entries would be pushed (dry run)",
    ]);
  });
});

describe("isFailure", () => {
  it("treats skips as failures only for a single requested entry", () => {
    const skip = { status: "skipped-invalid-tag", tag: "" } as const;
    expect(isFailure(skip, "all")).to.equal(false);
    expect(isFailure(skip, "latest")).to.equal(true);
    expect(isFailure(skip, "named")).to.equal(true);
  });
});

describe("runList", () => {
  it("prints the three tags in document order and exits 0", () => {
    const printed: string[] = [];
    const logger = createMemoryLogger();
    const entries = parseChangelog(
      "## 3.0.0\n- c\n## 2.0.0 (2020-01-02)\n- b\n## 1.0.0\n- a",
    );
    expect(runList(entries, logger, (line) => printed.push(line))).to.equal(0);
    expect(printed).to.deep.equal(["3.0.0", "2.0.0", "1.0.0"]);
    expect(logger.lines).to.deep.equal([]);
  });

  it("warns about an untagged heading instead of printing a blank line", () => {
    const printed: string[] = [];
    const logger = createMemoryLogger();
    const entries = parseChangelog("## 1.1.0\n## \nstray\n## 1.0.0");
    expect(runList(entries, logger, (line) => printed.push(line))).to.equal(0);
    expect(printed).to.deep.equal(["1.1.0", "1.0.0"]);
    expect(logger.lines).to.deep.equal(["warn Changelog heading without a tag"]);
  });

  it("exits 1 when the changelog has no entries", () => {
    const printed: string[] = [];
    const logger = createMemoryLogger();
    const entries = parseChangelog("# Changelog\n\nNothing released yet.");
    expect(runList(entries, logger, (line) => printed.push(line))).to.equal(1);
    expect(printed).to.deep.equal([]);
    expect(logger.lines).to.deep.equal(["error No tags in changelog"]);
  });
});
