import type { CommitRecord, Validation } from "@commitlens/core";
import { describe, expect, it } from "vitest";
import { ValidationConfig } from "../config.js";
import { evaluateCommits, isFailingSeverity } from "./commit-analysis.js";

const commit = (hash: string, subject: string): CommitRecord => ({
  hash: hash.repeat(40),
  authorName: "Test Author",
  authorEmail: "test@example.com",
  subject,
});

const validated = (
  entries: ReadonlyArray<[CommitRecord, readonly Validation[]]>,
): Array<{ commit: CommitRecord; validations: readonly Validation[] }> =>
  entries.map(([entry, validations]) => ({ commit: entry, validations }));

describe("evaluateCommits", () => {
  it("passes when no finding maps to error", () => {
    const analysis = evaluateCommits(
      validated([
        [commit("1", "tiny"), ["ShortCommit", "MissingReference"]],
        [commit("2", "feat: add retries to uploader #3"), []],
      ]),
      new ValidationConfig(),
    );

    expect(analysis).toMatchObject({
      analyzedCommits: 2,
      severityCounts: { error: 0, warning: 1, info: 1, ignore: 0 },
      highestSeverity: "warning",
      commitsWithErrors: 0,
      commitsWithWarnings: 1,
      failingCommits: 0,
      outcome: "passed",
      status: "needs_work",
    });
    expect(analysis.results.map((result) => result.commit.subject)).toEqual(["tiny"]);
  });

  it("fails when any finding maps to error", () => {
    const analysis = evaluateCommits(
      validated([
        [commit("1", "wip"), ["WipCommit"]],
        [commit("2", "tiny"), ["ShortCommit"]],
      ]),
      new ValidationConfig(),
    );

    expect(analysis.outcome).toBe("failed");
    expect(analysis.failingCommits).toBe(1);
    expect(analysis.results[0]?.findings).toEqual([{ validation: "WipCommit", severity: "error" }]);
  });

  it("fails on warnings in strict mode", () => {
    const analysis = evaluateCommits(validated([[commit("1", "tiny"), ["ShortCommit"]]]), new ValidationConfig(), {
      strict: true,
    });

    expect(analysis.outcome).toBe("failed");
    expect(analysis.failingCommits).toBe(1);
  });

  it("drops validations outside the allow-list before looking up severities", () => {
    const analysis = evaluateCommits(
      validated([[commit("1", "wip"), ["ShortCommit", "WipCommit"]]]),
      new ValidationConfig(),
      { allowList: ["ShortCommit"] },
    );

    expect(analysis.outcome).toBe("passed");
    expect(analysis.results[0]?.findings).toEqual([{ validation: "ShortCommit", severity: "warning" }]);
  });

  it("records ignored findings without reporting them", () => {
    const config = new ValidationConfig();
    config.setSeverity("MissingReference", "ignore");

    const analysis = evaluateCommits(
      validated([[commit("1", "feat: add retries to uploader"), ["MissingReference"]]]),
      config,
    );

    expect(analysis.severityCounts.ignore).toBe(1);
    expect(analysis.results).toHaveLength(1);
    expect(analysis.status).toBe("acceptable");
  });

  it("marks an empty batch as empty and passing", () => {
    const analysis = evaluateCommits([], new ValidationConfig());

    expect(analysis).toMatchObject({ analyzedCommits: 0, outcome: "passed", status: "empty", highestSeverity: null });
  });

  it("aggregates the same way regardless of commit order", () => {
    const entries: ReadonlyArray<[CommitRecord, readonly Validation[]]> = [
      [commit("1", "wip"), ["WipCommit"]],
      [commit("2", "tiny"), ["ShortCommit", "MissingReference"]],
      [commit("3", "misc"), ["VagueLanguage"]],
    ];
    const forward = evaluateCommits(validated(entries), new ValidationConfig());
    const backward = evaluateCommits(validated([...entries].reverse()), new ValidationConfig());

    expect(backward.severityCounts).toEqual(forward.severityCounts);
    expect(backward.outcome).toBe(forward.outcome);
    expect(backward.failingCommits).toBe(forward.failingCommits);
  });
});

describe("isFailingSeverity", () => {
  it("fails on errors, and on warnings only when strict", () => {
    expect(isFailingSeverity("error", false)).toBe(true);
    expect(isFailingSeverity("warning", false)).toBe(false);
    expect(isFailingSeverity("warning", true)).toBe(true);
    expect(isFailingSeverity("info", true)).toBe(false);
    expect(isFailingSeverity("ignore", true)).toBe(false);
  });
});
