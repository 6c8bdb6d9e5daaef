import type { CommitAnalysisReport } from "./commit-analysis.js";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const pluralizeCommits = (count: number): string => (count === 1 ? "1 commit" : `${count} commits`);

/**
 * Raised when a completed analysis found failing severities. Carries the full report.
 */
export class ValidationFailedError extends Error {
  readonly report: CommitAnalysisReport;

  constructor(report: CommitAnalysisReport, details: readonly string[] = []) {
    super([`Found ${pluralizeCommits(report.failingCommits)} with validation issues`, ...details].join("\n"));
    this.name = "ValidationFailedError";
    this.report = report;
  }
}
