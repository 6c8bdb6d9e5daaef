import { describeValidation, type Severity } from "@commitlens/core";
import {
  isFailingSeverity,
  isReportable,
  type CommitAnalysisReport,
  type CommitFindings,
  type ValidationFinding,
} from "../domain/commit-analysis.js";

const severityPrefix: Readonly<Record<Severity, string>> = {
  error: "[error]",
  warning: "[warn]",
  info: "[info]",
  ignore: "[ignore]",
};

export const formatFinding = (finding: ValidationFinding): string =>
  `${severityPrefix[finding.severity]} ${describeValidation(finding.validation)}`;

export const formatCommitHeading = (result: CommitFindings): string =>
  `${result.commit.hash}: "${result.commit.subject}"`;

/**
 * Lines listing only the commits and findings that made the run fail.
 */
export const formatFailureDetails = (report: CommitAnalysisReport): string[] => {
  const lines: string[] = [];
  for (const result of report.results) {
    const failing = result.findings.filter((finding) => isFailingSeverity(finding.severity, report.strict));
    if (failing.length === 0) {
      continue;
    }

    lines.push(`  ${formatCommitHeading(result)}`);
    lines.push(...failing.map((finding) => `    ${formatFinding(finding)}`));
  }

  return lines;
};

export const formatAnalysisHeadline = (report: CommitAnalysisReport): string => {
  switch (report.status) {
    case "empty":
      return "No commits found in repository.";
    case "acceptable":
      return `All ${report.analyzedCommits} analyzed commit messages passed validation.`;
    case "needs_work": {
      const flagged = report.results.filter((result) => result.findings.some(isReportable)).length;
      return (
        `Found ${flagged} commits with issues (${report.commitsWithErrors} errors, ` +
        `${report.commitsWithWarnings} warnings) (threshold: ${report.threshold} chars)`
      );
    }
  }
};

export const formatAnalysisReport = (report: CommitAnalysisReport): string => {
  const total = report.totalCommits === null ? "" : ` of ${report.totalCommits} total`;
  const lines = [`Analyzed ${report.analyzedCommits}${total} commits in ${report.targetPath}`];
  lines.push(formatAnalysisHeadline(report));

  for (const result of report.results) {
    const reportable = result.findings.filter(isReportable);
    if (reportable.length === 0) {
      continue;
    }

    lines.push("");
    lines.push(`  ${formatCommitHeading(result)}`);
    lines.push(...reportable.map((finding) => `    ${formatFinding(finding)}`));
  }

  return lines.join("\n");
};
