import { describeValidation, validationName } from "@commitlens/core";
import {
  formatAnalysisReport,
  type CommitAnalysisReport,
} from "@commitlens/validation-engine";

export type AnalyzeOutputMode = "summary" | "json";

type JsonShape = {
  targetPath: string;
  totalCommits: number | null;
  analyzedCommits: number;
  threshold: number;
  strict: boolean;
  outcome: CommitAnalysisReport["outcome"];
  status: CommitAnalysisReport["status"];
  highestSeverity: CommitAnalysisReport["highestSeverity"];
  severityCounts: CommitAnalysisReport["severityCounts"];
  commits: ReadonlyArray<{
    hash: string;
    authorName: string;
    authorEmail: string;
    subject: string;
    findings: ReadonlyArray<{
      validation: string;
      name: string;
      description: string;
      severity: string;
    }>;
  }>;
};

const createJsonShape = (report: CommitAnalysisReport): JsonShape => ({
  targetPath: report.targetPath,
  totalCommits: report.totalCommits,
  analyzedCommits: report.analyzedCommits,
  threshold: report.threshold,
  strict: report.strict,
  outcome: report.outcome,
  status: report.status,
  highestSeverity: report.highestSeverity,
  severityCounts: report.severityCounts,
  commits: report.results.map((result) => ({
    hash: result.commit.hash,
    authorName: result.commit.authorName,
    authorEmail: result.commit.authorEmail,
    subject: result.commit.subject,
    findings: result.findings.map((finding) => ({
      validation: finding.validation,
      name: validationName(finding.validation),
      description: describeValidation(finding.validation),
      severity: finding.severity,
    })),
  })),
});

export const formatAnalyzeOutput = (report: CommitAnalysisReport, mode: AnalyzeOutputMode): string =>
  mode === "json" ? JSON.stringify(createJsonShape(report), null, 2) : formatAnalysisReport(report);

/**
 * Quiet runs print nothing unless the analysis failed.
 */
export const shouldPrintReport = (report: CommitAnalysisReport, quiet: boolean): boolean =>
  !quiet || report.outcome === "failed";
