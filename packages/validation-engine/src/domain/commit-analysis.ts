import {
  SEVERITIES,
  maxSeverity,
  type CommitRecord,
  type Severity,
  type Validation,
} from "@commitlens/core";

export type ValidationFinding = {
  validation: Validation;
  severity: Severity;
};

export type CommitFindings = {
  commit: CommitRecord;
  findings: readonly ValidationFinding[];
};

export type SeverityCounts = Readonly<Record<Severity, number>>;

export type AnalysisOutcome = "passed" | "failed";

export type AnalysisStatus = "empty" | "acceptable" | "needs_work";

export type CommitAnalysis = {
  analyzedCommits: number;
  /** Commits with at least one finding, in fetch order. */
  results: readonly CommitFindings[];
  severityCounts: SeverityCounts;
  highestSeverity: Severity | null;
  commitsWithErrors: number;
  commitsWithWarnings: number;
  failingCommits: number;
  strict: boolean;
  outcome: AnalysisOutcome;
  status: AnalysisStatus;
};

export type SeverityLookup = {
  getSeverity(validation: Validation): Severity;
};

export type EvaluateCommitsOptions = {
  /** Validations outside this list are dropped before severities are looked up. */
  allowList?: readonly Validation[];
  /** Warnings fail the run as well as errors. */
  strict?: boolean;
};

const emptySeverityCounts = (): Record<Severity, number> => ({
  error: 0,
  warning: 0,
  info: 0,
  ignore: 0,
});

export const isFailingSeverity = (severity: Severity, strict: boolean): boolean =>
  severity === "error" || (strict && severity === "warning");

export const isReportable = (finding: ValidationFinding): boolean => finding.severity !== "ignore";

export const evaluateCommits = (
  validatedCommits: ReadonlyArray<{ commit: CommitRecord; validations: readonly Validation[] }>,
  severities: SeverityLookup,
  options: EvaluateCommitsOptions = {},
): CommitAnalysis => {
  const strict = options.strict ?? false;
  const allowList = options.allowList;
  const severityCounts = emptySeverityCounts();
  const results: CommitFindings[] = [];
  let commitsWithErrors = 0;
  let commitsWithWarnings = 0;
  let failingCommits = 0;

  for (const { commit, validations } of validatedCommits) {
    const findings = validations
      .filter((validation) => allowList === undefined || allowList.includes(validation))
      .map((validation) => ({ validation, severity: severities.getSeverity(validation) }));
    if (findings.length === 0) {
      continue;
    }

    for (const finding of findings) {
      severityCounts[finding.severity] += 1;
    }

    const commitSeverities = findings.map((finding) => finding.severity);
    if (commitSeverities.includes("error")) {
      commitsWithErrors += 1;
    }
    if (commitSeverities.includes("warning")) {
      commitsWithWarnings += 1;
    }
    if (commitSeverities.some((severity) => isFailingSeverity(severity, strict))) {
      failingCommits += 1;
    }

    results.push({ commit, findings });
  }

  const highestSeverity = maxSeverity(SEVERITIES.filter((severity) => severityCounts[severity] > 0));
  const hasReportable = results.some((result) => result.findings.some(isReportable));

  return {
    analyzedCommits: validatedCommits.length,
    results,
    severityCounts,
    highestSeverity,
    commitsWithErrors,
    commitsWithWarnings,
    failingCommits,
    strict,
    outcome: failingCommits > 0 ? "failed" : "passed",
    status: validatedCommits.length === 0 ? "empty" : hasReportable ? "needs_work" : "acceptable",
  };
};

export type CommitAnalysisReport = CommitAnalysis & {
  targetPath: string;
  /** Commits reachable from HEAD; null when the run examined none. */
  totalCommits: number | null;
  limit: number | null;
  threshold: number;
};
