import { createStderrLogger, resolveLogLevelFromEnv, type Logger } from "@commitlens/core";
import { createGitHistoryProvider } from "@commitlens/git-history";
import { analyzeCommits, type AnalyzeCommitsInput } from "./application/analyze-commits.js";
import type { CommitAnalysisReport } from "./domain/commit-analysis.js";

export {
  DEFAULT_SEVERITIES,
  DEFAULT_THRESHOLD,
  DEFAULT_VALIDATION_TOGGLES,
  ValidationConfig,
  parseValidationList,
  type ValidationConfigOptions,
  type ValidationToggles,
} from "./config.js";
export { DEFAULT_RULE_PATTERNS, type RulePatterns } from "./domain/rule-patterns.js";
export {
  firstWord,
  hasConventionalFormat,
  hasIssueReference,
  hasVagueLanguage,
  isNonImperative,
  isShortSubject,
  isWipSubject,
  subjectLength,
} from "./domain/rules.js";
export {
  evaluateCommits,
  isFailingSeverity,
  isReportable,
  type AnalysisOutcome,
  type AnalysisStatus,
  type CommitAnalysis,
  type CommitAnalysisReport,
  type CommitFindings,
  type EvaluateCommitsOptions,
  type SeverityCounts,
  type ValidationFinding,
} from "./domain/commit-analysis.js";
export { ConfigurationError, ValidationFailedError } from "./domain/errors.js";
export { checkCommit, validateCommit, type CheckCommitOptions } from "./application/validate-commit.js";
export {
  analyzeCommitHistory,
  analyzeCommits,
  createAnalysisProgressReporter,
  resolveValidationConfig,
  type AnalyzeCommitsInput,
  type CommitAnalysisProgressEvent,
} from "./application/analyze-commits.js";
export { formatAnalysisReport, formatFailureDetails } from "./application/format-analysis-report.js";

/**
 * Analyzes the repository at `input.path` with git. Returns the report on success and throws
 * `ValidationFailedError` when a finding maps to a failing severity.
 */
export const analyzeCommitsFromGit = (
  input: AnalyzeCommitsInput = {},
  logger: Logger = createStderrLogger(resolveLogLevelFromEnv()),
): CommitAnalysisReport => analyzeCommits(input, createGitHistoryProvider(), logger);
