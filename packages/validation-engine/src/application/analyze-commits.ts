import { createSilentLogger, type Logger, type Severity, type Validation } from "@commitlens/core";
import {
  fetchCommitHistory,
  type FetchCommitsProgressEvent,
  type GitHistoryProvider,
} from "@commitlens/git-history";
import { ValidationConfig, parseValidationList } from "../config.js";
import {
  evaluateCommits,
  isReportable,
  type AnalysisOutcome,
  type CommitAnalysisReport,
} from "../domain/commit-analysis.js";
import { ValidationFailedError } from "../domain/errors.js";
import {
  formatAnalysisHeadline,
  formatCommitHeading,
  formatFailureDetails,
  formatFinding,
} from "./format-analysis-report.js";
import { validateCommit } from "./validate-commit.js";

export type AnalyzeCommitsInput = {
  path?: string;
  limit?: number;
  /** Applied only when no explicit `config` is given. */
  threshold?: number;
  quiet?: boolean;
  strict?: boolean;
  config?: ValidationConfig;
  /** Allow-list of validation names, e.g. `["short", "wip"]` or `"short,wip"`. */
  errors?: string | readonly string[];
};

export type CommitAnalysisProgressEvent =
  | { stage: "config_resolved"; threshold: number; allowList: readonly Validation[] | null }
  | { stage: "fetch"; event: FetchCommitsProgressEvent }
  | { stage: "validating_commits"; commits: number }
  | { stage: "analysis_completed"; outcome: AnalysisOutcome };

export const resolveValidationConfig = (input: AnalyzeCommitsInput): ValidationConfig => {
  if (input.config !== undefined) {
    return input.config;
  }

  return input.threshold === undefined
    ? new ValidationConfig()
    : new ValidationConfig({ threshold: input.threshold });
};

const resolveTotalCommits = (
  input: AnalyzeCommitsInput,
  repositoryPath: string,
  fetchedCommits: number,
  historyProvider: GitHistoryProvider,
): number | null => {
  if (input.limit === undefined) {
    return fetchedCommits;
  }

  return input.limit === 0 ? null : historyProvider.countCommits(repositoryPath);
};

/**
 * Fetches, validates and aggregates one batch. Never throws for validation findings;
 * repository access errors propagate unchanged.
 */
export const analyzeCommitHistory = (
  input: AnalyzeCommitsInput,
  historyProvider: GitHistoryProvider,
  onProgress?: (event: CommitAnalysisProgressEvent) => void,
): CommitAnalysisReport => {
  const repositoryPath = input.path ?? ".";
  const config = resolveValidationConfig(input);
  const allowList = input.errors === undefined ? undefined : parseValidationList(input.errors);
  onProgress?.({ stage: "config_resolved", threshold: config.threshold, allowList: allowList ?? null });

  const commits = fetchCommitHistory(
    input.limit === undefined ? { repositoryPath } : { repositoryPath, limit: input.limit },
    historyProvider,
    (event) => onProgress?.({ stage: "fetch", event }),
  );

  onProgress?.({ stage: "validating_commits", commits: commits.length });
  const validatedCommits = commits.map((commit) => ({ commit, validations: validateCommit(commit, config) }));
  const analysis = evaluateCommits(validatedCommits, config, {
    ...(allowList === undefined ? {} : { allowList }),
    strict: input.strict ?? false,
  });
  onProgress?.({ stage: "analysis_completed", outcome: analysis.outcome });

  return {
    ...analysis,
    targetPath: repositoryPath,
    totalCommits: resolveTotalCommits(input, repositoryPath, commits.length, historyProvider),
    limit: input.limit ?? null,
    threshold: config.threshold,
  };
};

export const createAnalysisProgressReporter = (
  logger: Logger,
): ((event: CommitAnalysisProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "config_resolved":
        logger.debug(
          `config: threshold=${event.threshold}, allowList=${event.allowList?.join(",") ?? "all"}`,
        );
        break;
      case "fetch":
        switch (event.event.stage) {
          case "checking_repository":
            logger.debug("history: checking repository");
            break;
          case "loading_commit_history":
            logger.debug(`history: loading commits (limit=${event.event.limit ?? "none"})`);
            break;
          case "history":
            if (event.event.event.stage === "git_log_record_skipped") {
              logger.warn(
                `history: skipped unparseable commit record (${event.event.event.reason}): ${event.event.event.preview}`,
              );
            } else if (event.event.event.stage === "git_log_received") {
              logger.debug(`history: git log loaded (${event.event.event.bytes} bytes)`);
            }
            break;
          case "commits_loaded":
            logger.info(`history: loaded ${event.event.commits} commits`);
            break;
        }
        break;
      case "validating_commits":
        logger.debug(`validation: checking ${event.commits} commits`);
        break;
      case "analysis_completed":
        logger.debug(`validation: completed (outcome=${event.outcome})`);
        break;
    }
  };
};

const logAtSeverity = (logger: Logger, severity: Severity, message: string): void => {
  switch (severity) {
    case "error":
      logger.error(message);
      break;
    case "warning":
      logger.warn(message);
      break;
    case "info":
      logger.info(message);
      break;
    case "ignore":
      break;
  }
};

const logReport = (report: CommitAnalysisReport, logger: Logger): void => {
  logger.info(formatAnalysisHeadline(report));
  for (const result of report.results) {
    for (const finding of result.findings.filter(isReportable)) {
      logAtSeverity(logger, finding.severity, `${formatCommitHeading(result)} ${formatFinding(finding)}`);
    }
  }
};

/**
 * Runs one analysis and throws {@link ValidationFailedError} when it fails. `quiet` silences
 * progress and findings output but never the failure.
 */
export const analyzeCommits = (
  input: AnalyzeCommitsInput,
  historyProvider: GitHistoryProvider,
  logger: Logger = createSilentLogger(),
): CommitAnalysisReport => {
  const output = input.quiet === true ? createSilentLogger() : logger;
  const report = analyzeCommitHistory(input, historyProvider, createAnalysisProgressReporter(output));
  logReport(report, output);

  if (report.outcome === "failed") {
    throw new ValidationFailedError(report, formatFailureDetails(report));
  }

  return report;
};
