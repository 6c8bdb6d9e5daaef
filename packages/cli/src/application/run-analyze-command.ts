import { resolve } from "node:path";
import { createSilentLogger, type Logger, type Severity } from "@commitlens/core";
import { createGitHistoryProvider, type GitHistoryProvider } from "@commitlens/git-history";
import {
  ValidationConfig,
  ValidationFailedError,
  analyzeCommitHistory,
  createAnalysisProgressReporter,
  formatFailureDetails,
  type CommitAnalysisReport,
} from "@commitlens/validation-engine";

export type AnalyzeCommandOptions = {
  limit?: number;
  threshold: number;
  quiet: boolean;
  strict: boolean;
  error?: string;
  warn?: string;
  info?: string;
  ignore?: string;
  disable?: string;
  only?: string;
};

export type AnalyzeCommandResult = {
  report: CommitAnalysisReport;
  /** Set when a finding maps to a failing severity. */
  failure: ValidationFailedError | null;
  exitCode: 0 | 1;
};

const resolveTargetPath = (inputPath: string | undefined, cwd: string): string =>
  resolve(cwd, inputPath ?? ".");

type SeverityOverrideOption = "error" | "warn" | "info" | "ignore";

const severityOverrides: ReadonlyArray<[SeverityOverrideOption, Severity]> = [
  ["error", "error"],
  ["warn", "warning"],
  ["info", "info"],
  ["ignore", "ignore"],
];

export const buildValidationConfig = (options: AnalyzeCommandOptions): ValidationConfig => {
  const config = new ValidationConfig({ threshold: options.threshold });
  if (options.disable !== undefined) {
    config.disable(options.disable);
  }

  for (const [option, severity] of severityOverrides) {
    const names = options[option];
    if (names !== undefined) {
      config.applySeverity(names, severity);
    }
  }

  return config;
};

export const runAnalyzeCommand = (
  inputPath: string | undefined,
  options: AnalyzeCommandOptions,
  logger: Logger = createSilentLogger(),
  historyProvider: GitHistoryProvider = createGitHistoryProvider(),
): AnalyzeCommandResult => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const targetPath = resolveTargetPath(inputPath, invocationCwd);
  const config = buildValidationConfig(options);
  const output = options.quiet ? createSilentLogger() : logger;
  output.info(`analyzing commit messages: ${targetPath}`);

  const report = analyzeCommitHistory(
    {
      path: targetPath,
      config,
      strict: options.strict,
      ...(options.limit === undefined ? {} : { limit: options.limit }),
      ...(options.only === undefined ? {} : { errors: options.only }),
    },
    historyProvider,
    createAnalysisProgressReporter(output),
  );
  output.info(`analysis completed (outcome=${report.outcome}, highestSeverity=${report.highestSeverity ?? "none"})`);

  if (report.outcome === "failed") {
    return {
      report,
      failure: new ValidationFailedError(report, formatFailureDetails(report)),
      exitCode: 1,
    };
  }

  return { report, failure: null, exitCode: 0 };
};
