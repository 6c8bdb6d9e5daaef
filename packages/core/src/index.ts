export { isCommitHash, shortHash, type CommitRecord } from "./commit.js";
export {
  VALIDATIONS,
  VALIDATION_NAMES,
  describeValidation,
  inspectValidation,
  parseValidation,
  validationName,
  type Validation,
  type ValidationName,
} from "./validation.js";
export {
  SEVERITIES,
  compareSeverity,
  inspectSeverity,
  maxSeverity,
  parseSeverity,
  severityRank,
  type Severity,
} from "./severity.js";
export {
  LOG_LEVELS,
  createSilentLogger,
  createStderrLogger,
  formatLogLine,
  parseLogLevel,
  resolveLogLevelFromEnv,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./logger.js";
