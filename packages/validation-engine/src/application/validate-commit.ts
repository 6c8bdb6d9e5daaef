import { VALIDATIONS, type CommitRecord, type Validation } from "@commitlens/core";
import { ValidationConfig, assertThreshold } from "../config.js";
import {
  hasConventionalFormat,
  hasIssueReference,
  hasVagueLanguage,
  isNonImperative,
  isShortSubject,
  isWipSubject,
} from "../domain/rules.js";

type RuleCheck = (commit: CommitRecord, config: ValidationConfig) => boolean;

const ruleChecks: Readonly<Record<Validation, RuleCheck>> = {
  ShortCommit: (commit, config) => isShortSubject(commit.subject, config.threshold),
  MissingReference: (commit, config) => !hasIssueReference(commit.subject, commit.body, config.patterns),
  InvalidFormat: (commit, config) => !hasConventionalFormat(commit.subject, config.patterns),
  VagueLanguage: (commit, config) => hasVagueLanguage(commit.subject, config.patterns),
  WipCommit: (commit, config) => isWipSubject(commit.subject, config.patterns),
  NonImperative: (commit, config) => isNonImperative(commit.subject, config.patterns),
};

/**
 * Returns the triggered validations in evaluation order. Disabled rules are never evaluated.
 */
export const validateCommit = (commit: CommitRecord, config: ValidationConfig): readonly Validation[] =>
  VALIDATIONS.filter(
    (validation) => config.isEnabled(validation) && ruleChecks[validation](commit, config),
  );

export type CheckCommitOptions = {
  config?: ValidationConfig;
  threshold?: number;
};

/**
 * Validates one commit. A `threshold` overrides only the threshold, on a copy of `config`.
 */
export const checkCommit = (commit: CommitRecord, options: CheckCommitOptions = {}): readonly Validation[] => {
  const base = options.config ?? new ValidationConfig();
  if (options.threshold === undefined) {
    return validateCommit(commit, base);
  }

  const config = base.clone();
  config.threshold = assertThreshold(options.threshold);
  return validateCommit(commit, config);
};
