import {
  VALIDATIONS,
  VALIDATION_NAMES,
  parseValidation,
  type Severity,
  type Validation,
} from "@commitlens/core";
import { ConfigurationError } from "./domain/errors.js";
import { DEFAULT_RULE_PATTERNS, type RulePatterns } from "./domain/rule-patterns.js";

export type ValidationToggles = {
  requireIssueRef: boolean;
  requireConventionalFormat: boolean;
  checkVagueLanguage: boolean;
  checkWip: boolean;
  checkImperative: boolean;
};

export type ValidationConfigOptions = Partial<ValidationToggles> & {
  threshold?: number;
  patterns?: RulePatterns;
  severities?: Partial<Record<Validation, Severity>>;
};

export const DEFAULT_THRESHOLD = 30;

export const DEFAULT_VALIDATION_TOGGLES: ValidationToggles = {
  requireIssueRef: true,
  requireConventionalFormat: true,
  checkVagueLanguage: true,
  checkWip: true,
  checkImperative: true,
};

export const DEFAULT_SEVERITIES: Readonly<Record<Validation, Severity>> = {
  ShortCommit: "warning",
  MissingReference: "info",
  InvalidFormat: "info",
  VagueLanguage: "warning",
  WipCommit: "error",
  NonImperative: "warning",
};

const toggleForValidation: Readonly<Record<Exclude<Validation, "ShortCommit">, keyof ValidationToggles>> = {
  MissingReference: "requireIssueRef",
  InvalidFormat: "requireConventionalFormat",
  VagueLanguage: "checkVagueLanguage",
  WipCommit: "checkWip",
  NonImperative: "checkImperative",
};

export const assertThreshold = (threshold: number): number => {
  if (!Number.isInteger(threshold) || threshold < 0) {
    throw new ConfigurationError(`threshold must be a non-negative integer, received ${threshold}`);
  }

  return threshold;
};

export const parseValidationList = (names: string | readonly string[]): Validation[] => {
  const entries = typeof names === "string" ? names.split(",") : names;
  const validations: Validation[] = [];
  for (const entry of entries) {
    if (entry.trim().length === 0) {
      continue;
    }

    const validation = parseValidation(entry);
    if (validation === null) {
      throw new ConfigurationError(
        `invalid validation name: '${entry.trim()}' (valid: ${VALIDATION_NAMES.join(", ")})`,
      );
    }

    if (!validations.includes(validation)) {
      validations.push(validation);
    }
  }

  return validations;
};

/**
 * Rule toggles, the short-subject threshold and one severity per validation kind.
 * Fields are read on every validation call, so mutations apply to the next run.
 */
export class ValidationConfig implements ValidationToggles {
  threshold: number;
  requireIssueRef: boolean;
  requireConventionalFormat: boolean;
  checkVagueLanguage: boolean;
  checkWip: boolean;
  checkImperative: boolean;
  patterns: RulePatterns;
  private readonly severities: Map<Validation, Severity>;

  constructor(options: ValidationConfigOptions = {}) {
    const toggles = { ...DEFAULT_VALIDATION_TOGGLES, ...options };
    this.threshold = assertThreshold(options.threshold ?? DEFAULT_THRESHOLD);
    this.requireIssueRef = toggles.requireIssueRef;
    this.requireConventionalFormat = toggles.requireConventionalFormat;
    this.checkVagueLanguage = toggles.checkVagueLanguage;
    this.checkWip = toggles.checkWip;
    this.checkImperative = toggles.checkImperative;
    this.patterns = options.patterns ?? DEFAULT_RULE_PATTERNS;
    this.severities = new Map(
      VALIDATIONS.map((validation): [Validation, Severity] => [
        validation,
        options.severities?.[validation] ?? DEFAULT_SEVERITIES[validation],
      ]),
    );
  }

  getSeverity(validation: Validation): Severity {
    return this.severities.get(validation) ?? DEFAULT_SEVERITIES[validation];
  }

  setSeverity(validation: Validation, severity: Severity): void {
    this.severities.set(validation, severity);
  }

  /**
   * Sets `severity` on every named validation, e.g. `"short,wip"`.
   */
  applySeverity(names: string | readonly string[], severity: Severity): void {
    for (const validation of parseValidationList(names)) {
      this.setSeverity(validation, severity);
    }
  }

  disable(names: string | readonly string[]): void {
    for (const validation of parseValidationList(names)) {
      if (validation === "ShortCommit") {
        this.threshold = 0;
      } else {
        const toggles: ValidationToggles = this;
        toggles[toggleForValidation[validation]] = false;
      }
    }
  }

  isEnabled(validation: Validation): boolean {
    if (validation === "ShortCommit") {
      return this.threshold > 0;
    }

    const toggles: ValidationToggles = this;
    return toggles[toggleForValidation[validation]];
  }

  shouldReport(validation: Validation): boolean {
    return this.getSeverity(validation) !== "ignore";
  }

  isError(validation: Validation): boolean {
    return this.getSeverity(validation) === "error";
  }

  severityMap(): Readonly<Record<Validation, Severity>> {
    return {
      ShortCommit: this.getSeverity("ShortCommit"),
      MissingReference: this.getSeverity("MissingReference"),
      InvalidFormat: this.getSeverity("InvalidFormat"),
      VagueLanguage: this.getSeverity("VagueLanguage"),
      WipCommit: this.getSeverity("WipCommit"),
      NonImperative: this.getSeverity("NonImperative"),
    };
  }

  clone(): ValidationConfig {
    return new ValidationConfig({
      threshold: this.threshold,
      requireIssueRef: this.requireIssueRef,
      requireConventionalFormat: this.requireConventionalFormat,
      checkVagueLanguage: this.checkVagueLanguage,
      checkWip: this.checkWip,
      checkImperative: this.checkImperative,
      patterns: this.patterns,
      severities: this.severityMap(),
    });
  }

  toString(): string {
    return (
      `ValidationConfig(threshold=${this.threshold}, require_issue_ref=${this.requireIssueRef}, ` +
      `require_conventional_format=${this.requireConventionalFormat}, ` +
      `check_vague_language=${this.checkVagueLanguage}, check_wip=${this.checkWip}, ` +
      `check_imperative=${this.checkImperative})`
    );
  }
}
