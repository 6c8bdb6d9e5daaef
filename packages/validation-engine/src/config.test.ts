import { SEVERITIES, VALIDATIONS } from "@commitlens/core";
import { describe, expect, it } from "vitest";
import { ValidationConfig, parseValidationList } from "./config.js";
import { ConfigurationError } from "./domain/errors.js";
import { DEFAULT_RULE_PATTERNS } from "./domain/rule-patterns.js";

describe("ValidationConfig", () => {
  it("starts from the documented defaults", () => {
    const config = new ValidationConfig();

    expect(config.threshold).toBe(30);
    expect(config.requireIssueRef).toBe(true);
    expect(config.requireConventionalFormat).toBe(true);
    expect(config.checkVagueLanguage).toBe(true);
    expect(config.checkWip).toBe(true);
    expect(config.checkImperative).toBe(true);
    expect(config.patterns).toBe(DEFAULT_RULE_PATTERNS);
    expect(config.severityMap()).toEqual({
      ShortCommit: "warning",
      MissingReference: "info",
      InvalidFormat: "info",
      VagueLanguage: "warning",
      WipCommit: "error",
      NonImperative: "warning",
    });
  });

  it("reads back explicit options unchanged and defaults the rest", () => {
    const config = new ValidationConfig({ threshold: 50, requireIssueRef: false, checkWip: false });

    expect(config.threshold).toBe(50);
    expect(config.requireIssueRef).toBe(false);
    expect(config.checkWip).toBe(false);
    expect(config.requireConventionalFormat).toBe(true);
    expect(config.checkVagueLanguage).toBe(true);
    expect(config.checkImperative).toBe(true);
  });

  it("rejects thresholds that are negative or fractional", () => {
    expect(() => new ValidationConfig({ threshold: -1 })).toThrow(ConfigurationError);
    expect(() => new ValidationConfig({ threshold: 2.5 })).toThrow(
      "threshold must be a non-negative integer, received 2.5",
    );
  });

  it("round-trips every severity for every validation", () => {
    const config = new ValidationConfig();
    for (const validation of VALIDATIONS) {
      for (const severity of SEVERITIES) {
        config.setSeverity(validation, severity);
        expect(config.getSeverity(validation)).toBe(severity);
      }
    }
  });

  it("applies severities and disables rules by name", () => {
    const config = new ValidationConfig();
    config.applySeverity("short, reference", "error");
    config.disable(["format", "short-commit"]);

    expect(config.isError("ShortCommit")).toBe(true);
    expect(config.getSeverity("MissingReference")).toBe("error");
    expect(config.requireConventionalFormat).toBe(false);
    expect(config.threshold).toBe(0);
    expect(config.isEnabled("ShortCommit")).toBe(false);
    expect(config.isEnabled("WipCommit")).toBe(true);
  });

  it("reports unknown names", () => {
    const config = new ValidationConfig();

    expect(() => config.applySeverity("short,spelling", "error")).toThrow(
      "invalid validation name: 'spelling' (valid: short, reference, format, vague, wip, imperative)",
    );
  });

  it("rejects object built-in names instead of treating them as validations", () => {
    const config = new ValidationConfig();

    expect(() => config.applySeverity("constructor", "error")).toThrow(
      "invalid validation name: 'constructor' (valid: short, reference, format, vague, wip, imperative)",
    );
    expect(() => config.disable("__proto__")).toThrow(ConfigurationError);
    expect(Object.keys(config.severityMap())).toHaveLength(6);
  });

  it("treats ignored validations as not reportable", () => {
    const config = new ValidationConfig({ severities: { VagueLanguage: "ignore" } });

    expect(config.shouldReport("VagueLanguage")).toBe(false);
    expect(config.shouldReport("WipCommit")).toBe(true);
  });

  it("clones without sharing severity state", () => {
    const config = new ValidationConfig({ threshold: 12 });
    const copy = config.clone();
    copy.setSeverity("WipCommit", "warning");
    copy.threshold = 40;

    expect(config.getSeverity("WipCommit")).toBe("error");
    expect(config.threshold).toBe(12);
    expect(copy.threshold).toBe(40);
  });

  it("includes the threshold in its text form", () => {
    expect(String(new ValidationConfig())).toBe(
      "ValidationConfig(threshold=30, require_issue_ref=true, require_conventional_format=true, " +
        "check_vague_language=true, check_wip=true, check_imperative=true)",
    );
  });
});

describe("parseValidationList", () => {
  it("skips blanks and duplicates", () => {
    expect(parseValidationList("wip,,WIP, imperative")).toEqual(["WipCommit", "NonImperative"]);
  });
});
