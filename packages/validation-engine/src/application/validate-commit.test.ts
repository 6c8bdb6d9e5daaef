import { VALIDATIONS, type CommitRecord } from "@commitlens/core";
import { describe, expect, it } from "vitest";
import { ValidationConfig } from "../config.js";
import { ConfigurationError } from "../domain/errors.js";
import { checkCommit, validateCommit } from "./validate-commit.js";

const createCommit = (subject: string, body?: string): CommitRecord => ({
  hash: "a1b2c3d4e5f6a1b2c3d4e5f6a1b2c3d4e5f6a1b2",
  authorName: "Test Author",
  authorEmail: "test@example.com",
  subject,
  ...(body === undefined ? {} : { body }),
});

describe("validateCommit", () => {
  it("reports nothing for a well-formed subject", () => {
    const commit = createCommit("feat(auth): add OAuth2 login flow for admins #42");

    expect(validateCommit(commit, new ValidationConfig())).toEqual([]);
  });

  it("reports every triggered rule once, in evaluation order", () => {
    const commit = createCommit("WIP fixed stuff");

    expect(validateCommit(commit, new ValidationConfig())).toEqual([
      "ShortCommit",
      "MissingReference",
      "InvalidFormat",
      "VagueLanguage",
      "WipCommit",
    ]);
  });

  it("flags the first word after the conventional prefix", () => {
    const commit = createCommit("fix(parser): removed duplicate token handling #7");

    expect(validateCommit(commit, new ValidationConfig())).toEqual(["NonImperative"]);
  });

  it("never evaluates disabled rules", () => {
    const config = new ValidationConfig({
      threshold: 0,
      requireIssueRef: false,
      requireConventionalFormat: false,
      checkVagueLanguage: false,
      checkWip: false,
      checkImperative: false,
    });

    expect(validateCommit(createCommit("WIP fixed stuff"), config)).toEqual([]);
  });

  it("keeps at most one entry per validation kind", () => {
    const result = validateCommit(createCommit(""), new ValidationConfig({ threshold: 1000 }));

    expect(result.length).toBeLessThanOrEqual(VALIDATIONS.length);
    expect(new Set(result).size).toBe(result.length);
    expect(result).toEqual(["ShortCommit", "MissingReference", "InvalidFormat"]);
  });

  it("accepts a reference found only in the body", () => {
    const commit = createCommit("feat(export): add CSV export for reports", "Refs ABC-12");

    expect(validateCommit(commit, new ValidationConfig())).toEqual([]);
  });

  it("picks up configuration changes on the next call", () => {
    const config = new ValidationConfig();
    const commit = createCommit("feat: add dark mode toggle to settings");
    expect(validateCommit(commit, config)).toEqual(["MissingReference"]);

    config.requireIssueRef = false;
    expect(validateCommit(commit, config)).toEqual([]);
  });
});

describe("checkCommit", () => {
  it("uses the default configuration when none is given", () => {
    expect(checkCommit(createCommit("feat: add dark mode toggle to settings"))).toEqual(["MissingReference"]);
  });

  it("overrides only the threshold, on a copy of the config", () => {
    const config = new ValidationConfig({ requireIssueRef: false });
    const commit = createCommit("feat: add dark mode toggle to settings");

    expect(checkCommit(commit, { config, threshold: 100 })).toEqual(["ShortCommit"]);
    expect(config.threshold).toBe(30);
  });

  it("rejects an invalid threshold override", () => {
    expect(() => checkCommit(createCommit("feat: add x"), { threshold: -5 })).toThrow(ConfigurationError);
  });
});
