export type RulePatterns = {
  /** Tokens accepted as an issue or ticket reference in the subject or body. */
  issueReference: RegExp;
  conventionalTypes: readonly string[];
  vagueTerms: readonly string[];
  vagueVerbs: readonly string[];
  vagueObjects: readonly string[];
  wipMarker: RegExp;
  nonImperativeSuffixes: readonly string[];
  /** First words that end in a flagged suffix but are imperative verbs. */
  imperativeExceptions: readonly string[];
};

export const DEFAULT_RULE_PATTERNS: RulePatterns = {
  // #123, GH-123, JIRA-123, ABC2-45
  issueReference: /#\d+|\b[Gg][Hh]-\d+|\b[A-Z]{2}[A-Z0-9]*-\d+/,
  conventionalTypes: [
    "feat",
    "fix",
    "docs",
    "style",
    "refactor",
    "perf",
    "test",
    "build",
    "ci",
    "chore",
    "revert",
  ],
  vagueTerms: [
    "stuff",
    "things",
    "misc",
    "various",
    "minor changes",
    "minor fixes",
    "small changes",
    "small fixes",
    "some changes",
    "some fixes",
    "more changes",
  ],
  vagueVerbs: [
    "fix",
    "fixed",
    "fixes",
    "fixing",
    "update",
    "updated",
    "updates",
    "change",
    "changed",
    "changes",
    "modify",
    "modified",
    "modifies",
    "tweak",
    "tweaked",
    "tweaks",
    "adjust",
    "adjusted",
    "adjusts",
  ],
  vagueObjects: ["it", "this", "that", "thing", "stuff", "code", "bug", "issue", "error", "problem"],
  wipMarker:
    /\bwip\b|\bwork[\s_-]?in[\s_-]?progress\b|^(?:fixup|squash|amend)!|\bdo\s*not\s*merge\b|\bdon'?t\s*merge\b/i,
  nonImperativeSuffixes: ["ing", "ed", "s"],
  imperativeExceptions: [
    "access",
    "address",
    "bias",
    "bypass",
    "compress",
    "discuss",
    "embed",
    "exceed",
    "express",
    "focus",
    "pass",
    "proceed",
    "process",
    "seed",
    "shed",
    "speed",
    "succeed",
    "suppress",
  ],
};
