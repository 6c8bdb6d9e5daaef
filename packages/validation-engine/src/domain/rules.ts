import type { RulePatterns } from "./rule-patterns.js";

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const alternation = (words: readonly string[]): string =>
  words
    .map((word) => escapeRegExp(word.trim()).replace(/\s+/g, "\\s+"))
    .filter((word) => word.length > 0)
    .join("|");

// Only configured types count as a prefix: "Fixed: crash" keeps "fixed" as its first word.
const conventionalPrefixPattern = (patterns: RulePatterns): RegExp =>
  new RegExp(`^(?:${alternation(patterns.conventionalTypes)})(?:\\([^)]*\\))?!?:\\s*`);

const conventionalPattern = (patterns: RulePatterns): RegExp =>
  new RegExp(`^(?:${alternation(patterns.conventionalTypes)})(?:\\(.+\\))?!?:\\s.+`);

const vaguePattern = (patterns: RulePatterns): RegExp | null => {
  const vagueSources: string[] = [];
  const terms = alternation(patterns.vagueTerms);
  if (terms.length > 0) {
    vagueSources.push(`\\b(?:${terms})\\b`);
  }

  const verbs = alternation(patterns.vagueVerbs);
  const objects = alternation(patterns.vagueObjects);
  if (verbs.length > 0 && objects.length > 0) {
    vagueSources.push(`\\b(?:${verbs})\\s+(?:${objects})s?\\b`);
  }

  return vagueSources.length === 0 ? null : new RegExp(vagueSources.join("|"), "i");
};

/**
 * Length in characters (code points), so astral symbols count once.
 */
export const subjectLength = (subject: string): number => [...subject].length;

export const isShortSubject = (subject: string, threshold: number): boolean =>
  threshold > 0 && subjectLength(subject) < threshold;

/**
 * Tests without carrying `lastIndex` over from a previous call when the pattern is global or sticky.
 */
const matches = (pattern: RegExp, text: string): boolean =>
  pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")).test(text)
    : pattern.test(text);

export const hasIssueReference = (
  subject: string,
  body: string | undefined,
  patterns: RulePatterns,
): boolean =>
  matches(patterns.issueReference, subject) || (body !== undefined && matches(patterns.issueReference, body));

export const hasConventionalFormat = (subject: string, patterns: RulePatterns): boolean =>
  conventionalPattern(patterns).test(subject);

export const hasVagueLanguage = (subject: string, patterns: RulePatterns): boolean =>
  vaguePattern(patterns)?.test(subject) ?? false;

export const isWipSubject = (subject: string, patterns: RulePatterns): boolean =>
  matches(patterns.wipMarker, subject);

export const firstWord = (subject: string, patterns: RulePatterns): string => {
  const withoutPrefix = subject.trim().replace(conventionalPrefixPattern(patterns), "");
  const [word] = withoutPrefix.split(/\s+/);
  return (word ?? "").replace(/^[^\p{L}]+|[^\p{L}]+$/gu, "").toLowerCase();
};

export const isNonImperative = (subject: string, patterns: RulePatterns): boolean => {
  const word = firstWord(subject, patterns);
  if (word.length === 0 || patterns.imperativeExceptions.includes(word)) {
    return false;
  }

  return patterns.nonImperativeSuffixes.some((suffix) => word.length > suffix.length && word.endsWith(suffix));
};
