export type Validation =
  | "ShortCommit"
  | "MissingReference"
  | "InvalidFormat"
  | "VagueLanguage"
  | "WipCommit"
  | "NonImperative";

/**
 * Evaluation order. Validators and reports list kinds in this order.
 */
export const VALIDATIONS: readonly Validation[] = [
  "ShortCommit",
  "MissingReference",
  "InvalidFormat",
  "VagueLanguage",
  "WipCommit",
  "NonImperative",
];

export type ValidationName = "short" | "reference" | "format" | "vague" | "wip" | "imperative";

type ValidationMetadata = {
  name: ValidationName;
  kebabName: string;
  description: string;
};

const validationMetadata: Readonly<Record<Validation, ValidationMetadata>> = {
  ShortCommit: {
    name: "short",
    kebabName: "short-commit",
    description: "Short commit message",
  },
  MissingReference: {
    name: "reference",
    kebabName: "missing-reference",
    description: "Missing issue reference (e.g., #123)",
  },
  InvalidFormat: {
    name: "format",
    kebabName: "invalid-format",
    description: "Invalid format (expected: type: description)",
  },
  VagueLanguage: {
    name: "vague",
    kebabName: "vague-language",
    description: "Vague language (e.g., 'fix bug', 'update code')",
  },
  WipCommit: {
    name: "wip",
    kebabName: "wip-commit",
    description: "Work-in-progress commit (e.g., 'WIP', 'fixup!')",
  },
  NonImperative: {
    name: "imperative",
    kebabName: "non-imperative",
    description: "Non-imperative mood (use 'Add' not 'Added')",
  },
};

const validationAliases: ReadonlyMap<string, Validation> = new Map<string, Validation>([["ref", "MissingReference"]]);

export const describeValidation = (validation: Validation): string =>
  validationMetadata[validation].description;

export const validationName = (validation: Validation): ValidationName =>
  validationMetadata[validation].name;

export const inspectValidation = (validation: Validation): string => `Validation.${validation}`;

export const parseValidation = (value: string): Validation | null => {
  const normalized = value.trim().toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  for (const validation of VALIDATIONS) {
    const metadata = validationMetadata[validation];
    if (
      normalized === validation.toLowerCase() ||
      normalized === metadata.name ||
      normalized === metadata.kebabName
    ) {
      return validation;
    }
  }

  return validationAliases.get(normalized) ?? null;
};

export const VALIDATION_NAMES: readonly ValidationName[] = VALIDATIONS.map(validationName);
