import { InvalidArgumentError } from "commander";

export const parseNonNegativeInteger = (value: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`expected a non-negative integer, received '${value}'`);
  }

  return Number.parseInt(trimmed, 10);
};

export const readPackageVersion = (packageJson: string): string => {
  const parsed: unknown = JSON.parse(packageJson);
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }

  return "0.0.0";
};
