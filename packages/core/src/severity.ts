export type Severity = "error" | "warning" | "info" | "ignore";

/**
 * Most severe first.
 */
export const SEVERITIES: readonly Severity[] = ["error", "warning", "info", "ignore"];

export const severityRank: Readonly<Record<Severity, number>> = {
  ignore: 0,
  info: 1,
  warning: 2,
  error: 3,
};

const severityVariant: Readonly<Record<Severity, string>> = {
  error: "Error",
  warning: "Warning",
  info: "Info",
  ignore: "Ignore",
};

/**
 * Negative when `a` is less severe than `b`, so `[...list].sort(compareSeverity)` orders least severe first.
 */
export const compareSeverity = (a: Severity, b: Severity): number => severityRank[a] - severityRank[b];

export const maxSeverity = (severities: Iterable<Severity>): Severity | null => {
  let highest: Severity | null = null;
  for (const severity of severities) {
    if (highest === null || severityRank[severity] > severityRank[highest]) {
      highest = severity;
    }
  }

  return highest;
};

export const inspectSeverity = (severity: Severity): string => `Severity.${severityVariant[severity]}`;

export const parseSeverity = (value: string): Severity | null => {
  switch (value.trim().toLowerCase()) {
    case "error":
      return "error";
    case "warning":
    case "warn":
      return "warning";
    case "info":
      return "info";
    case "ignore":
      return "ignore";
    default:
      return null;
  }
};
