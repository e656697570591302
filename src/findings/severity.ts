/**
 * Severity normalization for the native scales of each scanner.
 */

import { Severity, SeverityHistogram, SEVERITY_RANK } from "./types";

/**
 * Map a numeric "security-severity" score (CVSS-like, 0-10).
 */
export function severityFromScore(score: number): Severity {
  if (score >= 9.0) return "critical";
  if (score >= 7.0) return "high";
  if (score >= 4.0) return "medium";
  return "low";
}

/**
 * Map a SARIF result level. Anything other than error/warning is low.
 */
export function severityFromLevel(level: string | undefined): Severity {
  switch (level) {
    case "error":
      return "high";
    case "warning":
      return "medium";
    default:
      return "low";
  }
}

/**
 * Map a free-form severity label ("CRITICAL", "Moderate", "high"...).
 * Unmatched or missing labels are medium.
 */
export function severityFromLabel(label: string | null | undefined): Severity {
  if (!label) return "medium";
  const sev = label.toLowerCase();
  if (sev.includes("critical")) return "critical";
  if (sev.includes("high")) return "high";
  if (sev.includes("medium") || sev.includes("moderate")) return "medium";
  if (sev.includes("low")) return "low";
  return "medium";
}

/**
 * Map the dynamic scanner's risk code. That format has no critical level.
 */
export function severityFromRiskCode(code: number): Severity {
  switch (code) {
    case 0:
      return "informational";
    case 1:
      return "low";
    case 3:
      return "high";
    default:
      return "medium";
  }
}

/**
 * Dynamic scanner confidence code to a display label.
 */
export function confidenceLabel(code: number): string {
  switch (code) {
    case 0:
      return "False Positive";
    case 1:
      return "Low";
    case 2:
      return "Medium";
    case 3:
      return "High";
    case 4:
      return "Confirmed";
    default:
      return "Unknown";
  }
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[b] - SEVERITY_RANK[a];
}

export function emptyHistogram(): SeverityHistogram {
  return { critical: 0, high: 0, medium: 0, low: 0, informational: 0 };
}

export function buildHistogram(findings: readonly { severity: Severity }[]): SeverityHistogram {
  const histogram = emptyHistogram();
  for (const finding of findings) {
    histogram[finding.severity]++;
  }
  return histogram;
}

