/**
 * Finding construction. Every adapter goes through createFinding so the
 * "never empty" fallbacks live in one place.
 */

import {
  CvssScore,
  Finding,
  Severity,
  ToolKind,
  UNKNOWN_LOCATION,
  UNKNOWN_PACKAGE,
  UNKNOWN_RULE_ID,
} from "./types";

export interface FindingInput {
  tool: ToolKind;
  severity: Severity;
  ruleId?: string | null;
  message?: string | null;
  location?: string | null;
  package?: string | null;
  cvssScore?: number | string | null;
  confidence?: string;
  solution?: string;
  reference?: string;
}

function nonEmpty(value: string | null | undefined, fallback: string): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed.length > 0 ? trimmed : fallback;
}

/**
 * Parse a CVSS score from a number or numeric string; anything outside 0-10 is "N/A".
 */
export function parseCvssScore(value: number | string | null | undefined): CvssScore {
  if (value === null || value === undefined || value === "") return "N/A";
  const score = typeof value === "number" ? value : parseFloat(value);
  if (!Number.isFinite(score) || score < 0 || score > 10) return "N/A";
  return Math.round(score * 10) / 10;
}

export function createFinding(input: FindingInput): Finding {
  const ruleId = nonEmpty(input.ruleId, UNKNOWN_RULE_ID);
  const finding: Finding = {
    tool: input.tool,
    severity: input.severity,
    ruleId,
    message: nonEmpty(input.message, "No description available"),
    location: nonEmpty(input.location, UNKNOWN_LOCATION),
    package: nonEmpty(input.package, UNKNOWN_PACKAGE),
    cvssScore: parseCvssScore(input.cvssScore),
    ...(input.confidence ? { confidence: input.confidence } : {}),
    ...(input.solution ? { solution: input.solution } : {}),
    ...(input.reference ? { reference: input.reference } : {}),
  };
  return Object.freeze(finding);
}

export function formatCvss(score: CvssScore): string {
  return typeof score === "number" ? score.toFixed(1) : score;
}
