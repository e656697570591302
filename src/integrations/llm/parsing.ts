/**
 * JSON extraction and validation for AI responses.
 */

import { TierVerdict, VulnerabilityItem, isRiskLevel } from "../../analysis/types";
import { ResponseShapeError } from "../../errors";
import { truncateForLog } from "../../logger";
import { JsonRecord, isRecord, stringOf } from "../../utils/json";

/**
 * Find the first balanced `{...}` object in free text.
 * Braces inside JSON strings (including escaped quotes) are ignored.
 * Returns null when no complete object exists.
 */
export function extractJsonObject(text: string): string | null {
  let start = text.indexOf("{");

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === "\\") {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === "{") {
        depth++;
      } else if (ch === "}") {
        depth--;
        if (depth === 0) {
          const candidate = text.slice(start, i + 1);
          if (isParseable(candidate)) {
            return candidate;
          }
          break;
        }
      }
    }

    start = text.indexOf("{", start + 1);
  }

  return null;
}

function isParseable(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

function toVulnerability(value: unknown): VulnerabilityItem | null {
  if (typeof value === "string" && value.trim()) {
    return { type: "Issue", severity: "UNKNOWN", description: value.trim() };
  }
  if (!isRecord(value)) return null;

  const description =
    stringOf(value.description) ?? stringOf(value.message) ?? stringOf(value.title) ?? stringOf(value.summary);
  if (!description) return null;

  const recommendation = stringOf(value.recommendation) ?? stringOf(value.recommendedFix) ?? stringOf(value.fix);
  const location = stringOf(value.location);
  return {
    type: stringOf(value.type) ?? stringOf(value.id) ?? "Issue",
    severity: (stringOf(value.severity) ?? "UNKNOWN").toUpperCase(),
    description,
    ...(location ? { location } : {}),
    ...(recommendation ? { recommendation } : {}),
  };
}

function toRecommendation(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (isRecord(value)) {
    return stringOf(value.action) ?? stringOf(value.recommendation) ?? stringOf(value.description) ?? null;
  }
  return null;
}

function requireField(obj: JsonRecord, field: string, excerpt: string): unknown {
  if (!(field in obj)) {
    throw new ResponseShapeError(`Missing required field "${field}"`, excerpt);
  }
  return obj[field];
}

/**
 * Parse an AI response into a verdict.
 *
 * Throws ResponseShapeError when no JSON object can be extracted or a
 * required field is missing or of the wrong type. Malformed output is never
 * accepted partially.
 */
export function parseTierVerdict(text: string): TierVerdict {
  const excerpt = truncateForLog(text);
  const json = extractJsonObject(text);
  if (json === null) {
    throw new ResponseShapeError("No JSON object found in response", excerpt);
  }

  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) {
    throw new ResponseShapeError("Response JSON is not an object", excerpt);
  }

  const score = requireField(parsed, "securityScore", excerpt);
  if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 10) {
    throw new ResponseShapeError("securityScore must be a number between 0 and 10", excerpt);
  }

  const risk = requireField(parsed, "riskAssessment", excerpt);
  const normalizedRisk = typeof risk === "string" ? risk.toUpperCase() : risk;
  if (!isRiskLevel(normalizedRisk)) {
    throw new ResponseShapeError(`Unknown riskAssessment ${JSON.stringify(risk)}`, excerpt);
  }

  const actionRequired = requireField(parsed, "actionRequired", excerpt);
  if (typeof actionRequired !== "boolean") {
    throw new ResponseShapeError("actionRequired must be a boolean", excerpt);
  }

  const vulnerabilities = requireField(parsed, "vulnerabilitiesFound", excerpt);
  if (!Array.isArray(vulnerabilities)) {
    throw new ResponseShapeError("vulnerabilitiesFound must be an array", excerpt);
  }

  const recommendations = requireField(parsed, "recommendations", excerpt);
  if (!Array.isArray(recommendations)) {
    throw new ResponseShapeError("recommendations must be an array", excerpt);
  }

  return {
    securityScore: Math.round(score * 10) / 10,
    riskAssessment: normalizedRisk,
    actionRequired,
    vulnerabilitiesFound: vulnerabilities
      .map(toVulnerability)
      .filter((v): v is VulnerabilityItem => v !== null),
    recommendations: recommendations.map(toRecommendation).filter((r): r is string => r !== null),
  };
}
