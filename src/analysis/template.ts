/**
 * Deterministic template analysis.
 *
 * Produces a verdict from the parsed findings, the risk hint and the changed-file
 * categories alone. Has no external dependency and cannot fail.
 */

import { buildHistogram, compareSeverity } from "../findings/severity";
import { Finding, TOOL_INFO } from "../findings/types";
import {
  criticalRecommendation,
  highRecommendation,
  NO_ISSUES_RECOMMENDATION,
  secretRecommendation,
} from "./recommendations";
import { AnalysisInput, RiskLevel, TierVerdict, VulnerabilityItem } from "./types";

export const TEMPLATE_BASE_SCORE = 5.0;
export const TEMPLATE_CRITICAL_SCORE = 8.0;
export const TEMPLATE_HIGH_SCORE = 6.5;
export const TEMPLATE_MEDIUM_SCORE = 5.5;
/** Added per sensitive file category (auth/security, dependencies) touched. */
export const TEMPLATE_CATEGORY_BONUS = 0.5;
export const MAX_TEMPLATE_VULNERABILITIES = 20;

export function templateScore(input: AnalysisInput): number {
  const histogram = buildHistogram(input.findings);
  const { categoryCounts: counts, riskHint } = input;

  let score = TEMPLATE_BASE_SCORE;
  if (histogram.critical > 0) {
    score = TEMPLATE_CRITICAL_SCORE;
  } else if (histogram.high > 0 || riskHint === "HIGH") {
    score = TEMPLATE_HIGH_SCORE;
  } else if (histogram.medium > 0 || riskHint === "MEDIUM") {
    score = TEMPLATE_MEDIUM_SCORE;
  }

  if (counts.auth + counts.security > 0) score += TEMPLATE_CATEGORY_BONUS;
  if (counts.dependencies > 0) score += TEMPLATE_CATEGORY_BONUS;

  return Math.min(10, score);
}

export function templateRisk(input: AnalysisInput): RiskLevel {
  const histogram = buildHistogram(input.findings);
  if (histogram.critical > 0) return "CRITICAL";
  if (histogram.high > 0 || input.riskHint === "HIGH") return "HIGH";
  if (histogram.medium > 0 || input.riskHint === "MEDIUM" || input.categoryCounts.infrastructure > 0) {
    return "MEDIUM";
  }
  return "LOW";
}

function toVulnerability(finding: Finding): VulnerabilityItem {
  return {
    type: finding.ruleId,
    severity: finding.severity.toUpperCase(),
    description: `[${TOOL_INFO[finding.tool].label}] ${finding.message}`,
    location: finding.location,
    ...(finding.solution ? { recommendation: finding.solution } : {}),
  };
}

function templateRecommendations(input: AnalysisInput): string[] {
  const histogram = buildHistogram(input.findings);
  const counts = input.categoryCounts;
  const secrets = input.findings.filter((f) => f.tool === "gitLeaks").length;
  const misconfigurations = input.findings.filter((f) => f.tool === "checkov").length;
  const recommendations: string[] = [];

  if (histogram.critical > 0) recommendations.push(criticalRecommendation(histogram.critical));
  if (histogram.high > 0) recommendations.push(highRecommendation(histogram.high));
  if (secrets > 0) recommendations.push(secretRecommendation(secrets));
  if (misconfigurations > 0) {
    recommendations.push(`Fix ${misconfigurations} infrastructure configuration issues flagged by Checkov`);
  }
  if (counts.dependencies > 0) {
    recommendations.push(`Review ${counts.dependencies} dependency manifest changes for newly introduced vulnerabilities`);
  }
  if (counts.auth + counts.security > 0) {
    recommendations.push(
      `Request a security-focused review of ${counts.auth + counts.security} authentication and security file changes`
    );
  }
  if (counts.infrastructure > 0) {
    recommendations.push(`Check ${counts.infrastructure} infrastructure changes for exposed ports, privileges and secrets`);
  }

  if (recommendations.length === 0) {
    recommendations.push(NO_ISSUES_RECOMMENDATION);
  }
  return recommendations;
}

/**
 * Run the template analyzer.
 */
export function analyzeWithTemplate(input: AnalysisInput): TierVerdict {
  const riskAssessment = templateRisk(input);
  const vulnerabilitiesFound = input.findings
    .filter((f) => f.severity === "critical" || f.severity === "high")
    .sort((a, b) => compareSeverity(a.severity, b.severity))
    .slice(0, MAX_TEMPLATE_VULNERABILITIES)
    .map(toVulnerability);

  return {
    securityScore: templateScore(input),
    riskAssessment,
    actionRequired: riskAssessment === "HIGH" || riskAssessment === "CRITICAL",
    vulnerabilitiesFound,
    recommendations: templateRecommendations(input),
  };
}
