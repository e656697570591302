/**
 * Step outputs and job summary for the calling workflow.
 */

import * as core from "@actions/core";
import { EMERGENCY_RECOMMENDATION } from "../analysis/recommendations";
import { AnalysisMode, TierResult } from "../analysis/types";
import { AggregatedReport } from "./types";

export const OUTPUT_NAMES = [
  "risk-assessment",
  "action-required",
  "security-score",
  "vulnerabilities-found",
  "requires-security-review",
  "recommendations",
  "recommendations-text",
  "ai-provider",
  "analysis-tier",
  "total-findings",
  "critical-count",
  "high-count",
  "analysis-report",
] as const;

export type OutputName = (typeof OUTPUT_NAMES)[number];

export type ActionOutputs = Record<OutputName, string>;

export const EMERGENCY_SCORE = 5.0;

export function buildOutputs(report: AggregatedReport): ActionOutputs {
  const { analysis, summary } = report;
  return {
    "risk-assessment": analysis.riskAssessment,
    "action-required": String(analysis.actionRequired),
    "security-score": String(analysis.securityScore),
    "vulnerabilities-found": String(analysis.vulnerabilitiesFound.length),
    "requires-security-review": String(report.requiresReview),
    recommendations: String(report.recommendations.length),
    "recommendations-text": report.recommendations.join("; "),
    "ai-provider": analysis.metadata.provider,
    "analysis-tier": analysis.metadata.tier,
    "total-findings": String(summary.total),
    "critical-count": String(summary.critical),
    "high-count": String(summary.high),
    "analysis-report": [
      `Risk: ${analysis.riskAssessment}`,
      `Score: ${analysis.securityScore}/10`,
      `Findings: ${summary.total} (${summary.critical} critical, ${summary.high} high)`,
      `Tier: ${analysis.metadata.tier}`,
      `Provider: ${analysis.metadata.provider}`,
    ].join("|"),
  };
}

export function setActionOutputs(
  outputs: ActionOutputs,
  setOutput: (name: string, value: string) => void = core.setOutput
): void {
  for (const name of OUTPUT_NAMES) {
    setOutput(name, outputs[name]);
  }
}

export async function writeJobSummary(report: AggregatedReport): Promise<void> {
  const { analysis, summary } = report;
  await core.summary
    .addHeading("Unified Security Report")
    .addRaw(`**Risk:** ${analysis.riskAssessment} | **Score:** ${analysis.securityScore}/10`)
    .addBreak()
    .addRaw(
      `**Findings:** ${summary.total} (${summary.critical} critical, ${summary.high} high, ${summary.medium} medium, ${summary.low} low)`
    )
    .addBreak()
    .addRaw(`**Analysis:** ${analysis.metadata.tier} via ${analysis.metadata.provider}`)
    .write();
}

/**
 * Tier result used when the pipeline itself fails.
 */
export function buildEmergencyResult(reason: string, mode: AnalysisMode, now: Date = new Date()): TierResult {
  return {
    securityScore: EMERGENCY_SCORE,
    riskAssessment: "UNKNOWN",
    actionRequired: true,
    vulnerabilitiesFound: [],
    recommendations: [EMERGENCY_RECOMMENDATION],
    metadata: {
      tier: "Emergency Fallback",
      provider: "none",
      analysisType: "emergency",
      timestamp: now.toISOString(),
      reason,
      mode,
    },
  };
}
