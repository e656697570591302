/**
 * Aggregation of parsed findings and the tier result into the final report.
 *
 * Deterministic counts take precedence over the tier's own assessment: any
 * critical or high finding raises the risk to at least that level and forces
 * actionRequired. The risk is never lowered.
 */

import {
  criticalRecommendation,
  highRecommendation,
  scannerErrorRecommendation,
  secretRecommendation,
} from "../analysis/recommendations";
import { RISK_RANK, RiskLevel, TierResult } from "../analysis/types";
import { buildHistogram } from "../findings/severity";
import { Finding, SeverityHistogram, TOOL_INFO, TOOL_KINDS, ToolStatusMap } from "../findings/types";
import { logger } from "../logger";
import { deepFreeze } from "../utils/freeze";
import { renderReport, RenderOptions } from "./markdown";
import { AggregatedReport, ReportSummary, ReviewUnit, ToolSummary } from "./types";

const log = logger.child("Aggregator");

/** Score at or above which a review is requested even without actionRequired. */
export const REVIEW_SCORE_THRESHOLD = 6.0;

/**
 * Highest risk level the findings alone justify, or undefined when there are
 * no findings above informational.
 */
export function observedRisk(histogram: SeverityHistogram): RiskLevel | undefined {
  if (histogram.critical > 0) return "CRITICAL";
  if (histogram.high > 0) return "HIGH";
  if (histogram.medium > 0) return "MEDIUM";
  if (histogram.low > 0) return "LOW";
  return undefined;
}

export interface OverrideOutcome {
  result: TierResult;
  notes: string[];
}

/**
 * Apply the ground-truth override to a tier result.
 */
export function applyGroundTruth(result: TierResult, histogram: SeverityHistogram): OverrideOutcome {
  const notes: string[] = [];
  const observed = observedRisk(histogram);
  let riskAssessment = result.riskAssessment;
  let actionRequired = result.actionRequired;

  if (observed === "CRITICAL" || observed === "HIGH") {
    if (RISK_RANK[observed] > RISK_RANK[riskAssessment]) {
      notes.push(
        `Risk raised from ${riskAssessment} to ${observed}: ${observed === "CRITICAL" ? histogram.critical : histogram.high} ${observed.toLowerCase()} finding(s) reported by scanners`
      );
      riskAssessment = observed;
    }
    if (!actionRequired) {
      notes.push("Action required forced by scanner findings");
      actionRequired = true;
    }
  } else if (riskAssessment === "UNKNOWN" && observed) {
    notes.push(`Risk UNKNOWN replaced by observed level ${observed}`);
    riskAssessment = observed;
  }

  return { result: { ...result, riskAssessment, actionRequired }, notes };
}

/**
 * Deterministic recommendations first, then the tier's, de-duplicated by exact text.
 */
export function mergeRecommendations(
  findings: readonly Finding[],
  toolStatus: ToolStatusMap,
  tierRecommendations: readonly string[]
): string[] {
  const histogram = buildHistogram(findings);
  const deterministic: string[] = [];

  if (histogram.critical > 0) deterministic.push(criticalRecommendation(histogram.critical));
  if (histogram.high > 0) deterministic.push(highRecommendation(histogram.high));

  const secrets = findings.filter((f) => f.tool === "gitLeaks").length;
  if (secrets > 0) deterministic.push(secretRecommendation(secrets));

  const failedTools = TOOL_KINDS.filter((tool) => toolStatus[tool] === "Error").map((tool) => TOOL_INFO[tool].label);
  if (failedTools.length > 0) deterministic.push(scannerErrorRecommendation(failedTools));

  return Array.from(new Set([...deterministic, ...tierRecommendations]));
}

export function buildToolSummary(findings: readonly Finding[]): ToolSummary {
  const perTool = (tool: keyof ToolSummary) => {
    const own = findings.filter((f) => f.tool === tool);
    return { ...buildHistogram(own), total: own.length };
  };
  return {
    trivy: perTool("trivy"),
    osvScanner: perTool("osvScanner"),
    semgrep: perTool("semgrep"),
    gitLeaks: perTool("gitLeaks"),
    checkov: perTool("checkov"),
    owaspZap: perTool("owaspZap"),
    dependabot: perTool("dependabot"),
  };
}

export interface AggregateParams {
  findings: readonly Finding[];
  toolStatus: ToolStatusMap;
  tierResult: TierResult;
  reviewUnit: ReviewUnit;
  render?: Partial<RenderOptions>;
  now?: () => Date;
}

/**
 * Build the immutable report, including its rendered markdown body.
 */
export function aggregate(params: AggregateParams): AggregatedReport {
  const histogram = buildHistogram(params.findings);
  const summary: ReportSummary = { ...histogram, total: params.findings.length };
  const { result: analysis, notes } = applyGroundTruth(params.tierResult, histogram);

  for (const note of notes) {
    log.info(note);
  }

  const withoutBody: Omit<AggregatedReport, "body"> = {
    generatedAt: (params.now ?? (() => new Date()))().toISOString(),
    reviewUnit: { ...params.reviewUnit },
    findings: [...params.findings],
    summary,
    toolStatus: { ...params.toolStatus },
    toolSummary: buildToolSummary(params.findings),
    analysis: {
      ...analysis,
      vulnerabilitiesFound: analysis.vulnerabilitiesFound.map((v) => ({ ...v })),
      recommendations: [...analysis.recommendations],
      metadata: { ...analysis.metadata },
    },
    overrides: notes,
    recommendations: mergeRecommendations(params.findings, params.toolStatus, analysis.recommendations),
    requiresReview: analysis.actionRequired || analysis.securityScore >= REVIEW_SCORE_THRESHOLD,
  };

  return deepFreeze({ ...withoutBody, body: renderReport(withoutBody, params.render) });
}
