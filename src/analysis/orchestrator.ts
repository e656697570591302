/**
 * Tiered analysis orchestration.
 *
 * NOT_STARTED -> ATTEMPT_TIER1 -> ATTEMPT_TIER2 -> TEMPLATE_FALLBACK -> DONE
 *
 * The mode decides which states are reachable. AI calls are strictly
 * sequential. The template state has no external dependency, so every run
 * ends with a TierResult.
 */

import { errorMessage } from "../errors";
import { buildHistogram } from "../findings/severity";
import { ProviderGateway } from "../integrations/llm/gateway";
import { parseTierVerdict } from "../integrations/llm/parsing";
import { buildFocusedPrompt, buildSecurityPrompt } from "../integrations/llm/prompts";
import { ProviderKind } from "../integrations/llm/types";
import { logger } from "../logger";
import { AI_FAILED_RECOMMENDATION } from "./recommendations";
import { analyzeWithTemplate } from "./template";
import { AnalysisInput, AnalysisMode, AnalysisType, TierLabel, TierMetadata, TierResult, TierVerdict } from "./types";

const log = logger.child("Orchestrator");

export type OrchestratorState = "NOT_STARTED" | "ATTEMPT_TIER1" | "ATTEMPT_TIER2" | "TEMPLATE_FALLBACK" | "DONE";

export interface OrchestratorOptions {
  mode: AnalysisMode;
  gateway: ProviderGateway;
  now?: () => Date;
  /** Receives every state the run enters, in order. */
  onTransition?: (state: OrchestratorState) => void;
}

/** High findings tolerated by the low-risk shortcut. */
const SHORTCUT_MAX_HIGH = 2;
const SHORTCUT_MAX_FILES = 2;

/**
 * Whether the input is low-risk enough to skip the AI tiers entirely.
 * Never true with critical findings, secrets, or more than two high findings.
 */
export function isTriviallyLowRisk(input: AnalysisInput): boolean {
  const histogram = buildHistogram(input.findings);
  const secrets = input.findings.some((f) => f.tool === "gitLeaks");
  if (histogram.critical > 0 || secrets || histogram.high > SHORTCUT_MAX_HIGH) {
    return false;
  }

  const fewFiles = input.changedFiles.length > 0 && input.changedFiles.length <= SHORTCUT_MAX_FILES;
  return fewFiles || input.riskHint === "MINIMAL" || input.findings.length === 0;
}

interface AiAttempt {
  state: OrchestratorState;
  kind: ProviderKind;
  tier: TierLabel;
  analysisType: AnalysisType;
  buildPrompt: (input: AnalysisInput) => string;
}

const TIER1: AiAttempt = {
  state: "ATTEMPT_TIER1",
  kind: "primary",
  tier: "Tier 1 (Primary)",
  analysisType: "comprehensive",
  buildPrompt: buildSecurityPrompt,
};

const TIER2: AiAttempt = {
  state: "ATTEMPT_TIER2",
  kind: "secondary",
  tier: "Tier 2 (Secondary)",
  analysisType: "comprehensive",
  buildPrompt: buildSecurityPrompt,
};

const TIER2_FOCUSED: AiAttempt = {
  state: "ATTEMPT_TIER2",
  kind: "secondary",
  tier: "Tier 2 (Secondary Focused)",
  analysisType: "focused",
  buildPrompt: buildFocusedPrompt,
};

/**
 * Run the analysis tiers for one review unit.
 */
export async function runTieredAnalysis(input: AnalysisInput, options: OrchestratorOptions): Promise<TierResult> {
  const { mode, gateway } = options;
  const now = options.now ?? (() => new Date());
  const reasons: string[] = [];
  let aiFailed = false;

  function enter(state: OrchestratorState): void {
    log.debug(`State ${state}`);
    options.onTransition?.(state);
  }

  function finish(verdict: TierVerdict, metadata: Omit<TierMetadata, "timestamp" | "mode">): TierResult {
    enter("DONE");
    const result: TierResult = {
      ...verdict,
      metadata: { ...metadata, timestamp: now().toISOString(), mode },
    };
    log.info(`Analysis completed by ${result.metadata.tier}`, {
      provider: result.metadata.provider,
      risk: result.riskAssessment,
      score: result.securityScore,
    });
    return result;
  }

  async function attempt(step: AiAttempt): Promise<TierResult | null> {
    enter(step.state);
    if (!gateway.has(step.kind)) {
      reasons.push(`${step.tier}: not configured`);
      log.info(`${step.tier} skipped: no ${step.kind} provider configured`);
      return null;
    }

    try {
      const response = await gateway.invoke(step.buildPrompt(input), step.kind);
      const verdict = parseTierVerdict(response.text);
      return finish(verdict, {
        tier: step.tier,
        provider: response.provider,
        analysisType: step.analysisType,
        estimatedTokens: response.estimatedTokens,
      });
    } catch (error) {
      aiFailed = true;
      reasons.push(`${step.tier}: ${errorMessage(error)}`);
      log.warn(`${step.tier} failed, falling back`, { error: errorMessage(error) });
      return null;
    }
  }

  function templateResult(tier: TierLabel, analysisType: AnalysisType, reason: string): TierResult {
    enter("TEMPLATE_FALLBACK");
    const verdict = analyzeWithTemplate(input);
    if (aiFailed) {
      verdict.recommendations.unshift(AI_FAILED_RECOMMENDATION);
    }
    return finish(verdict, { tier, provider: "template", analysisType, reason });
  }

  enter("NOT_STARTED");

  switch (mode) {
    case "template-only":
      return templateResult("Template-Only", "template", "Template-only mode: AI tiers disabled");

    case "secondary-only": {
      reasons.push("Tier 1 (Primary): skipped in secondary-only mode");
      const secondary = await attempt(TIER2_FOCUSED);
      if (secondary) return secondary;
      return templateResult("Tier 3 (Fallback)", "template", reasons.join("; "));
    }

    case "standard": {
      if (isTriviallyLowRisk(input)) {
        log.info("Minimal risk input, using optimized template analysis");
        return templateResult(
          "Tier 3 (Optimized)",
          "optimized-template",
          "Minimal risk scan - AI analysis skipped for cost optimization"
        );
      }
      const primary = await attempt(TIER1);
      if (primary) return primary;
      const secondary = await attempt(TIER2);
      if (secondary) return secondary;
      return templateResult("Tier 3 (Fallback)", "template", reasons.join("; "));
    }

    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown analysis mode: ${String(unreachable)}`);
    }
  }
}
