/**
 * Types for the tiered analysis: tier results, risk levels and run modes.
 */

import { FileCategory } from "../config/schema";
import { Finding, ToolStatusMap } from "../findings/types";

// ============================================================================
// Risk
// ============================================================================

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL" | "UNKNOWN";

export const RISK_LEVELS: readonly RiskLevel[] = ["LOW", "MEDIUM", "HIGH", "CRITICAL", "UNKNOWN"];

/** UNKNOWN ranks below everything so any observed level replaces it. */
export const RISK_RANK: Record<RiskLevel, number> = {
  UNKNOWN: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
};

export function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === "string" && (RISK_LEVELS as readonly string[]).includes(value);
}

/**
 * Coarse risk of the change set, supplied by the caller or derived from changed files.
 */
export type RiskHint = "HIGH" | "MEDIUM" | "LOW" | "MINIMAL" | "UNKNOWN";

export const RISK_HINTS: readonly RiskHint[] = ["HIGH", "MEDIUM", "LOW", "MINIMAL", "UNKNOWN"];

export function isRiskHint(value: unknown): value is RiskHint {
  return typeof value === "string" && (RISK_HINTS as readonly string[]).includes(value);
}

// ============================================================================
// Modes and tiers
// ============================================================================

export type AnalysisMode = "standard" | "secondary-only" | "template-only";

export type AnalysisType = "comprehensive" | "focused" | "template" | "optimized-template" | "emergency";

export type TierLabel =
  | "Tier 1 (Primary)"
  | "Tier 2 (Secondary)"
  | "Tier 2 (Secondary Focused)"
  | "Tier 3 (Fallback)"
  | "Template-Only"
  | "Tier 3 (Optimized)"
  | "Emergency Fallback";

export interface TierMetadata {
  tier: TierLabel;
  /** Backend name, "template" for deterministic results. */
  provider: string;
  analysisType: AnalysisType;
  timestamp: string;
  /** Why earlier tiers were skipped or failed. */
  reason?: string;
  estimatedTokens?: number;
  mode: AnalysisMode;
}

/**
 * One issue as reported by an analysis tier.
 */
export interface VulnerabilityItem {
  type: string;
  severity: string;
  description: string;
  location?: string;
  recommendation?: string;
}

export interface TierResult {
  securityScore: number;
  riskAssessment: RiskLevel;
  actionRequired: boolean;
  vulnerabilitiesFound: VulnerabilityItem[];
  recommendations: string[];
  metadata: TierMetadata;
}

/** A tier's verdict before the orchestrator stamps metadata on it. */
export type TierVerdict = Omit<TierResult, "metadata">;

// ============================================================================
// Input
// ============================================================================

export type CategoryCounts = Record<FileCategory, number>;

/**
 * Everything a tier sees about the review unit.
 */
export interface AnalysisInput {
  findings: readonly Finding[];
  toolStatus: ToolStatusMap;
  changedFiles: readonly string[];
  categoryCounts: CategoryCounts;
  riskHint: RiskHint;
}
