/**
 * The aggregated report: one per run, immutable once built.
 */

import { TierResult } from "../analysis/types";
import { Finding, SeverityHistogram, ToolKind, ToolStatusMap } from "../findings/types";

export interface ReviewUnit {
  /** "owner/repo" */
  repository?: string;
  /** Pull request number; absent for scheduled runs. */
  number?: number;
}

export interface ReportSummary extends SeverityHistogram {
  total: number;
}

export type ToolSummary = Record<ToolKind, SeverityHistogram & { total: number }>;

export interface AggregatedReport {
  generatedAt: string;
  reviewUnit: ReviewUnit;
  findings: readonly Finding[];
  summary: ReportSummary;
  toolStatus: ToolStatusMap;
  toolSummary: ToolSummary;
  /** Tier result after the ground-truth override. */
  analysis: TierResult;
  /** Human-readable notes on what the override changed; empty when nothing did. */
  overrides: string[];
  recommendations: string[];
  requiresReview: boolean;
  body: string;
}
