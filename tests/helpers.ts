/**
 * Builders and fakes shared by the tests.
 */

import { emptyCategoryCounts } from "../src/analysis/categories";
import { AnalysisInput, TierResult } from "../src/analysis/types";
import { createFinding, FindingInput } from "../src/findings/finding";
import { Finding, Severity, ToolKind, ToolStatus, ToolStatusMap } from "../src/findings/types";
import { CommentApi, TrackedComment } from "../src/integrations/github";
import { AnalysisProvider, CompletionOptions, ProviderKind, ProviderResponse } from "../src/integrations/llm";

export function finding(tool: ToolKind, severity: Severity, overrides: Partial<FindingInput> = {}): Finding {
  return createFinding({
    tool,
    severity,
    ruleId: `${tool.toUpperCase()}-${severity}`,
    message: `${severity} issue from ${tool}`,
    location: "src/app.ts:10",
    package: "app",
    ...overrides,
  });
}

export function toolStatuses(status: ToolStatus = "Completed"): ToolStatusMap {
  return {
    trivy: status,
    osvScanner: status,
    semgrep: status,
    gitLeaks: status,
    checkov: status,
    owaspZap: status,
    dependabot: status,
  };
}

export function analysisInput(overrides: Partial<AnalysisInput> = {}): AnalysisInput {
  return {
    findings: [],
    toolStatus: toolStatuses(),
    changedFiles: [],
    categoryCounts: emptyCategoryCounts(),
    riskHint: "UNKNOWN",
    ...overrides,
  };
}

export function tierResult(overrides: Partial<TierResult> = {}): TierResult {
  return {
    securityScore: 2.0,
    riskAssessment: "LOW",
    actionRequired: false,
    vulnerabilitiesFound: [],
    recommendations: [],
    metadata: {
      tier: "Tier 1 (Primary)",
      provider: "Fake Primary",
      analysisType: "comprehensive",
      timestamp: "2026-10-19T12:00:00.000Z",
      mode: "standard",
    },
    ...overrides,
  };
}

export type CompleteMock = jest.Mock<Promise<ProviderResponse>, [string, CompletionOptions]>;

export function fakeProvider(kind: ProviderKind, name: string): { provider: AnalysisProvider; complete: CompleteMock } {
  const complete: CompleteMock = jest.fn<Promise<ProviderResponse>, [string, CompletionOptions]>();
  return { provider: { kind, name, complete }, complete };
}

export function verdictJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    securityScore: 3.5,
    riskAssessment: "LOW",
    actionRequired: false,
    vulnerabilitiesFound: [],
    recommendations: ["Keep dependencies current"],
    ...overrides,
  });
}

export const FIXED_NOW = new Date("2026-10-19T12:00:00.000Z");

export function fixedClock(): Date {
  return FIXED_NOW;
}

/**
 * In-memory comment thread.
 */
export class InMemoryCommentApi implements CommentApi {
  comments: TrackedComment[] = [];
  private nextId = 100;

  async listComments(_issueNumber: number): Promise<TrackedComment[]> {
    return this.comments.map((c) => ({ ...c }));
  }

  async createComment(_issueNumber: number, body: string): Promise<TrackedComment> {
    const comment = { id: this.nextId++, body };
    this.comments.push(comment);
    return comment;
  }

  async updateComment(commentId: number, body: string): Promise<TrackedComment> {
    const comment = this.comments.find((c) => c.id === commentId);
    if (!comment) {
      throw Object.assign(new Error("Not Found"), { status: 404 });
    }
    comment.body = body;
    return { ...comment };
  }
}
