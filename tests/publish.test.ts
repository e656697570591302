/**
 * Tests for the tracked comment publisher and the workflow outputs.
 */

import * as core from "@actions/core";
import { EMERGENCY_RECOMMENDATION } from "../src/analysis/recommendations";
import { InvalidReportError, PublishError } from "../src/errors";
import { assertPublishable, findTrackedComment, publishReport } from "../src/integrations/github";
import { configureLogger } from "../src/logger";
import { aggregate } from "../src/report/aggregator";
import { REPORT_MARKER } from "../src/report/markdown";
import {
  buildEmergencyResult,
  buildOutputs,
  OUTPUT_NAMES,
  setActionOutputs,
  writeJobSummary,
} from "../src/report/outputs";
import { AggregatedReport, ReviewUnit } from "../src/report/types";
import { finding, fixedClock, FIXED_NOW, InMemoryCommentApi, tierResult, toolStatuses } from "./helpers";

jest.mock("@actions/core", () => {
  const summary = {
    addHeading: jest.fn(),
    addRaw: jest.fn(),
    addBreak: jest.fn(),
    write: jest.fn(),
  };
  summary.addHeading.mockReturnValue(summary);
  summary.addRaw.mockReturnValue(summary);
  summary.addBreak.mockReturnValue(summary);
  summary.write.mockResolvedValue(summary);
  return { setOutput: jest.fn(), setFailed: jest.fn(), summary };
});

beforeAll(() => {
  configureLogger({ level: "error" });
});

afterAll(() => {
  configureLogger({ level: "info" });
});

function report(reviewUnit: ReviewUnit = { repository: "acme/shop", number: 7 }, score = 2.0): AggregatedReport {
  return aggregate({
    findings: [finding("semgrep", "medium")],
    toolStatus: toolStatuses(),
    tierResult: tierResult({ securityScore: score }),
    reviewUnit,
    now: fixedClock,
  });
}

describe("publishReport", () => {
  it("should create the tracked comment on the first run", async () => {
    const api = new InMemoryCommentApi();

    const outcome = await publishReport(report(), api);

    expect(outcome).toEqual({ action: "created", commentId: 100 });
    expect(api.comments).toHaveLength(1);
    expect(api.comments[0].body?.startsWith(REPORT_MARKER)).toBe(true);
  });

  it("should update the same comment on later runs", async () => {
    const api = new InMemoryCommentApi();

    await publishReport(report(), api);
    const second = report({ repository: "acme/shop", number: 7 }, 4.5);
    const outcome = await publishReport(second, api);

    expect(outcome).toEqual({ action: "updated", commentId: 100 });
    expect(api.comments).toHaveLength(1);
    expect(api.comments[0].body).toBe(second.body);
  });

  it("should leave other comments untouched", async () => {
    const api = new InMemoryCommentApi();
    api.comments.push({ id: 1, body: "LGTM" }, { id: 2, body: null }, { id: 3, body: `${REPORT_MARKER}\nold report` });

    const current = report();
    const outcome = await publishReport(current, api);

    expect(outcome).toEqual({ action: "updated", commentId: 3 });
    expect(api.comments.map((c) => c.body)).toEqual(["LGTM", null, current.body]);
  });

  it("should skip without a pull request number", async () => {
    const api = new InMemoryCommentApi();
    const listSpy = jest.spyOn(api, "listComments");

    const outcome = await publishReport(report({ repository: "acme/shop" }), api);

    expect(outcome).toEqual({ action: "skipped", reason: "no review unit" });
    expect(listSpy).not.toHaveBeenCalled();
  });

  it("should fail when there is no API to publish through", async () => {
    await expect(publishReport(report(), undefined)).rejects.toBeInstanceOf(PublishError);
  });

  it("should wrap API failures with their status", async () => {
    const api = new InMemoryCommentApi();
    jest
      .spyOn(api, "listComments")
      .mockRejectedValue(Object.assign(new Error("Resource not accessible by integration"), { status: 403 }));

    const promise = publishReport(report(), api);

    await expect(promise).rejects.toBeInstanceOf(PublishError);
    await expect(promise).rejects.toMatchObject({
      message: "Failed to list comments: Resource not accessible by integration",
      status: 403,
    });
  });

  it("should find the first comment carrying the marker", () => {
    const comments = [
      { id: 1, body: "hi" },
      { id: 2, body: REPORT_MARKER },
      { id: 3, body: REPORT_MARKER },
    ];
    expect(findTrackedComment(comments)).toEqual({ id: 2, body: REPORT_MARKER });
    expect(findTrackedComment([{ id: 1 }])).toBeUndefined();
  });

  it("should reject a body without the marker", () => {
    const tampered: AggregatedReport = { ...report(), body: "plain text" };
    expect(() => assertPublishable(tampered)).toThrow(
      new InvalidReportError("Report body is missing the tracking marker")
    );
  });
});

describe("Workflow outputs", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should stringify every output", () => {
    const outputs = buildOutputs(
      aggregate({
        findings: [finding("trivy", "critical"), finding("semgrep", "high")],
        toolStatus: toolStatuses(),
        tierResult: tierResult({ securityScore: 7.5, riskAssessment: "HIGH", recommendations: ["Pin base images"] }),
        reviewUnit: { number: 7 },
        now: fixedClock,
      })
    );

    expect(outputs).toEqual({
      "risk-assessment": "CRITICAL",
      "action-required": "true",
      "security-score": "7.5",
      "vulnerabilities-found": "0",
      "requires-security-review": "true",
      recommendations: "3",
      "recommendations-text":
        "1 critical vulnerability found - address before merge; " +
        "1 high-severity vulnerability found - review and patch before merge; Pin base images",
      "ai-provider": "Fake Primary",
      "analysis-tier": "Tier 1 (Primary)",
      "total-findings": "2",
      "critical-count": "1",
      "high-count": "1",
      "analysis-report":
        "Risk: CRITICAL|Score: 7.5/10|Findings: 2 (1 critical, 1 high)|Tier: Tier 1 (Primary)|Provider: Fake Primary",
    });
  });

  it("should set outputs in a fixed order", () => {
    setActionOutputs(buildOutputs(report()));

    const setOutput = jest.mocked(core.setOutput);
    expect(setOutput.mock.calls.map(([name]) => name)).toEqual([...OUTPUT_NAMES]);
    expect(setOutput).toHaveBeenCalledWith("analysis-tier", "Tier 1 (Primary)");
  });

  it("should accept a custom output sink", () => {
    const sink = jest.fn();
    setActionOutputs(buildOutputs(report()), sink);

    expect(sink).toHaveBeenCalledTimes(OUTPUT_NAMES.length);
    expect(core.setOutput).not.toHaveBeenCalled();
  });

  it("should write a short job summary", async () => {
    await writeJobSummary(report());

    expect(core.summary.addHeading).toHaveBeenCalledWith("Unified Security Report");
    expect(core.summary.addRaw).toHaveBeenCalledWith("**Risk:** LOW | **Score:** 2/10");
    expect(core.summary.write).toHaveBeenCalledTimes(1);
  });

  it("should build the emergency result", () => {
    expect(buildEmergencyResult("disk full", "secondary-only", FIXED_NOW)).toEqual({
      securityScore: 5.0,
      riskAssessment: "UNKNOWN",
      actionRequired: true,
      vulnerabilitiesFound: [],
      recommendations: [EMERGENCY_RECOMMENDATION],
      metadata: {
        tier: "Emergency Fallback",
        provider: "none",
        analysisType: "emergency",
        timestamp: "2026-10-19T12:00:00.000Z",
        reason: "disk full",
        mode: "secondary-only",
      },
    });
  });
});
