/**
 * Tests for report aggregation, markdown rendering and the JSON artifact.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runTieredAnalysis } from "../src/analysis/orchestrator";
import { TierResult } from "../src/analysis/types";
import { createProviderGateway } from "../src/integrations/llm";
import { configureLogger } from "../src/logger";
import {
  aggregate,
  AggregateParams,
  applyGroundTruth,
  buildToolSummary,
  mergeRecommendations,
} from "../src/report/aggregator";
import { serializeReport, writeReportArtifact } from "../src/report/artifact";
import { REPORT_MARKER } from "../src/report/markdown";
import { analysisInput, finding, fixedClock, tierResult, toolStatuses } from "./helpers";

beforeAll(() => {
  configureLogger({ level: "error" });
});

afterAll(() => {
  configureLogger({ level: "info" });
});

function build(overrides: Partial<AggregateParams> = {}) {
  return aggregate({
    findings: [],
    toolStatus: toolStatuses(),
    tierResult: tierResult(),
    reviewUnit: { number: 7 },
    now: fixedClock,
    ...overrides,
  });
}

const templateOnlyResult: TierResult = tierResult({
  securityScore: 5.0,
  metadata: {
    tier: "Template-Only",
    provider: "template",
    analysisType: "template",
    timestamp: "2026-10-19T12:00:00.000Z",
    reason: "Template-only mode: AI tiers disabled",
    mode: "template-only",
  },
});

describe("Ground-truth override", () => {
  it("should raise an AI verdict that missed a critical finding", () => {
    const report = build({ findings: [finding("trivy", "critical")] });

    expect(report.analysis.riskAssessment).toBe("CRITICAL");
    expect(report.analysis.actionRequired).toBe(true);
    expect(report.analysis.securityScore).toBe(2.0);
    expect(report.overrides).toEqual([
      "Risk raised from LOW to CRITICAL: 1 critical finding(s) reported by scanners",
      "Action required forced by scanner findings",
    ]);
    expect(report.requiresReview).toBe(true);
    expect(report.recommendations).toEqual(["1 critical vulnerability found - address before merge"]);
  });

  it("should never lower the tier's risk", () => {
    const { result, notes } = applyGroundTruth(
      tierResult({ riskAssessment: "CRITICAL", actionRequired: true, securityScore: 9 }),
      { critical: 0, high: 0, medium: 1, low: 0, informational: 0 }
    );

    expect(result.riskAssessment).toBe("CRITICAL");
    expect(notes).toEqual([]);
  });

  it("should only note the risk change when action is already required", () => {
    const { result, notes } = applyGroundTruth(tierResult({ riskAssessment: "MEDIUM", actionRequired: true }), {
      critical: 0,
      high: 2,
      medium: 0,
      low: 0,
      informational: 0,
    });

    expect(result.riskAssessment).toBe("HIGH");
    expect(notes).toEqual(["Risk raised from MEDIUM to HIGH: 2 high finding(s) reported by scanners"]);
  });

  it("should replace UNKNOWN with the observed level", () => {
    const { result, notes } = applyGroundTruth(tierResult({ riskAssessment: "UNKNOWN" }), {
      critical: 0,
      high: 0,
      medium: 3,
      low: 1,
      informational: 0,
    });

    expect(result.riskAssessment).toBe("MEDIUM");
    expect(result.actionRequired).toBe(false);
    expect(notes).toEqual(["Risk UNKNOWN replaced by observed level MEDIUM"]);
  });

  it("should require review at the score threshold", () => {
    expect(build({ tierResult: tierResult({ securityScore: 6.0 }) }).requiresReview).toBe(true);
    expect(build({ tierResult: tierResult({ securityScore: 5.9 }) }).requiresReview).toBe(false);
  });

  it("should request review for one high dependency finding in template-only mode", async () => {
    const input = analysisInput({ findings: [finding("dependabot", "high")] });
    const result = await runTieredAnalysis(input, {
      mode: "template-only",
      gateway: createProviderGateway({}),
      now: fixedClock,
    });

    const report = build({ findings: input.findings, tierResult: result });

    expect(report.analysis.securityScore).toBe(6.5);
    expect(report.analysis.riskAssessment).toBe("HIGH");
    expect(report.requiresReview).toBe(true);
    expect(report.overrides).toEqual([]);
  });
});

describe("Aggregation", () => {
  it("should summarize findings per severity and per tool", () => {
    const findings = [finding("trivy", "critical"), finding("trivy", "low"), finding("owaspZap", "informational")];
    const report = build({ findings });

    expect(report.summary).toEqual({ critical: 1, high: 0, medium: 0, low: 1, informational: 1, total: 3 });
    expect(report.toolSummary.trivy).toEqual({ critical: 1, high: 0, medium: 0, low: 1, informational: 0, total: 2 });
    expect(buildToolSummary(findings).semgrep.total).toBe(0);
  });

  it("should put deterministic recommendations first and drop duplicates", () => {
    const statuses = { ...toolStatuses(), semgrep: "Error" as const };
    const merged = mergeRecommendations(
      [finding("trivy", "critical"), finding("gitLeaks", "high")],
      statuses,
      ["1 critical vulnerability found - address before merge", "Enable MFA on the deploy account"]
    );

    expect(merged).toEqual([
      "1 critical vulnerability found - address before merge",
      "1 high-severity vulnerability found - review and patch before merge",
      "1 potential secret detected - remove and rotate the exposed credentials",
      "Scanner output could not be processed for Semgrep - check the scan jobs",
      "Enable MFA on the deploy account",
    ]);
  });

  it("should freeze the report", () => {
    const report = build({ findings: [finding("semgrep", "medium")] });

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.analysis.metadata)).toBe(true);
    expect(Object.isFrozen(report.findings)).toBe(true);
    expect(report.generatedAt).toBe("2026-10-19T12:00:00.000Z");
  });

  it("should not share state with its inputs", () => {
    const tier = tierResult({ recommendations: ["Enable MFA on the deploy account"] });
    build({ tierResult: tier });

    expect(Object.isFrozen(tier.recommendations)).toBe(false);
  });
});

describe("Markdown rendering", () => {
  it("should open with the marker, heading and tier metadata", () => {
    const report = build({ tierResult: templateOnlyResult });
    const head =
      `${REPORT_MARKER}\n## 🛡️ Unified Security Report\n\n` +
      "> **Analysis:** Template-Only | **Provider:** template | **Type:** template\n" +
      "> **Reason:** Template-only mode: AI tiers disabled\n\n### 📊 Executive Summary";

    expect(report.body.startsWith(head)).toBe(true);
  });

  it("should render the empty sections for a clean report", () => {
    const { body } = build({ tierResult: templateOnlyResult });

    expect(body).toContain("### 🚨 Critical Issues\n✅ **No critical vulnerabilities found.**");
    expect(body).toContain("### 🔥 High Priority Issues\n✅ **No high-priority vulnerabilities found.**");
    expect(body).toContain("| Security Score | 5.0/10 |");
    expect(body).not.toContain("| Informational |");
    expect(body).not.toContain("### 🤖 AI-Identified Issues");
    expect(body).not.toContain("### 💡 Recommendations");
    expect(body).toContain("### 🔗 Additional Resources\n\n### 🛠️ Remediation Guidance");
    expect(body.endsWith("*📅 Generated at 2026-10-19 12:00:00 UTC*\n")).toBe(true);
  });

  it("should truncate the critical list with a trailer", () => {
    const findings = Array.from({ length: 7 }, (_, i) =>
      finding("trivy", "critical", {
        ruleId: `CVE-2024-000${i}`,
        message: "Heap overflow",
        location: "Dockerfile:3",
        package: "openssl",
        cvssScore: 9.8,
      })
    );
    const { body } = build({ findings, render: { maxCriticalDisplay: 5 } });

    expect(body).toContain("### 🚨 Critical Issues (7) - Immediate Action Required");
    expect(body).toContain(
      "1. **CVE-2024-0000** - Heap overflow\n   - **Tool**: Trivy | **CVSS**: 9.8 | **Package**: `openssl`\n   - **Location**: Dockerfile:3"
    );
    expect(body).toContain("5. **CVE-2024-0004**");
    expect(body).not.toContain("CVE-2024-0005");
    expect(body).toContain("*...and 2 more critical issues. See the JSON report for details.*");
    expect(body).toContain("| 🐳 **Trivy** | ✅ Completed | 7 | 7 | 0 | 0 | 0 | Container Security |");
    expect(body).toContain("> ⚖️ Risk raised from LOW to CRITICAL: 7 critical finding(s) reported by scanners");
  });

  it("should collapse high findings and flatten multi-line messages", () => {
    const { body } = build({ findings: [finding("semgrep", "high", { message: "line one\nline two" })] });

    expect(body).toContain("<details>\n<summary>Click to expand high-priority findings</summary>");
    expect(body).toContain("1. **SEMGREP-high** - line one line two\n   - **Tool**: Semgrep | **Package**: `app`");
  });

  it("should escape angle brackets in scanner text", () => {
    const { body } = build({
      findings: [finding("owaspZap", "high", { message: "Closes </details> early <!-- hidden" })],
    });

    expect(body).toContain("1. **OWASPZAP-high** - Closes &lt;/details&gt; early &lt;!-- hidden\n");
    expect(body).not.toContain("</details> early");
  });

  it("should list AI-identified issues for AI tiers", () => {
    const { body } = build({
      tierResult: tierResult({
        vulnerabilitiesFound: [
          {
            type: "CWE-79",
            severity: "HIGH",
            description: "XSS in search",
            location: "src/search.ts",
            recommendation: "Escape output",
          },
        ],
      }),
    });

    expect(body).toContain(
      "### 🤖 AI-Identified Issues\n\n- **[HIGH] CWE-79** - XSS in search (`src/search.ts`)\n   - 💡 Escape output"
    );
  });

  it("should show tool status labels and the informational row", () => {
    const statuses = { ...toolStatuses(), checkov: "Missing" as const, owaspZap: "Error" as const };
    const { body } = build({ findings: [finding("owaspZap", "informational")], toolStatus: statuses });

    expect(body).toContain("| Informational | 1 |");
    expect(body).toContain("| 🏗️ **Checkov** | ⚠️ Missing | 0 | 0 | 0 | 0 | 0 | Infrastructure |");
    expect(body).toContain("| ⚡ **OWASP ZAP** | ❌ Error | 1 | 0 | 0 | 0 | 0 | Dynamic Analysis |");
  });

  it("should link repository resources when the repository is known", () => {
    const { body } = build({ reviewUnit: { repository: "acme/shop", number: 7 } });
    expect(body).toContain("- **📊 [Security Tab](https://github.com/acme/shop/security)** - Complete vulnerability details");
  });

  it("should number the merged recommendations", () => {
    const { body } = build({ tierResult: tierResult({ recommendations: ["Enable MFA", "Pin base images"] }) });
    expect(body).toContain("### 💡 Recommendations\n\n1. Enable MFA\n2. Pin base images");
  });
});

describe("Report artifact", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "security-report-artifact-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should write the report as JSON, creating parent directories", () => {
    const report = build({ findings: [finding("semgrep", "medium")] });

    const written = writeReportArtifact(report, path.join(tmpDir, "nested", "report.json"));

    expect(written).toBe(path.join(tmpDir, "nested", "report.json"));
    const parsed = JSON.parse(fs.readFileSync(written, "utf-8"));
    expect(parsed.summary.total).toBe(1);
    expect(parsed.analysis.metadata.tier).toBe("Tier 1 (Primary)");
    expect(parsed.body).toBe(report.body);
  });

  it("should end the serialized report with a newline", () => {
    expect(serializeReport(build()).endsWith("}\n")).toBe(true);
  });
});
