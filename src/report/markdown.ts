/**
 * Markdown rendering for the tracked report comment.
 */

import { RiskLevel } from "../analysis/types";
import { DEFAULT_REPORTING_CONFIG } from "../config/schema";
import { formatCvss } from "../findings/finding";
import { Finding, Severity, TOOL_INFO, TOOL_KINDS, ToolStatus } from "../findings/types";
import { AggregatedReport } from "./types";

/**
 * Hidden marker identifying the tracked comment. Must stay stable across releases.
 */
export const REPORT_MARKER = "<!-- unified-security-report -->";

export interface RenderOptions {
  maxCriticalDisplay: number;
  maxHighDisplay: number;
  maxAiIssuesDisplay: number;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  maxCriticalDisplay: DEFAULT_REPORTING_CONFIG.max_critical_display,
  maxHighDisplay: DEFAULT_REPORTING_CONFIG.max_high_display,
  maxAiIssuesDisplay: DEFAULT_REPORTING_CONFIG.max_ai_issues_display,
};

const STATUS_LABELS: Record<ToolStatus, string> = {
  Completed: "✅ Completed",
  Missing: "⚠️ Missing",
  Error: "❌ Error",
};

const RISK_BADGES: Record<RiskLevel, string> = {
  CRITICAL: "🔴 CRITICAL",
  HIGH: "🟠 HIGH",
  MEDIUM: "🟡 MEDIUM",
  LOW: "🟢 LOW",
  UNKNOWN: "⚪ UNKNOWN",
};

type RenderableReport = Omit<AggregatedReport, "body">;

/**
 * Collapse whitespace so free text cannot break list or table layout, and
 * escape angle brackets so scanner text never renders as HTML.
 */
function inline(text: string): string {
  return text.replace(/\s+/g, " ").trim().replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatTimestamp(iso: string): string {
  return `${iso.replace("T", " ").substring(0, 19)} UTC`;
}

function findingsOf(report: RenderableReport, severity: Severity): Finding[] {
  return report.findings.filter((f) => f.severity === severity);
}

function metadataLine(report: RenderableReport): string {
  const { metadata } = report.analysis;
  let line = `> **Analysis:** ${metadata.tier} | **Provider:** ${metadata.provider} | **Type:** ${metadata.analysisType}`;
  if (metadata.reason) {
    line += `\n> **Reason:** ${inline(metadata.reason)}`;
  }
  return line;
}

function executiveSummary(report: RenderableReport): string {
  const { summary, analysis } = report;
  const rows = [
    `| Total Findings | ${summary.total} |`,
    `| Critical | ${summary.critical} 🚨 |`,
    `| High | ${summary.high} 🔥 |`,
    `| Medium | ${summary.medium} ⚠️ |`,
    `| Low | ${summary.low} ℹ️ |`,
  ];
  if (summary.informational > 0) {
    rows.push(`| Informational | ${summary.informational} |`);
  }
  rows.push(
    `| Risk Assessment | ${RISK_BADGES[analysis.riskAssessment]} |`,
    `| Security Score | ${analysis.securityScore.toFixed(1)}/10 |`,
    `| Action Required | ${analysis.actionRequired ? "Yes" : "No"} |`,
    `| Security Review | ${report.requiresReview ? "Required" : "Not required"} |`
  );

  let section = `### 📊 Executive Summary\n\n| Metric | Value |\n|--------|-------|\n${rows.join("\n")}`;
  if (report.overrides.length > 0) {
    section += `\n\n${report.overrides.map((note) => `> ⚖️ ${note}`).join("\n")}`;
  }
  return section;
}

function toolTable(report: RenderableReport): string {
  const rows = TOOL_KINDS.map((tool) => {
    const info = TOOL_INFO[tool];
    const counts = report.toolSummary[tool];
    return `| ${info.emoji} **${info.label}** | ${STATUS_LABELS[report.toolStatus[tool]]} | ${counts.total} | ${counts.critical} | ${counts.high} | ${counts.medium} | ${counts.low} | ${info.category} |`;
  });
  return `### 🔍 Security Tool Results

| Tool | Status | Findings | Critical | High | Medium | Low | Category |
|------|--------|----------|----------|------|--------|-----|----------|
${rows.join("\n")}`;
}

function findingEntry(finding: Finding, index: number, withCvss: boolean): string {
  const cvss = withCvss ? ` | **CVSS**: ${formatCvss(finding.cvssScore)}` : "";
  return `${index + 1}. **${inline(finding.ruleId)}** - ${inline(finding.message)}
   - **Tool**: ${TOOL_INFO[finding.tool].label}${cvss} | **Package**: \`${inline(finding.package)}\`
   - **Location**: ${inline(finding.location)}`;
}

function criticalSection(report: RenderableReport, max: number): string {
  const critical = findingsOf(report, "critical");
  if (critical.length === 0) {
    return `### 🚨 Critical Issues\n✅ **No critical vulnerabilities found.**`;
  }

  let section = `### 🚨 Critical Issues (${critical.length}) - Immediate Action Required\n\n`;
  section += critical.slice(0, max).map((f, i) => findingEntry(f, i, true)).join("\n\n");
  if (critical.length > max) {
    section += `\n\n*...and ${critical.length - max} more critical issues. See the JSON report for details.*`;
  }
  return section;
}

function highSection(report: RenderableReport, max: number): string {
  const high = findingsOf(report, "high");
  if (high.length === 0) {
    return `### 🔥 High Priority Issues\n✅ **No high-priority vulnerabilities found.**`;
  }

  let section = `### 🔥 High Priority Issues (${high.length})\n\n`;
  section += `<details>\n<summary>Click to expand high-priority findings</summary>\n\n`;
  section += high.slice(0, max).map((f, i) => findingEntry(f, i, false)).join("\n\n");
  if (high.length > max) {
    section += `\n\n*...and ${high.length - max} more high-priority issues.*`;
  }
  section += `\n\n</details>`;
  return section;
}

/**
 * Issues the AI tier reported. Omitted for template results, whose list
 * only repeats the scanner findings.
 */
function aiSection(report: RenderableReport, max: number): string | null {
  const { analysis } = report;
  if (analysis.metadata.provider === "template" || analysis.vulnerabilitiesFound.length === 0) {
    return null;
  }

  const items = analysis.vulnerabilitiesFound.slice(0, max).map((v) => {
    const location = v.location ? ` (\`${inline(v.location)}\`)` : "";
    const fix = v.recommendation ? `\n   - 💡 ${inline(v.recommendation)}` : "";
    return `- **[${v.severity}] ${inline(v.type)}** - ${inline(v.description)}${location}${fix}`;
  });
  const remaining = analysis.vulnerabilitiesFound.length - max;
  const trailer = remaining > 0 ? `\n\n*...and ${remaining} more.*` : "";
  return `### 🤖 AI-Identified Issues\n\n${items.join("\n")}${trailer}`;
}

function recommendationsSection(report: RenderableReport): string | null {
  if (report.recommendations.length === 0) return null;
  const items = report.recommendations.map((r, i) => `${i + 1}. ${inline(r)}`);
  return `### 💡 Recommendations\n\n${items.join("\n")}`;
}

function resourcesSection(report: RenderableReport): string {
  const repository = report.reviewUnit.repository;
  const links = repository
    ? `- **📊 [Security Tab](https://github.com/${repository}/security)** - Complete vulnerability details
- **🔒 [Security Advisories](https://github.com/${repository}/security/advisories)** - Published security issues
- **🤖 [Dependabot Dashboard](https://github.com/${repository}/security/dependabot)** - Dependency management
- **📋 [Workflow Runs](https://github.com/${repository}/actions)** - Download the complete scanner reports

`
    : "";

  return `### 🔗 Additional Resources

${links}### 🛠️ Remediation Guidance

1. **Critical Issues**: Address immediately before merging
2. **High Priority**: Plan fixes in the current sprint
3. **Medium/Low**: Include in the technical debt backlog
4. **False Positives**: Document and suppress with justification`;
}

/**
 * Render the comment body for a report.
 */
export function renderReport(report: RenderableReport, options: Partial<RenderOptions> = {}): string {
  const opts: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };

  const sections = [
    `${REPORT_MARKER}\n## 🛡️ Unified Security Report`,
    metadataLine(report),
    executiveSummary(report),
    toolTable(report),
    criticalSection(report, opts.maxCriticalDisplay),
    highSection(report, opts.maxHighDisplay),
    aiSection(report, opts.maxAiIssuesDisplay),
    recommendationsSection(report),
    resourcesSection(report),
    `---
*⚠️ Known limitation: findings are not de-duplicated across tools, so the same vulnerability reported by two scanners is counted twice.*
*📅 Generated at ${formatTimestamp(report.generatedAt)}*`,
  ];

  return sections.filter((section): section is string => section !== null).join("\n\n") + "\n";
}
