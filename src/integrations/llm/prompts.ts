/**
 * Prompt builders for the AI analysis tiers.
 */

import { AnalysisInput } from "../../analysis/types";
import { FILE_CATEGORIES } from "../../config/schema";
import { buildHistogram, compareSeverity } from "../../findings/severity";
import { Finding, TOOL_INFO, TOOL_KINDS, ToolKind } from "../../findings/types";

export const SYSTEM_PROMPT =
  "You are a senior application security engineer. Respond with a single JSON object and nothing else.";

/** Findings listed individually in a prompt; the rest are only counted. */
export const MAX_PROMPT_FINDINGS = 30;

/** Tools covered by the focused (secondary-only) prompt. */
export const FOCUSED_TOOLS: readonly ToolKind[] = ["trivy", "gitLeaks"];

const RESPONSE_FORMAT = `Respond ONLY with a JSON object matching this exact shape (no markdown, no extra text):

{
  "securityScore": <number 0-10, higher means riskier>,
  "riskAssessment": "LOW" | "MEDIUM" | "HIGH" | "CRITICAL",
  "actionRequired": <boolean>,
  "vulnerabilitiesFound": [
    {
      "type": "short identifier (CVE, CWE or rule)",
      "severity": "CRITICAL" | "HIGH" | "MEDIUM" | "LOW",
      "description": "1-2 sentence explanation",
      "location": "optional file, package or URL",
      "recommendation": "optional 1 sentence fix"
    }
  ],
  "recommendations": ["short, actionable recommendation", "..."]
}`;

function summarizeFinding(finding: Finding): string {
  const pkg = finding.package !== "Unknown package" ? ` (${finding.package})` : "";
  return `- [${finding.severity.toUpperCase()}] ${TOOL_INFO[finding.tool].label} ${finding.ruleId}${pkg} at ${finding.location}: ${finding.message.slice(0, 160)}`;
}

function findingsSection(findings: readonly Finding[]): string {
  if (findings.length === 0) {
    return "No findings were reported.";
  }
  const sorted = [...findings].sort((a, b) => compareSeverity(a.severity, b.severity));
  const listed = sorted.slice(0, MAX_PROMPT_FINDINGS).map(summarizeFinding).join("\n");
  const remaining = sorted.length - MAX_PROMPT_FINDINGS;
  return remaining > 0 ? `${listed}\n- ...and ${remaining} more lower-priority findings` : listed;
}

function countsSection(findings: readonly Finding[]): string {
  const histogram = buildHistogram(findings);
  return `Critical: ${histogram.critical}, High: ${histogram.high}, Medium: ${histogram.medium}, Low: ${histogram.low}, Informational: ${histogram.informational}`;
}

function changeSection(input: AnalysisInput): string {
  const categories = FILE_CATEGORIES.filter((c) => input.categoryCounts[c] > 0)
    .map((c) => `${c}: ${input.categoryCounts[c]}`)
    .join(", ");
  return `Changed files: ${input.changedFiles.length}${categories ? ` (${categories})` : ""}
Change risk hint: ${input.riskHint}`;
}

/**
 * General prompt covering every scanner.
 */
export function buildSecurityPrompt(input: AnalysisInput): string {
  const tools = TOOL_KINDS.map(
    (tool) => `- ${TOOL_INFO[tool].label} (${TOOL_INFO[tool].category}): ${input.toolStatus[tool]}, ${input.findings.filter((f) => f.tool === tool).length} findings`
  ).join("\n");

  return `Assess the security posture of a pull request from the output of its security scanners.

SCANNERS:
${tools}

FINDING COUNTS:
${countsSection(input.findings)}

${changeSection(input)}

FINDINGS (highest severity first):
${findingsSection(input.findings)}

${RESPONSE_FORMAT}

Rules:
- Base the assessment on the findings above; do not invent vulnerabilities
- Group related findings into one vulnerability entry where they share a root cause
- Prioritize exploitable issues over informational ones
- Keep at most 10 recommendations, most important first`;
}

/**
 * Narrower prompt for the secondary-only mode: container images and secrets.
 */
export function buildFocusedPrompt(input: AnalysisInput): string {
  const focused = input.findings.filter((f) => FOCUSED_TOOLS.includes(f.tool));
  const others = input.findings.length - focused.length;

  return `Assess container image and secret exposure risk for a pull request.

FOCUS AREAS:
- Vulnerable OS and library packages in container images
- Credentials, tokens or keys committed to the repository
- Base image hygiene and privilege settings

FINDING COUNTS (container and secrets):
${countsSection(focused)}
Other scanners reported ${others} additional findings.

${changeSection(input)}

FINDINGS:
${findingsSection(focused)}

${RESPONSE_FORMAT}

Rules:
- Treat any exposed secret as at least HIGH risk
- Do not invent vulnerabilities that are not in the findings
- Keep at most 5 recommendations`;
}
