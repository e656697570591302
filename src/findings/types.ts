/**
 * Canonical finding model shared by every adapter, the aggregator and the renderer.
 */

// ============================================================================
// Tools
// ============================================================================

/**
 * Scanners whose output the report understands. Closed set.
 */
export type ToolKind =
  | "trivy"
  | "osvScanner"
  | "semgrep"
  | "gitLeaks"
  | "checkov"
  | "owaspZap"
  | "dependabot";

/** Report order for tool tables. */
export const TOOL_KINDS: readonly ToolKind[] = [
  "trivy",
  "osvScanner",
  "semgrep",
  "gitLeaks",
  "checkov",
  "owaspZap",
  "dependabot",
];

export interface ToolInfo {
  label: string;
  emoji: string;
  category: string;
}

export const TOOL_INFO: Record<ToolKind, ToolInfo> = {
  trivy: { label: "Trivy", emoji: "🐳", category: "Container Security" },
  osvScanner: { label: "OSV-Scanner", emoji: "🔍", category: "Open Source Vulns" },
  semgrep: { label: "Semgrep", emoji: "🔒", category: "Static Analysis" },
  gitLeaks: { label: "GitLeaks", emoji: "🔑", category: "Secret Detection" },
  checkov: { label: "Checkov", emoji: "🏗️", category: "Infrastructure" },
  owaspZap: { label: "OWASP ZAP", emoji: "⚡", category: "Dynamic Analysis" },
  dependabot: { label: "Dependabot", emoji: "🔧", category: "Dependencies" },
};

/**
 * Outcome of collecting one tool's output for this run.
 */
export type ToolStatus = "Completed" | "Missing" | "Error";

// ============================================================================
// Severity
// ============================================================================

/**
 * Canonical severity. "informational" is only produced by the dynamic scanner.
 */
export type Severity = "critical" | "high" | "medium" | "low" | "informational";

/** Highest first. */
export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low", "informational"];

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  informational: 0,
};

// ============================================================================
// Finding
// ============================================================================

export type CvssScore = number | "N/A";

/**
 * One normalized issue reported by a scanner. Created by an adapter, never mutated.
 */
export interface Finding {
  readonly tool: ToolKind;
  readonly severity: Severity;
  /** CVE, CWE, rule name... never empty. */
  readonly ruleId: string;
  readonly message: string;
  /** "file[:line]", "host:port" or "Issue #N". */
  readonly location: string;
  readonly package: string;
  readonly cvssScore: CvssScore;
  /** Display-only confidence label (dynamic scanner). */
  readonly confidence?: string;
  /** Remediation text when the source provides one. */
  readonly solution?: string;
  readonly reference?: string;
}

export type SeverityHistogram = Record<Severity, number>;

export const UNKNOWN_RULE_ID = "Unknown";
export const UNKNOWN_LOCATION = "Unknown location";
export const UNKNOWN_PACKAGE = "Unknown package";

export type ToolStatusMap = Record<ToolKind, ToolStatus>;
