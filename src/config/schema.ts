/**
 * Configuration schema types for .security-report.yml files.
 *
 * This module defines the structure of the optional configuration file
 * that can be placed in the repository root to customize where scanner
 * artifacts are found, how analysis backends are driven, and how the
 * report is rendered.
 */

import { ToolKind } from "../findings/types";

/**
 * Tools whose output is read from an artifact file (the rest come from the API).
 */
export type FileToolKind = Exclude<ToolKind, "gitLeaks" | "dependabot">;

export const FILE_TOOL_KINDS: readonly FileToolKind[] = ["trivy", "osvScanner", "semgrep", "checkov", "owaspZap"];

/**
 * Changed-file categories used by the template analyzer and the risk hint.
 */
export type FileCategory = "auth" | "security" | "security_tests" | "dependencies" | "infrastructure";

export const FILE_CATEGORIES: readonly FileCategory[] = [
  "auth",
  "security",
  "security_tests",
  "dependencies",
  "infrastructure",
];

/**
 * Artifact discovery options.
 */
export interface ReportArtifactsConfig {
  /**
   * Directories searched (recursively) for scanner output, in order.
   * Default: ["security-artifacts", ".", "downloaded-artifacts"]
   */
  search_dirs?: string[];

  /**
   * Filename glob patterns per tool, tried in order. The first match wins.
   * Example: { semgrep: ["semgrep.sarif", "*semgrep*.sarif"] }
   */
  patterns?: Partial<Record<FileToolKind, string[]>>;
}

/**
 * Analysis backend options.
 */
export interface ReportAnalysisConfig {
  /**
   * Attempts per provider for transient errors. Values above 3 are capped.
   * Default: 3
   */
  max_attempts?: number;

  /**
   * Base delay between attempts; attempt N waits base * N.
   * Default: 2000
   */
  base_delay_ms?: number;

  /**
   * Maximum tokens for model responses.
   * Default: 3000
   */
  max_tokens?: number;

  /**
   * Temperature for model responses (0.0 - 1.0).
   * Default: 0.1
   */
  temperature?: number;
}

/**
 * Report rendering options.
 */
export interface ReportReportingConfig {
  /**
   * Critical findings listed in the comment before the "...and N more" trailer.
   * Default: 5
   */
  max_critical_display?: number;

  /**
   * High findings listed in the collapsible section.
   * Default: 10
   */
  max_high_display?: number;

  /**
   * AI-identified issues listed.
   * Default: 5
   */
  max_ai_issues_display?: number;

  /**
   * Path of the JSON report artifact.
   * Default: "unified-security-report.json"
   */
  output_path?: string;
}

/**
 * Complete .security-report.yml configuration schema.
 */
export interface SecurityReportConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  artifacts?: ReportArtifactsConfig;

  analysis?: ReportAnalysisConfig;

  reporting?: ReportReportingConfig;

  /**
   * Glob patterns (case-insensitive) classifying changed files.
   */
  files?: Partial<Record<FileCategory, string[]>>;
}

/**
 * Required/complete versions of optional config interfaces.
 */
export interface RequiredArtifactsConfig {
  search_dirs: string[];
  patterns: Record<FileToolKind, string[]>;
}

export interface RequiredAnalysisConfig {
  max_attempts: number;
  base_delay_ms: number;
  max_tokens: number;
  temperature: number;
}

export interface RequiredReportingConfig {
  max_critical_display: number;
  max_high_display: number;
  max_ai_issues_display: number;
  output_path: string;
}

export type RequiredFilesConfig = Record<FileCategory, string[]>;

/**
 * Default values for artifact discovery.
 */
export const DEFAULT_ARTIFACTS_CONFIG: RequiredArtifactsConfig = {
  search_dirs: ["security-artifacts", ".", "downloaded-artifacts"],
  patterns: {
    trivy: ["docker-security-scan-results.sarif", "*trivy*.sarif"],
    osvScanner: ["osv-results.json", "*osv*.json"],
    semgrep: ["semgrep.sarif", "semgrep-results.sarif", "*semgrep*.sarif"],
    checkov: ["checkov-results.sarif", "*checkov*.sarif"],
    owaspZap: ["zap-report.json", "report_json.json", "*zap*.json", "zap-results.sarif", "*zap*.sarif"],
  },
};

/**
 * Default values for analysis configuration.
 */
export const DEFAULT_ANALYSIS_CONFIG: RequiredAnalysisConfig = {
  max_attempts: 3,
  base_delay_ms: 2000,
  max_tokens: 3000,
  temperature: 0.1,
};

/**
 * Default values for reporting configuration.
 */
export const DEFAULT_REPORTING_CONFIG: RequiredReportingConfig = {
  max_critical_display: 5,
  max_high_display: 10,
  max_ai_issues_display: 5,
  output_path: "unified-security-report.json",
};

/**
 * Default values for changed-file classification.
 */
export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  auth: ["**/*auth*", "**/*auth*/**", "**/*login*", "**/*session*", "**/*passkey*", "**/*credential*"],
  security: ["**/*security*", "**/*security*/**", "**/*crypto*", "**/*jwt*", "**/*secret*", "**/*token*"],
  security_tests: ["**/*security*test*", "**/*vulnerability*test*"],
  dependencies: [
    "**/package.json",
    "**/package-lock.json",
    "**/*.gradle",
    "**/*.gradle.kts",
    "**/libs.versions.toml",
    "**/gradle.lockfile",
    "**/requirements*.txt",
    "**/go.mod",
    "**/Cargo.toml",
    "**/pom.xml",
  ],
  infrastructure: [
    "**/Dockerfile*",
    "**/docker-compose*.yml",
    "**/*.tf",
    "**/.github/workflows/**",
    "**/k8s/**",
    "**/helm/**",
  ],
};
