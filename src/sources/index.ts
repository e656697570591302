/**
 * Collect findings from every tool. Each tool is isolated: a missing or
 * broken source only affects that tool's status.
 */

import { RequiredArtifactsConfig } from "../config/schema";
import { TOOL_KINDS, ToolKind } from "../findings/types";
import { logger } from "../logger";
import { collectFileTool } from "./artifacts";
import { collectDependencyAlerts, collectSecretIssues } from "./feeds";
import { CollectionResult, SecurityFeedApi, ToolCollection } from "./types";

export type { CollectionResult, SecurityFeedApi, ToolCollection } from "./types";

const log = logger.child("Collector");

export interface CollectOptions {
  artifacts: RequiredArtifactsConfig;
  /** Directory the search dirs are resolved against. */
  baseDir: string;
  api?: SecurityFeedApi;
}

export async function collectFindings(options: CollectOptions): Promise<CollectionResult> {
  const { patterns } = options.artifacts;
  const tools: Record<ToolKind, ToolCollection> = {
    trivy: collectFileTool("trivy", patterns.trivy, options.artifacts, options.baseDir),
    osvScanner: collectFileTool("osvScanner", patterns.osvScanner, options.artifacts, options.baseDir),
    semgrep: collectFileTool("semgrep", patterns.semgrep, options.artifacts, options.baseDir),
    gitLeaks: await collectSecretIssues(options.api),
    checkov: collectFileTool("checkov", patterns.checkov, options.artifacts, options.baseDir),
    owaspZap: collectFileTool("owaspZap", patterns.owaspZap, options.artifacts, options.baseDir),
    dependabot: await collectDependencyAlerts(options.api),
  };

  const findings = TOOL_KINDS.flatMap((tool) => tools[tool].findings);
  const toolStatus = {
    trivy: tools.trivy.status,
    osvScanner: tools.osvScanner.status,
    semgrep: tools.semgrep.status,
    gitLeaks: tools.gitLeaks.status,
    checkov: tools.checkov.status,
    owaspZap: tools.owaspZap.status,
    dependabot: tools.dependabot.status,
  };

  log.info(`Collected ${findings.length} findings`, { ...toolStatus });
  return { findings, toolStatus, tools };
}
