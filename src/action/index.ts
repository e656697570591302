/**
 * Unified security report - workflow entry point.
 *
 * Collects scanner output, runs the tiered analysis, writes the JSON
 * artifact, publishes the tracked comment and sets the step outputs.
 */

import * as path from "path";
import * as core from "@actions/core";
import { countCategories, describeCategories, resolveRiskHint } from "../analysis/categories";
import { runTieredAnalysis } from "../analysis/orchestrator";
import { AnalysisInput, AnalysisMode } from "../analysis/types";
import { CONFIG_FILE_NAME, LoadedConfig, loadConfig } from "../config/loader";
import { DEFAULT_REPORTING_CONFIG } from "../config/schema";
import { loadDotenv, readRunConfig, RunConfig } from "../env";
import { errorMessage, PublishError } from "../errors";
import { ToolStatusMap } from "../findings/types";
import {
  CommentApi,
  createCommentApi,
  createOctokit,
  createSecurityFeedApi,
  publishReport,
  PublishOutcome,
} from "../integrations/github";
import { createProviderGateway, createProviders, ProviderSet, Sleep } from "../integrations/llm";
import { configureLogger, logger } from "../logger";
import { aggregate } from "../report/aggregator";
import { writeReportArtifact } from "../report/artifact";
import { buildEmergencyResult, buildOutputs, setActionOutputs, writeJobSummary } from "../report/outputs";
import { AggregatedReport, ReviewUnit } from "../report/types";
import { collectFindings, SecurityFeedApi } from "../sources";

const log = logger.child("Action");

/**
 * Collaborators that can be replaced, mainly by tests.
 * Anything not given is built from the run configuration.
 */
export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  /** Directory artifacts and the config file are resolved against. */
  baseDir?: string;
  providers?: ProviderSet;
  commentApi?: CommentApi;
  feedApi?: SecurityFeedApi;
  sleep?: Sleep;
  now?: () => Date;
}

export interface RunResult {
  report: AggregatedReport;
  artifactPath: string;
  publish: PublishOutcome;
}

function reviewUnitOf(runConfig: RunConfig): ReviewUnit {
  const { repository, prNumber } = runConfig.github;
  return {
    repository: repository ? `${repository.owner}/${repository.repo}` : undefined,
    number: prNumber,
  };
}

function githubApis(runConfig: RunConfig, deps: RunDependencies): { comments?: CommentApi; feeds?: SecurityFeedApi } {
  const { token, repository } = runConfig.github;
  if (!token || !repository) {
    log.warn("GITHUB_TOKEN or GITHUB_REPOSITORY not set - API-sourced tools and comments unavailable");
    return { comments: deps.commentApi, feeds: deps.feedApi };
  }
  const octokit = createOctokit(token);
  return {
    comments: deps.commentApi ?? createCommentApi(octokit, repository),
    feeds: deps.feedApi ?? createSecurityFeedApi(octokit, repository),
  };
}

function loadRepositoryConfig(runConfig: RunConfig, baseDir: string): LoadedConfig {
  return loadConfig(path.resolve(baseDir, runConfig.configPath ?? CONFIG_FILE_NAME));
}

/**
 * One full report run. Throws on publish failure and on anything unexpected.
 */
export async function run(deps: RunDependencies = {}): Promise<RunResult> {
  const runConfig = readRunConfig(deps.env ?? process.env);
  configureLogger({ level: runConfig.logLevel, format: runConfig.logFormat });

  const baseDir = deps.baseDir ?? process.cwd();
  const config = loadRepositoryConfig(runConfig, baseDir);
  const apis = githubApis(runConfig, deps);

  log.info(`Starting security report in ${runConfig.mode} mode`);

  const collection = await collectFindings({ artifacts: config.artifacts, baseDir, api: apis.feeds });

  const categoryCounts = countCategories(runConfig.changedFiles, config);
  const riskHint = resolveRiskHint(runConfig.riskHint, runConfig.changedFiles, categoryCounts);
  log.info(`Risk hint ${riskHint}`, { changedFiles: runConfig.changedFiles.length, categories: describeCategories(categoryCounts) });

  const input: AnalysisInput = {
    findings: collection.findings,
    toolStatus: collection.toolStatus,
    changedFiles: runConfig.changedFiles,
    categoryCounts,
    riskHint,
  };

  const gateway = createProviderGateway(deps.providers ?? createProviders(runConfig), {
    maxAttempts: config.analysis.max_attempts,
    baseDelayMs: config.analysis.base_delay_ms,
    completion: { maxTokens: config.analysis.max_tokens, temperature: config.analysis.temperature },
    sleep: deps.sleep,
  });

  const tierResult = await runTieredAnalysis(input, { mode: runConfig.mode, gateway, now: deps.now });

  const report = aggregate({
    findings: collection.findings,
    toolStatus: collection.toolStatus,
    tierResult,
    reviewUnit: reviewUnitOf(runConfig),
    render: {
      maxCriticalDisplay: config.reporting.max_critical_display,
      maxHighDisplay: config.reporting.max_high_display,
      maxAiIssuesDisplay: config.reporting.max_ai_issues_display,
    },
    now: deps.now,
  });

  const artifactPath = writeReportArtifact(
    report,
    path.resolve(baseDir, runConfig.outputPath ?? config.reporting.output_path)
  );

  setActionOutputs(buildOutputs(report));
  if (runConfig.jobSummary) {
    await writeJobSummary(report);
  }

  const publish = await publishReport(report, apis.comments);

  log.info("Security report completed", {
    risk: report.analysis.riskAssessment,
    score: report.analysis.securityScore,
    tier: report.analysis.metadata.tier,
    requiresReview: report.requiresReview,
  });

  return { report, artifactPath, publish };
}

/**
 * Minimal report for a run that failed before producing one. Sets the
 * outputs so downstream steps never read undefined values.
 */
export function runEmergency(error: unknown, deps: RunDependencies = {}): AggregatedReport {
  const reason = errorMessage(error);
  let mode: AnalysisMode = "standard";
  let reviewUnit: ReviewUnit = {};
  let outputPath: string | undefined;

  try {
    const runConfig = readRunConfig(deps.env ?? process.env);
    mode = runConfig.mode;
    reviewUnit = reviewUnitOf(runConfig);
    outputPath = runConfig.outputPath;
  } catch (configError) {
    log.error("Run configuration unreadable during emergency report", { error: errorMessage(configError) });
  }

  const statuses: ToolStatusMap = {
    trivy: "Missing",
    osvScanner: "Missing",
    semgrep: "Missing",
    gitLeaks: "Missing",
    checkov: "Missing",
    owaspZap: "Missing",
    dependabot: "Missing",
  };

  const now = (deps.now ?? (() => new Date()))();
  const report = aggregate({
    findings: [],
    toolStatus: statuses,
    tierResult: buildEmergencyResult(reason, mode, now),
    reviewUnit,
    now: () => now,
  });

  setActionOutputs(buildOutputs(report));

  try {
    writeReportArtifact(report, path.resolve(deps.baseDir ?? process.cwd(), outputPath ?? DEFAULT_REPORTING_CONFIG.output_path));
  } catch (writeError) {
    log.error("Failed to write emergency report artifact", { error: errorMessage(writeError) });
  }

  return report;
}

/**
 * Run and translate failures into a failed step.
 */
export async function main(deps: RunDependencies = {}): Promise<void> {
  try {
    await run(deps);
  } catch (error) {
    if (error instanceof PublishError) {
      log.error("Publishing the security report failed", { error: error.message, status: error.status });
      core.setFailed(`Failed to publish security report: ${error.message}`);
      return;
    }

    log.error("Security report failed, emitting emergency report", { error: errorMessage(error) });
    runEmergency(error, deps);
    core.setFailed(`Security analysis failed: ${errorMessage(error)}`);
  }
}

if (require.main === module) {
  loadDotenv();
  main().catch((error) => {
    core.setFailed(errorMessage(error));
  });
}
