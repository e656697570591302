/**
 * Tools whose findings come from the repository API instead of a file.
 */

import { dependencyAlertAdapter, filterLabeledIssues, secretIssueAdapter } from "../adapters/github";
import { errorMessage } from "../errors";
import { logger } from "../logger";
import { SecurityFeedApi, ToolCollection } from "./types";

const log = logger.child("Feeds");

export const SECRET_ISSUE_LABEL = "gitleaks";

export async function collectSecretIssues(api: SecurityFeedApi | undefined): Promise<ToolCollection> {
  if (!api) {
    return { tool: "gitLeaks", status: "Missing", findings: [] };
  }
  try {
    const issues = filterLabeledIssues(await api.listIssuesWithLabel(SECRET_ISSUE_LABEL), SECRET_ISSUE_LABEL);
    const findings = secretIssueAdapter.parse(issues, "gitLeaks");
    log.info("Fetched secret detection issues", { findings: findings.length });
    return { tool: "gitLeaks", status: "Completed", findings, source: `issues?labels=${SECRET_ISSUE_LABEL}` };
  } catch (err) {
    log.error("Failed to fetch secret detection issues", { error: errorMessage(err) });
    return { tool: "gitLeaks", status: "Error", findings: [], error: errorMessage(err) };
  }
}

export async function collectDependencyAlerts(api: SecurityFeedApi | undefined): Promise<ToolCollection> {
  if (!api) {
    return { tool: "dependabot", status: "Missing", findings: [] };
  }
  try {
    const findings = dependencyAlertAdapter.parse(await api.listOpenDependencyAlerts(), "dependabot");
    log.info("Fetched dependency alerts", { findings: findings.length });
    return { tool: "dependabot", status: "Completed", findings, source: "dependabot/alerts?state=open" };
  } catch (err) {
    log.error("Failed to fetch dependency alerts", { error: errorMessage(err) });
    return { tool: "dependabot", status: "Error", findings: [], error: errorMessage(err) };
  }
}
