/**
 * Adapters for findings that arrive pre-summarized from the GitHub API
 * rather than from a file: secret-scanner issues and dependency alerts.
 */

import { createFinding } from "../findings/finding";
import { severityFromLabel } from "../findings/severity";
import { Finding, ToolKind } from "../findings/types";
import { numberOf, recordOf, recordsOf, stringOf } from "../utils/json";
import { FormatAdapter } from "./types";

/**
 * Issues opened by the secret scanner. Secrets are always high severity.
 * Input: the issue list as returned by GET /repos/{owner}/{repo}/issues.
 */
export const secretIssueAdapter: FormatAdapter = {
  format: "github-issues",
  parse(document: unknown, tool: ToolKind): Finding[] {
    return recordsOf(document).map((issue) => {
      const number = numberOf(issue.number);
      return createFinding({
        tool,
        severity: "high",
        ruleId: "Secret Detection",
        message: stringOf(issue.title),
        location: number !== undefined ? `Issue #${number}` : stringOf(issue.html_url),
        package: "Repository",
      });
    });
  },
};

/**
 * Dependency alerts as returned by GET /repos/{owner}/{repo}/dependabot/alerts.
 * Only open alerts count.
 */
export const dependencyAlertAdapter: FormatAdapter = {
  format: "github-dependency-alerts",
  parse(document: unknown, tool: ToolKind): Finding[] {
    const findings: Finding[] = [];

    for (const alert of recordsOf(document)) {
      const state = stringOf(alert.state);
      if (state && state !== "open") {
        continue;
      }

      const advisory = recordOf(alert.security_advisory);
      const vulnerability = recordOf(alert.security_vulnerability);
      const dependency = recordOf(alert.dependency);
      const number = numberOf(alert.number);
      const severity =
        stringOf(vulnerability?.severity) ?? stringOf(advisory?.severity);

      findings.push(
        createFinding({
          tool,
          severity: severityFromLabel(severity),
          ruleId: stringOf(advisory?.cve_id) ?? stringOf(advisory?.ghsa_id) ?? "Dependency Alert",
          message: stringOf(advisory?.summary),
          location: number !== undefined ? `Alert #${number}` : stringOf(dependency?.manifest_path) ?? "Dependencies",
          package: stringOf(recordOf(dependency?.package)?.name),
          cvssScore: numberOf(recordOf(advisory?.cvss)?.score),
        })
      );
    }

    return findings;
  },
};

/** Keeps only issues carrying the given label; the issues endpoint also returns pull requests. */
export function filterLabeledIssues(issues: unknown, label: string): unknown[] {
  return recordsOf(issues).filter(
    (issue) =>
      issue.pull_request === undefined &&
      recordsOf(issue.labels).some((l) => stringOf(l.name) === label)
  );
}
