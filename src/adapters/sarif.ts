/**
 * SARIF adapters: the generic rule-based format (static analysis, IaC,
 * dynamic scans exported as SARIF) and the container scanner's variant.
 */

import { createFinding } from "../findings/finding";
import { severityFromLevel, severityFromScore } from "../findings/severity";
import { Finding, Severity, ToolKind, UNKNOWN_LOCATION, UNKNOWN_PACKAGE } from "../findings/types";
import { JsonRecord, isRecord, numberOf, recordOf, recordsOf, stringOf } from "../utils/json";
import { FormatAdapter } from "./types";

/**
 * Severity from `properties["security-severity"]` when it is numeric,
 * otherwise from the result level. A missing level is SARIF's default, "warning".
 */
export function extractSarifSeverity(result: JsonRecord): Severity {
  const properties = recordOf(result.properties);
  const score = numberOf(properties?.["security-severity"]);
  if (score !== undefined) {
    return severityFromScore(score);
  }
  return severityFromLevel(stringOf(result.level) ?? "warning");
}

export function extractSarifLocation(result: JsonRecord): string {
  const location = recordsOf(result.locations)[0];
  const physical = recordOf(location?.physicalLocation);
  const uri = stringOf(recordOf(physical?.artifactLocation)?.uri);
  if (!uri) {
    return UNKNOWN_LOCATION;
  }
  const startLine = numberOf(recordOf(physical?.region)?.startLine);
  return startLine !== undefined ? `${uri}:${startLine}` : uri;
}

function extractRuleId(result: JsonRecord): string | undefined {
  return stringOf(result.ruleId) ?? stringOf(recordOf(result.properties)?.vulnId);
}

function extractMessage(result: JsonRecord): string | undefined {
  return stringOf(recordOf(result.message)?.text);
}

type PackageExtractor = (result: JsonRecord) => string;

const propertyPackage: PackageExtractor = (result) =>
  stringOf(recordOf(result.properties)?.package) ?? UNKNOWN_PACKAGE;

/**
 * The container scanner writes the package into the message text:
 * "Package: openssl\nInstalled Version: ...".
 */
export const containerPackage: PackageExtractor = (result) => {
  const match = (extractMessage(result) ?? "").match(/Package:\s*([^\s]+)/);
  return match ? match[1] : UNKNOWN_PACKAGE;
};

export interface SarifAdapterOptions {
  format: string;
  extractPackage?: PackageExtractor;
  /** Cap applied after derivation; used for scanners with no critical level. */
  maxSeverity?: Severity;
}

export function createSarifAdapter(options: SarifAdapterOptions): FormatAdapter {
  const extractPackage = options.extractPackage ?? propertyPackage;

  return {
    format: options.format,
    parse(document: unknown, tool: ToolKind): Finding[] {
      if (!isRecord(document)) {
        return [];
      }

      const findings: Finding[] = [];
      for (const run of recordsOf(document.runs)) {
        for (const result of recordsOf(run.results)) {
          let severity = extractSarifSeverity(result);
          if (options.maxSeverity === "high" && severity === "critical") {
            severity = "high";
          }
          const score = numberOf(recordOf(result.properties)?.["security-severity"]);

          findings.push(
            createFinding({
              tool,
              severity,
              ruleId: extractRuleId(result),
              message: extractMessage(result),
              location: extractSarifLocation(result),
              package: extractPackage(result),
              cvssScore: score,
            })
          );
        }
      }
      return findings;
    },
  };
}

export const genericSarifAdapter = createSarifAdapter({ format: "sarif" });

export const containerSarifAdapter = createSarifAdapter({
  format: "sarif-container",
  extractPackage: containerPackage,
});
