/**
 * Dynamic scanner reports.
 *
 * The native JSON report is a site/alert tree:
 *   { "site": [{ "@host", "@port", "@name", "alerts": [{ "riskcode", "confidence", ... }] }] }
 * Some pipelines export SARIF instead; that is handled by the generic SARIF
 * adapter, capped at "high" because this scanner has no critical level.
 */

import { createFinding } from "../findings/finding";
import { stripMarkup } from "../findings/markup";
import { confidenceLabel, severityFromRiskCode } from "../findings/severity";
import { Finding, ToolKind } from "../findings/types";
import { JsonRecord, isRecord, numberOf, recordsOf, stringOf } from "../utils/json";
import { createSarifAdapter } from "./sarif";
import { FormatAdapter } from "./types";

const dynamicSarifAdapter = createSarifAdapter({ format: "sarif-dynamic", maxSeverity: "high" });

function siteLocation(site: JsonRecord, alert: JsonRecord): string | undefined {
  const host = stringOf(site["@host"]);
  const port = stringOf(site["@port"]) ?? numberOf(site["@port"])?.toString();
  if (host) {
    return port ? `${host}:${port}` : host;
  }
  const firstInstance = recordsOf(alert.instances)[0];
  return stringOf(firstInstance?.uri) ?? stringOf(site["@name"]);
}

function alertRuleId(alert: JsonRecord): string | undefined {
  const cweId = numberOf(alert.cweid);
  if (cweId !== undefined && cweId > 0) {
    return `CWE-${cweId}`;
  }
  return stringOf(alert.pluginid) ?? stringOf(alert.alertRef);
}

function parseSiteTree(document: JsonRecord, tool: ToolKind): Finding[] {
  const findings: Finding[] = [];

  for (const site of recordsOf(document.site)) {
    for (const alert of recordsOf(site.alerts)) {
      const name = stringOf(alert.alert) ?? stringOf(alert.name);
      const description = stripMarkup(stringOf(alert.desc));
      const instanceCount = recordsOf(alert.instances).length;
      const countSuffix = instanceCount > 1 ? ` (${instanceCount} instances)` : "";

      findings.push(
        createFinding({
          tool,
          severity: severityFromRiskCode(numberOf(alert.riskcode) ?? -1),
          ruleId: alertRuleId(alert),
          message: name ? `${name}${countSuffix}${description ? `: ${description}` : ""}` : description,
          location: siteLocation(site, alert),
          package: stringOf(site["@name"]),
          confidence: confidenceLabel(numberOf(alert.confidence) ?? -1),
          solution: stripMarkup(stringOf(alert.solution)),
          reference: stripMarkup(stringOf(alert.reference)),
        })
      );
    }
  }

  return findings;
}

export const zapAdapter: FormatAdapter = {
  format: "zap-json",
  parse(document: unknown, tool: ToolKind): Finding[] {
    if (!isRecord(document)) {
      return [];
    }
    if (Array.isArray(document.runs)) {
      return dynamicSarifAdapter.parse(document, tool);
    }
    return parseSiteTree(document, tool);
  },
};
