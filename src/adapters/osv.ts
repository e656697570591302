/**
 * Dependency scanner JSON: results[].packages[].vulnerabilities[].
 */

import { createFinding } from "../findings/finding";
import { severityFromLabel } from "../findings/severity";
import { Finding, ToolKind } from "../findings/types";
import { isRecord, recordOf, recordsOf, stringOf } from "../utils/json";
import { FormatAdapter } from "./types";

export const osvAdapter: FormatAdapter = {
  format: "osv-json",
  parse(document: unknown, tool: ToolKind): Finding[] {
    if (!isRecord(document)) {
      return [];
    }

    const findings: Finding[] = [];
    for (const result of recordsOf(document.results)) {
      const sourcePath = stringOf(recordOf(result.source)?.path);

      for (const pkg of recordsOf(result.packages)) {
        const packageName = stringOf(recordOf(pkg.package)?.name);

        for (const vuln of recordsOf(pkg.vulnerabilities)) {
          const databaseSpecific = recordOf(vuln.database_specific);
          const id = stringOf(vuln.id);
          const rawScore = databaseSpecific?.cvss_score;

          findings.push(
            createFinding({
              tool,
              severity: severityFromLabel(stringOf(databaseSpecific?.severity)),
              ruleId: id,
              message: stringOf(vuln.summary) ?? id,
              location: sourcePath,
              package: packageName,
              cvssScore: typeof rawScore === "number" || typeof rawScore === "string" ? rawScore : undefined,
            })
          );
        }
      }
    }
    return findings;
  },
};
