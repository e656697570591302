/**
 * Static adapter registry keyed on tool kind.
 */

import { Finding, ToolKind } from "../findings/types";
import { dependencyAlertAdapter, secretIssueAdapter } from "./github";
import { osvAdapter } from "./osv";
import { containerSarifAdapter, genericSarifAdapter } from "./sarif";
import { FormatAdapter } from "./types";
import { zapAdapter } from "./zap";

export type { FormatAdapter } from "./types";

export const ADAPTERS: Record<ToolKind, FormatAdapter> = {
  trivy: containerSarifAdapter,
  osvScanner: osvAdapter,
  semgrep: genericSarifAdapter,
  gitLeaks: secretIssueAdapter,
  checkov: genericSarifAdapter,
  owaspZap: zapAdapter,
  dependabot: dependencyAlertAdapter,
};

/**
 * Parse a raw document with the adapter registered for the tool.
 */
export function parseToolDocument(tool: ToolKind, document: unknown): Finding[] {
  return ADAPTERS[tool].parse(document, tool);
}
