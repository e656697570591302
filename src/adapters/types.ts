/**
 * Adapter contract shared by all scanner formats.
 */

import { Finding, ToolKind } from "../findings/types";

/**
 * Maps one raw scanner document to canonical findings.
 *
 * parse() must not throw for a document that was valid JSON: unexpected
 * shapes yield fewer (or zero) findings. Documents that fail to parse as
 * JSON never reach an adapter; the collector records them as "Error".
 */
export interface FormatAdapter {
  /** Short format name used in logs. */
  readonly format: string;
  parse(document: unknown, tool: ToolKind): Finding[];
}
