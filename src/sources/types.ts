/**
 * Collection results: what each tool contributed to this run.
 */

import { Finding, ToolKind, ToolStatus, ToolStatusMap } from "../findings/types";

export interface ToolCollection {
  tool: ToolKind;
  status: ToolStatus;
  findings: Finding[];
  /** File path or API endpoint the findings came from. */
  source?: string;
  error?: string;
}

export interface CollectionResult {
  findings: Finding[];
  toolStatus: ToolStatusMap;
  tools: Record<ToolKind, ToolCollection>;
}

/**
 * Read-only access to the security feeds that live behind the repository API.
 */
export interface SecurityFeedApi {
  /** Open issues carrying the label (pull requests excluded by the caller). */
  listIssuesWithLabel(label: string): Promise<unknown[]>;
  /** Dependency alerts in the open state. */
  listOpenDependencyAlerts(): Promise<unknown[]>;
}
