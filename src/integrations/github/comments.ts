/**
 * Tracked report comment: one per pull request, updated in place.
 */

import { errorMessage, InvalidReportError, PublishError } from "../../errors";
import { logger } from "../../logger";
import { REPORT_MARKER } from "../../report/markdown";
import { AggregatedReport } from "../../report/types";
import { isRecord, numberOf } from "../../utils/json";

const log = logger.child("Publisher");

export interface TrackedComment {
  id: number;
  body?: string | null;
}

/**
 * The three comment operations the publisher needs.
 * listComments must return every page.
 */
export interface CommentApi {
  listComments(issueNumber: number): Promise<TrackedComment[]>;
  createComment(issueNumber: number, body: string): Promise<TrackedComment>;
  updateComment(commentId: number, body: string): Promise<TrackedComment>;
}

export type PublishOutcome =
  | { action: "created"; commentId: number }
  | { action: "updated"; commentId: number }
  | { action: "skipped"; reason: string };

/**
 * First comment carrying the report marker, if any.
 */
export function findTrackedComment(comments: readonly TrackedComment[]): TrackedComment | undefined {
  return comments.find((comment) => comment.body?.includes(REPORT_MARKER));
}

function statusOf(error: unknown): number | undefined {
  return isRecord(error) ? numberOf(error.status) : undefined;
}

async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new PublishError(`Failed to ${operation}: ${errorMessage(err)}`, statusOf(err), { cause: err });
  }
}

/**
 * Reject reports that did not go through the tier orchestrator and renderer.
 */
export function assertPublishable(report: AggregatedReport): void {
  const metadata: unknown = report.analysis.metadata;
  if (!isRecord(metadata) || typeof metadata.tier !== "string" || metadata.tier === "") {
    throw new InvalidReportError("Report analysis has no tier metadata");
  }
  if (!report.body.includes(REPORT_MARKER)) {
    throw new InvalidReportError("Report body is missing the tracking marker");
  }
}

/**
 * Create or update the tracked comment for the report's review unit.
 *
 * Idempotent: the existing comment is found by marker and replaced, so
 * repeated runs never leave a second tracked comment. API failures
 * propagate as PublishError.
 */
export async function publishReport(report: AggregatedReport, api: CommentApi | undefined): Promise<PublishOutcome> {
  assertPublishable(report);

  const issueNumber = report.reviewUnit.number;
  if (issueNumber === undefined) {
    log.info("No pull request number - skipping comment");
    return { action: "skipped", reason: "no review unit" };
  }
  if (!api) {
    throw new PublishError(`Cannot publish report to #${issueNumber}: no GitHub token or repository configured`);
  }

  const existing = findTrackedComment(await call("list comments", () => api.listComments(issueNumber)));

  if (existing) {
    await call("update comment", () => api.updateComment(existing.id, report.body));
    log.info(`Updated report comment ${existing.id} on #${issueNumber}`);
    return { action: "updated", commentId: existing.id };
  }

  const created = await call("create comment", () => api.createComment(issueNumber, report.body));
  log.info(`Created report comment ${created.id} on #${issueNumber}`);
  return { action: "created", commentId: created.id };
}
