/**
 * GitHub integration module: the tracked report comment and the security feeds.
 */

export { createOctokit, createCommentApi, createSecurityFeedApi } from "./client";
export type { GitHubClient } from "./client";
export { publishReport, findTrackedComment, assertPublishable } from "./comments";
export type { CommentApi, TrackedComment, PublishOutcome } from "./comments";
