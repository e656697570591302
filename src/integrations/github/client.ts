/**
 * GitHub API client creation and the API adapters built on it.
 */

import * as github from "@actions/github";
import { RepositoryRef } from "../../env";
import { SecurityFeedApi } from "../../sources/types";
import { CommentApi, TrackedComment } from "./comments";

export type GitHubClient = ReturnType<typeof github.getOctokit>;

/**
 * Create an Octokit client authenticated with a workflow or personal token.
 */
export function createOctokit(token: string): GitHubClient {
  return github.getOctokit(token);
}

/**
 * Issue comments on one repository.
 */
export function createCommentApi(octokit: GitHubClient, repository: RepositoryRef): CommentApi {
  const { owner, repo } = repository;

  return {
    async listComments(issueNumber: number): Promise<TrackedComment[]> {
      const comments = await octokit.paginate(octokit.rest.issues.listComments, {
        owner,
        repo,
        issue_number: issueNumber,
        per_page: 100,
      });
      return comments.map((comment) => ({ id: comment.id, body: comment.body }));
    },

    async createComment(issueNumber: number, body: string): Promise<TrackedComment> {
      const { data } = await octokit.rest.issues.createComment({ owner, repo, issue_number: issueNumber, body });
      return { id: data.id, body: data.body };
    },

    async updateComment(commentId: number, body: string): Promise<TrackedComment> {
      const { data } = await octokit.rest.issues.updateComment({ owner, repo, comment_id: commentId, body });
      return { id: data.id, body: data.body };
    },
  };
}

/**
 * Secret-scanner issues and dependency alerts on one repository.
 */
export function createSecurityFeedApi(octokit: GitHubClient, repository: RepositoryRef): SecurityFeedApi {
  const { owner, repo } = repository;

  return {
    listIssuesWithLabel(label: string): Promise<unknown[]> {
      return octokit.paginate(octokit.rest.issues.listForRepo, {
        owner,
        repo,
        labels: label,
        state: "open",
        per_page: 100,
      });
    },

    listOpenDependencyAlerts(): Promise<unknown[]> {
      return octokit.paginate(octokit.rest.dependabot.listAlertsForRepo, {
        owner,
        repo,
        state: "open",
        per_page: 100,
      });
    },
  };
}
