/**
 * GitHubPullRequestPublisher - PullRequestPublisher over the GitHub API
 *
 * Drafts are opened with `pulls.create({ draft: true })`. REST cannot take
 * a pull request out of draft, so `markReady` uses the GraphQL
 * `markPullRequestReadyForReview` mutation.
 *
 * @example
 * ```typescript
 * import { Octokit } from '@octokit/rest';
 * const publisher = new GitHubPullRequestPublisher({
 *   octokit: new Octokit({ auth: process.env.GITHUB_TOKEN }),
 *   owner: 'acme',
 *   repo: 'web',
 *   baseBranch: 'main',
 * });
 * ```
 */

import type { Octokit } from '@octokit/rest';
import type { PullRequestPublisher, PullRequestRef } from '../pull_request_publisher';
import { isOctokitRequestError, mapOctokitError } from '../errors';

export type GitHubPullRequestPublisherOptions = {
  octokit: Octokit;
  owner: string;
  repo: string;
  baseBranch: string;
};

const MARK_READY_MUTATION = `
  mutation MarkReady($id: ID!) {
    markPullRequestReadyForReview(input: { pullRequestId: $id }) {
      pullRequest { isDraft }
    }
  }
`;

export class GitHubPullRequestPublisher implements PullRequestPublisher {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly baseBranch: string;

  constructor(options: GitHubPullRequestPublisherOptions) {
    this.octokit = options.octokit;
    this.owner = options.owner;
    this.repo = options.repo;
    this.baseBranch = options.baseBranch;
  }

  async createDraft(branch: string, title: string, body: string): Promise<PullRequestRef> {
    try {
      const { data } = await this.octokit.rest.pulls.create({
        owner: this.owner,
        repo: this.repo,
        head: branch,
        base: this.baseBranch,
        title,
        body,
        draft: true,
      });
      return { number: data.number, url: data.html_url, nodeId: data.node_id };
    } catch (error) {
      throw mapOctokitError(error, `creating draft pull request for ${branch}`);
    }
  }

  async updateBody(pullRequest: PullRequestRef, body: string): Promise<void> {
    try {
      await this.octokit.rest.pulls.update({
        owner: this.owner,
        repo: this.repo,
        pull_number: pullRequest.number,
        body,
      });
    } catch (error) {
      throw mapOctokitError(error, `updating pull request #${pullRequest.number}`);
    }
  }

  async markReady(pullRequest: PullRequestRef): Promise<void> {
    try {
      const nodeId = pullRequest.nodeId ?? (await this.fetchNodeId(pullRequest.number));
      await this.octokit.graphql(MARK_READY_MUTATION, { id: nodeId });
    } catch (error) {
      throw mapOctokitError(error, `marking pull request #${pullRequest.number} ready`);
    }
  }

  async branchExists(name: string): Promise<boolean> {
    try {
      await this.octokit.rest.repos.getBranch({
        owner: this.owner,
        repo: this.repo,
        branch: name,
      });
      return true;
    } catch (error) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return false;
      }
      throw mapOctokitError(error, `checking branch ${name}`);
    }
  }

  // ==================== PRIVATE HELPERS ====================

  private async fetchNodeId(pullNumber: number): Promise<string> {
    const { data } = await this.octokit.rest.pulls.get({
      owner: this.owner,
      repo: this.repo,
      pull_number: pullNumber,
    });
    return data.node_id;
  }
}
