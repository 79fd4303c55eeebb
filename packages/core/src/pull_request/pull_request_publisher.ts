/**
 * PullRequestPublisher - outbound boundary to the source-hosting service
 *
 * The pull request itself lives outside Leash; the task runner only keeps
 * the reference returned by `createDraft`.
 *
 * Implementations:
 * - GitHubPullRequestPublisher: Octokit REST + GraphQL
 * - MemoryPullRequestPublisher: in-memory for tests
 */

export type PullRequestRef = {
  number: number;
  url: string;
  /** GraphQL node id, needed to leave draft state on GitHub */
  nodeId?: string;
};

export interface PullRequestPublisher {
  createDraft(branch: string, title: string, body: string): Promise<PullRequestRef>;
  updateBody(pullRequest: PullRequestRef, body: string): Promise<void>;
  markReady(pullRequest: PullRequestRef): Promise<void>;
  branchExists(name: string): Promise<boolean>;
}
