/**
 * MemoryPullRequestPublisher - In-memory implementation of PullRequestPublisher
 */

import type { PullRequestPublisher, PullRequestRef } from '../pull_request_publisher';

export type StoredPullRequest = {
  ref: PullRequestRef;
  branch: string;
  title: string;
  body: string;
  draft: boolean;
  /** Every body the pull request has had, oldest first */
  bodies: string[];
};

type Operation = 'createDraft' | 'updateBody' | 'markReady' | 'branchExists';

/**
 * @example
 * ```typescript
 * const publisher = new MemoryPullRequestPublisher({ repoUrl: 'https://github.com/acme/web' });
 * publisher.addBranch('rex/add-dark-mode');
 * publisher.failNext('createDraft', new Error('socket hang up'));
 * ```
 */
export class MemoryPullRequestPublisher implements PullRequestPublisher {
  private readonly pullRequests = new Map<number, StoredPullRequest>();
  private readonly branches = new Set<string>();
  private readonly failures: Array<{ operation: Operation; error: Error }> = [];
  private readonly repoUrl: string;
  private nextNumber = 1;

  constructor(options: { repoUrl?: string } = {}) {
    this.repoUrl = options.repoUrl ?? 'https://github.com/example/repo';
  }

  async createDraft(branch: string, title: string, body: string): Promise<PullRequestRef> {
    this.throwIfScripted('createDraft');
    const number = this.nextNumber++;
    const ref: PullRequestRef = { number, url: `${this.repoUrl}/pull/${number}` };
    this.pullRequests.set(number, { ref, branch, title, body, draft: true, bodies: [body] });
    this.branches.add(branch);
    return ref;
  }

  async updateBody(pullRequest: PullRequestRef, body: string): Promise<void> {
    this.throwIfScripted('updateBody');
    const stored = this.require(pullRequest);
    stored.body = body;
    stored.bodies.push(body);
  }

  async markReady(pullRequest: PullRequestRef): Promise<void> {
    this.throwIfScripted('markReady');
    this.require(pullRequest).draft = false;
  }

  async branchExists(name: string): Promise<boolean> {
    this.throwIfScripted('branchExists');
    return this.branches.has(name);
  }

  // ==================== Test Helper Methods ====================

  addBranch(name: string): void {
    this.branches.add(name);
  }

  /**
   * Make the next call of `operation` reject with `error`. Queue the same
   * operation several times to fail several calls.
   */
  failNext(operation: Operation, error: Error): void {
    this.failures.push({ operation, error });
  }

  get(number: number): StoredPullRequest | undefined {
    return this.pullRequests.get(number);
  }

  list(): StoredPullRequest[] {
    return Array.from(this.pullRequests.values());
  }

  clear(): void {
    this.pullRequests.clear();
    this.branches.clear();
    this.failures.length = 0;
    this.nextNumber = 1;
  }

  // ==================== PRIVATE HELPERS ====================

  private throwIfScripted(operation: Operation): void {
    const index = this.failures.findIndex(failure => failure.operation === operation);
    if (index === -1) return;
    const [failure] = this.failures.splice(index, 1);
    if (failure) throw failure.error;
  }

  private require(pullRequest: PullRequestRef): StoredPullRequest {
    const stored = this.pullRequests.get(pullRequest.number);
    if (!stored) {
      throw new Error(`Pull request #${pullRequest.number} does not exist`);
    }
    return stored;
  }
}
