/**
 * GitHub API implementations for @leash/core/github
 *
 * Usage:
 *   import { Octokit } from '@octokit/rest';
 *   import { GitHubPullRequestPublisher } from '@leash/core/github';
 *
 *   const publisher = new GitHubPullRequestPublisher({ octokit: new Octokit({ auth }), owner, repo, baseBranch: 'main' });
 */

export type { Octokit, RestEndpointMethodTypes } from '@octokit/rest';

export { GitHubPullRequestPublisher } from './pull_request/github';
export type { GitHubPullRequestPublisherOptions } from './pull_request/github';
export { PublisherError, mapOctokitError, isOctokitRequestError } from './pull_request/errors';
export type { PublisherErrorCode } from './pull_request/errors';
