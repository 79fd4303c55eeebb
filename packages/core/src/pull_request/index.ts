/**
 * Pull request boundary - interface and errors only.
 * For implementations, use @leash/core/github or @leash/core/memory.
 */
export type { PullRequestPublisher, PullRequestRef } from './pull_request_publisher';
export { PublisherError, isOctokitRequestError, mapOctokitError } from './errors';
export type { PublisherErrorCode } from './errors';
