export { MemoryPullRequestPublisher } from './memory_pull_request_publisher';
export type { StoredPullRequest } from './memory_pull_request_publisher';
