export { GitHubPullRequestPublisher } from './github_pull_request_publisher';
export type { GitHubPullRequestPublisherOptions } from './github_pull_request_publisher';
