export type { PublishRepository } from './repository.js';
export { GitPublishRepository, type OpenRepositoryOptions } from './git-repository.js';
export { resolveBranchTarget, snapshotMessage } from './branch-resolver.js';
export { takeSnapshot } from './snapshotter.js';
export { contentDiffers } from './change-detector.js';
export { negotiatePush, type NegotiationInput } from './push-negotiator.js';
export { OutcomeAggregator, isPushed } from './outcome-aggregator.js';
export { defaultDescription, resolveDescription } from './description.js';
export {
  GitHubPullRequestGateway,
  PullRequestRequester,
  type NewPullRequest,
  type PullRequestGateway,
} from './pr-requester.js';
export { Publisher, type PublisherOptions } from './publisher.js';
