export { FeedbackRelay, RECEIPT_EMOJI } from './feedback_relay';
export { FeedbackRelayError, AlreadyBoundError } from './errors';
export type {
  FeedbackSender,
  FeedbackMessage,
  RecordResult,
  AwaitOptions,
  AwaitResult,
  FeedbackRelayDependencies,
  IFeedbackRelay,
} from './feedback_relay.types';
