/**
 * Task lifecycle types.
 *
 * A task moves through the work phases in order and ends in exactly one of
 * the terminal phases. Between two work phases the machine performs a
 * checkpoint (cancellation first, then unread feedback).
 */

import type { IAgentRegistry } from '../agent_registry/agent_registry.types';
import type { CancellationInfo, ICancellationController, PartialReport } from '../cancellation/cancellation.types';
import type { ChatNotifier } from '../chat/chat_notifier';
import type { CodingAgent } from '../coding_agent/coding_agent';
import type { IEventStream } from '../event_bus';
import type { FeedbackMessage, IFeedbackRelay } from '../feedback_relay/feedback_relay.types';
import type { Logger } from '../logger';
import type { PullRequestPublisher, PullRequestRef } from '../pull_request/pull_request_publisher';
import type { Sleep } from '../utils/sleep';
import type { WorkspaceFactory } from '../workspace/workspace';

export type TaskPhase =
  | 'QUEUED'
  | 'PLANNING'
  | 'DRAFT_OPENED'
  | 'IMPLEMENTING'
  | 'SELF_REVIEW'
  | 'TESTING'
  | 'FINALIZING'
  | 'READY'
  | 'FAILED'
  | 'CANCELLED';

export type WorkPhase = 'PLANNING' | 'DRAFT_OPENED' | 'IMPLEMENTING' | 'SELF_REVIEW' | 'TESTING' | 'FINALIZING';

export type TerminalPhase = 'READY' | 'FAILED' | 'CANCELLED';

export type ErrorKind = 'transient' | 'validation' | 'fatal';

/**
 * Everything the phases have produced so far.
 */
export type TaskResultSummary = {
  branchName: string;
  title?: string;
  plan?: string;
  pullRequest?: PullRequestRef;
  filesTouched: string[];
  reviewNotes?: string;
  testsPassed?: boolean;
  testSummary?: string;
};

export type TaskFailure = {
  phase: WorkPhase;
  kind: ErrorKind;
  reason: string;
};

export type TaskMachineState = {
  /** Current phase; after a phase body succeeds it stays there until the checkpoint. */
  phase: TaskPhase;
  completed: WorkPhase[];
  summary: TaskResultSummary;
  /** Feedback collected at checkpoints and not yet handed to the agent */
  pendingFeedback: FeedbackMessage[];
  cancellation?: CancellationInfo;
  failure?: TaskFailure;
};

export type TaskEvent =
  | { type: 'start' }
  | { type: 'phase_succeeded'; phase: WorkPhase; patch: Partial<TaskResultSummary> }
  | { type: 'checkpoint'; next: WorkPhase; cancellation: CancellationInfo | null; feedback: FeedbackMessage[] }
  | { type: 'phase_failed'; phase: WorkPhase; kind: ErrorKind; reason: string };

export type TaskEffect =
  | { type: 'runPhase'; phase: WorkPhase; feedback: FeedbackMessage[] }
  | { type: 'checkpoint'; next: WorkPhase }
  | { type: 'acknowledgeFeedback'; messages: FeedbackMessage[] }
  | { type: 'publishCancellation'; cancellation: CancellationInfo; completed: WorkPhase[] }
  | { type: 'notifyFailure'; failure: TaskFailure }
  | { type: 'notifyReady' }
  | { type: 'releaseAgent' };

export type TransitionResult = {
  state: TaskMachineState;
  effects: TaskEffect[];
};

export type TaskOutcome = {
  taskId: string;
  phase: TerminalPhase;
  completedPhases: WorkPhase[];
  summary: TaskResultSummary;
  durationMs: number;
  failure?: TaskFailure;
  report?: PartialReport;
};

export type TaskRunnerDependencies = {
  codingAgent: CodingAgent;
  workspaces: WorkspaceFactory;
  publisher: PullRequestPublisher;
  chat: ChatNotifier;
  relay: IFeedbackRelay;
  cancellation: ICancellationController;
  registry: IAgentRegistry;
  eventBus?: IEventStream;
  logger?: Logger;
  /** Branch the work starts from (default: main) */
  baseBranch?: string;
  /** Backoff for transient remote failures (default: 60s, 120s, 240s) */
  retryDelaysMs?: readonly number[];
  sleep?: Sleep;
  now?: () => number;
};
