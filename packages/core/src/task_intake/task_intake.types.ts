import type { IAgentRegistry } from '../agent_registry/agent_registry.types';
import type { CancellationInfo, ICancellationController } from '../cancellation/cancellation.types';
import type { ChatNotifier } from '../chat/chat_notifier';
import type { IEventStream } from '../event_bus';
import type { IFeedbackRelay, RecordResult } from '../feedback_relay/feedback_relay.types';
import type { Logger } from '../logger';
import type { TaskQueue } from '../task_queue/task_queue.types';
import type { TerminalPhase } from '../task_machine/task_machine.types';

/**
 * A message that mentions the bot. `threadTs` is set when the mention was
 * posted inside an existing thread; otherwise the message starts one.
 */
export type MentionEvent = {
  channelId: string;
  ts: string;
  threadTs?: string;
  text: string;
  userId: string;
  userName: string;
};

/** Any channel message, as delivered by the chat platform. */
export type ThreadMessageEvent = {
  channelId: string;
  ts: string;
  threadTs?: string;
  text?: string;
  userId?: string;
  userName?: string;
  /** Set for messages posted by bots, including our own */
  botId?: string;
  subtype?: string;
};

export type CancelActionEvent = {
  /** Value carried by the cancel action: the task id */
  taskId: string;
  actorId: string;
  actorName: string;
};

export type MentionResult =
  | { status: 'accepted'; taskId: string; agentName: string; branchName: string }
  | { status: 'rejected'; reason: 'empty_description' | 'already_bound' }
  | { status: 'failed'; error: string };

/**
 * `finished`: the task had already ended; no flag was set.
 */
export type CancelActionResult =
  | { status: 'requested'; info: CancellationInfo }
  | { status: 'finished'; phase: TerminalPhase };

export type ThreadMessageResult =
  | RecordResult
  | { status: 'ignored'; reason: 'not_threaded' | 'bot' | 'edited' | 'empty' };

export type TaskIntakeDependencies = {
  registry: IAgentRegistry;
  relay: IFeedbackRelay;
  cancellation: ICancellationController;
  queue: TaskQueue;
  chat: ChatNotifier;
  eventBus?: IEventStream;
  logger?: Logger;
  /** Mention token stripped from descriptions, e.g. "U0BOT" */
  botUserId?: string;
  /** Base URL of the chat workspace, used for requester profile links */
  workspaceUrl?: string;
  now?: () => number;
};
