/**
 * TaskIntake - turns chat events into queued tasks, feedback and cancellations
 *
 * A mention becomes a task: an agent is claimed, the thread is bound to the
 * task id, and the task message is validated and enqueued. Replies in a
 * bound thread become feedback. The cancel action sets the task's flag;
 * the runner observes it at its next checkpoint.
 *
 * Host applications translate their chat SDK's payloads into the plain
 * event types accepted here.
 *
 * @example
 * ```typescript
 * const intake = new TaskIntake({ registry, relay, cancellation, queue, chat, botUserId: 'U0BOT' });
 * await intake.handleMention({ channelId: 'C1', ts: '1700000000.000100', text: '<@U0BOT> add rate limiting', userId: 'U1', userName: 'Ana' });
 * ```
 */

import type { ChatNotifier, PostOptions, ThreadRef } from '../chat/chat_notifier';
import { AlreadyBoundError } from '../feedback_relay/errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { createBranchName } from '../task_machine/branch_name';
import { humanizeError } from '../task_machine/errors';
import { isTerminalPhase } from '../task_machine/phases';
import {
  alreadyFinishedText,
  alreadyWorkingText,
  cancellationRequestedText,
  queueFailedText,
  taskStartedText,
  usageHintText,
} from '../task_machine/reports';
import type { TaskMessage } from '../task_queue/task_queue.types';
import { formatTaskId, parseTaskId } from './task_id';
import type {
  CancelActionEvent,
  CancelActionResult,
  MentionEvent,
  MentionResult,
  TaskIntakeDependencies,
  ThreadMessageEvent,
  ThreadMessageResult,
} from './task_intake.types';

const IGNORED_SUBTYPES = new Set(['message_changed', 'message_deleted']);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class TaskIntake {
  private readonly deps: TaskIntakeDependencies;
  private readonly chat: ChatNotifier;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: TaskIntakeDependencies) {
    this.deps = deps;
    this.chat = deps.chat;
    this.logger = deps.logger ?? createLogger('[TaskIntake] ');
    this.now = deps.now ?? Date.now;
  }

  // ==================== Mentions ====================

  async handleMention(event: MentionEvent): Promise<MentionResult> {
    const thread: ThreadRef = { channelId: event.channelId, threadTs: event.threadTs ?? event.ts };
    const description = this.extractDescription(event.text);

    if (!description) {
      await this.postSafely(thread, usageHintText(), { emoji: 'wave' });
      return { status: 'rejected', reason: 'empty_description' };
    }

    // Keyed by the mention's own ts: a second mention in a busy thread gets
    // a new task id, which bind() refuses.
    const taskId = formatTaskId({ channelId: event.channelId, threadTs: event.ts });
    const agent = await this.deps.registry.assign(taskId);

    try {
      await this.deps.relay.bind(thread.threadTs, taskId);
    } catch (error) {
      await this.freeAgent(agent.name, taskId);
      if (error instanceof AlreadyBoundError) {
        this.logger.info(`Thread ${thread.threadTs} already runs ${error.existingTaskId}`);
        await this.postSafely(thread, alreadyWorkingText(), { emoji: 'hourglass' });
        return { status: 'rejected', reason: 'already_bound' };
      }
      return this.fail(thread, taskId, error);
    }

    const message: TaskMessage = {
      task_id: taskId,
      task_description: description,
      branch_name: createBranchName(agent.name, description, thread.threadTs),
      agent_name: agent.name,
      agent_display_name: agent.displayName,
      agent_email: agent.email,
      thread_ts: thread.threadTs,
      channel_id: thread.channelId,
      requester_name: event.userName,
      requester_profile_url: this.profileUrl(event.userId),
      start_time: Math.floor(this.now() / 1000),
    };

    try {
      await this.deps.queue.enqueue(message);
    } catch (error) {
      await this.unbind(thread.threadTs);
      await this.freeAgent(agent.name, taskId);
      return this.fail(thread, taskId, error);
    }

    this.logger.info(`Queued ${taskId} for ${agent.name}`);
    await this.postSafely(thread, taskStartedText(agent.name, description), {
      emoji: 'rocket',
      cancelActionValue: taskId,
    });
    this.deps.eventBus?.publish({
      type: 'task.queued',
      timestamp: this.now(),
      source: 'task_intake',
      payload: { taskId, agentName: agent.name, requesterName: event.userName },
    });

    return { status: 'accepted', taskId, agentName: agent.name, branchName: message.branch_name };
  }

  // ==================== Thread Replies ====================

  async handleThreadMessage(event: ThreadMessageEvent): Promise<ThreadMessageResult> {
    if (!event.threadTs || event.threadTs === event.ts) {
      return { status: 'ignored', reason: 'not_threaded' };
    }
    if (event.botId || event.subtype === 'bot_message') {
      return { status: 'ignored', reason: 'bot' };
    }
    if (event.subtype && IGNORED_SUBTYPES.has(event.subtype)) {
      return { status: 'ignored', reason: 'edited' };
    }
    const text = event.text?.trim() ?? '';
    if (!text) {
      return { status: 'ignored', reason: 'empty' };
    }

    return this.deps.relay.recordMessage(
      event.threadTs,
      { id: event.userId ?? 'unknown', name: event.userName || 'Unknown User' },
      text,
      event.ts,
      { channelId: event.channelId, ts: event.ts },
    );
  }

  // ==================== Cancellation ====================

  /**
   * Sets the cancellation flag. The first request wins; later ones get the
   * original requester back. A task whose last progress is terminal is
   * left alone.
   */
  async handleCancelAction(event: CancelActionEvent): Promise<CancelActionResult> {
    const thread = await this.threadOf(event.taskId);
    const progress = await this.deps.cancellation.lastProgress(event.taskId);

    if (progress && isTerminalPhase(progress.phase)) {
      this.logger.info(`${event.taskId} already finished as ${progress.phase}, ignoring cancel from ${event.actorName}`);
      await this.postTo(thread, event.taskId, alreadyFinishedText(progress.phase), 'information_source');
      return { status: 'finished', phase: progress.phase };
    }

    const info = await this.deps.cancellation.requestCancel(event.taskId, {
      id: event.actorId,
      name: event.actorName,
    });
    await this.postTo(thread, event.taskId, cancellationRequestedText(info.actorName), 'octagonal_sign');
    return { status: 'requested', info };
  }

  // ==================== PRIVATE HELPERS ====================

  private extractDescription(text: string): string {
    const mention = this.deps.botUserId
      ? new RegExp(`<@${escapeRegExp(this.deps.botUserId)}>`, 'g')
      : /^\s*<@[^>]+>/;
    return text.replace(mention, '').trim();
  }

  private async threadOf(taskId: string): Promise<ThreadRef | null> {
    const parsed = parseTaskId(taskId);
    if (!parsed) return null;
    const threadTs = await this.deps.relay.threadForTask(taskId);
    return { channelId: parsed.channelId, threadTs: threadTs ?? parsed.threadTs };
  }

  private profileUrl(userId: string): string | null {
    const base = this.deps.workspaceUrl?.replace(/\/+$/, '');
    return base ? `${base}/team/${encodeURIComponent(userId)}` : null;
  }

  private async fail(thread: ThreadRef, taskId: string, error: unknown): Promise<MentionResult> {
    const reason = humanizeError(error);
    this.logger.error(`Could not queue ${taskId}: ${reason}`, error);
    await this.postSafely(thread, queueFailedText(reason), { emoji: 'warning' });
    return { status: 'failed', error: reason };
  }

  private async freeAgent(agentName: string, taskId: string): Promise<void> {
    try {
      await this.deps.registry.markFree(agentName, taskId);
    } catch (error) {
      this.logger.error(`Could not release ${agentName} from ${taskId}: ${humanizeError(error)}`);
    }
  }

  private async unbind(threadTs: string): Promise<void> {
    try {
      await this.deps.relay.unbind(threadTs);
    } catch (error) {
      this.logger.warn(`Could not unbind thread ${threadTs}: ${humanizeError(error)}`);
    }
  }

  private async postTo(thread: ThreadRef | null, taskId: string, text: string, emoji: string): Promise<void> {
    if (thread) {
      await this.postSafely(thread, text, { emoji });
    } else {
      this.logger.warn(`Cannot locate the thread of ${taskId}`);
    }
  }

  private async postSafely(thread: ThreadRef, text: string, options: PostOptions): Promise<void> {
    try {
      await this.chat.post(thread, text, options);
    } catch (error) {
      this.logger.warn(`Could not post to thread ${thread.threadTs}: ${humanizeError(error)}`);
    }
  }
}
