/**
 * FeedbackRelay - thread↔task mapping and per-thread feedback log
 *
 * Keys (un-prefixed; the store applies its namespace):
 * - `thread_tasks:{thread}` / `task_threads:{task_id}`: both directions of
 *   the mapping, written together with one TTL
 * - `thread_messages:{thread}`: JSON messages, appended atomically; a
 *   message's sequence number is its 1-based list position
 * - `read_pointer:{task_id}`: count of messages already handed to the task
 * - `thread_released:{thread}`: id of the finished task that last held the
 *   thread; a new task may take the thread over while it is set
 *
 * `peekNew` moves the read pointer with one atomic `advanceTo` and returns
 * exactly the slice between the previous and the new pointer, so concurrent
 * readers never see the same message twice and never skip one.
 *
 * @example
 * ```typescript
 * const relay = new FeedbackRelay({ store, chat });
 * await relay.bind('1700000000.000100', 'C123_1700000000.000100');
 * await relay.recordMessage('1700000000.000100', { id: 'U1', name: 'Ana' }, 'use Tailwind', '1700000001.000200');
 * const fresh = await relay.peekNew('C123_1700000000.000100'); // [{ sequence: 1, text: 'use Tailwind', ... }]
 * ```
 */

import type { ChatNotifier, MessageRef, ThreadRef } from '../chat';
import { StoreKeys, DEFAULT_RETENTION_SECONDS } from '../coordination_store';
import type { CoordinationStore } from '../coordination_store';
import type { IEventStream } from '../event_bus';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { sleep as defaultSleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { AlreadyBoundError, FeedbackRelayError } from './errors';
import type {
  AwaitOptions,
  AwaitResult,
  FeedbackMessage,
  FeedbackRelayDependencies,
  FeedbackSender,
  IFeedbackRelay,
  RecordResult,
} from './feedback_relay.types';

/** Reaction added to every recorded human message */
export const RECEIPT_EMOJI = 'eyes';

type StoredMessage = Omit<FeedbackMessage, 'sequence'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessageRef(value: unknown): value is MessageRef {
  return isRecord(value) && typeof value['channelId'] === 'string' && typeof value['ts'] === 'string';
}

function isStoredMessage(value: unknown): value is StoredMessage {
  if (!isRecord(value)) return false;
  const sender = value['sender'];
  return (
    isRecord(sender) &&
    typeof sender['id'] === 'string' &&
    typeof sender['name'] === 'string' &&
    typeof value['text'] === 'string' &&
    typeof value['timestamp'] === 'string' &&
    (value['messageRef'] === undefined || isMessageRef(value['messageRef']))
  );
}

function escapeMarkdown(text: string): string {
  return text.replace(/\*/g, '\\*').replace(/_/g, '\\_');
}

export class FeedbackRelay implements IFeedbackRelay {
  private readonly store: CoordinationStore;
  private readonly chat: ChatNotifier | undefined;
  private readonly eventBus: IEventStream | undefined;
  private readonly logger: Logger;
  private readonly retentionSeconds: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(deps: FeedbackRelayDependencies) {
    this.store = deps.store;
    this.chat = deps.chat;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? createLogger('[FeedbackRelay] ');
    this.retentionSeconds = deps.retentionSeconds ?? DEFAULT_RETENTION_SECONDS;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ==================== MAPPING ====================

  async bind(thread: string, taskId: string): Promise<void> {
    // A finished task's mapping is replaced, and its feedback log goes with it.
    const written = await this.store.setAllIfAbsent(
      [
        { key: StoreKeys.threadTask(thread), value: taskId },
        { key: StoreKeys.taskThread(taskId), value: thread },
      ],
      this.retentionSeconds,
      { releasedKey: StoreKeys.threadReleased(thread), discardKeys: [StoreKeys.threadMessages(thread)] },
    );
    if (written) {
      this.logger.debug(`Bound thread ${thread} to ${taskId}`);
      return;
    }

    const existing = await this.taskForThread(thread);
    if (existing === taskId) return;
    if (existing !== null) {
      throw new AlreadyBoundError(thread, existing);
    }
    throw new FeedbackRelayError(`Task ${taskId} is already bound to another thread`);
  }

  /**
   * Marks a finished task's thread as free for a new task. The mapping, the
   * feedback log and the read pointer stay readable for the retention window,
   * counted from now.
   */
  async release(taskId: string): Promise<void> {
    const thread = await this.threadForTask(taskId);
    if (thread === null || (await this.taskForThread(thread)) !== taskId) return;

    await this.store.set(StoreKeys.threadReleased(thread), taskId, this.retentionSeconds);
    await Promise.all(
      [
        StoreKeys.threadTask(thread),
        StoreKeys.taskThread(taskId),
        StoreKeys.threadMessages(thread),
        StoreKeys.readPointer(taskId),
      ].map(key => this.store.expire(key, this.retentionSeconds)),
    );
    this.logger.debug(`Released thread ${thread} from ${taskId}`);
  }

  async unbind(thread: string): Promise<void> {
    const taskId = await this.taskForThread(thread);
    const keys = [StoreKeys.threadTask(thread)];
    if (taskId !== null) {
      keys.push(StoreKeys.taskThread(taskId), StoreKeys.readPointer(taskId));
    }
    await this.store.delete(...keys);
  }

  async taskForThread(thread: string): Promise<string | null> {
    return this.store.get(StoreKeys.threadTask(thread));
  }

  async threadForTask(taskId: string): Promise<string | null> {
    return this.store.get(StoreKeys.taskThread(taskId));
  }

  // ==================== MESSAGES ====================

  async recordMessage(
    thread: string,
    sender: FeedbackSender,
    text: string,
    timestamp: string,
    messageRef?: MessageRef,
  ): Promise<RecordResult> {
    const taskId = await this.taskForThread(thread);
    if (taskId === null) {
      this.logger.debug(`No task bound to thread ${thread}, dropping message`);
      return { status: 'unbound' };
    }
    if ((await this.store.get(StoreKeys.threadReleased(thread))) === taskId) {
      this.logger.debug(`${taskId} already finished, dropping message`);
      return { status: 'unbound' };
    }

    const stored: StoredMessage = { sender, text, timestamp, ...(messageRef ? { messageRef } : {}) };
    const sequence = await this.store.append(
      StoreKeys.threadMessages(thread),
      JSON.stringify(stored),
      this.retentionSeconds,
    );
    const message: FeedbackMessage = { sequence, ...stored };
    this.logger.info(`Stored message #${sequence} from ${sender.name} for ${taskId}`);

    if (messageRef && this.chat) {
      try {
        await this.chat.react(messageRef, RECEIPT_EMOJI);
      } catch (error) {
        this.logger.debug(`Could not add reaction: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    this.eventBus?.publish({
      type: 'task.feedback.received',
      timestamp: this.now(),
      source: 'feedback_relay',
      payload: { taskId, thread, sequence, sender: sender.name },
    });

    return { status: 'recorded', message };
  }

  async peekNew(taskId: string, limit?: number): Promise<FeedbackMessage[]> {
    const thread = await this.threadForTask(taskId);
    if (thread === null) return [];

    const listKey = StoreKeys.threadMessages(thread);
    const pointerKey = StoreKeys.readPointer(taskId);
    const length = await this.store.length(listKey);
    const current = Number.parseInt((await this.store.get(pointerKey)) ?? '0', 10) || 0;
    const end = limit === undefined ? length : Math.min(length, current + limit);
    if (end <= current) return [];

    const previous = await this.store.advanceTo(pointerKey, end, this.retentionSeconds);
    if (previous >= end) return [];

    const raw = await this.store.range(listKey, previous, end - 1);
    return this.parse(raw, previous);
  }

  async awaitNext(taskId: string, options: AwaitOptions): Promise<AwaitResult> {
    const deadline = this.now() + options.timeoutMs;

    for (;;) {
      if (options.signal?.aborted) return { status: 'aborted' };

      const [message] = await this.peekNew(taskId, 1);
      if (message) return { status: 'message', message };

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.logger.warn(`No reply for ${taskId} within ${options.timeoutMs}ms`);
        return { status: 'timeout' };
      }
      await this.sleep(Math.min(options.pollIntervalMs, remaining), options.signal);
    }
  }

  async ask(taskId: string, thread: ThreadRef, question: string, options: AwaitOptions): Promise<AwaitResult> {
    if (!this.chat) {
      throw new FeedbackRelayError('Asking a question requires a chat notifier');
    }
    await this.chat.post(thread, `Question: ${question}\n\nPlease reply in this thread.`, { emoji: 'question' });
    return this.awaitNext(taskId, options);
  }

  async getAllMessages(taskId: string): Promise<FeedbackMessage[]> {
    const thread = await this.threadForTask(taskId);
    if (thread === null) return [];
    return this.parse(await this.store.range(StoreKeys.threadMessages(thread), 0, -1), 0);
  }

  // ==================== RENDERING ====================

  formatForAgent(messages: FeedbackMessage[]): string {
    if (messages.length === 0) return '';

    const feedback = messages.map(message => `${message.sender.name}: ${message.text}`).join('\n\n');
    return [
      'IMPORTANT - HUMAN FEEDBACK:',
      'The human has provided the following feedback/change request in the task thread:',
      '',
      feedback,
      '',
      'Please incorporate this feedback into your current work.',
    ].join('\n');
  }

  async renderForPr(taskId: string): Promise<string> {
    const messages = await this.getAllMessages(taskId);
    return messages
      .map(message => `- **${message.sender.name}:** ${escapeMarkdown(message.text)}`)
      .join('\n');
  }

  // ==================== PRIVATE HELPERS ====================

  private parse(raw: string[], offset: number): FeedbackMessage[] {
    const messages: FeedbackMessage[] = [];
    raw.forEach((value, index) => {
      const sequence = offset + index + 1;
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        parsed = undefined;
      }
      if (!isStoredMessage(parsed)) {
        this.logger.error(`Skipping malformed feedback message #${sequence}`);
        return;
      }
      messages.push({ sequence, ...parsed });
    });
    return messages;
  }
}
