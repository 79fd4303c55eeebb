/**
 * ChatNotifier - outbound boundary to the chat platform
 *
 * Leash never talks to a chat SDK directly. The entry point and the task
 * runner post plain-text updates into the task's thread and react to
 * human messages through this interface.
 *
 * Implementations:
 * - MemoryChatNotifier: records posts and reactions (tests, dry runs)
 * - Host applications adapt their chat SDK to this interface
 */

/** A conversation thread: the channel plus the timestamp of its root message. */
export type ThreadRef = {
  channelId: string;
  threadTs: string;
};

/** A single posted message. */
export type MessageRef = {
  channelId: string;
  ts: string;
};

export type PostOptions = {
  /** Emoji name prefixed to the message, e.g. "rocket" */
  emoji?: string;
  /** Attaches a cancel action whose value is the task id */
  cancelActionValue?: string;
};

export interface ChatNotifier {
  post(thread: ThreadRef, text: string, options?: PostOptions): Promise<MessageRef>;
  react(message: MessageRef, emoji: string): Promise<void>;
}
