/**
 * MemoryChatNotifier - In-memory implementation of ChatNotifier
 *
 * Records every post and reaction for assertions. Message timestamps are
 * generated from a counter ("1000.000001", "1000.000002", ...).
 */

import type { ChatNotifier, MessageRef, PostOptions, ThreadRef } from '../chat_notifier';

export type RecordedPost = {
  thread: ThreadRef;
  text: string;
  options: PostOptions;
  ref: MessageRef;
};

export type RecordedReaction = {
  message: MessageRef;
  emoji: string;
};

export class MemoryChatNotifier implements ChatNotifier {
  private readonly posts: RecordedPost[] = [];
  private readonly reactions: RecordedReaction[] = [];
  private counter = 0;
  private failure: Error | null = null;

  async post(thread: ThreadRef, text: string, options: PostOptions = {}): Promise<MessageRef> {
    if (this.failure) throw this.failure;
    this.counter += 1;
    const ref: MessageRef = {
      channelId: thread.channelId,
      ts: `1000.${String(this.counter).padStart(6, '0')}`,
    };
    this.posts.push({ thread, text, options, ref });
    return ref;
  }

  async react(message: MessageRef, emoji: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.reactions.push({ message, emoji });
  }

  // ==================== Test Helper Methods ====================

  /**
   * Make every subsequent call reject with the given error (null to heal)
   */
  setFailure(error: Error | null): void {
    this.failure = error;
  }

  getPosts(): RecordedPost[] {
    return [...this.posts];
  }

  /** Texts posted to one thread, in order */
  getTexts(threadTs?: string): string[] {
    return this.posts
      .filter(post => threadTs === undefined || post.thread.threadTs === threadTs)
      .map(post => post.text);
  }

  getReactions(): RecordedReaction[] {
    return [...this.reactions];
  }

  clear(): void {
    this.posts.length = 0;
    this.reactions.length = 0;
    this.counter = 0;
    this.failure = null;
  }
}
