/**
 * Chat boundary - interface only.
 * For the in-memory implementation, use @leash/core/memory.
 */
export type { ChatNotifier, ThreadRef, MessageRef, PostOptions } from './chat_notifier';
