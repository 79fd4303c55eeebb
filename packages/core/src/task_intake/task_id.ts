import type { ThreadRef } from '../chat/chat_notifier';

/**
 * `{channel_id}_{ts}` of the message that started the task. For a
 * top-level mention the ts is also the thread's.
 */
export function formatTaskId(thread: ThreadRef): string {
  return `${thread.channelId}_${thread.threadTs}`;
}

/**
 * Inverse of formatTaskId. Channel ids never contain "_", so the first
 * one separates the parts.
 */
export function parseTaskId(taskId: string): ThreadRef | null {
  const separator = taskId.indexOf('_');
  if (separator <= 0 || separator === taskId.length - 1) return null;
  return { channelId: taskId.slice(0, separator), threadTs: taskId.slice(separator + 1) };
}
