export { MemoryChatNotifier } from './memory_chat_notifier';
export type { RecordedPost, RecordedReaction } from './memory_chat_notifier';
