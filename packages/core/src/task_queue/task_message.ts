import { SchemaFiles, SchemaValidationCache, formatSchemaErrors } from '../schemas';
import { InvalidTaskMessageError } from './errors';
import type { TaskMessage } from './task_queue.types';

/**
 * Throws InvalidTaskMessageError unless `value` matches task_message.schema.yaml.
 */
export function validateTaskMessage(value: unknown): asserts value is TaskMessage {
  const validator = SchemaValidationCache.getValidator<TaskMessage>(SchemaFiles.TaskMessage);
  if (!validator(value)) {
    throw new InvalidTaskMessageError(formatSchemaErrors(validator.errors));
  }
}

/**
 * Parses a serialized message read back from a queue.
 */
export function parseTaskMessage(raw: string): TaskMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new InvalidTaskMessageError(['/ is not valid JSON']);
  }
  validateTaskMessage(value);
  return value;
}
