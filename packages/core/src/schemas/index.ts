import * as path from "path";

export { SchemaValidationCache, formatSchemaErrors } from "./schema_cache";

const SCHEMA_DIR = path.resolve(__dirname, "..", "..", "schemas");

/**
 * Absolute paths of the YAML schemas shipped with the package.
 */
export const SchemaFiles = {
  LeashConfig: path.join(SCHEMA_DIR, "leash_config.schema.yaml"),
  TaskMessage: path.join(SCHEMA_DIR, "task_message.schema.yaml"),
} as const;
