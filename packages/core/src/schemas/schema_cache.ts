import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as yaml from "js-yaml";

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 *
 * Parsed YAML documents are kept per path; AJV keeps its own compiled
 * function per schema object, so repeated lookups return the same validator.
 */
export class SchemaValidationCache {
  private static schemas = new Map<string, SchemaObject>();
  private static ajv: Ajv | null = null;

  private static instance(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  private static load(schemaPath: string): SchemaObject {
    const cached = this.schemas.get(schemaPath);
    if (cached) {
      return cached;
    }

    const schema = yaml.load(fs.readFileSync(schemaPath, "utf8"));
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema file ${schemaPath} does not contain a schema object`);
    }
    this.schemas.set(schemaPath, schema);
    return schema;
  }

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator<T = unknown>(schemaPath: string): ValidateFunction<T> {
    return this.instance().compile<T>(this.load(schemaPath));
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemas.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.schemas.size,
      schemasLoaded: Array.from(this.schemas.keys())
    };
  }
}

/**
 * Renders AJV errors as "path message" lines, "/" standing for the root.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(error => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`);
}
