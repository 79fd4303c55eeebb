/**
 * ConfigStore Interface
 *
 * Abstraction over where the raw Leash configuration lives. Stores return
 * the parsed document untouched; ConfigManager owns validation and defaults.
 *
 * Implementations:
 * - FsConfigStore: JSON file on disk (default `leash.config.json`)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load the raw configuration document
   *
   * @returns Parsed document, or null if not found/invalid JSON
   */
  loadConfig(): Promise<unknown>;

  /**
   * Human-readable location, used in error messages
   */
  describe(): string;
}
