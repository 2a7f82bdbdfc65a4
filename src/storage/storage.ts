/**
 * Abstract Storage interface.
 *
 * Provider-agnostic key-value persistence for JSON-safe data.
 * The continuity store builds on it; tests swap in an in-memory map.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Save data with a key. Replaces the previous value as a whole.
   */
  save(key: string, data: unknown): Promise<void>;

  /**
   * Check if a key exists.
   */
  exists(key: string): Promise<boolean>;
}
