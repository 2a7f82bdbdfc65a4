import type { Logger } from '../types/index.js';
import { PersistenceReadError, PersistenceWriteError, errorMessage } from '../core/errors.js';
import { withRetry, type RetryOptions } from '../core/retry.js';
import { StateLock } from '../core/state-lock.js';
import type { Storage } from './storage.js';
import { decodeSnapshot, encodeSnapshot, type ContinuitySnapshot } from './snapshot.js';

/**
 * Continuity store port.
 *
 * The mind only needs to save an image of itself and get it back.
 */
export interface ContinuityStore {
  /**
   * Persist a snapshot, replacing the previous one.
   * @throws PersistenceWriteError when the write ultimately fails
   */
  save(snapshot: ContinuitySnapshot): Promise<void>;

  /**
   * Load the last snapshot.
   * @returns null when nothing was saved yet
   * @throws PersistenceReadError when stored data is unreadable or invalid
   */
  load(): Promise<ContinuitySnapshot | null>;
}

/**
 * Configuration for JsonContinuityStore.
 */
export interface JsonContinuityStoreConfig {
  /** Storage key, e.g. `mind.<agentId>.v1` */
  key: string;
  /** Retry policy for writes */
  retry: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs'>;
  /** Per-attempt write timeout in ms, 0 = none */
  writeTimeoutMs: number;
}

const DEFAULT_CONFIG: Omit<JsonContinuityStoreConfig, 'key'> = {
  retry: { maxAttempts: 3, baseDelayMs: 100 },
  writeTimeoutMs: 0,
};

/**
 * Storage key for an agent's snapshot.
 */
export function continuityKey(agentId: string): string {
  return `mind.${agentId}.v1`;
}

/**
 * ContinuityStore over a key-value Storage.
 *
 * Writes are serialized so a slow retry never lets an older snapshot land
 * after a newer one.
 */
export class JsonContinuityStore implements ContinuityStore {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly config: JsonContinuityStoreConfig;
  private readonly writes = new StateLock();

  constructor(
    storage: Storage,
    logger: Logger,
    config: Partial<JsonContinuityStoreConfig> & Pick<JsonContinuityStoreConfig, 'key'>
  ) {
    this.storage = storage;
    this.logger = logger.child({ component: 'continuity-store' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  save(snapshot: ContinuitySnapshot): Promise<void> {
    const record = encodeSnapshot(snapshot);

    return this.writes.run(async () => {
      try {
        await withRetry(() => this.storage.save(this.config.key, record), {
          ...this.config.retry,
          timeoutMs: this.config.writeTimeoutMs,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn(
              { attempt, delayMs, error: errorMessage(error) },
              'Snapshot write failed, retrying'
            );
          },
        });
      } catch (error) {
        throw new PersistenceWriteError(`Snapshot write failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      this.logger.debug(
        { key: this.config.key, cycleCount: snapshot.cycleCount },
        'Snapshot persisted'
      );
    });
  }

  async load(): Promise<ContinuitySnapshot | null> {
    let data: unknown;
    try {
      data = await this.storage.load(this.config.key);
    } catch (error) {
      throw new PersistenceReadError(`Snapshot read failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (data === null) {
      return null;
    }
    return decodeSnapshot(data);
  }
}

/**
 * Factory function for creating a JSON continuity store.
 */
export function createContinuityStore(
  storage: Storage,
  logger: Logger,
  config: Partial<JsonContinuityStoreConfig> & Pick<JsonContinuityStoreConfig, 'key'>
): JsonContinuityStore {
  return new JsonContinuityStore(storage, logger, config);
}
