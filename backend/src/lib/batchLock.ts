/**
 * Exclusive write lock for one reconciliation batch. Two batches must never
 * interleave: the fuzzy tier needs a consistent snapshot of the catalog.
 */

import { randomUUID } from 'crypto';
import type { Redis } from 'ioredis';
import { LoadError, describeError } from './errors.js';
import { logger } from './logger.js';

export interface LockHandle {
  release(): Promise<void>;
}

export interface BatchLock {
  /** Resolves to null when another batch holds the lock */
  acquire(): Promise<LockHandle | null>;
}

/**
 * Take the lock or fail the run with a LoadError
 */
export async function acquireBatchLock(lock: BatchLock): Promise<LockHandle> {
  let handle: LockHandle | null;
  try {
    handle = await lock.acquire();
  } catch (error) {
    throw new LoadError(`Could not acquire batch lock: ${describeError(error)}`, { cause: error });
  }
  if (!handle) {
    throw new LoadError('Another batch is already reconciling the catalog');
  }
  return handle;
}

/**
 * Guards batches started from the same process
 */
export class InProcessBatchLock implements BatchLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<LockHandle | null> {
    if (this.held) return null;
    this.held = true;
    let released = false;
    return {
      release: async () => {
        if (released) return;
        released = true;
        this.held = false;
      },
    };
  }
}

// Delete the key only if it still carries our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

// Push the expiry out only while the key still carries our token
const RENEW_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
end
return 0
`;

/**
 * Cross-process lock: SET NX PX with a random token, compare-and-delete on
 * release. While held, the expiry is renewed every third of the TTL, so a
 * run waiting on an operator keeps the lock; the TTL only bounds how long a
 * crashed importer can block others.
 */
export class RedisBatchLock implements BatchLock {
  constructor(
    private readonly redis: Redis,
    private readonly ttlMs: number,
    private readonly key = 'venue-catalog:batch-lock'
  ) {}

  async acquire(): Promise<LockHandle | null> {
    const token = randomUUID();
    const result = await this.redis.set(this.key, token, 'PX', this.ttlMs, 'NX');
    if (result !== 'OK') return null;

    const renewal = setInterval(() => {
      this.redis
        .eval(RENEW_SCRIPT, 1, this.key, token, this.ttlMs)
        .then((renewed) => {
          if (renewed !== 1) {
            clearInterval(renewal);
            logger.warn('Batch lock expired while held', { key: this.key });
          }
        })
        .catch((error: unknown) => {
          logger.warn('Batch lock renewal failed', { key: this.key, error: describeError(error) });
        });
    }, Math.max(1, Math.floor(this.ttlMs / 3)));
    renewal.unref();

    let released = false;
    return {
      release: async () => {
        if (released) return;
        released = true;
        clearInterval(renewal);
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, token);
      },
    };
  }
}
