import { randomUUID } from 'crypto';
import NodeCache from 'node-cache';
import logger from 'jet-logger';

import type { ValidationResult, ValidationRun } from '@src/types/validation';

/**
 * In-memory store of finished runs, so the table and CSV endpoints can be
 * called after the upload request returns. Entries expire after `ttlSeconds`.
 */
export class RunStore {
  private cache: NodeCache;
  private readonly ttlSeconds: number;

  constructor(ttlSeconds: number, maxRuns = 200) {
    this.ttlSeconds = ttlSeconds;
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      checkperiod: Math.min(ttlSeconds, 10 * 60),
      useClones: false,
      deleteOnExpire: true,
      maxKeys: maxRuns,
    });

    this.cache.on('expired', (key) => {
      logger.info(`⏰ Run expired: ${key}`);
    });
  }

  /**
   * Store a result under a fresh run id. When the store is full the oldest
   * run is evicted first.
   */
  save(masterFile: string, result: ValidationResult): ValidationRun {
    const run: ValidationRun = {
      ...result,
      runId: randomUUID(),
      createdAt: new Date().toISOString(),
      masterFile,
    };

    if (this.isFull()) {
      this.evictOldest();
    }

    this.cache.set(run.runId, run, this.ttlSeconds);
    logger.info(`💾 Stored run ${run.runId} (${run.summary.total} document(s))`);
    return run;
  }

  get(runId: string): ValidationRun | undefined {
    return this.cache.get<ValidationRun>(runId);
  }

  size(): number {
    return this.cache.keys().length;
  }

  /** Stops the expiry timer so the process can exit */
  close(): void {
    this.cache.flushAll();
    this.cache.close();
  }

  private isFull(): boolean {
    const { maxKeys } = this.cache.options;
    return maxKeys !== undefined && maxKeys > 0 && this.size() >= maxKeys;
  }

  private evictOldest(): void {
    let oldest: ValidationRun | undefined;
    for (const key of this.cache.keys()) {
      const run = this.cache.get<ValidationRun>(key);
      if (run && (!oldest || run.createdAt < oldest.createdAt)) {
        oldest = run;
      }
    }
    if (oldest) {
      this.cache.del(oldest.runId);
      logger.warn(`🗑️ Run store full, evicted run ${oldest.runId}`);
    }
  }
}
