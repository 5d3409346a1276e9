/**
 * Archive Expired Events Job
 *
 * Periodically removes events whose date plus the retention window has
 * passed, from the synchronizer, the read projection and suggestions.
 */

import { BatchOutcome } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child({ component: 'ArchiveExpiredJob' });

export const ARCHIVE_INTERVAL_MS = 60 * 60 * 1000;

export interface Archiver {
  archiveExpired(now?: number): Promise<BatchOutcome>;
}

export class ArchiveExpiredJob {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly archiver: Archiver,
    private readonly intervalMs: number = ARCHIVE_INTERVAL_MS
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log.error({ error: errorMessage(error) }, 'Archive run failed');
      });
    }, this.intervalMs);
    this.timer.unref();
    log.info({ intervalMs: this.intervalMs }, 'Archive job scheduled');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One archival pass. Overlapping runs are skipped.
   */
  async runOnce(now?: number): Promise<BatchOutcome> {
    if (this.running) return { applied: [], failed: [] };
    this.running = true;
    try {
      return await this.archiver.archiveExpired(now);
    } finally {
      this.running = false;
    }
  }
}
