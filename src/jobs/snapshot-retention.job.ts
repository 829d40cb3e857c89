import { TIME } from '../constants';
import { AcademicRepository } from '../repositories/interfaces/academic.repository';
import { logger } from '../utils/logger';

export interface SnapshotRetentionOptions {
  /** Snapshots older than this are pruned; 0 disables the job */
  retentionDays: number;
  intervalMs: number;
  batchSize: number;
  batchDelayMs: number;
  warningThresholdMs: number;
  now?: () => number;
}

/**
 * Snapshot Retention Job
 *
 * Prunes old snapshot history so the append-only table stays bounded.
 * The newest snapshot of each (owner, kind, scope) survives for fallback reads.
 * Runs on an interval with overlap prevention; batched deletes.
 */
export class SnapshotRetentionJob {
  private intervalId?: NodeJS.Timeout | undefined;
  private isRunning = false;
  private currentExecution: Promise<number> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly repository: AcademicRepository,
    private readonly options: SnapshotRetentionOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.options.retentionDays > 0;
  }

  /**
   * Start the job; a no-op when retention is disabled
   */
  start(): void {
    if (!this.enabled) {
      logger.debug('SnapshotRetentionJob', 'Snapshot retention disabled');
      return;
    }
    if (this.intervalId) {
      logger.warn('SnapshotRetentionJob', 'Snapshot retention job already running');
      return;
    }

    logger.debug('SnapshotRetentionJob', 'Starting snapshot retention job', {
      intervalMs: this.options.intervalMs,
      retentionDays: this.options.retentionDays,
    });

    // Run immediately on start
    void this.runOnce();

    this.intervalId = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.intervalId.unref?.();
  }

  /**
   * Stop the job and wait for the current execution to complete
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    if (this.currentExecution) {
      logger.debug('SnapshotRetentionJob', 'Waiting for current pruning run to finish...');
      await this.currentExecution;
    }

    logger.debug('SnapshotRetentionJob', 'Snapshot retention job stopped');
  }

  /**
   * Prune once; resolves with the number of deleted snapshots.
   * Failures are logged and resolve to 0.
   */
  runOnce(): Promise<number> {
    if (this.isRunning) {
      logger.warn('SnapshotRetentionJob', 'Snapshot pruning already in progress, skipping');
      return this.currentExecution ?? Promise.resolve(0);
    }

    this.isRunning = true;

    const execution = (async () => {
      const startTime = this.now();
      const cutoff = new Date(startTime - this.options.retentionDays * TIME.MS_PER_DAY);

      try {
        const deleted = await this.repository.pruneSnapshots(
          cutoff,
          this.options.batchSize,
          this.options.batchDelayMs
        );
        const duration = this.now() - startTime;

        logger.debug('SnapshotRetentionJob', 'Snapshot pruning completed', {
          deleted,
          cutoff: cutoff.toISOString(),
          durationMs: duration,
        });

        // Alert if pruning took too long
        if (duration > this.options.warningThresholdMs) {
          logger.warn('SnapshotRetentionJob', 'Snapshot pruning took longer than expected', {
            durationMs: duration,
            thresholdMs: this.options.warningThresholdMs,
          });
        }
        return deleted;
      } catch (error) {
        logger.error('SnapshotRetentionJob', 'Snapshot pruning failed', error);
        return 0;
      } finally {
        this.isRunning = false;
        this.currentExecution = null;
      }
    })();

    this.currentExecution = execution;
    return execution;
  }

  getStatus(): { isRunning: boolean; isScheduled: boolean; enabled: boolean } {
    return {
      isRunning: this.isRunning,
      isScheduled: !!this.intervalId,
      enabled: this.enabled,
    };
  }
}
