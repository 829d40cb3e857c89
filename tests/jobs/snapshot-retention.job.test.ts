import { describe, expect, it, vi } from 'vitest';
import { SnapshotRetentionJob } from '../../src/jobs/snapshot-retention.job';
import { MemoryAcademicRepository } from '../../src/repositories/implementations/memory-academic.repository';
import { createClock } from '../support/clock';

function createJob(retentionDays = 30) {
  const clock = createClock();
  const repository = new MemoryAcademicRepository(clock.now);
  const job = new SnapshotRetentionJob(repository, {
    retentionDays,
    intervalMs: 60_000,
    batchSize: 500,
    batchDelayMs: 0,
    warningThresholdMs: 5_000,
    now: clock.now,
  });
  return { clock, repository, job };
}

describe('SnapshotRetentionJob', () => {
  it('prunes snapshots older than the retention window', async () => {
    const { clock, repository, job } = createJob(30);
    const prune = vi.spyOn(repository, 'pruneSnapshots').mockResolvedValue(3);

    expect(await job.runOnce()).toBe(3);
    expect(prune).toHaveBeenCalledWith(new Date(clock.now() - 30 * 86_400_000), 500, 0);
  });

  it('shares a running execution instead of overlapping', async () => {
    const { repository, job } = createJob();
    let finish: (count: number) => void = () => undefined;
    const prune = vi.spyOn(repository, 'pruneSnapshots').mockReturnValue(
      new Promise<number>(resolve => {
        finish = resolve;
      })
    );

    const first = job.runOnce();
    const second = job.runOnce();
    expect(job.getStatus().isRunning).toBe(true);
    finish(4);

    expect(await first).toBe(4);
    expect(await second).toBe(4);
    expect(prune).toHaveBeenCalledTimes(1);
    expect(job.getStatus().isRunning).toBe(false);
  });

  it('resolves to zero when pruning fails', async () => {
    const { repository, job } = createJob();
    vi.spyOn(repository, 'pruneSnapshots').mockRejectedValue(new Error('db down'));

    expect(await job.runOnce()).toBe(0);
  });

  it('schedules on start and stops cleanly', async () => {
    const { repository, job } = createJob();
    const prune = vi.spyOn(repository, 'pruneSnapshots').mockResolvedValue(0);

    job.start();
    expect(job.getStatus()).toEqual({ isRunning: true, isScheduled: true, enabled: true });

    await job.stop();
    expect(prune).toHaveBeenCalledTimes(1);
    expect(job.getStatus()).toEqual({ isRunning: false, isScheduled: false, enabled: true });
  });

  it('does nothing when retention is disabled', () => {
    const { repository, job } = createJob(0);
    const prune = vi.spyOn(repository, 'pruneSnapshots');

    job.start();

    expect(prune).not.toHaveBeenCalled();
    expect(job.getStatus()).toEqual({ isRunning: false, isScheduled: false, enabled: false });
  });
});
