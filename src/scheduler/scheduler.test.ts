import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import * as cron from 'node-cron';
import { JobScheduler } from './scheduler.js';
import { finishCronCheckIn, startCronCheckIn } from '../utils/sentry.js';
import { logger } from '../utils/logger.js';

vi.mock('node-cron', () => ({
  validate: vi.fn(),
  schedule: vi.fn(),
}));

vi.mock('../utils/sentry.js', () => ({
  startCronCheckIn: vi.fn(() => 'check-in-1'),
  finishCronCheckIn: vi.fn(),
}));

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('JobScheduler', () => {
  let stopTask: Mock;
  let tick: () => Promise<void>;

  beforeEach(() => {
    vi.clearAllMocks();
    stopTask = vi.fn();
    (cron.validate as Mock).mockReturnValue(true);
    (cron.schedule as Mock).mockImplementation((_expression: string, callback: () => Promise<void>) => {
      tick = callback;
      return { stop: stopTask };
    });
  });

  it('rejects an invalid cron expression', async () => {
    (cron.validate as Mock).mockReturnValue(false);
    const scheduler = new JobScheduler(vi.fn(), { schedule: 'every day' });

    await expect(scheduler.start()).rejects.toThrow('Invalid cron expression: every day');
    expect(scheduler.isSchedulerRunning()).toBe(false);
  });

  it('runs the job on every tick of the default daily schedule', async () => {
    const job = vi.fn(async () => undefined);
    const scheduler = new JobScheduler(job);

    await scheduler.start();
    expect(cron.schedule).toHaveBeenCalledWith('0 8 * * *', expect.any(Function));
    expect(job).not.toHaveBeenCalled();

    await tick();

    expect(job).toHaveBeenCalledTimes(1);
    expect(startCronCheckIn).toHaveBeenCalledWith({
      monitorSlug: 'multi-model-scrape',
      schedule: '0 8 * * *',
      maxRuntimeMinutes: 180,
      checkinMarginMinutes: 10,
    });
    expect(finishCronCheckIn).toHaveBeenCalledWith('check-in-1', 'multi-model-scrape', 'ok');
  });

  it('runs immediately when runOnStart is set', async () => {
    const job = vi.fn(async () => undefined);

    await new JobScheduler(job, { runOnStart: true }).start();

    expect(job).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: () => void = () => undefined;
    const job = vi.fn(() => new Promise<void>(resolve => {
      finish = () => resolve();
    }));
    const scheduler = new JobScheduler(job);
    await scheduler.start();

    const running = tick();
    expect(scheduler.isJobRunning()).toBe(true);

    await tick();
    await scheduler.runNow();
    expect(job).toHaveBeenCalledTimes(1);

    finish();
    await running;
    expect(scheduler.isJobRunning()).toBe(false);
  });

  it('reports a failed run and keeps the schedule alive', async () => {
    const job = vi.fn(async () => {
      throw new Error('store unreachable');
    });
    const scheduler = new JobScheduler(job);
    await scheduler.start();

    await expect(tick()).resolves.toBeUndefined();
    expect(finishCronCheckIn).toHaveBeenCalledWith('check-in-1', 'multi-model-scrape', 'error');
    expect(logger.error).toHaveBeenCalledWith('Job failed (scheduled)', { error: 'store unreachable' });

    await expect(scheduler.runNow()).rejects.toThrow('store unreachable');
    expect(scheduler.isSchedulerRunning()).toBe(true);
  });

  it('stops the cron task', async () => {
    const scheduler = new JobScheduler(vi.fn(async () => undefined));
    await scheduler.start();

    scheduler.stop();

    expect(stopTask).toHaveBeenCalledTimes(1);
    expect(scheduler.isSchedulerRunning()).toBe(false);
  });
});
