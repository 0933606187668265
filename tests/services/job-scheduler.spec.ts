import { afterEach, describe, expect, it } from 'vitest';
import { JobScheduler } from '../../src/services/job-scheduler.js';

describe('JobScheduler', () => {
  const scheduler = new JobScheduler();

  afterEach(() => {
    scheduler.stopAll();
  });

  it('registers jobs and runs them on demand', async () => {
    let runs = 0;
    scheduler.register({
      id: 'counter',
      cronExpression: '0 0 1 1 *',
      description: 'test job',
      handler: () => {
        runs += 1;
      },
    });

    await scheduler.runNow('counter');

    expect(runs).toBe(1);
    expect(scheduler.getJob('counter')).toMatchObject({ id: 'counter', status: 'idle', lastError: null });
  });

  it('rejects duplicate ids and invalid expressions', () => {
    scheduler.register({ id: 'dup', cronExpression: '0 0 1 1 *', description: '', handler: () => undefined });

    expect(() =>
      scheduler.register({ id: 'dup', cronExpression: '0 0 1 1 *', description: '', handler: () => undefined }),
    ).toThrow(/already registered/);
    expect(() =>
      scheduler.register({ id: 'bad', cronExpression: 'not a cron', description: '', handler: () => undefined }),
    ).toThrow(/Invalid cron expression/);
  });

  it('records handler failures on the job', async () => {
    scheduler.register({
      id: 'failing',
      cronExpression: '0 0 1 1 *',
      description: '',
      handler: async () => {
        throw new Error('boom');
      },
    });

    await scheduler.runNow('failing');

    expect(scheduler.getJob('failing')).toMatchObject({ status: 'error', lastError: 'boom' });
  });

  it('unregisters jobs', async () => {
    scheduler.register({ id: 'gone', cronExpression: '0 0 1 1 *', description: '', handler: () => undefined });

    expect(scheduler.unregister('gone')).toBe(true);
    expect(scheduler.unregister('gone')).toBe(false);
    await expect(scheduler.runNow('gone')).rejects.toThrow(/not registered/);
  });
});
