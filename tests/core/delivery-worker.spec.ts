import { beforeEach, describe, expect, it } from 'vitest';
import { DeliveryWorker, MAX_RETRIES_REASON, SHUTDOWN_REASON } from '../../src/core/delivery-worker.js';
import { RateLimiter } from '../../src/core/rate-limiter.js';
import { StatsTracker } from '../../src/core/stats-tracker.js';
import {
  PermanentDeliveryError,
  RateLimitSignal,
  TransientDeliveryError,
} from '../../src/core/errors.js';
import type { DeliveryOutcome, ForwardJob } from '../../src/types/relay.js';
import { FakeTransport, makeMessage } from '../harness/fake-transport.js';
import { MemoryRelayStore } from '../harness/memory-store.js';

describe('DeliveryWorker', () => {
  let clock = 0;
  let transport: FakeTransport;
  let limiter: RateLimiter;
  let stats: StatsTracker;
  let worker: DeliveryWorker;
  const signal = new AbortController().signal;

  function newJob(): ForwardJob {
    return {
      message: makeMessage('50% off sale!'),
      matchedKeywords: ['sale'],
      attempts: 0,
      transientFailures: 0,
      notBefore: 0,
    };
  }

  beforeEach(() => {
    clock = 0;
    transport = new FakeTransport();
    limiter = new RateLimiter({ minIntervalMs: 0, now: () => clock });
    stats = new StatsTracker(new MemoryRelayStore());
    stats.start();
    worker = new DeliveryWorker(transport, limiter, stats, {
      destinationId: '@dest',
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 60_000,
    });
  });

  it('delivers to the destination and counts the forward', async () => {
    const job = newJob();
    const outcome = await worker.process(job, signal);

    expect(outcome).toEqual({ kind: 'delivered' });
    expect(transport.sent).toEqual([{ destinationId: '@dest', message: job.message }]);
    expect(stats.snapshot().forwarded).toBe(1);
  });

  it('abandons after the retry budget with a single failure count', async () => {
    for (let i = 0; i < 3; i++) {
      transport.sendScripts.push(() => {
        throw new TransientDeliveryError('bad gateway');
      });
    }

    const job = newJob();
    const outcomes: DeliveryOutcome[] = [];
    for (let i = 0; i < 3; i++) {
      outcomes.push(await worker.process(job, signal));
    }

    expect(outcomes).toEqual([
      { kind: 'retry_later', delayMs: 1000, cause: 'transient' },
      { kind: 'retry_later', delayMs: 2000, cause: 'transient' },
      { kind: 'abandoned', reason: MAX_RETRIES_REASON },
    ]);
    expect(job.attempts).toBe(3);
    expect(stats.snapshot().failed).toBe(1);
    expect(stats.snapshot().forwarded).toBe(0);
    expect(stats.snapshot().lastError).toBe(MAX_RETRIES_REASON);
  });

  it('treats unclassified errors as transient', async () => {
    transport.sendScripts.push(() => {
      throw new Error('ECONNRESET');
    });

    const outcome = await worker.process(newJob(), signal);
    expect(outcome).toEqual({ kind: 'retry_later', delayMs: 1000, cause: 'transient' });
    expect(stats.snapshot().failed).toBe(0);
  });

  it('honors flood control then delivers', async () => {
    transport.sendScripts.push(() => {
      throw new RateLimitSignal(30_000);
    });

    const job = newJob();
    const first = await worker.process(job, signal);
    expect(limiter.reserve()).toBe(30_000);

    clock += 30_000;
    const second = await worker.process(job, signal);

    expect([first, second]).toEqual([
      { kind: 'retry_later', delayMs: 30_000, cause: 'rate_limited' },
      { kind: 'delivered' },
    ]);
    expect(stats.snapshot()).toMatchObject({ forwarded: 1, failed: 0 });
  });

  it('does not consume the retry budget on flood control', async () => {
    for (let i = 0; i < 5; i++) {
      transport.sendScripts.push(() => {
        throw new RateLimitSignal(0);
      });
    }

    const job = newJob();
    for (let i = 0; i < 5; i++) {
      expect((await worker.process(job, signal)).kind).toBe('retry_later');
    }
    expect(stats.snapshot().failed).toBe(0);
  });

  it('keeps the full transient budget after flood control retries', async () => {
    for (let i = 0; i < 3; i++) {
      transport.sendScripts.push(() => {
        throw new RateLimitSignal(0);
      });
    }
    for (let i = 0; i < 3; i++) {
      transport.sendScripts.push(() => {
        throw new TransientDeliveryError('bad gateway');
      });
    }

    const job = newJob();
    const outcomes: DeliveryOutcome[] = [];
    for (let i = 0; i < 6; i++) {
      outcomes.push(await worker.process(job, signal));
    }

    expect(outcomes.slice(0, 3).map((outcome) => outcome.kind)).toEqual(['retry_later', 'retry_later', 'retry_later']);
    expect(outcomes.slice(3)).toEqual([
      { kind: 'retry_later', delayMs: 1000, cause: 'transient' },
      { kind: 'retry_later', delayMs: 2000, cause: 'transient' },
      { kind: 'abandoned', reason: MAX_RETRIES_REASON },
    ]);
    expect(job.attempts).toBe(6);
    expect(job.transientFailures).toBe(3);
    expect(stats.snapshot().failed).toBe(1);
  });

  it('abandons permanent failures without retrying', async () => {
    transport.sendScripts.push(() => {
      throw new PermanentDeliveryError('chat not found');
    });

    const job = newJob();
    const outcome = await worker.process(job, signal);

    expect(outcome).toEqual({ kind: 'abandoned', reason: 'chat not found' });
    expect(job.attempts).toBe(1);
    expect(stats.snapshot().failed).toBe(1);
  });

  it('abandons with the shutdown reason when aborted before sending', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await worker.process(newJob(), controller.signal);
    expect(outcome).toEqual({ kind: 'abandoned', reason: SHUTDOWN_REASON });
    expect(transport.sendAttempts).toEqual([]);
  });

  it('abandons with the shutdown reason when aborted while waiting for a slot', async () => {
    limiter.notifyBackoff(60_000);
    const controller = new AbortController();

    const pending = worker.process(newJob(), controller.signal);
    controller.abort();

    expect(await pending).toEqual({ kind: 'abandoned', reason: SHUTDOWN_REASON });
    expect(transport.sendAttempts).toEqual([]);
    expect(stats.snapshot().failed).toBe(1);
  });
});
