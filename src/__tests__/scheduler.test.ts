import { describe, it, expect, vi } from 'vitest';
import { PhaseFailedError, PhaseScheduler, planPhases } from '../core/scheduler';
import { Semaphore } from '../utils/semaphore';
import { ErrorCode } from '../utils/errors';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const parents: Record<string, string> = {
  activityTags: 'activities',
  activityAttachments: 'activities',
  ticketActivities: 'tickets',
};
const parentOf = (name: string): string | undefined => parents[name];

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('planPhases', () => {
  it('puts the identity family and all dependents in phase 2', () => {
    const plan = planPhases(
      ['users', 'activities', 'activityTags', 'tickets', 'ticketActivities'],
      parentOf,
      'activities'
    );

    expect(plan).toEqual({
      phase1: ['users', 'tickets'],
      phase2: ['activities', 'activityTags', 'ticketActivities'],
    });
  });

  it('still defers dependents without an identity source', () => {
    expect(planPhases(['tickets', 'ticketActivities'], parentOf)).toEqual({
      phase1: ['tickets'],
      phase2: ['ticketActivities'],
    });
  });
});

describe('PhaseScheduler', () => {
  it('finishes phase 1 before any phase 2 task starts', async () => {
    const events: string[] = [];
    const scheduler = new PhaseScheduler<string>(new Semaphore(3));

    await scheduler.run(
      { phase1: ['users', 'tickets'], phase2: ['activities', 'activityTags'] },
      parentOf,
      async (name) => {
        events.push(`start:${name}`);
        await delay(name === 'users' ? 20 : 1);
        events.push(`end:${name}`);
        return name;
      }
    );

    const lastPhase1End = Math.max(events.indexOf('end:users'), events.indexOf('end:tickets'));
    expect(events.indexOf('start:activities')).toBeGreaterThan(lastPhase1End);
    expect(events.indexOf('start:activityTags')).toBeGreaterThan(events.indexOf('end:activities'));
  });

  it('runs a dependent listed before its parent with a single endpoint slot', async () => {
    const order: string[] = [];
    const scheduler = new PhaseScheduler<string>(new Semaphore(1));

    const results = await scheduler.run(
      { phase1: [], phase2: ['activityTags', 'activities'] },
      parentOf,
      async (name) => {
        order.push(name);
        return name.toUpperCase();
      }
    );

    expect(order).toEqual(['activities', 'activityTags']);
    expect(results.get('activityTags')).toBe('ACTIVITYTAGS');
  });

  it('never runs more endpoints at once than the limiter allows', async () => {
    let active = 0;
    let peak = 0;
    const scheduler = new PhaseScheduler<void>(new Semaphore(2));

    await scheduler.run({ phase1: ['a', 'b', 'c', 'd', 'e'], phase2: [] }, parentOf, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(2);
      active -= 1;
    });

    expect(peak).toBe(2);
  });

  it('lets phase 1 settle and skips phase 2 after a failure', async () => {
    const finished: string[] = [];
    const scheduler = new PhaseScheduler<void>(new Semaphore(3));

    const run = scheduler.run(
      { phase1: ['users', 'tickets'], phase2: ['activities'] },
      parentOf,
      async (name) => {
        if (name === 'users') {
          throw new Error('boom');
        }
        await delay(5);
        finished.push(name);
      }
    );

    await expect(run).rejects.toBeInstanceOf(PhaseFailedError);
    await expect(run).rejects.toMatchObject({ phase: 1, code: ErrorCode.EXTRACTION_ERROR });
    expect(finished).toEqual(['tickets']);
  });

  it('fails a dependent whose parent failed', async () => {
    const scheduler = new PhaseScheduler<void>(new Semaphore(2));
    const task = vi.fn(async (name: string) => {
      if (name === 'activities') {
        throw new Error('boom');
      }
    });

    const error = await scheduler
      .run({ phase1: [], phase2: ['activities', 'activityTags'] }, parentOf, task)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PhaseFailedError);
    expect(error).toMatchObject({
      message: 'Extraction phase 2 failed: activities (boom); activityTags (Parent endpoint "activities" of "activityTags" failed)',
    });
    expect(task).toHaveBeenCalledTimes(1);
  });
});
