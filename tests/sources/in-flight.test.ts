import { describe, it, expect, vi } from 'vitest';
import { InFlight } from '../../src/sources/in-flight.js';

describe('InFlight', () => {
  it('should run a task once for concurrent callers of the same key', async () => {
    const inFlight = new InFlight<string>();
    const task = vi.fn(async () => '/cache/git/abc');

    const results = await Promise.all([inFlight.run('abc', task), inFlight.run('abc', task)]);

    expect(results).toEqual(['/cache/git/abc', '/cache/git/abc']);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should run tasks for different keys separately', async () => {
    const inFlight = new InFlight<string>();
    const task = vi.fn(async () => 'done');

    await Promise.all([inFlight.run('a', task), inFlight.run('b', task)]);

    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should start a new run after the previous one settled', async () => {
    const inFlight = new InFlight<string>();
    const task = vi.fn(async () => 'done');

    await inFlight.run('a', task);
    await inFlight.run('a', task);

    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should share a failure and forget it afterwards', async () => {
    const inFlight = new InFlight<string>();
    const failing = vi.fn(async (): Promise<string> => {
      throw new Error('clone failed');
    });

    const outcomes = await Promise.allSettled([inFlight.run('a', failing), inFlight.run('a', failing)]);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'rejected']);
    expect(failing).toHaveBeenCalledTimes(1);
    await expect(inFlight.run('a', async () => 'retried')).resolves.toBe('retried');
  });
});
