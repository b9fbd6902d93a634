import { describe, it, expect } from 'vitest';
import { Deadline } from '../../../src/utils/deadline.js';
import { DeadlineExceededError } from '../../../src/errors.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Deadline', () => {
  it('starts unexpired with its full budget', () => {
    const deadline = new Deadline(1_000);
    expect(deadline.isExpired()).toBe(false);
    expect(deadline.remainingMs()).toBeGreaterThan(900);
    expect(deadline.remainingMs()).toBeLessThanOrEqual(1_000);
    expect(() => deadline.throwIfExpired()).not.toThrow();
    deadline.dispose();
  });

  it('aborts with DeadlineExceededError when the budget runs out', async () => {
    const deadline = new Deadline(10);
    await sleep(30);
    expect(deadline.isExpired()).toBe(true);
    expect(deadline.remainingMs()).toBe(0);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceededError);
    expect(() => deadline.throwIfExpired()).toThrow('Request deadline of 10ms exceeded');
  });

  it('clamps a negative budget to zero', () => {
    const deadline = new Deadline(-5);
    expect(deadline.budgetMs).toBe(0);
    deadline.dispose();
  });

  it('propagates a parent abort and its reason', () => {
    const controller = new AbortController();
    const deadline = new Deadline(1_000, controller.signal);
    const reason = new Error('client disconnected');

    controller.abort(reason);

    expect(deadline.isExpired()).toBe(true);
    expect(deadline.signal.reason).toBe(reason);
    deadline.dispose();
  });

  it('starts aborted when the parent already is', () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    const deadline = new Deadline(1_000, controller.signal);
    expect(() => deadline.throwIfExpired()).toThrow('gone');
    deadline.dispose();
  });

  it('does not fire after dispose', async () => {
    const deadline = new Deadline(10);
    deadline.dispose();
    await sleep(30);
    expect(deadline.isExpired()).toBe(false);
  });

  describe('child', () => {
    it('takes the smaller of its own budget and what is left', () => {
      const parent = new Deadline(100);
      const short = parent.child(20);
      const long = parent.child(10_000);

      expect(short.budgetMs).toBe(20);
      expect(long.budgetMs).toBeLessThanOrEqual(100);

      short.dispose();
      long.dispose();
      parent.dispose();
    });

    it('aborts with the parent', async () => {
      const parent = new Deadline(10);
      const child = parent.child(10_000);
      await sleep(30);

      expect(child.isExpired()).toBe(true);
      expect(child.signal.reason).toBeInstanceOf(DeadlineExceededError);
      child.dispose();
    });

    it('expiring does not abort the parent', async () => {
      const parent = new Deadline(1_000);
      const child = parent.child(10);
      await sleep(30);

      expect(child.isExpired()).toBe(true);
      expect(parent.isExpired()).toBe(false);
      child.dispose();
      parent.dispose();
    });
  });
});
