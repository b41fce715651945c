import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FollowUpScheduler } from './followup.scheduler';

describe('FollowUpScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the task once after the delay', async () => {
    const scheduler = new FollowUpScheduler(45_000);
    const task = vi.fn(async () => undefined);

    scheduler.schedule('order-1', task);
    await vi.advanceTimersByTimeAsync(44_999);
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount).toBe(0);

    await vi.advanceTimersByTimeAsync(90_000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('replaces an earlier task for the same key', async () => {
    const scheduler = new FollowUpScheduler(1000);
    const first = vi.fn(async () => undefined);
    const second = vi.fn(async () => undefined);

    scheduler.schedule('order-1', first);
    await vi.advanceTimersByTimeAsync(500);
    scheduler.schedule('order-1', second);
    await vi.advanceTimersByTimeAsync(1000);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('cancels by key and all at once', async () => {
    const scheduler = new FollowUpScheduler(1000);
    const task = vi.fn(async () => undefined);

    scheduler.schedule('order-1', task);
    scheduler.schedule('order-2', task);
    expect(scheduler.cancel('order-1')).toBe(true);
    expect(scheduler.cancel('order-1')).toBe(false);
    scheduler.cancelAll();

    await vi.advanceTimersByTimeAsync(5000);
    expect(task).not.toHaveBeenCalled();
  });

  it('keeps running after a task rejects', async () => {
    const scheduler = new FollowUpScheduler(1000);
    const failing = vi.fn(async () => {
      throw new Error('boom');
    });
    const next = vi.fn(async () => undefined);

    scheduler.schedule('order-1', failing);
    scheduler.schedule('order-2', next);
    await vi.advanceTimersByTimeAsync(1000);

    expect(failing).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledTimes(1);
  });
});
