import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PaymentDispatchQueue } from './dispatch.queue';
import { KopoKopoStkResponse, PaymentError, StkPushSender } from '../../types/payment';

class RecordingSender implements StkPushSender {
  readonly calls: Array<{ orderId: string; phone: string; amount: number }> = [];
  failNext = false;

  async sendStkPush(orderId: string, phone: string, amount: number): Promise<KopoKopoStkResponse> {
    this.calls.push({ orderId, phone, amount });
    if (this.failNext) {
      this.failNext = false;
      throw new Error('provider down');
    }
    return { location: '' };
  }
}

describe('PaymentDispatchQueue', () => {
  let sender: RecordingSender;
  let queue: PaymentDispatchQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    sender = new RecordingSender();
    queue = new PaymentDispatchQueue(sender, { intervalMs: 2100, capacity: 3, dedupWindowMs: 60_000 });
  });

  afterEach(() => {
    queue.stop();
    vi.useRealTimers();
  });

  it('sends one request per interval in arrival order', async () => {
    queue.enqueue('o1', '254711111111', 100);
    queue.enqueue('o2', '254722222222', 200);
    queue.enqueue('o3', '254733333333', 300);
    queue.start();

    await vi.advanceTimersByTimeAsync(2099);
    expect(sender.calls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(sender.calls.map((call) => call.orderId)).toEqual(['o1']);

    await vi.advanceTimersByTimeAsync(4200);
    expect(sender.calls.map((call) => call.orderId)).toEqual(['o1', 'o2', 'o3']);
  });

  it('drops a second request for the same phone while one is outstanding', () => {
    expect(queue.enqueue('o1', '254711111111', 100)).toBe('queued');
    expect(queue.enqueue('o2', '+254711111111', 100)).toBe('deduplicated');
    expect(queue.enqueue('o3', '0711111111', 100)).toBe('deduplicated');
    expect(queue.size).toBe(1);
  });

  it('accepts the phone again once its request was sent', async () => {
    queue.enqueue('o1', '254711111111', 100);
    await queue.tick();

    expect(queue.enqueue('o2', '254711111111', 100)).toBe('queued');
  });

  it('clears the marker when the send fails', async () => {
    sender.failNext = true;
    queue.enqueue('o1', '254711111111', 100);
    await queue.tick();

    expect(sender.calls).toHaveLength(1);
    expect(queue.enqueue('o2', '254711111111', 100)).toBe('queued');
  });

  it('lets a request through after the window even if the earlier one is still queued', () => {
    queue.enqueue('o1', '254711111111', 100);
    vi.advanceTimersByTime(60_000);

    expect(queue.enqueue('o2', '254711111111', 100)).toBe('queued');
    expect(queue.size).toBe(2);
  });

  it('rejects with QUEUE_FULL at capacity without marking the phone', async () => {
    queue.enqueue('o1', '254711111111', 100);
    queue.enqueue('o2', '254722222222', 100);
    queue.enqueue('o3', '254733333333', 100);

    let error: unknown;
    try {
      queue.enqueue('o4', '254744444444', 100);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(PaymentError);
    expect(error).toHaveProperty('code', 'QUEUE_FULL');

    await queue.tick();
    expect(queue.enqueue('o5', '254744444444', 100)).toBe('queued');
  });

  it('does not overlap sends when the provider is slow', async () => {
    let release: () => void = () => undefined;
    const slowSender: StkPushSender = {
      sendStkPush: vi.fn(
        () =>
          new Promise<KopoKopoStkResponse>((resolve) => {
            release = () => resolve({ location: '' });
          })
      ),
    };
    const slowQueue = new PaymentDispatchQueue(slowSender, { intervalMs: 2100 });
    slowQueue.enqueue('o1', '254711111111', 100);
    slowQueue.enqueue('o2', '254722222222', 100);
    slowQueue.start();

    await vi.advanceTimersByTimeAsync(6300);
    expect(slowSender.sendStkPush).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(2100);
    expect(slowSender.sendStkPush).toHaveBeenCalledTimes(2);
    slowQueue.stop();
  });
});
