import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  InMemorySessionStore,
  RedisSessionStore,
  SessionRedisClient,
  deserializeSession,
  serializeSession,
} from './session.service';
import { DialogueState, Session, createSession } from '../types/session';

class FakeRedis implements SessionRedisClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<unknown> {
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async del(key: string): Promise<unknown> {
    this.values.delete(key);
    return 1;
  }
}

const sampleSession: Session = {
  state: DialogueState.CONFIRM_ORDER,
  currentCategory: 'Gin',
  currentProductId: '',
  cart: [{ productId: 'g1', quantity: 2, name: 'Beefeater', price: 450 }],
  pendingOrderId: 'order-1',
};

describe('session serialization', () => {
  it('stores snake_case fields', () => {
    expect(JSON.parse(serializeSession(sampleSession))).toEqual({
      state: 'CONFIRM_ORDER',
      current_category: 'Gin',
      current_product_id: '',
      cart: [{ product_id: 'g1', quantity: 2, name: 'Beefeater', price: 450 }],
      pending_order_id: 'order-1',
    });
  });

  it('reads back what it wrote', () => {
    expect(deserializeSession(serializeSession(sampleSession))).toEqual(sampleSession);
  });

  it('maps an unknown state to START and drops malformed cart lines', () => {
    const session = deserializeSession(
      JSON.stringify({ state: 'AWAITING_TABLE', cart: [{ product_id: 'x', quantity: 0 }] })
    );
    expect(session).toEqual(createSession());
  });

  it('returns null for unreadable data', () => {
    expect(deserializeSession('{not json')).toBeNull();
    expect(deserializeSession('"text"')).toBeNull();
  });
});

describe('RedisSessionStore', () => {
  it('writes under the session prefix with the configured TTL', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis, 7200);

    await store.set('254712345678', sampleSession);

    expect(redis.ttls.get('session:254712345678')).toBe(7200);
    expect(await store.get('254712345678')).toEqual(sampleSession);

    await store.delete('254712345678');
    expect(await store.get('254712345678')).toBeNull();
  });

  it('propagates client failures', async () => {
    const redis = new FakeRedis();
    vi.spyOn(redis, 'get').mockRejectedValue(new Error('connection refused'));
    const store = new RedisSessionStore(redis);

    await expect(store.get('254712345678')).rejects.toThrow('connection refused');
  });
});

describe('InMemorySessionStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('expires sessions after the TTL and slides it on write', async () => {
    vi.useFakeTimers();
    const store = new InMemorySessionStore(60);

    await store.set('254712345678', sampleSession);
    vi.advanceTimersByTime(59_000);
    await store.set('254712345678', sampleSession);
    vi.advanceTimersByTime(59_000);
    expect(await store.get('254712345678')).toEqual(sampleSession);

    vi.advanceTimersByTime(2_000);
    expect(await store.get('254712345678')).toBeNull();
  });

  it('returns copies so callers cannot mutate stored state', async () => {
    const store = new InMemorySessionStore();
    await store.set('254712345678', sampleSession);

    const loaded = await store.get('254712345678');
    loaded?.cart.push({ productId: 'x', quantity: 1, name: 'X', price: 1 });

    expect((await store.get('254712345678'))?.cart).toHaveLength(1);
  });
});
