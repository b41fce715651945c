import logger from '../config/logger';
import { CartItem, Session, parseDialogueState } from '../types/session';

const SESSION_KEY_PREFIX = 'session:';
export const DEFAULT_SESSION_TTL_SECONDS = 7200;

/**
 * Conversation sessions keyed by customer phone, refreshed on every write
 */
export interface SessionStore {
  get(phone: string): Promise<Session | null>;
  set(phone: string, session: Session): Promise<void>;
  delete(phone: string): Promise<void>;
}

/**
 * The subset of the Redis client the store uses
 */
export interface SessionRedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCartItem(value: unknown): CartItem | null {
  if (!isRecord(value)) {
    return null;
  }
  const { product_id: productId, quantity, name, price } = value;
  if (
    typeof productId !== 'string' ||
    typeof quantity !== 'number' ||
    quantity <= 0 ||
    typeof name !== 'string' ||
    typeof price !== 'number'
  ) {
    return null;
  }
  return { productId, quantity, name, price };
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Stored layout uses snake_case keys so sessions survive across deployments
 */
export function serializeSession(session: Session): string {
  return JSON.stringify({
    state: session.state,
    current_category: session.currentCategory,
    current_product_id: session.currentProductId,
    cart: session.cart.map((item) => ({
      product_id: item.productId,
      quantity: item.quantity,
      name: item.name,
      price: item.price,
    })),
    pending_order_id: session.pendingOrderId,
  });
}

/**
 * @returns null when the stored value is not a session at all
 */
export function deserializeSession(raw: string): Session | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('Discarding unreadable session:', error instanceof Error ? error.message : 'Unknown error');
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const rawCart = Array.isArray(parsed.cart) ? parsed.cart : [];
  const cart: CartItem[] = [];
  for (const entry of rawCart) {
    const item = parseCartItem(entry);
    if (item) {
      cart.push(item);
    }
  }

  return {
    state: parseDialogueState(parsed.state),
    currentCategory: stringField(parsed, 'current_category'),
    currentProductId: stringField(parsed, 'current_product_id'),
    cart,
    pendingOrderId: stringField(parsed, 'pending_order_id'),
  };
}

/**
 * RedisSessionStore keeps sessions in Redis with a sliding TTL
 * Connection failures propagate so the current message is aborted
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly client: SessionRedisClient,
    private readonly ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS
  ) {}

  async get(phone: string): Promise<Session | null> {
    const raw = await this.client.get(`${SESSION_KEY_PREFIX}${phone}`);
    if (!raw) {
      return null;
    }
    return deserializeSession(raw);
  }

  async set(phone: string, session: Session): Promise<void> {
    await this.client.setex(`${SESSION_KEY_PREFIX}${phone}`, this.ttlSeconds, serializeSession(session));
    logger.debug(`Session saved for ${phone}: state=${session.state}`);
  }

  async delete(phone: string): Promise<void> {
    await this.client.del(`${SESSION_KEY_PREFIX}${phone}`);
  }
}

/**
 * InMemorySessionStore is used when Redis is not configured
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, { session: Session; expiresAt: number }>();

  constructor(private readonly ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS) {}

  async get(phone: string): Promise<Session | null> {
    const entry = this.sessions.get(phone);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.sessions.delete(phone);
      return null;
    }
    return structuredClone(entry.session);
  }

  async set(phone: string, session: Session): Promise<void> {
    this.cleanup();
    this.sessions.set(phone, {
      session: structuredClone(session),
      expiresAt: Date.now() + this.ttlSeconds * 1000,
    });
  }

  async delete(phone: string): Promise<void> {
    this.sessions.delete(phone);
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, value] of this.sessions.entries()) {
      if (value.expiresAt <= now) {
        this.sessions.delete(key);
      }
    }
  }
}
