import logger from '../../config/logger';
import { lastNineDigits } from '../../utils/phoneNormalizer';
import {
  DispatchOutcome,
  PaymentDispatcher,
  PaymentError,
  StkPushSender,
} from '../../types/payment';

export interface DispatchQueueOptions {
  /** Delay between provider calls; Kopo Kopo allows 10 requests per 20s */
  intervalMs: number;
  capacity: number;
  /** How long an outstanding request blocks another prompt to the same phone */
  dedupWindowMs: number;
}

const DEFAULT_OPTIONS: DispatchQueueOptions = {
  intervalMs: 2100,
  capacity: 100,
  dedupWindowMs: 60_000,
};

interface QueuedPayment {
  orderId: string;
  phone: string;
  amount: number;
  dedupKey: string;
  enqueuedAt: number;
}

function dedupKeyFor(phone: string): string {
  const tail = lastNineDigits(phone);
  return tail.length === 9 ? tail : phone;
}

/**
 * PaymentDispatchQueue serializes STK push requests below the provider rate limit
 * and drops repeat prompts to a phone that already has one outstanding
 */
export class PaymentDispatchQueue implements PaymentDispatcher {
  private readonly options: DispatchQueueOptions;
  private readonly queue: QueuedPayment[] = [];
  private readonly inFlight = new Map<string, number>();
  private timer: NodeJS.Timeout | null = null;
  private processing = false;

  constructor(private readonly sender: StkPushSender, options: Partial<DispatchQueueOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Returns immediately
   * @throws PaymentError QUEUE_FULL when the queue is at capacity
   */
  enqueue(orderId: string, phone: string, amount: number): DispatchOutcome {
    const dedupKey = dedupKeyFor(phone);
    const now = Date.now();
    const issuedAt = this.inFlight.get(dedupKey);

    if (issuedAt !== undefined) {
      if (now - issuedAt < this.options.dedupWindowMs) {
        logger.info(`Duplicate STK push suppressed: order=${orderId}, phone=${phone}`);
        return 'deduplicated';
      }
      this.inFlight.delete(dedupKey);
    }

    if (this.queue.length >= this.options.capacity) {
      logger.warn(`Payment queue full (${this.queue.length}), rejecting order ${orderId}`);
      throw new PaymentError('payment system busy, please try again', 'QUEUE_FULL', 'KOPOKOPO');
    }

    this.queue.push({ orderId, phone, amount, dedupKey, enqueuedAt: now });
    this.inFlight.set(dedupKey, now);

    logger.info(`STK push queued: order=${orderId}, position=${this.queue.length}`);
    return 'queued';
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((error) => {
        logger.error('Payment dispatch tick failed:', error);
      });
    }, this.options.intervalMs);
    logger.info(`Payment dispatch worker started: interval=${this.options.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info(`Payment dispatch worker stopped with ${this.queue.length} queued`);
    }
  }

  /**
   * Sends at most one queued request; skipped while a previous send is running
   */
  async tick(): Promise<void> {
    if (this.processing) {
      return;
    }
    const item = this.queue.shift();
    if (!item) {
      return;
    }

    this.processing = true;
    try {
      await this.sender.sendStkPush(item.orderId, item.phone, item.amount);
    } catch (error) {
      logger.error(`STK push dispatch failed for order ${item.orderId}:`, error);
    } finally {
      if (this.inFlight.get(item.dedupKey) === item.enqueuedAt) {
        this.inFlight.delete(item.dedupKey);
      }
      this.processing = false;
    }
  }
}
