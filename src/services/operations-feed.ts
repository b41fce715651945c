import logger from '../config/logger';
import type { OperationsEvent, OperationsListener } from '../types/events';

/**
 * OperationsFeed fans order and inventory events out to live subscribers
 * Publishing never throws; a failing subscriber is logged and skipped
 */
export class OperationsFeed {
  private readonly listeners = new Set<OperationsListener>();

  subscribe(listener: OperationsListener): () => void {
    this.listeners.add(listener);
    logger.debug(`Operations feed subscriber added (total=${this.listeners.size})`);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: OperationsEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`Operations feed subscriber failed on ${event.type}:`, error);
      }
    }
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
