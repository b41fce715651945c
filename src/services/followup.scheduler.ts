import logger from '../config/logger';

export type FollowUpTask = () => Promise<void>;

/**
 * FollowUpScheduler runs one delayed task per key
 * Scheduling a key again replaces its earlier task. Nothing survives a restart.
 */
export class FollowUpScheduler {
  private readonly timers = new Map<string, NodeJS.Timeout>();

  constructor(private readonly delayMs: number = 45_000) {}

  schedule(key: string, task: FollowUpTask): void {
    this.cancel(key);

    const handle = setTimeout(() => {
      this.timers.delete(key);
      task().catch((error) => {
        logger.error(`Follow-up task ${key} failed:`, error);
      });
    }, this.delayMs);

    this.timers.set(key, handle);
  }

  cancel(key: string): boolean {
    const handle = this.timers.get(key);
    if (!handle) {
      return false;
    }
    clearTimeout(handle);
    this.timers.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const handle of this.timers.values()) {
      clearTimeout(handle);
    }
    this.timers.clear();
  }

  get pendingCount(): number {
    return this.timers.size;
  }
}
