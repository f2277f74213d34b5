import type { ExtendResult, LockLogger, LockLostEvent } from './types.js';

export interface LockRenewerOptions {
  name: string;
  id: string;
  intervalMs: number;
  /** Ownership-checked extension of the holder key */
  renew: () => Promise<ExtendResult>;
  logger: LockLogger;
  onLost?: (event: LockLostEvent) => void;
  /** Cancels renewal permanently once aborted */
  signal?: AbortSignal;
}

/**
 * Renewal interval for a lock expiry: two thirds of the lease, so one
 * renewal lands well before the key would expire.
 */
export function renewalInterval(expireMs: number): number {
  return Math.max(1, Math.round((expireMs * 2) / 3));
}

/**
 * Background task keeping a held lock's expiry alive.
 *
 * Each tick re-applies the expiry only while the holder key still stores
 * this owner's id. The first tick that finds the lock gone, or that fails
 * against the store, stops the task and reports through the logger and
 * `onLost`. Timers are unref'd so a pending renewal never keeps the
 * process alive.
 */
export class LockRenewer {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private stopped = true;

  constructor(private readonly options: LockRenewerOptions) {
    options.signal?.addEventListener('abort', () => this.cancel(), { once: true });
  }

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped || this.options.signal?.aborted) {
      return;
    }
    this.stopped = false;
    this.schedule();
  }

  /**
   * Prevents further ticks without waiting for one already running.
   */
  cancel(): void {
    this.stopped = true;
    clearTimeout(this.timer);
    this.timer = undefined;
  }

  /**
   * Cancels the task and waits for an in-flight renewal to settle, so the
   * caller can delete the holder key without a renewal racing it.
   */
  async stop(): Promise<void> {
    this.cancel();
    await this.inFlight;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = undefined;
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    const { name, id, logger } = this.options;

    let result: ExtendResult;
    try {
      result = await this.options.renew();
    } catch (error) {
      this.stopped = true;
      logger.error({ err: error }, 'Lock renewal failed, renewal stopped');
      this.report({ reason: 'store-error', name, id, error });
      return;
    }

    if (result === 'extended') {
      logger.debug('Renewed lock');
      if (!this.stopped) {
        this.schedule();
      }
      return;
    }

    this.stopped = true;
    logger.warn({ reason: result }, 'Lock lost during renewal, renewal stopped');
    this.report({ reason: result, name, id });
  }

  private report(event: LockLostEvent): void {
    try {
      this.options.onLost?.(event);
    } catch (error) {
      this.options.logger.error({ err: error }, 'onLockLost callback threw');
    }
  }
}
