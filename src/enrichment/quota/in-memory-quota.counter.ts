import { QuotaCounter, QuotaReservation, QuotaUsage } from './quota-counter.interface';
import { QuotaWindow, quotaWindow } from './quota-window';

/** Single-process counter. Used by tests and by QUOTA_BACKEND=memory. */
export class InMemoryQuotaCounter implements QuotaCounter {
  private windowKey = '';
  private used = 0;

  constructor(
    private readonly limit: number,
    private readonly resetHourUtc: number = 0,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  tryConsume(): Promise<QuotaReservation> {
    const window = this.roll();
    if (this.used >= this.limit) {
      return Promise.resolve({
        granted: false,
        used: this.used,
        limit: this.limit,
        resetsAt: window.end,
      });
    }
    this.used++;
    return Promise.resolve({
      granted: true,
      used: this.used,
      limit: this.limit,
      resetsAt: window.end,
    });
  }

  peek(): Promise<QuotaUsage> {
    const window = this.roll();
    return Promise.resolve({
      used: this.used,
      limit: this.limit,
      resetsAt: window.end,
    });
  }

  private roll(): QuotaWindow {
    const window = quotaWindow(this.clock(), this.resetHourUtc);
    if (window.key !== this.windowKey) {
      this.windowKey = window.key;
      this.used = 0;
    }
    return window;
  }
}
