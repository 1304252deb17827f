export interface QuotaReservation {
  granted: boolean;
  used: number;
  limit: number;
  resetsAt: Date;
}

export interface QuotaUsage {
  used: number;
  limit: number;
  resetsAt: Date;
}

/**
 * Daily budget for external email finder calls. `tryConsume` must increment
 * and check in one step so that concurrent runs never overspend.
 */
export interface QuotaCounter {
  tryConsume(): Promise<QuotaReservation>;
  peek(): Promise<QuotaUsage>;
}

export const ENRICHMENT_QUOTA = 'ENRICHMENT_QUOTA';
