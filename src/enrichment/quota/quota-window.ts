const DAY_MS = 24 * 60 * 60 * 1000;

export interface QuotaWindow {
  start: Date;
  end: Date;
  /** Stable per window, e.g. `enrichment:quota:2026-10-19T00` */
  key: string;
}

/** The 24h window containing `now` that opens at `resetHourUtc`. */
export function quotaWindow(now: Date, resetHourUtc: number): QuotaWindow {
  const start = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate(),
      resetHourUtc,
    ),
  );
  if (start.getTime() > now.getTime()) {
    start.setTime(start.getTime() - DAY_MS);
  }
  const end = new Date(start.getTime() + DAY_MS);
  return {
    start,
    end,
    key: `enrichment:quota:${start.toISOString().slice(0, 13)}`,
  };
}
