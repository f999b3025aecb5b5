export const PERIODS = ['week', 'month', 'all'] as const;

export type Period = (typeof PERIODS)[number];

const PERIOD_DAYS: Record<Exclude<Period, 'all'>, number> = { week: 7, month: 30 };

/** Start of the window ending at `now`; `null` for the whole history. */
export function periodStart(period: Period, now: Date = new Date()): Date | null {
  if (period === 'all') return null;
  return new Date(now.getTime() - PERIOD_DAYS[period] * 24 * 60 * 60 * 1000);
}
