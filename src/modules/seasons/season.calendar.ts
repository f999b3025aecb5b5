export interface SeasonWindow {
  number: number;
  name: string;
  startsAt: Date;
  endsAt: Date;
}

/** The UTC calendar month containing `at`, e.g. 202603 / "March 2026". */
export function monthlySeason(at: Date): SeasonWindow {
  const year = at.getUTCFullYear();
  const month = at.getUTCMonth();
  const startsAt = new Date(Date.UTC(year, month, 1));
  return {
    number: year * 100 + month + 1,
    name: `${startsAt.toLocaleString('en-US', { month: 'long', timeZone: 'UTC' })} ${year}`,
    startsAt,
    endsAt: new Date(Date.UTC(year, month + 1, 1)),
  };
}
