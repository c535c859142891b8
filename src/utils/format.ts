const USD = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const LONG_DATE = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: 'numeric',
  year: 'numeric',
});

/**
 * "$1,234.56"
 */
export function formatUsd(amount: number): string {
  return `$${USD.format(amount)}`;
}

/**
 * Cut text to `limit` characters and say so, rather than dropping the tail silently.
 */
export function truncateWithMarker(text: string, limit: number, marker: string): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}\n\n${marker}`;
}

/**
 * "January 5, 2026"
 */
export function formatLongDate(date: Date): string {
  return LONG_DATE.format(date);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local date as YYYY-MM-DD.
 */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local timestamp for file names: "2026-01-05_093000".
 */
export function fileTimestamp(date: Date): string {
  return `${isoDate(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Monday of the week containing `date`, at local midnight.
 */
export function weekStart(date: Date): Date {
  const start = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  const offset = (start.getDay() + 6) % 7;
  start.setDate(start.getDate() - offset);
  return start;
}
