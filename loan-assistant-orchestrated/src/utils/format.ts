const rupeeFormat = new Intl.NumberFormat('en-IN', { maximumFractionDigits: 0 });

/** Whole-rupee amount with Indian digit grouping, e.g. 300000 -> "3,00,000". */
export function formatAmount(value: number): string {
  return rupeeFormat.format(value);
}

export function formatRupees(value: number): string {
  return `₹${formatAmount(value)}`;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** YYYYMMDD in local time. */
export function compactDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** YYYYMMDD_HHmmss in local time. */
export function compactTimestamp(date: Date): string {
  return `${compactDate(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

/** e.g. "March 07, 2025". */
export function longDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()}`;
}
