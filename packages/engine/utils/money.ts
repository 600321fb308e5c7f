// Monetary arithmetic in integer cents; rounding to two places happens
// only when a value is presented.

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function sumMoney(amounts: readonly number[]): number {
  let cents = 0;
  for (const amount of amounts) cents += toCents(amount);
  return fromCents(cents);
}

export function averageMoney(amounts: readonly number[]): number | null {
  if (amounts.length === 0) return null;
  let cents = 0;
  for (const amount of amounts) cents += toCents(amount);
  return cents / amounts.length / 100;
}

export function formatMoney(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const fixed = Math.abs(amount).toFixed(2);
  const [whole, fraction] = fixed.split('.');
  return `${sign}$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;
}
