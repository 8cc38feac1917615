export type Money = string;

// Non-negative amount fitting decimal(12,2).
export const PRICE_PATTERN = /^\d{1,10}(\.\d{1,2})?$/;

export function toCents(amount: Money | number): number {
  return Math.round(Number(amount) * 100);
}

export function fromCents(cents: number): Money {
  return (cents / 100).toFixed(2);
}

// Summed in integer cents.
export function sumLineTotals(lines: Array<{ quantity: number; unitPrice: Money }>): Money {
  const cents = lines.reduce((acc, line) => acc + line.quantity * toCents(line.unitPrice), 0);
  return fromCents(cents);
}
