// ──────────────────────────────────────────
// Money helpers: two-decimal amounts summed as integer cents
// ──────────────────────────────────────────

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function lineTotal(quantity: number, unitPrice: number): number {
  return fromCents(quantity * toCents(unitPrice));
}
