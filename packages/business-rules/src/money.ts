/** Round a currency amount to cents, matching NUMBER(10,2) columns. */
export function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/** Null-as-zero, the `coalesce(x, 0)` of the warehouse queries. */
export function orZero(amount: number | null | undefined): number {
  return amount ?? 0;
}
