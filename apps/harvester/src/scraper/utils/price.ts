/**
 * Parse displayed price text into dollars.
 *
 * Every character that is not a digit or '.' is stripped ("$1,299.99" → 1299.99).
 * Anything that does not then parse as a finite, nonnegative number yields null:
 * an absent price, never an error.
 */
export function normalizePrice(priceText: string | number | null | undefined): number | null {
  if (priceText === null || priceText === undefined) return null

  if (typeof priceText === 'number') {
    return Number.isFinite(priceText) && priceText >= 0 ? roundCents(priceText) : null
  }

  const cleaned = priceText.replace(/[^\d.]/g, '')
  if (!/^\d*\.?\d+$|^\d+\.$/.test(cleaned)) return null

  const value = Number.parseFloat(cleaned)
  if (!Number.isFinite(value) || value < 0) return null

  return roundCents(value)
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100
}

/**
 * Price equality at cent precision; null equals only null.
 */
export function samePrice(a: number | null, b: number | null): boolean {
  if (a === null || b === null) return a === b
  return Math.round(a * 100) === Math.round(b * 100)
}
