export function median(values: number[]): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid]
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

/**
 * (value - reference) / reference, rounded to 4 decimals.
 * Negative means cheaper than the reference. Null without a positive reference.
 */
export function relativeDelta(value: number, reference: number | null): number | null {
  if (reference === null || reference <= 0) return null
  return roundTo((value - reference) / reference, 4)
}
