/**
 * Parse a string as a positive integer (timeouts, sizes). Returns fallback for
 * empty, non-numeric, fractional, zero or negative values.
 */
export const parsePositiveInteger = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value?.trim()) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    return fallback
  }

  return parsed
}
