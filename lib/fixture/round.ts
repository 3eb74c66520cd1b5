/**
 * Round to `decimals` places, resolving exact ties toward the even neighbor.
 */
export const roundHalfEven = (value: number, decimals = 0): number => {
  if (!Number.isFinite(value)) return value

  const factor = 10 ** decimals
  const scaled = decimals === 0 ? value : value * factor
  const floor = Math.floor(scaled)
  const diff = scaled - floor

  let rounded: number
  if (diff > 0.5) {
    rounded = floor + 1
  } else if (diff < 0.5) {
    rounded = floor
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1
  }

  // avoid -0 leaking into formatted output
  if (rounded === 0) return 0
  return decimals === 0 ? rounded : rounded / factor
}

/**
 * Snap `value` to a grid of `base`, then round the result to 2 decimals so
 * the grid multiplication leaves no floating point noise behind.
 */
export const roundTo = (base: number, value: number): number =>
  roundHalfEven(roundHalfEven(value / base) * base, 2)

/**
 * Format with exactly two decimals, e.g. 5 -> "5.00".
 *
 * Rounds the exact binary value, so 3.175 (stored as 3.17499...) prints
 * "3.17". Only odd multiples of 1/8 sit exactly on a tie; those go to the
 * even neighbor.
 */
export const formatFixed2 = (value: number): string => {
  const eighths = value * 8
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    return roundHalfEven(value, 2).toFixed(2)
  }
  const text = value.toFixed(2)
  return text === "-0.00" ? "0.00" : text
}

export const GRID_MM = 0.01
