/**
 * Format an amount held in millions with an abbreviation (M, B, T)
 */
export function formatMillions(value: number, decimals: number = 1): string {
  const abs = Math.abs(value)
  const sign = value < 0 ? '-' : ''
  if (abs >= 1_000_000) return `${sign}$${(abs / 1_000_000).toFixed(decimals)}T`
  if (abs >= 1_000) return `${sign}$${(abs / 1_000).toFixed(decimals)}B`
  return `${sign}$${abs.toFixed(decimals)}M`
}

/**
 * Format percentage
 */
export function formatPercentage(value: number, decimals: number = 2): string {
  return `${value.toFixed(decimals)}%`
}

export function formatBps(value: number, decimals: number = 1): string {
  return `${value.toFixed(decimals)} bps`
}

/**
 * Prefix non-negative values with "+"
 */
export function formatSigned(value: number, decimals: number = 1): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(decimals)}`
}
