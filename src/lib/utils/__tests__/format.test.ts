import { describe, it, expect } from 'vitest'
import { formatBps, formatMillions, formatPercentage, formatSigned } from '../format'

describe('formatMillions', () => {
  it('abbreviates by magnitude and keeps the sign', () => {
    expect(formatMillions(950)).toBe('$950.0M')
    expect(formatMillions(-1_500)).toBe('-$1.5B')
    expect(formatMillions(7_200_000)).toBe('$7.2T')
    expect(formatMillions(7_200_000, 2)).toBe('$7.20T')
  })
})

describe('rate formatting', () => {
  it('formats percentages, basis points and signed values', () => {
    expect(formatPercentage(4.2)).toBe('4.20%')
    expect(formatBps(4.2)).toBe('4.2 bps')
    expect(formatSigned(0)).toBe('+0.0')
    expect(formatSigned(-2.4)).toBe('-2.4')
  })
})
