/**
 * Series Registry - FRED series behind each engine column
 *
 * Frequency drives the aligner's fill rule; units drive normalization to the
 * configured base unit before any arithmetic.
 */

import type { SeriesFrequency, Units } from './types'

export interface SeriesMetadata {
  fredId: string
  column: string
  name: string
  frequency: SeriesFrequency
  units: Units
}

export const SERIES_REGISTRY: Record<string, SeriesMetadata> = {
  // =========================================================================
  // Balance Sheet
  // =========================================================================
  WALCL: { fredId: 'WALCL', column: 'fed_total_assets', name: 'Fed Total Assets', frequency: 'weekly', units: 'millions' },
  WSHOMCB: { fredId: 'WSHOMCB', column: 'fed_mbs_holdings', name: 'MBS Held Outright', frequency: 'weekly', units: 'millions' },
  TREAST: { fredId: 'TREAST', column: 'fed_treasury_holdings', name: 'Treasuries Held Outright', frequency: 'weekly', units: 'millions' },
  WSHOBL: { fredId: 'WSHOBL', column: 'fed_bill_holdings', name: 'Bills Held Outright', frequency: 'weekly', units: 'millions' },
  WSHONOT: { fredId: 'WSHONOT', column: 'fed_notes_holdings', name: 'Notes Held Outright', frequency: 'weekly', units: 'millions' },
  WSHOBND: { fredId: 'WSHOBND', column: 'fed_bonds_holdings', name: 'Bonds Held Outright', frequency: 'weekly', units: 'millions' },
  SWPT: { fredId: 'SWPT', column: 'swap_lines', name: 'Central Bank Liquidity Swaps', frequency: 'weekly', units: 'millions' },

  // =========================================================================
  // Liquidity Facilities
  // =========================================================================
  RRPONTSYD: { fredId: 'RRPONTSYD', column: 'rrp_balance', name: 'Overnight Reverse Repo', frequency: 'daily', units: 'billions' },
  RPONTSYD: { fredId: 'RPONTSYD', column: 'repo_ops_balance', name: 'Overnight Repo Operations', frequency: 'daily', units: 'billions' },
  WTREGEN: { fredId: 'WTREGEN', column: 'tga_balance', name: 'Treasury General Account', frequency: 'weekly', units: 'billions' },

  // =========================================================================
  // Money-Market Rates
  // =========================================================================
  IORB: { fredId: 'IORB', column: 'iorb_rate', name: 'Interest on Reserve Balances', frequency: 'policy-driven', units: 'percent' },
  SOFR: { fredId: 'SOFR', column: 'sofr_rate', name: 'SOFR', frequency: 'daily', units: 'percent' },
  EFFR: { fredId: 'EFFR', column: 'effr_rate', name: 'Effective Fed Funds Rate', frequency: 'daily', units: 'percent' },
  TGCRRATE: { fredId: 'TGCRRATE', column: 'tgcr_rate', name: 'Tri-Party General Collateral Rate', frequency: 'daily', units: 'percent' },

  // =========================================================================
  // Treasury Curve & Breakevens
  // =========================================================================
  DGS2: { fredId: 'DGS2', column: 'ust_2y', name: '2-Year Treasury', frequency: 'daily', units: 'percent' },
  DGS5: { fredId: 'DGS5', column: 'ust_5y', name: '5-Year Treasury', frequency: 'daily', units: 'percent' },
  DGS10: { fredId: 'DGS10', column: 'ust_10y', name: '10-Year Treasury', frequency: 'daily', units: 'percent' },
  DGS30: { fredId: 'DGS30', column: 'ust_30y', name: '30-Year Treasury', frequency: 'daily', units: 'percent' },
  T10YIE: { fredId: 'T10YIE', column: 'breakeven_10y', name: '10-Year Breakeven Inflation', frequency: 'daily', units: 'percent' },
  T5YIE: { fredId: 'T5YIE', column: 'breakeven_5y', name: '5-Year Breakeven Inflation', frequency: 'daily', units: 'percent' },
}

export function getSeriesMetadata(fredId: string): SeriesMetadata | null {
  return Object.hasOwn(SERIES_REGISTRY, fredId) ? SERIES_REGISTRY[fredId] : null
}

export function getRegisteredSeriesIds(): string[] {
  return Object.keys(SERIES_REGISTRY)
}

export function getSeriesByColumn(column: string): SeriesMetadata | null {
  return Object.values(SERIES_REGISTRY).find((meta) => meta.column === column) ?? null
}
