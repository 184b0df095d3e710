import { CONFIG } from '@/lib/config'
import { getSeriesMetadata } from '@/lib/analytics/series-registry'
import type { RawSeries, SeriesMap, TimePoint } from '@/lib/analytics/types'
import { APIError, ValidationError, getErrorMessage } from '@/lib/utils/errors'
import { fetchWithRetry, type RetryOptions } from '@/lib/utils/retry'
import { FREDResponseSchema, type FREDObservation, type FREDSeries } from './types'

export interface FREDClientOptions {
  apiKey?: string
  baseUrl?: string
  retry?: RetryOptions
}

/**
 * FRED observations as engine inputs. Missing observations ("." in FRED's
 * payload) are dropped; the aligner treats the gap per the series' frequency.
 */
export function toTimePoints(observations: readonly FREDObservation[]): TimePoint[] {
  const points: TimePoint[] = []
  for (const obs of observations) {
    const value = parseFloat(obs.value)
    if (Number.isFinite(value)) points.push({ date: obs.date, value })
  }
  return points
}

export class FREDClient {
  private readonly apiKey: string | undefined
  private readonly baseUrl: string
  private readonly retry: RetryOptions

  constructor(options: FREDClientOptions = {}) {
    const raw = options.apiKey ?? process.env.FRED_API_KEY ?? ''
    this.apiKey = raw.trim() || undefined
    this.baseUrl = options.baseUrl ?? CONFIG.api.fred.baseUrl
    this.retry = options.retry ?? {}
  }

  private requireApiKey(): string {
    if (!this.apiKey) {
      throw new ValidationError('FRED_API_KEY is required', 'FRED_API_KEY')
    }
    return this.apiKey
  }

  async getObservations(seriesId: string, startISO: string): Promise<FREDSeries> {
    const apiKey = this.requireApiKey()
    const url = new URL(`${this.baseUrl}/series/observations`)
    url.searchParams.set('series_id', seriesId)
    url.searchParams.set('api_key', apiKey)
    url.searchParams.set('file_type', 'json')
    url.searchParams.set('observation_start', startISO)

    return fetchWithRetry(async () => {
      const res = await fetch(url.toString())
      if (!res.ok) {
        const text = await res.text().catch(() => '')
        throw new APIError(`FRED API returned HTTP ${res.status}${text ? `: ${text}` : ''}`, res.status, 'FRED')
      }
      const parsed = FREDResponseSchema.safeParse(await res.json())
      if (!parsed.success) {
        throw new ValidationError(`Invalid FRED response for ${seriesId}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
      }
      return parsed.data.observations
    }, this.retry)
  }

  /**
   * One registered series as a RawSeries keyed by its engine column
   */
  async getRawSeries(fredId: string, startISO: string): Promise<RawSeries> {
    const meta = getSeriesMetadata(fredId)
    if (meta === null) {
      throw new ValidationError(`Series ${fredId} is not registered`, 'fredId')
    }

    const observations = await this.getObservations(fredId, startISO)
    return {
      id: meta.column,
      units: meta.units,
      frequency: meta.frequency,
      observations: toTimePoints(observations),
    }
  }

  /**
   * Fetch several series; a series that fails is logged and left out so the
   * engine can degrade around it.
   */
  async getSeriesMap(fredIds: readonly string[], startISO: string): Promise<SeriesMap> {
    const settled = await Promise.allSettled(fredIds.map((id) => this.getRawSeries(id, startISO)))
    const series: SeriesMap = {}

    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        series[result.value.id] = result.value
      } else {
        console.warn(`[fred] failed to fetch ${fredIds[i]}: ${getErrorMessage(result.reason)}`)
      }
    })

    console.log(`[fred] fetched ${Object.keys(series).length}/${fredIds.length} series from ${startISO}`)
    return series
  }
}

export type { FREDObservation, FREDSeries }
