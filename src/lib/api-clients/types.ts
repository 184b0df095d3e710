import { z } from 'zod'

export const FREDObservationSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  /** Numeric string, or "." for a missing observation */
  value: z.string(),
})

export const FREDResponseSchema = z.object({
  observations: z.array(FREDObservationSchema),
})

export type FREDObservation = z.infer<typeof FREDObservationSchema>
export type FREDSeries = FREDObservation[]
