import { z } from 'zod'
import type { LayoffRecord } from '@layoffs/types'

// Row shape shared by the source and staging tables
export const LayoffRowSchema: z.ZodType<LayoffRecord> = z.object({
  company: z.string(),
  location: z.string(),
  industry: z.string().nullable(),
  total_laid_off: z.number().int().nullable(),
  percentage_laid_off: z.string().nullable(),
  event_date: z.string().nullable(),
  stage: z.string().nullable(),
  country: z.string(),
  funds_raised_millions: z.number().int().nullable(),
})

export const LayoffRowsSchema = z.array(LayoffRowSchema)
