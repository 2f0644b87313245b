import { z } from 'zod'
import { InvalidProfileError } from '../errors'
import type { Region, RegionProfileData } from './types'

const AGE_SUM_TOLERANCE = 0.01

const ageDistributionSchema = z
  .record(z.string(), z.number().min(0).max(1))
  .refine((d) => Object.keys(d).length > 0, { message: 'must list at least one age bucket' })
  .refine((d) => Math.abs(Object.values(d).reduce((a, b) => a + b, 0) - 1) <= AGE_SUM_TOLERANCE, {
    message: 'fractions must sum to 1.0'
  })

export const regionSchema = z.object({
  id: z.string().min(1),
  population: z.number().int().nonnegative().nullish(),
  ageDistribution: ageDistributionSchema,
  preferences: z.array(z.string().min(1)),
  cluster: z.string().min(1).nullish(),
  area: z.string().min(1).nullish()
})

function describeIssues(issues: z.ZodIssue[]) {
  return issues.map((i) => {
    const where = i.path.length ? i.path.join('.') : 'profile'
    if (i.code === 'invalid_type' && i.received === 'undefined') return `${where} is required`
    return `${where} ${i.message}`
  })
}

/**
 * Validate one profile record. Age distribution and preferences are required;
 * population, cluster and area fall back to null.
 */
export function parseRegion(data: RegionProfileData, fallbackId?: string): Region {
  const result = regionSchema.safeParse({ ...data, id: data.id ?? fallbackId })
  if (!result.success) {
    const id = typeof data.id === 'string' ? data.id : fallbackId ?? '<unknown>'
    throw new InvalidProfileError(id, describeIssues(result.error.issues))
  }
  const p = result.data
  return Object.freeze({
    id: p.id,
    population: p.population ?? null,
    ageDistribution: Object.freeze({ ...p.ageDistribution }),
    preferences: Object.freeze(Array.from(new Set(p.preferences))),
    cluster: p.cluster ?? null,
    area: p.area ?? null
  })
}

export function describeRegion(region: Region): string {
  const ages = Object.entries(region.ageDistribution)
    .map(([bucket, share]) => `${bucket}: ${Math.round(share * 100)}%`)
    .join(', ')
  return [
    `Region: ${region.id}${region.area ? ` (${region.area})` : ''}`,
    `Population: ${region.population === null ? 'N/A' : region.population.toLocaleString('en-US')}`,
    `Cluster: ${region.cluster ?? 'N/A'}`,
    `Preferences: ${region.preferences.join(', ') || 'none listed'}`,
    `Age distribution: ${ages}`
  ].join('\n')
}
