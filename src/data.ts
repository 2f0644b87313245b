import appRoot from 'app-root-path'
import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { debug, info } from './logger'
import { parseRegion } from './regions/profiles'
import { SimilarityMatrix } from './regions/similarity'
import type { AdjacencyGraph, Region, RegionProfileData } from './regions/types'
import type { SeedScores } from './scoring/scoreStore'
import type { Advertisement } from './scoring/types'

export const DEFAULT_DATA_DIR = path.resolve(appRoot.path, 'data')

export const DATA_FILES = {
  regions: 'regions.json',
  adjacency: 'adjacency.json',
  similarity: 'similarity.csv',
  scores: 'scores.json'
} as const

const adjacencySchema = z.record(z.string(), z.array(z.string()))

const neighborScoreSchema = z.object({
  liking: z.number().min(0).max(5),
  purchaseIntent: z.number().min(0).max(5)
})

const seedScoresSchema = z.record(z.string(), z.record(z.string(), neighborScoreSchema))

const advertisementSchema = z.object({
  id: z.string().min(1),
  content: z.string().min(1),
  category: z.string().optional()
})

export const advertisementsSchema = z.array(advertisementSchema)

async function readJSON(filePath: string): Promise<unknown> {
  const absPath = path.resolve(appRoot.path, filePath)
  debug('Reading', absPath)
  return JSON.parse(await fs.readFile(absPath, 'utf-8'))
}

function asProfile(value: unknown): RegionProfileData {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {}
}

/**
 * Profiles as an array of records or an object keyed by region id.
 * Every record is validated here so a bad file fails at startup.
 */
export function parseRegionProfiles(raw: unknown): Region[] {
  let records: Array<[string | undefined, RegionProfileData]> = []
  if (Array.isArray(raw)) records = raw.map((r: unknown): [undefined, RegionProfileData] => [undefined, asProfile(r)])
  else if (typeof raw === 'object' && raw !== null) {
    records = Object.entries(raw).map(([id, r]: [string, unknown]): [string, RegionProfileData] => [id, asProfile(r)])
  }
  const regions = records.map(([id, data]) => parseRegion(data, id))
  const dupes = regions.map((r) => r.id).filter((id, i, all) => all.indexOf(id) !== i)
  if (dupes.length) throw new Error(`Duplicate region ids in profile data: ${dupes.join(', ')}`)
  return regions
}

export async function loadRegionProfiles(filePath: string): Promise<Region[]> {
  const regions = parseRegionProfiles(await readJSON(filePath))
  info(`Loaded ${regions.length} region profiles from ${path.basename(filePath)}`)
  return regions
}

export async function loadAdjacency(filePath: string): Promise<AdjacencyGraph> {
  return adjacencySchema.parse(await readJSON(filePath))
}

export async function loadSimilarity(filePath: string): Promise<SimilarityMatrix> {
  const text = await fs.readFile(path.resolve(appRoot.path, filePath), 'utf-8')
  const matrix = SimilarityMatrix.fromCsv(text)
  debug(`Loaded ${matrix.size} similarity entries`)
  return matrix
}

export async function loadSeedScores(filePath: string): Promise<SeedScores> {
  return seedScoresSchema.parse(await readJSON(filePath))
}

export async function loadAdvertisements(filePath: string): Promise<Advertisement[]> {
  const raw = await readJSON(filePath)
  return advertisementsSchema.parse(Array.isArray(raw) ? raw : [raw])
}
