import { PersonaRegistry, type PersonaRegistryOptions } from '../src/agents/registry'
import { SimilarityMatrix } from '../src/regions/similarity'
import { RegionTopology } from '../src/regions/topology'
import type { AdjacencyGraph, RegionProfileData } from '../src/regions/types'
import type { AgentScoringFunction, NeighborScore, ScoreRecord } from '../src/scoring/types'

// Small four-prefecture panel shared by the unit tests.
export const profiles: Array<RegionProfileData & { id: string }> = [
  {
    id: 'Tokyo',
    population: 13960000,
    area: 'Kanto',
    cluster: 'urban',
    preferences: ['tech-savvy', 'quality-oriented'],
    ageDistribution: { '20s': 0.3, '40s': 0.3, '60s+': 0.4 }
  },
  {
    id: 'Osaka',
    population: 8809000,
    area: 'Kansai',
    cluster: 'urban',
    preferences: ['price-conscious', 'food-lover'],
    ageDistribution: { '20s': 0.25, '40s': 0.35, '60s+': 0.4 }
  },
  {
    id: 'Kyoto',
    population: 2578000,
    area: 'Kansai',
    cluster: 'tourism-oriented',
    preferences: ['traditional', 'quality-oriented'],
    ageDistribution: { '20s': 0.2, '40s': 0.3, '60s+': 0.5 }
  },
  {
    id: 'Hokkaido',
    population: 5250000,
    area: 'Hokkaido',
    cluster: 'rural',
    preferences: ['outdoor', 'local-produce'],
    ageDistribution: { '20s': 0.2, '40s': 0.25, '60s+': 0.55 }
  }
]

export const adjacency: AdjacencyGraph = {
  Tokyo: ['Osaka', 'Kyoto'],
  Osaka: ['Tokyo', 'Kyoto'],
  Kyoto: ['Tokyo', 'Osaka', 'Hokkaido'],
  Hokkaido: ['Kyoto']
}

// Kyoto<->Hokkaido deliberately has no entry
export const similarityTable = {
  Tokyo: { Osaka: 0.7, Kyoto: 0.6 },
  Osaka: { Tokyo: 0.7, Kyoto: 0.8 },
  Kyoto: { Tokyo: 0.6, Osaka: 0.8 }
}

export function makeTopology() {
  return new RegionTopology(adjacency)
}

export function makeSimilarity() {
  return SimilarityMatrix.fromNested(similarityTable)
}

export function makeRegistry(opts: PersonaRegistryOptions = {}) {
  return new PersonaRegistry(profiles, opts)
}

type Scripted = NeighborScore | Error | 'hang'

/**
 * Scorer answering from a fixed table. `hang` never settles; an Error is thrown.
 * Agents missing from the table get 2.5 / 2.5.
 */
export function scriptedScorer(table: Record<string, Scripted>): AgentScoringFunction {
  return async ({ agentId, ad }): Promise<ScoreRecord> => {
    const entry = table[agentId] ?? { liking: 2.5, purchaseIntent: 2.5 }
    if (entry === 'hang') return new Promise<ScoreRecord>(() => {})
    if (entry instanceof Error) throw entry
    return {
      agentId,
      adId: ad.id,
      liking: entry.liking,
      purchaseIntent: entry.purchaseIntent,
      commentary: `${agentId} on ${ad.id}`,
      confidence: 0.9,
      neighborsUsed: []
    }
  }
}
