import type { RegionTopology } from '../regions/topology'
import type { NeighborScore, NeighborScoreMap, NeighborScoreStore, ScoreRecord } from './types'

export type StoredScore = NeighborScore & { recordedAt: Date }

export type SeedScores = Record<string, Record<string, NeighborScore>>

/** Process-local score store: latest score per (ad, agent). Nothing survives a restart. */
export class InMemoryScoreStore implements NeighborScoreStore {
  private readonly byAd = new Map<string, Map<string, StoredScore>>()
  private readonly maxNeighbors: number

  constructor(private readonly topology: RegionTopology, opts: { maxNeighbors?: number } = {}) {
    this.maxNeighbors = opts.maxNeighbors ?? 5
  }

  put(adId: string, agentId: string, score: NeighborScore) {
    let scores = this.byAd.get(adId)
    if (!scores) {
      scores = new Map()
      this.byAd.set(adId, scores)
    }
    scores.set(agentId, { liking: score.liking, purchaseIntent: score.purchaseIntent, recordedAt: new Date() })
  }

  seed(seed: SeedScores) {
    for (const [adId, scores] of Object.entries(seed)) {
      for (const [agentId, score] of Object.entries(scores)) this.put(adId, agentId, score)
    }
  }

  recordScore(record: ScoreRecord) {
    this.put(record.adId, record.agentId, record)
  }

  get(adId: string, agentId: string): StoredScore | undefined {
    return this.byAd.get(adId)?.get(agentId)
  }

  /**
   * Scores of the first `maxNeighbors` topology neighbours of `agentId` that
   * have scored `adId`. Unknown agents raise UnknownRegionError from the topology.
   */
  async fetchNeighborScores(agentId: string, adId: string): Promise<NeighborScoreMap> {
    const scores = this.byAd.get(adId)
    const out: NeighborScoreMap = {}
    const neighbors = this.topology.neighborsOf(agentId).slice(0, this.maxNeighbors)
    if (!scores) return out
    for (const id of neighbors) {
      const s = scores.get(id)
      if (s) out[id] = { liking: s.liking, purchaseIntent: s.purchaseIntent }
    }
    return out
  }

  averageFor(adId: string, agentIds: string[]): NeighborScore | null {
    const found = agentIds.map((id) => this.get(adId, id)).filter((s): s is StoredScore => s !== undefined)
    if (!found.length) return null
    return {
      liking: found.reduce((a, s) => a + s.liking, 0) / found.length,
      purchaseIntent: found.reduce((a, s) => a + s.purchaseIntent, 0) / found.length
    }
  }
}
