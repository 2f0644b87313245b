import type { Region } from '../regions/types'

export const SCORE_MIN = 0
export const SCORE_MAX = 5

export interface ScoreRecord {
  readonly agentId: string
  readonly adId: string
  readonly liking: number // [0,5]
  readonly purchaseIntent: number // [0,5]
  readonly commentary: string
  readonly confidence: number // [0,1]
  readonly neighborsUsed: readonly string[]
}

export type OwnScore = {
  liking: number
  purchaseIntent: number
}

export type NeighborScore = OwnScore

export type NeighborScoreMap = Record<string, NeighborScore>

export interface AggregateResult {
  agentId: string
  aggregateLiking: number
  aggregatePurchaseIntent: number
  neighborInfluence: Record<string, number>
  skippedNeighbors: string[]
  explanation: string
}

export interface Advertisement {
  id: string
  content: string
  category?: string
}

export type ScoringRequest = {
  agentId: string
  region: Region
  systemPrompt: string
  ad: Advertisement
  signal: AbortSignal
}

/** External, usually LLM-backed, producer of an agent's own score. */
export type AgentScoringFunction = (request: ScoringRequest) => Promise<ScoreRecord>

export interface NeighborScoreStore {
  fetchNeighborScores(agentId: string, adId: string): Promise<NeighborScoreMap>
  recordScore?(record: ScoreRecord): Promise<void> | void
}
