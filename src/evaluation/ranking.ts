import type { ScoreRecord } from '../scoring/types'

export type ScoreDimension = 'liking' | 'purchaseIntent'

export type RankingEntry = {
  rank: number
  agentId: string
  value: number
}

export type Averages = {
  liking: number
  purchaseIntent: number
}

export type ClusterSummary =
  | {
      cluster: string
      status: 'ok'
      agents: string[]
      agentCount: number
      meanLiking: number
      meanPurchaseIntent: number
    }
  | {
      cluster: string
      status: 'no_data'
      agents: string[]
      agentCount: 0
    }

export type ClusterRankingEntry = {
  rank: number
  cluster: string
  value: number
}

/** Descending by the dimension, ties broken by agent id ascending. */
export function rankBy(scores: readonly ScoreRecord[], dimension: ScoreDimension): RankingEntry[] {
  return [...scores]
    .sort((a, b) => b[dimension] - a[dimension] || (a.agentId < b.agentId ? -1 : a.agentId > b.agentId ? 1 : 0))
    .map((s, i) => ({ rank: i + 1, agentId: s.agentId, value: s[dimension] }))
}

export function averageOf(scores: readonly ScoreRecord[]): Averages | null {
  if (!scores.length) return null
  return {
    liking: scores.reduce((a, s) => a + s.liking, 0) / scores.length,
    purchaseIntent: scores.reduce((a, s) => a + s.purchaseIntent, 0) / scores.length
  }
}

/**
 * Per-cluster means over successfully scored agents. `attempted` lists every
 * agent that was asked, so a cluster whose agents all failed still shows who
 * was tried. Clusters without a single success are `no_data`, never zero.
 */
export function summarizeClusters(
  clusters: readonly string[],
  clusterOf: (agentId: string) => string | null,
  attempted: readonly string[],
  scores: readonly ScoreRecord[]
): ClusterSummary[] {
  return clusters.map((cluster): ClusterSummary => {
    const agents = attempted.filter((id) => clusterOf(id) === cluster)
    const inCluster = scores.filter((s) => clusterOf(s.agentId) === cluster)
    const avg = averageOf(inCluster)
    if (!avg) return { cluster, status: 'no_data', agents, agentCount: 0 }
    return {
      cluster,
      status: 'ok',
      agents,
      agentCount: inCluster.length,
      meanLiking: avg.liking,
      meanPurchaseIntent: avg.purchaseIntent
    }
  })
}

export function rankClusters(summaries: readonly ClusterSummary[], dimension: ScoreDimension): ClusterRankingEntry[] {
  const withData = summaries.flatMap((s) =>
    s.status === 'ok' ? [{ cluster: s.cluster, value: dimension === 'liking' ? s.meanLiking : s.meanPurchaseIntent }] : []
  )
  return withData
    .sort((a, b) => b.value - a.value || (a.cluster < b.cluster ? -1 : a.cluster > b.cluster ? 1 : 0))
    .map((e, i) => ({ rank: i + 1, ...e }))
}
