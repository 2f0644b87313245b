import { z } from 'zod'
import type { PersonaRegistry } from '../agents/registry'
import { AgentScoringError, ScoringTimeoutError, errorMessage } from '../errors'
import { scoped } from '../logger'
import type { SimilarityMatrix } from '../regions/similarity'
import type { RegionTopology } from '../regions/topology'
import { aggregateScore } from '../scoring/aggregate'
import type {
  Advertisement,
  AgentScoringFunction,
  AggregateResult,
  NeighborScoreMap,
  NeighborScoreStore,
  ScoreRecord
} from '../scoring/types'
import {
  averageOf,
  rankBy,
  rankClusters,
  summarizeClusters,
  type Averages,
  type ClusterRankingEntry,
  type ClusterSummary,
  type RankingEntry
} from './ranking'

const log = scoped('orchestrator')

export type RunState = 'PENDING' | 'SCORING' | 'AGGREGATING' | 'COMPLETE' | 'PARTIAL_FAILURE'

export type AgentOutcome =
  | {
      agentId: string
      status: 'succeeded'
      score: ScoreRecord
      aggregate?: AggregateResult
      aggregationError?: string
      // the score stands; only the store write failed
      storeError?: string
    }
  | {
      agentId: string
      status: 'failed'
      errorName: string
      error: string
    }

export type FailedAgent = Extract<AgentOutcome, { status: 'failed' }>
export type SucceededAgent = Extract<AgentOutcome, { status: 'succeeded' }>

export interface EvaluationReport {
  adId: string
  state: RunState
  transitions: RunState[]
  results: AgentOutcome[]
  succeeded: string[]
  failed: FailedAgent[]
  rankings: {
    liking: RankingEntry[]
    purchaseIntent: RankingEntry[]
  }
  averages: Averages | null
  startedAt: string
  finishedAt: string
}

export interface ClusterComparison {
  adId: string
  clusters: ClusterSummary[]
  rankings: {
    liking: ClusterRankingEntry[]
    purchaseIntent: ClusterRankingEntry[]
  }
  report: EvaluationReport
}

export type EvaluateOptions = {
  // true: every scored agent; a list: only those agents
  aggregate?: boolean | string[]
}

export type OrchestratorOptions = {
  registry: PersonaRegistry
  topology: RegionTopology
  similarity: SimilarityMatrix
  scorer: AgentScoringFunction
  store?: NeighborScoreStore
  timeoutMs?: number
  onStateChange?: (state: RunState, adId: string) => void
}

export const DEFAULT_TIMEOUT_MS = 60_000

const scoreRecordSchema = z.object({
  agentId: z.string().min(1),
  adId: z.string().min(1),
  liking: z.number().min(0).max(5),
  purchaseIntent: z.number().min(0).max(5),
  commentary: z.string(),
  confidence: z.number().min(0).max(1),
  neighborsUsed: z.array(z.string())
})

function unique(ids: string[]) {
  return Array.from(new Set(ids))
}

async function withTimeout<T>(
  agentId: string,
  adId: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new ScoringTimeoutError(agentId, adId, timeoutMs))
    }, timeoutMs)
  })
  try {
    return await Promise.race([run(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Drives one advertisement through the panel: fan-out scoring, optional
 * neighbour aggregation, then rankings. Per-agent failures end up in the
 * report; nothing a single agent does aborts its siblings.
 */
export class EvaluationOrchestrator {
  private readonly registry: PersonaRegistry
  private readonly topology: RegionTopology
  private readonly similarity: SimilarityMatrix
  private readonly scorer: AgentScoringFunction
  private readonly store?: NeighborScoreStore
  private readonly timeoutMs: number
  private readonly onStateChange?: (state: RunState, adId: string) => void

  constructor(opts: OrchestratorOptions) {
    this.registry = opts.registry
    this.topology = opts.topology
    this.similarity = opts.similarity
    this.scorer = opts.scorer
    this.store = opts.store
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.onStateChange = opts.onStateChange
  }

  async evaluate(ad: Advertisement, targets: string[], opts: EvaluateOptions = {}): Promise<EvaluationReport> {
    const startedAt = new Date().toISOString()
    const transitions: RunState[] = []
    const enter = (state: RunState) => {
      transitions.push(state)
      log.debug(`${ad.id}: ${state}`)
      this.onStateChange?.(state, ad.id)
    }

    enter('PENDING')
    const agentIds = unique(targets)

    enter('SCORING')
    const outcomes = await Promise.all(agentIds.map((id) => this.scoreOne(id, ad)))

    enter('AGGREGATING')
    const scored = outcomes.filter((o): o is SucceededAgent => o.status === 'succeeded')
    const aggregateFor = opts.aggregate
    const wanted = new Set(
      scored
        .filter((o) => aggregateFor === true || (Array.isArray(aggregateFor) && aggregateFor.includes(o.agentId)))
        .map((o) => o.agentId)
    )
    const results = await Promise.all(
      outcomes.map((o) => (o.status === 'succeeded' && wanted.has(o.agentId) ? this.aggregateOne(o, ad.id, scored) : o))
    )

    const failed = results.filter((o): o is FailedAgent => o.status === 'failed')
    const scores = scored.map((o) => o.score)
    enter(failed.length ? 'PARTIAL_FAILURE' : 'COMPLETE')

    log.info(`Evaluated ${ad.id}: ${scores.length} succeeded, ${failed.length} failed`)
    return {
      adId: ad.id,
      state: transitions[transitions.length - 1],
      transitions,
      results,
      succeeded: scored.map((o) => o.agentId),
      failed,
      rankings: {
        liking: rankBy(scores, 'liking'),
        purchaseIntent: rankBy(scores, 'purchaseIntent')
      },
      averages: averageOf(scores),
      startedAt,
      finishedAt: new Date().toISOString()
    }
  }

  /**
   * Score the agents of the given clusters (every known cluster by default)
   * and compare the clusters by mean score.
   */
  async compareClusters(ad: Advertisement, clusters: string[] = this.registry.clusters()): Promise<ClusterComparison> {
    const wanted = unique(clusters)
    const targets = wanted.flatMap((c) => this.registry.listByCluster(c))
    const report = await this.evaluate(ad, targets)

    const clusterOf = (id: string) => (this.registry.has(id) ? this.registry.clusterOf(id) : null)
    const scores = report.results.flatMap((o) => (o.status === 'succeeded' ? [o.score] : []))
    const summaries = summarizeClusters(wanted, clusterOf, targets, scores)
    for (const s of summaries) {
      if (s.status === 'no_data') log.info(`Cluster ${s.cluster}: no data for ${ad.id}`)
    }

    return {
      adId: ad.id,
      clusters: summaries,
      rankings: {
        liking: rankClusters(summaries, 'liking'),
        purchaseIntent: rankClusters(summaries, 'purchaseIntent')
      },
      report
    }
  }

  private async scoreOne(agentId: string, ad: Advertisement): Promise<AgentOutcome> {
    try {
      const agent = await this.registry.getOrCreate(agentId)
      const raw = await withTimeout(agentId, ad.id, this.timeoutMs, (signal) =>
        this.scorer({ agentId, region: agent.region, systemPrompt: agent.systemPrompt(), ad, signal })
      )

      const checked = scoreRecordSchema.safeParse(raw)
      if (!checked.success) {
        throw new AgentScoringError(agentId, ad.id, `invalid score record (${checked.error.issues[0]?.message})`)
      }
      if (checked.data.agentId !== agentId || checked.data.adId !== ad.id) {
        throw new AgentScoringError(agentId, ad.id, `score record is for ${checked.data.agentId}/${checked.data.adId}`)
      }
      const score: ScoreRecord = Object.freeze({
        ...checked.data,
        neighborsUsed: Object.freeze(checked.data.neighborsUsed)
      })

      agent.recordScore(score)
      log.debug(`${agentId} scored ${ad.id}: liking=${score.liking} purchaseIntent=${score.purchaseIntent}`)
      return this.storeScore({ agentId, status: 'succeeded', score })
    } catch (err) {
      log.warn(`Agent ${agentId} failed on ${ad.id}:`, errorMessage(err))
      return {
        agentId,
        status: 'failed',
        errorName: err instanceof Error ? err.name : 'Error',
        error: errorMessage(err)
      }
    }
  }

  private async storeScore(outcome: SucceededAgent): Promise<SucceededAgent> {
    try {
      await this.store?.recordScore?.(outcome.score)
      return outcome
    } catch (err) {
      log.warn(`Could not store the score of ${outcome.agentId} for ${outcome.score.adId}:`, errorMessage(err))
      return { ...outcome, storeError: errorMessage(err) }
    }
  }

  // store scores merged with this run's siblings; siblings win
  private async neighborScoresFor(agentId: string, adId: string, scored: SucceededAgent[]) {
    const fromStore: NeighborScoreMap = this.store ? await this.store.fetchNeighborScores(agentId, adId) : {}
    const fromBatch: NeighborScoreMap = {}
    for (const o of scored) {
      if (o.agentId === agentId) continue
      fromBatch[o.agentId] = { liking: o.score.liking, purchaseIntent: o.score.purchaseIntent }
    }
    return { ...fromStore, ...fromBatch }
  }

  private async aggregateOne(outcome: SucceededAgent, adId: string, scored: SucceededAgent[]): Promise<AgentOutcome> {
    const { agentId, score } = outcome
    try {
      const neighborScores = await this.neighborScoresFor(agentId, adId, scored)
      const aggregate = aggregateScore(
        { agentId, ownScore: { liking: score.liking, purchaseIntent: score.purchaseIntent }, neighborScores },
        { topology: this.topology, similarity: this.similarity }
      )
      return { ...outcome, aggregate }
    } catch (err) {
      log.warn(`Aggregation failed for ${agentId} on ${adId}:`, errorMessage(err))
      return { ...outcome, aggregationError: errorMessage(err) }
    }
  }
}
