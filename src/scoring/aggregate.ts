import { InvalidScoreError } from '../errors'
import { scoped } from '../logger'
import type { SimilarityMatrix } from '../regions/similarity'
import type { RegionTopology } from '../regions/topology'
import { SCORE_MAX, SCORE_MIN, type AggregateResult, type NeighborScore, type OwnScore } from './types'

const log = scoped('aggregate')

export const OWN_WEIGHT = 1.0
// a neighbour never counts for more than half of the agent's own view
export const NEIGHBOR_INFLUENCE_CAP = 0.5

export type AggregateInput = {
  agentId: string
  ownScore: Partial<Record<keyof OwnScore, unknown>> | null | undefined
  neighborScores?: Record<string, unknown> | null
}

export type AggregateContext = {
  topology: RegionTopology
  similarity: SimilarityMatrix
}

const clamp = (v: number) => Math.max(SCORE_MIN, Math.min(SCORE_MAX, v))

function isScore(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v)
}

function readOwnScore(agentId: string, own: AggregateInput['ownScore']): OwnScore {
  if (!own) throw new InvalidScoreError(agentId, 'own score is missing')
  const { liking, purchaseIntent } = own
  if (!isScore(liking) || !isScore(purchaseIntent)) {
    const missing = [isScore(liking) ? null : 'liking', isScore(purchaseIntent) ? null : 'purchaseIntent']
    throw new InvalidScoreError(agentId, `${missing.filter(Boolean).join(', ')} must be finite numbers`)
  }
  return { liking, purchaseIntent }
}

function readNeighborScore(value: unknown): NeighborScore | null {
  if (!value || typeof value !== 'object') return null
  const liking = 'liking' in value ? value.liking : undefined
  // both spellings, as in model replies
  const purchaseIntent =
    'purchaseIntent' in value ? value.purchaseIntent : 'purchase_intent' in value ? value.purchase_intent : undefined
  if (!isScore(liking) || !isScore(purchaseIntent)) return null
  return { liking, purchaseIntent }
}

/**
 * Blend an agent's own score with the scores of its topological neighbours.
 * Each neighbour present in both the topology and `neighborScores` counts with
 * weight similarity * NEIGHBOR_INFLUENCE_CAP against the own weight of 1.0.
 */
export function aggregateScore(input: AggregateInput, ctx: AggregateContext): AggregateResult {
  const { agentId } = input
  const own = readOwnScore(agentId, input.ownScore)
  // snapshot so callers mutating their map mid-flight cannot skew the result
  const neighborScores = { ...(input.neighborScores ?? {}) }

  if (Object.keys(neighborScores).length === 0) {
    return {
      agentId,
      aggregateLiking: clamp(own.liking),
      aggregatePurchaseIntent: clamp(own.purchaseIntent),
      neighborInfluence: {},
      skippedNeighbors: [],
      explanation: 'No neighbor data used; aggregate equals own score.'
    }
  }

  let totalWeight = OWN_WEIGHT
  let likingSum = own.liking * OWN_WEIGHT
  let intentSum = own.purchaseIntent * OWN_WEIGHT
  const neighborInfluence: Record<string, number> = {}
  const skippedNeighbors: string[] = []

  for (const neighborId of ctx.topology.neighborsOf(agentId)) {
    if (!Object.prototype.hasOwnProperty.call(neighborScores, neighborId)) continue
    const score = readNeighborScore(neighborScores[neighborId])
    if (!score) {
      log.warn(`Skipping malformed neighbor score from ${neighborId} for ${agentId}`)
      skippedNeighbors.push(neighborId)
      continue
    }
    const weight = ctx.similarity.similarity(agentId, neighborId) * NEIGHBOR_INFLUENCE_CAP
    neighborInfluence[neighborId] = weight
    likingSum += score.liking * weight
    intentSum += score.purchaseIntent * weight
    totalWeight += weight
  }

  const used = Object.values(neighborInfluence).filter((w) => w > 0).length
  const aggregateLiking = clamp(likingSum / totalWeight)
  const aggregatePurchaseIntent = clamp(intentSum / totalWeight)
  log.debug(
    `${agentId}: liking=${aggregateLiking.toFixed(2)} purchaseIntent=${aggregatePurchaseIntent.toFixed(2)} from ${used} neighbor(s)`
  )

  return {
    agentId,
    aggregateLiking,
    aggregatePurchaseIntent,
    neighborInfluence,
    skippedNeighbors,
    explanation:
      used === 0
        ? 'No neighbor data used; aggregate equals own score.'
        : `Weighted average of own score (weight ${OWN_WEIGHT.toFixed(1)}) and ${used} neighbor(s) by regional similarity.`
  }
}
