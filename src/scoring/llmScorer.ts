import { z } from 'zod'
import { AgentScoringError } from '../errors'
import { callLLM, type CallOptions } from '../llm'
import type { AgentScoringFunction, NeighborScoreMap, ScoreRecord, ScoringRequest } from './types'

const round1 = (n: number) => Math.round(n * 10) / 10

// Models disagree on key casing, so both spellings of purchase intent are accepted.
const llmScoreSchema = z.object({
  liking: z.coerce.number().min(0).max(5),
  purchase_intent: z.coerce.number().min(0).max(5).optional(),
  purchaseIntent: z.coerce.number().min(0).max(5).optional(),
  commentary: z.string().default(''),
  confidence: z.coerce.number().min(0).max(1).optional(),
  neighbors_used: z.array(z.string()).optional(),
  neighborsUsed: z.array(z.string()).optional()
})

export type LlmScorerOptions = CallOptions & {
  // neighbour scores to show the model as context, if any
  neighborHints?: (agentId: string, adId: string) => Promise<NeighborScoreMap>
  defaultConfidence?: number
}

export function buildEvaluationPrompt(request: ScoringRequest, neighbors: NeighborScoreMap = {}): string {
  const { agentId, ad } = request
  const neighborLines = Object.entries(neighbors).map(
    ([id, s]) => `- ${id}: liking=${round1(s.liking)}, purchase_intent=${round1(s.purchaseIntent)}`
  )
  return [
    `TASK: Evaluate the following advertisement from the perspective of ${agentId}.`,
    '',
    'Advertisement:',
    `- ID: ${ad.id}`,
    ad.category ? `- Category: ${ad.category}` : null,
    `- Content: ${ad.content}`,
    '',
    'Neighboring prefecture evaluations:',
    neighborLines.length ? neighborLines.join('\n') : '- none available',
    '',
    'Respond ONLY with a JSON object with these keys:',
    '- liking (number 0-5, one decimal)',
    '- purchase_intent (number 0-5, one decimal)',
    '- confidence (number 0-1)',
    '- commentary (string explaining the evaluation for local residents)',
    '- neighbors_used (array of prefecture names whose opinions influenced you)'
  ]
    .filter((line): line is string => line !== null)
    .join('\n')
}

/** Agent scoring function backed by the configured LLM provider. */
export function createLlmScorer(opts: LlmScorerOptions = {}): AgentScoringFunction {
  const defaultConfidence = opts.defaultConfidence ?? 0.8

  return async (request: ScoringRequest): Promise<ScoreRecord> => {
    const { agentId, ad } = request
    const neighbors = opts.neighborHints ? await opts.neighborHints(agentId, ad.id) : {}
    const prompt = buildEvaluationPrompt(request, neighbors)

    const res = await callLLM(`${request.systemPrompt}\nOutput MUST be compact JSON, no prose.`, prompt, {
      provider: opts.provider,
      model: opts.model,
      retry: opts.retry,
      signal: request.signal
    })
    if (!res.success) throw new AgentScoringError(agentId, ad.id, res.error)

    const parsed = llmScoreSchema.safeParse(res.data)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'reply'}: ${i.message}`)
      throw new AgentScoringError(agentId, ad.id, `unusable reply (${issues.join('; ')})`)
    }

    const v = parsed.data
    const purchaseIntent = v.purchase_intent ?? v.purchaseIntent
    if (purchaseIntent === undefined) {
      throw new AgentScoringError(agentId, ad.id, 'unusable reply (purchase_intent: Required)')
    }
    return Object.freeze({
      agentId,
      adId: ad.id,
      liking: v.liking,
      purchaseIntent,
      commentary: v.commentary,
      confidence: v.confidence ?? defaultConfidence,
      neighborsUsed: Object.freeze([...(v.neighbors_used ?? v.neighborsUsed ?? [])])
    })
  }
}
