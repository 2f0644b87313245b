import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { makeRegistry, makeSimilarity, makeTopology, profiles, scriptedScorer } from '../../test/fixtures'
import { PersonaRegistry } from '../agents/registry'
import { AgentScoringError } from '../errors'
import { InMemoryScoreStore } from '../scoring/scoreStore'
import type { AgentScoringFunction, NeighborScoreStore } from '../scoring/types'
import { EvaluationOrchestrator, type OrchestratorOptions } from './orchestrator'

const ad = { id: 'ad-1', content: 'Limited edition green tea', category: 'beverages' }

function setup(scorer: AgentScoringFunction, opts: Partial<OrchestratorOptions> = {}) {
  const registry = opts.registry ?? makeRegistry()
  const orchestrator = new EvaluationOrchestrator({
    registry,
    topology: makeTopology(),
    similarity: makeSimilarity(),
    scorer,
    ...opts
  })
  return { registry, orchestrator }
}

describe('EvaluationOrchestrator.evaluate', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reports a failing agent without losing the others', async () => {
    const { orchestrator } = setup(
      scriptedScorer({
        Tokyo: { liking: 4, purchaseIntent: 3.5 },
        Osaka: new AgentScoringError('Osaka', 'ad-1', 'model down'),
        Kyoto: { liking: 3, purchaseIntent: 3 }
      })
    )
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Osaka', 'Kyoto'])

    expect(report.state).toBe('PARTIAL_FAILURE')
    expect(report.transitions).toEqual(['PENDING', 'SCORING', 'AGGREGATING', 'PARTIAL_FAILURE'])
    expect(report.succeeded).toEqual(['Tokyo', 'Kyoto'])
    expect(report.failed).toEqual([
      {
        agentId: 'Osaka',
        status: 'failed',
        errorName: 'AgentScoringError',
        error: 'Scoring failed for Osaka on ad-1: model down'
      }
    ])
    expect(report.rankings.liking).toEqual([
      { rank: 1, agentId: 'Tokyo', value: 4 },
      { rank: 2, agentId: 'Kyoto', value: 3 }
    ])
    expect(report.averages).toEqual({ liking: 3.5, purchaseIntent: 3.25 })
  })

  it('completes and breaks ranking ties by agent id', async () => {
    const { orchestrator } = setup(
      scriptedScorer({
        Tokyo: { liking: 4, purchaseIntent: 2 },
        Kyoto: { liking: 4, purchaseIntent: 3 },
        Hokkaido: { liking: 3, purchaseIntent: 3 }
      })
    )
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Kyoto', 'Hokkaido'])

    expect(report.state).toBe('COMPLETE')
    expect(report.rankings.liking.map((r) => r.agentId)).toEqual(['Kyoto', 'Tokyo', 'Hokkaido'])
    expect(report.rankings.purchaseIntent.map((r) => [r.rank, r.agentId])).toEqual([
      [1, 'Hokkaido'],
      [2, 'Kyoto'],
      [3, 'Tokyo']
    ])
  })

  it('times out a hanging agent and aborts its call', async () => {
    let seen: AbortSignal | undefined
    const fallback = scriptedScorer({})
    const scorer: AgentScoringFunction = (req) => {
      if (req.agentId !== 'Hokkaido') return fallback(req)
      seen = req.signal
      return new Promise(() => {})
    }
    const { orchestrator } = setup(scorer, { timeoutMs: 20 })
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Hokkaido'])

    expect(report.succeeded).toEqual(['Tokyo'])
    expect(report.failed).toEqual([
      {
        agentId: 'Hokkaido',
        status: 'failed',
        errorName: 'ScoringTimeoutError',
        error: 'Scoring failed for Hokkaido on ad-1: timed out after 20ms'
      }
    ])
    expect(seen?.aborted).toBe(true)
  })

  it('fails unknown agents and scores duplicates once', async () => {
    const scorer = vi.fn(scriptedScorer({}))
    const { orchestrator } = setup(scorer)
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Tokyo', 'Atlantis'])

    expect(scorer).toHaveBeenCalledTimes(1)
    expect(report.results.map((r) => [r.agentId, r.status])).toEqual([
      ['Tokyo', 'succeeded'],
      ['Atlantis', 'failed']
    ])
    expect(report.failed[0].errorName).toBe('UnknownPersonaError')
  })

  it('rejects score records outside the range', async () => {
    const { orchestrator } = setup(scriptedScorer({ Tokyo: { liking: 7, purchaseIntent: 1 } }))
    const report = await orchestrator.evaluate(ad, ['Tokyo'])
    expect(report.failed[0].errorName).toBe('AgentScoringError')
    expect(report.failed[0].error).toMatch(/^Scoring failed for Tokyo on ad-1: invalid score record \(/)
    expect(report.averages).toBeNull()
  })

  it('aggregates with sibling scores from the same run', async () => {
    const { orchestrator } = setup(
      scriptedScorer({
        Tokyo: { liking: 4, purchaseIntent: 3.5 },
        Osaka: { liking: 3, purchaseIntent: 2 }
      })
    )
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Osaka'], { aggregate: true })
    const [tokyo, osaka] = report.results

    expect(report.state).toBe('COMPLETE')
    expect(tokyo).toMatchObject({ status: 'succeeded', aggregate: { neighborInfluence: { Osaka: 0.35 } } })
    if (tokyo.status !== 'succeeded' || osaka.status !== 'succeeded') throw new Error('expected both to succeed')
    expect(tokyo.aggregate?.aggregateLiking).toBeCloseTo(5.05 / 1.35, 10)
    expect(tokyo.aggregate?.aggregatePurchaseIntent).toBeCloseTo(4.2 / 1.35, 10)
    expect(osaka.aggregate?.aggregateLiking).toBeCloseTo(4.4 / 1.35, 10)
    expect(osaka.aggregate?.aggregatePurchaseIntent).toBeCloseTo(3.225 / 1.35, 10)
    // rankings use the own scores
    expect(report.rankings.liking.map((r) => r.value)).toEqual([4, 3])
  })

  it('aggregates only the listed agents', async () => {
    const { orchestrator } = setup(scriptedScorer({}))
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Osaka'], { aggregate: ['Tokyo'] })
    expect(report.results[0]).toHaveProperty('aggregate')
    expect(report.results[1]).not.toHaveProperty('aggregate')
  })

  it('combines stored neighbour scores and records new ones', async () => {
    const topology = makeTopology()
    const store = new InMemoryScoreStore(topology)
    store.seed({ 'ad-1': { Kyoto: { liking: 5, purchaseIntent: 5 }, Osaka: { liking: 0, purchaseIntent: 0 } } })
    const { orchestrator } = setup(
      scriptedScorer({
        Tokyo: { liking: 4, purchaseIntent: 3.5 },
        Osaka: { liking: 3, purchaseIntent: 2 }
      }),
      { topology, store }
    )
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Osaka'], { aggregate: ['Tokyo'] })
    const [tokyo] = report.results
    if (tokyo.status !== 'succeeded') throw new Error('expected Tokyo to succeed')

    expect(tokyo.aggregate?.neighborInfluence).toEqual({ Osaka: 0.35, Kyoto: 0.3 })
    expect(tokyo.aggregate?.aggregateLiking).toBeCloseTo(6.55 / 1.65, 10)
    expect(tokyo.aggregate?.aggregatePurchaseIntent).toBeCloseTo(5.7 / 1.65, 10)
    expect(store.get('ad-1', 'Tokyo')).toMatchObject({ liking: 4, purchaseIntent: 3.5 })
    expect(store.get('ad-1', 'Osaka')).toMatchObject({ liking: 3, purchaseIntent: 2 })
  })

  it('keeps a scored agent succeeded when the store write fails', async () => {
    const store: NeighborScoreStore = {
      fetchNeighborScores: async () => ({}),
      recordScore: () => {
        throw new Error('store down')
      }
    }
    const { orchestrator, registry } = setup(scriptedScorer({ Tokyo: { liking: 4, purchaseIntent: 3.5 } }), { store })
    const report = await orchestrator.evaluate(ad, ['Tokyo'])

    expect(report.state).toBe('COMPLETE')
    expect(report.failed).toEqual([])
    expect(report.results[0]).toMatchObject({ agentId: 'Tokyo', status: 'succeeded', storeError: 'store down' })
    const tokyo = await registry.getOrCreate('Tokyo')
    expect(tokyo.scoreHistory()).toHaveLength(1)
  })

  it('keeps aggregation errors per agent without failing the run', async () => {
    const registry = new PersonaRegistry([
      ...profiles,
      { id: 'Okinawa', cluster: 'tourism-oriented', preferences: [], ageDistribution: { '20s': 1 } }
    ])
    const { orchestrator } = setup(scriptedScorer({}), { registry })
    const report = await orchestrator.evaluate(ad, ['Tokyo', 'Okinawa'], { aggregate: true })

    expect(report.state).toBe('COMPLETE')
    expect(report.results[1]).toMatchObject({
      agentId: 'Okinawa',
      status: 'succeeded',
      aggregationError: 'Unknown region: Okinawa'
    })
    expect(report.results[0]).toMatchObject({ aggregate: { aggregateLiking: 2.5, neighborInfluence: {} } })
  })

  it('announces each state and records scores on the agents', async () => {
    const onStateChange = vi.fn()
    const { orchestrator, registry } = setup(scriptedScorer({ Tokyo: { liking: 4, purchaseIntent: 1 } }), {
      onStateChange
    })
    await orchestrator.evaluate(ad, ['Tokyo'])

    expect(onStateChange.mock.calls).toEqual([
      ['PENDING', 'ad-1'],
      ['SCORING', 'ad-1'],
      ['AGGREGATING', 'ad-1'],
      ['COMPLETE', 'ad-1']
    ])
    const tokyo = await registry.getOrCreate('Tokyo')
    expect(tokyo.latestScore('ad-1')?.liking).toBe(4)
  })
})

describe('EvaluationOrchestrator.compareClusters', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const scorer = scriptedScorer({
    Tokyo: { liking: 4, purchaseIntent: 3 },
    Osaka: { liking: 3, purchaseIntent: 2 },
    Hokkaido: new Error('offline')
  })

  it('compares clusters and reports those without data', async () => {
    const { orchestrator } = setup(scorer)
    const comparison = await orchestrator.compareClusters(ad, ['urban', 'rural', 'industrial'])

    expect(comparison.clusters).toEqual([
      {
        cluster: 'urban',
        status: 'ok',
        agents: ['Tokyo', 'Osaka'],
        agentCount: 2,
        meanLiking: 3.5,
        meanPurchaseIntent: 2.5
      },
      { cluster: 'rural', status: 'no_data', agents: ['Hokkaido'], agentCount: 0 },
      { cluster: 'industrial', status: 'no_data', agents: [], agentCount: 0 }
    ])
    expect(comparison.rankings.liking).toEqual([{ rank: 1, cluster: 'urban', value: 3.5 }])
    expect(comparison.report.failed.map((f) => f.agentId)).toEqual(['Hokkaido'])
  })

  it('covers every known cluster by default', async () => {
    const { orchestrator } = setup(scorer)
    const comparison = await orchestrator.compareClusters(ad)

    expect(comparison.clusters.map((c) => [c.cluster, c.status])).toEqual([
      ['urban', 'ok'],
      ['tourism-oriented', 'ok'],
      ['rural', 'no_data']
    ])
    expect(comparison.rankings.purchaseIntent).toEqual([
      { rank: 1, cluster: 'tourism-oriented', value: 2.5 },
      { rank: 2, cluster: 'urban', value: 2.5 }
    ])
  })
})
