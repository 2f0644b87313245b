import fs from 'fs'
import path from 'path'
import { PersonaRegistry } from './agents/registry'
import type { Settings } from './config'
import { DATA_FILES, loadAdjacency, loadRegionProfiles, loadSeedScores, loadSimilarity } from './data'
import { EvaluationOrchestrator, type RunState } from './evaluation/orchestrator'
import { info, warn } from './logger'
import type { SimilarityMatrix } from './regions/similarity'
import { RegionTopology } from './regions/topology'
import { createLlmScorer } from './scoring/llmScorer'
import { InMemoryScoreStore } from './scoring/scoreStore'
import type { AgentScoringFunction } from './scoring/types'

export type Panel = {
  settings: Settings
  registry: PersonaRegistry
  topology: RegionTopology
  similarity: SimilarityMatrix
  store: InMemoryScoreStore
  orchestrator: EvaluationOrchestrator
}

export type PanelOptions = {
  // defaults to the LLM-backed scorer from settings
  scorer?: AgentScoringFunction
  onStateChange?: (state: RunState, adId: string) => void
}

/** Load the static data once and wire registry, store and orchestrator together. */
export async function createPanel(settings: Settings, opts: PanelOptions = {}): Promise<Panel> {
  const file = (name: string) => path.join(settings.dataDir, name)

  const regions = await loadRegionProfiles(file(DATA_FILES.regions))
  const topology = new RegionTopology(await loadAdjacency(file(DATA_FILES.adjacency)))
  const similarity = await loadSimilarity(file(DATA_FILES.similarity))

  const withoutProfile = topology.regionIds().filter((id) => !regions.some((r) => r.id === id))
  if (withoutProfile.length) warn(`Regions in the adjacency graph without a profile: ${withoutProfile.join(', ')}`)

  const registry = new PersonaRegistry(regions)
  const store = new InMemoryScoreStore(topology, { maxNeighbors: settings.maxNeighbors })
  if (fs.existsSync(file(DATA_FILES.scores))) {
    store.seed(await loadSeedScores(file(DATA_FILES.scores)))
  }

  const scorer =
    opts.scorer ??
    createLlmScorer({
      provider: settings.llm.provider,
      model: settings.llm.model,
      retry: settings.llm.retry,
      neighborHints: (agentId, adId) => store.fetchNeighborScores(agentId, adId)
    })

  const orchestrator = new EvaluationOrchestrator({
    registry,
    topology,
    similarity,
    scorer,
    store,
    timeoutMs: settings.scoringTimeoutMs,
    onStateChange: opts.onStateChange
  })

  info(`Panel ready: ${regions.length} regions, ${similarity.size} similarity entries`)
  return { settings, registry, topology, similarity, store, orchestrator }
}
