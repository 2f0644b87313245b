export { RegionAgent } from './agents/agent'
export { PersonaRegistry, type AgentFactory, type PersonaRegistryOptions } from './agents/registry'
export { createPanel, type Panel, type PanelOptions } from './app'
export { loadEnvFiles, loadSettings, type Settings } from './config'
export * from './data'
export * from './errors'
export {
  EvaluationOrchestrator,
  type AgentOutcome,
  type ClusterComparison,
  type EvaluateOptions,
  type EvaluationReport,
  type OrchestratorOptions,
  type RunState
} from './evaluation/orchestrator'
export * from './evaluation/ranking'
export { callLLM, extractJSON, type Provider, type RetryPolicy } from './llm'
export { describeRegion, parseRegion } from './regions/profiles'
export { SimilarityMatrix } from './regions/similarity'
export { RegionTopology } from './regions/topology'
export type * from './regions/types'
export { aggregateScore, NEIGHBOR_INFLUENCE_CAP, OWN_WEIGHT } from './scoring/aggregate'
export { buildEvaluationPrompt, createLlmScorer, type LlmScorerOptions } from './scoring/llmScorer'
export { InMemoryScoreStore } from './scoring/scoreStore'
export * from './scoring/types'
export { createApp, startServer } from './server'
