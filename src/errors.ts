// Typed failures raised by the panel core. The orchestrator is the only place
// that turns them into report entries instead of rethrowing.

export class UnknownRegionError extends Error {
  readonly regionId: string

  constructor(regionId: string) {
    super(`Unknown region: ${regionId}`)
    this.name = 'UnknownRegionError'
    this.regionId = regionId
  }
}

export class UnknownPersonaError extends Error {
  readonly regionId: string

  constructor(regionId: string) {
    super(`No persona data found for region ${regionId}`)
    this.name = 'UnknownPersonaError'
    this.regionId = regionId
  }
}

export class InvalidProfileError extends Error {
  readonly regionId: string
  readonly issues: string[]

  constructor(regionId: string, issues: string[]) {
    super(`Invalid profile for ${regionId}: ${issues.join('; ')}`)
    this.name = 'InvalidProfileError'
    this.regionId = regionId
    this.issues = issues
  }
}

export class InvalidTopologyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidTopologyError'
  }
}

export class InvalidSimilarityError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidSimilarityError'
  }
}

export class InvalidScoreError extends Error {
  readonly agentId: string

  constructor(agentId: string, message: string) {
    super(`Invalid own score for ${agentId}: ${message}`)
    this.name = 'InvalidScoreError'
    this.agentId = agentId
  }
}

export class AgentScoringError extends Error {
  readonly agentId: string
  readonly adId: string

  constructor(agentId: string, adId: string, message: string, options?: { cause?: unknown }) {
    super(`Scoring failed for ${agentId} on ${adId}: ${message}`, options)
    this.name = 'AgentScoringError'
    this.agentId = agentId
    this.adId = adId
  }
}

export class ScoringTimeoutError extends AgentScoringError {
  readonly timeoutMs: number

  constructor(agentId: string, adId: string, timeoutMs: number) {
    super(agentId, adId, `timed out after ${timeoutMs}ms`)
    this.name = 'ScoringTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
