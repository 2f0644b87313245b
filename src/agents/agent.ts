import { describeRegion } from '../regions/profiles'
import type { Region } from '../regions/types'
import type { ScoreRecord } from '../scoring/types'

/** One prefecture persona. Lives in the registry cache until invalidated. */
export class RegionAgent {
  readonly id: string
  readonly region: Region
  readonly createdAt: Date
  private readonly history: ScoreRecord[] = []

  constructor(region: Region) {
    this.id = region.id
    this.region = region
    this.createdAt = new Date()
  }

  systemPrompt(): string {
    return [
      `You are a regional advertisement evaluation agent representing ${this.id} prefecture in Japan.`,
      'You judge advertisements from the perspective of the residents of your region.',
      '',
      'Your profile:',
      describeRegion(this.region)
    ].join('\n')
  }

  recordScore(record: ScoreRecord) {
    if (record.agentId !== this.id) {
      throw new Error(`Score for ${record.agentId} cannot be recorded on agent ${this.id}`)
    }
    this.history.push(record)
  }

  scoreHistory(): readonly ScoreRecord[] {
    return [...this.history]
  }

  latestScore(adId: string): ScoreRecord | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].adId === adId) return this.history[i]
    }
    return undefined
  }
}
