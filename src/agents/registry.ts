import { UnknownPersonaError } from '../errors'
import { scoped } from '../logger'
import { parseRegion } from '../regions/profiles'
import type { Region, RegionProfileData } from '../regions/types'
import { RegionAgent } from './agent'

const log = scoped('registry')

export type AgentFactory = (region: Region) => RegionAgent | Promise<RegionAgent>

export type PersonaRegistryOptions = {
  createAgent?: AgentFactory
}

export type RegistryInfo = {
  totalProfiles: number
  totalCachedAgents: number
  cachedAgents: Record<string, { cluster: string | null; scoresRecorded: number }>
}

const defaultFactory: AgentFactory = (region) => new RegionAgent(region)

function clusterOf(data: RegionProfileData) {
  return typeof data.cluster === 'string' ? data.cluster : null
}

/**
 * Lazily builds one agent per region and keeps it until invalidated.
 * Entries are the creation promises themselves, so concurrent first access
 * shares a single construction.
 */
export class PersonaRegistry {
  private readonly profiles: Map<string, RegionProfileData>
  private readonly createAgent: AgentFactory
  private readonly cache = new Map<string, Promise<RegionAgent>>()
  private readonly resolved = new Map<string, RegionAgent>()

  constructor(profiles: Iterable<RegionProfileData & { id: string }>, opts: PersonaRegistryOptions = {}) {
    this.profiles = new Map()
    for (const p of profiles) this.profiles.set(p.id, p)
    this.createAgent = opts.createAgent ?? defaultFactory
  }

  getOrCreate(regionId: string): Promise<RegionAgent> {
    const cached = this.cache.get(regionId)
    if (cached) return cached

    const data = this.profiles.get(regionId)
    if (!data) return Promise.reject(new UnknownPersonaError(regionId))

    const pending = this.construct(regionId, data)
    this.cache.set(regionId, pending)
    void pending.then(
      (agent) => {
        // an invalidate() while this was in flight must win
        if (this.cache.get(regionId) === pending) this.resolved.set(regionId, agent)
      },
      (err: unknown) => {
        if (this.cache.get(regionId) === pending) this.cache.delete(regionId)
        log.warn(`Failed to create agent for ${regionId}:`, err instanceof Error ? err.message : err)
      }
    )
    return pending
  }

  private async construct(regionId: string, data: RegionProfileData) {
    const region = parseRegion(data, regionId)
    const agent = await this.createAgent(region)
    log.debug(`Created agent for ${regionId}`)
    return agent
  }

  getMany(regionIds: string[]): Promise<RegionAgent[]> {
    return Promise.all(regionIds.map((id) => this.getOrCreate(id)))
  }

  invalidate(regionId: string): boolean {
    this.resolved.delete(regionId)
    const had = this.cache.delete(regionId)
    if (had) log.debug(`Invalidated agent ${regionId}`)
    return had
  }

  invalidateAll() {
    const n = this.cache.size
    this.cache.clear()
    this.resolved.clear()
    log.info(`Cleared agent cache (${n} entries)`)
  }

  has(regionId: string) {
    return this.profiles.has(regionId)
  }

  regionIds(): string[] {
    return Array.from(this.profiles.keys())
  }

  clusterOf(regionId: string): string | null {
    const data = this.profiles.get(regionId)
    if (!data) throw new UnknownPersonaError(regionId)
    return clusterOf(data)
  }

  listByCluster(cluster: string): string[] {
    return this.regionIds().filter((id) => clusterOf(this.profiles.get(id) ?? {}) === cluster)
  }

  listByArea(area: string): string[] {
    return this.regionIds().filter((id) => this.profiles.get(id)?.area === area)
  }

  /** Distinct cluster labels in profile order. */
  clusters(): string[] {
    const out = new Set<string>()
    for (const data of this.profiles.values()) {
      const c = clusterOf(data)
      if (c) out.add(c)
    }
    return Array.from(out)
  }

  cachedIds(): string[] {
    return Array.from(this.cache.keys())
  }

  info(): RegistryInfo {
    const cachedAgents: RegistryInfo['cachedAgents'] = {}
    for (const [id, agent] of this.resolved) {
      cachedAgents[id] = { cluster: agent.region.cluster, scoresRecorded: agent.scoreHistory().length }
    }
    return {
      totalProfiles: this.profiles.size,
      // creations still in flight are not counted
      totalCachedAgents: this.resolved.size,
      cachedAgents
    }
  }
}
