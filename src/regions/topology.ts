import { InvalidTopologyError, UnknownRegionError } from '../errors'
import { warn } from '../logger'
import type { AdjacencyGraph, Asymmetry } from './types'

function validate(graph: Map<string, readonly string[]>) {
  const problems: string[] = []
  for (const [id, neighbors] of graph) {
    const seen = new Set<string>()
    for (const n of neighbors) {
      if (n === id) problems.push(`${id} lists itself as a neighbor`)
      else if (!graph.has(n)) problems.push(`${id} lists unknown neighbor ${n}`)
      if (seen.has(n)) problems.push(`${id} lists ${n} more than once`)
      seen.add(n)
    }
  }
  if (problems.length) throw new InvalidTopologyError(`Invalid adjacency graph: ${problems.join('; ')}`)
}

export class RegionTopology {
  private readonly graph: Map<string, readonly string[]>

  constructor(adjacency: AdjacencyGraph) {
    this.graph = new Map(Object.entries(adjacency).map(([id, ns]) => [id, Object.freeze([...ns])]))
    validate(this.graph)

    const asym = this.asymmetries()
    if (asym.length) {
      warn(
        `Adjacency graph has ${asym.length} one-way edge(s):`,
        asym.map((a) => `${a.from}->${a.to}`).join(', ')
      )
    }
  }

  /** Neighbors of a region in stored order. */
  neighborsOf(regionId: string): readonly string[] {
    const neighbors = this.graph.get(regionId)
    if (!neighbors) throw new UnknownRegionError(regionId)
    return neighbors
  }

  has(regionId: string) {
    return this.graph.has(regionId)
  }

  regionIds(): string[] {
    return Array.from(this.graph.keys())
  }

  /** Edges A->B where B does not list A back. A data-quality warning only. */
  asymmetries(): Asymmetry[] {
    const out: Asymmetry[] = []
    for (const [from, neighbors] of this.graph) {
      for (const to of neighbors) {
        if (!this.graph.get(to)?.includes(from)) out.push({ from, to })
      }
    }
    return out
  }

  toJSON(): AdjacencyGraph {
    const out: AdjacencyGraph = {}
    for (const [id, ns] of this.graph) out[id] = [...ns]
    return out
  }
}
