export type AgeDistribution = Readonly<Record<string, number>>

export interface Region {
  readonly id: string
  readonly population: number | null
  readonly ageDistribution: AgeDistribution
  readonly preferences: readonly string[]
  readonly cluster: string | null
  // broader grouping such as Kanto or Kansai
  readonly area: string | null
}

/** A profile record as supplied by the data source, before validation. */
export type RegionProfileData = {
  id?: unknown
  population?: unknown
  ageDistribution?: unknown
  preferences?: unknown
  cluster?: unknown
  area?: unknown
}

export type AdjacencyGraph = Record<string, string[]>

export type SimilarityEntry = {
  region: string
  neighbor: string
  similarity: number
}

export type Asymmetry = {
  from: string
  to: string
}
