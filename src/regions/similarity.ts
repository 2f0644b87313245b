import { parse } from 'csv-parse/sync'
import { InvalidSimilarityError } from '../errors'
import type { SimilarityEntry } from './types'

type CsvRow = Record<string, string>

/**
 * Directed cultural/regional similarity between a region and its neighbors.
 * Missing pairs carry no influence.
 */
export class SimilarityMatrix {
  private readonly table = new Map<string, Map<string, number>>()

  constructor(entries: Iterable<SimilarityEntry> = []) {
    for (const e of entries) {
      if (!Number.isFinite(e.similarity) || e.similarity < 0 || e.similarity > 1) {
        throw new InvalidSimilarityError(
          `Similarity ${e.region}->${e.neighbor} must be within [0,1], got ${e.similarity}`
        )
      }
      if (e.region === e.neighbor) {
        throw new InvalidSimilarityError(`Similarity of ${e.region} with itself is not allowed`)
      }
      let row = this.table.get(e.region)
      if (!row) {
        row = new Map()
        this.table.set(e.region, row)
      }
      row.set(e.neighbor, e.similarity)
    }
  }

  get(region: string, neighbor: string): number | undefined {
    return this.table.get(region)?.get(neighbor)
  }

  similarity(region: string, neighbor: string): number {
    return this.get(region, neighbor) ?? 0
  }

  entries(): SimilarityEntry[] {
    const out: SimilarityEntry[] = []
    for (const [region, row] of this.table) {
      for (const [neighbor, similarity] of row) out.push({ region, neighbor, similarity })
    }
    return out
  }

  get size() {
    let n = 0
    for (const row of this.table.values()) n += row.size
    return n
  }

  static fromNested(nested: Record<string, Record<string, number>>) {
    const entries: SimilarityEntry[] = []
    for (const [region, row] of Object.entries(nested)) {
      for (const [neighbor, similarity] of Object.entries(row)) entries.push({ region, neighbor, similarity })
    }
    return new SimilarityMatrix(entries)
  }

  /** Parse `region,neighbor,similarity` CSV text (header row required). */
  static fromCsv(text: string) {
    const records: CsvRow[] = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true
    })

    const entries = records.map((row, i): SimilarityEntry => {
      const { region, neighbor } = row
      const raw = row.similarity
      if (!region || !neighbor || raw === undefined || raw === '') {
        throw new InvalidSimilarityError(`Similarity CSV row ${i + 2} needs region, neighbor and similarity`)
      }
      return { region, neighbor, similarity: Number(raw) }
    })
    return new SimilarityMatrix(entries)
  }
}
