#!/usr/bin/env node
import { createPanel, type Panel } from './app'
import { loadEnvFiles, loadSettings } from './config'
import { loadAdvertisements } from './data'
import { errorMessage } from './errors'
import type { EvaluationReport } from './evaluation/orchestrator'
import { aggregateScore } from './scoring/aggregate'

type Output = { write: (text: string) => void }

const stdout: Output = { write: (text) => console.log(text) }

const json = (value: unknown) => JSON.stringify(value, null, 2)

async function cmdRegions(panel: Panel, cluster: string | undefined, out: Output) {
  const ids = cluster ? panel.registry.listByCluster(cluster) : panel.registry.regionIds()
  out.write(json(ids.map((id) => ({ id, cluster: panel.registry.clusterOf(id) }))))
}

async function cmdNeighbors(panel: Panel, regionId: string, out: Output) {
  if (!regionId) throw new Error('Usage: neighbors <regionId>')
  const neighbors = panel.topology.neighborsOf(regionId).map((id) => ({
    id,
    similarity: panel.similarity.similarity(regionId, id)
  }))
  out.write(json({ regionId, neighbors }))
}

async function cmdEvaluate(panel: Panel, adsPath: string, regionList: string | undefined, out: Output) {
  if (!adsPath) throw new Error('Usage: evaluate <ads.json> [regionId,regionId,...]')
  const ads = await loadAdvertisements(adsPath)
  const targets = regionList ? regionList.split(',').map((s) => s.trim()).filter(Boolean) : panel.registry.regionIds()
  const reports: EvaluationReport[] = []
  for (const ad of ads) {
    reports.push(await panel.orchestrator.evaluate(ad, targets, { aggregate: true }))
  }
  out.write(json(reports))
}

async function cmdClusters(panel: Panel, adsPath: string, out: Output) {
  if (!adsPath) throw new Error('Usage: clusters <ads.json>')
  const ads = await loadAdvertisements(adsPath)
  const comparisons = []
  for (const ad of ads) {
    const { report, ...comparison } = await panel.orchestrator.compareClusters(ad)
    comparisons.push({ ...comparison, failed: report.failed })
  }
  out.write(json(comparisons))
}

async function cmdAggregate(panel: Panel, args: string[], out: Output) {
  const [adId, regionId, liking, purchaseIntent] = args
  if (!adId || !regionId || liking === undefined || purchaseIntent === undefined) {
    throw new Error('Usage: aggregate <adId> <regionId> <liking> <purchaseIntent>')
  }
  const neighborScores = await panel.store.fetchNeighborScores(regionId, adId)
  const result = aggregateScore(
    { agentId: regionId, ownScore: { liking: Number(liking), purchaseIntent: Number(purchaseIntent) }, neighborScores },
    { topology: panel.topology, similarity: panel.similarity }
  )
  const neighborAverage = panel.store.averageFor(adId, Object.keys(neighborScores))
  out.write(json({ ...result, neighborScores, neighborAverage }))
}

export async function run(argv: string[], panel: Panel, out: Output = stdout) {
  const cmd = argv[0]
  if (cmd === 'regions') await cmdRegions(panel, argv[1], out)
  else if (cmd === 'neighbors') await cmdNeighbors(panel, argv[1], out)
  else if (cmd === 'evaluate') await cmdEvaluate(panel, argv[1], argv[2], out)
  else if (cmd === 'clusters') await cmdClusters(panel, argv[1], out)
  else if (cmd === 'aggregate') await cmdAggregate(panel, argv.slice(1), out)
  else return false
  return true
}

function usage() {
  console.log('Usage: ad-panel <command> [args]')
  console.log('Commands:')
  console.log('  regions [cluster]')
  console.log('  neighbors <regionId>')
  console.log('  evaluate <ads.json> [regionId,regionId,...]')
  console.log('  clusters <ads.json>')
  console.log('  aggregate <adId> <regionId> <liking> <purchaseIntent>')
}

async function main(argv: string[]) {
  try {
    loadEnvFiles()
    const panel = await createPanel(loadSettings())
    const handled = await run(argv, panel)
    if (!handled) {
      usage()
      process.exit(1)
    }
  } catch (err) {
    console.error('Error:', errorMessage(err))
    process.exit(1)
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}
