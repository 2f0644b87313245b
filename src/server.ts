import cors from 'cors'
import express, { NextFunction, Request, Response } from 'express'
import type { Server } from 'http'
import { z, ZodError } from 'zod'
import { createPanel, type Panel } from './app'
import { loadEnvFiles, loadSettings } from './config'
import {
  InvalidProfileError,
  InvalidScoreError,
  UnknownPersonaError,
  UnknownRegionError,
  errorMessage
} from './errors'
import { error, info } from './logger'
import { aggregateScore } from './scoring/aggregate'

const evaluateBody = z.object({
  content: z.string().min(1),
  category: z.string().optional(),
  agents: z.array(z.string().min(1)).optional(),
  aggregate: z.union([z.boolean(), z.array(z.string())]).optional()
})

const clustersBody = z.object({
  content: z.string().min(1),
  category: z.string().optional(),
  clusters: z.array(z.string().min(1)).optional()
})

const aggregateBody = z.object({
  agentId: z.string().min(1),
  ownScore: z.object({ liking: z.unknown(), purchaseIntent: z.unknown() }).partial().nullish(),
  neighborScores: z.record(z.string(), z.unknown()).optional(),
  adId: z.string().optional()
})

function statusFor(err: unknown) {
  if (err instanceof UnknownRegionError || err instanceof UnknownPersonaError) return 404
  if (err instanceof InvalidScoreError || err instanceof ZodError) return 400
  if (err instanceof InvalidProfileError) return 422
  return 500
}

/** JSON API over a loaded panel. No auth: meant to sit behind whatever fronts it. */
export function createApp(panel: Panel) {
  const { registry, topology, similarity, orchestrator, store } = panel
  const app = express()
  app.use(cors())
  app.use(express.json())

  app.get('/api/regions', (req: Request, res: Response) => {
    const cluster = typeof req.query.cluster === 'string' ? req.query.cluster : undefined
    const ids = cluster ? registry.listByCluster(cluster) : registry.regionIds()
    res.json(ids.map((id) => ({ id, cluster: registry.clusterOf(id) })))
  })

  app.get('/api/regions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const agent = await registry.getOrCreate(req.params.id)
      res.json({ ...agent.region, scoresRecorded: agent.scoreHistory().length })
    } catch (err) {
      next(err)
    }
  })

  app.get('/api/regions/:id/neighbors', (req: Request, res: Response, next: NextFunction) => {
    try {
      const regionId = req.params.id
      const neighbors = topology.neighborsOf(regionId).map((id) => ({
        id,
        similarity: similarity.similarity(regionId, id)
      }))
      res.json({ regionId, neighbors })
    } catch (err) {
      next(err)
    }
  })

  app.post('/api/ads/:adId/evaluate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = evaluateBody.parse(req.body)
      const report = await orchestrator.evaluate(
        { id: req.params.adId, content: body.content, category: body.category },
        body.agents ?? registry.regionIds(),
        { aggregate: body.aggregate ?? true }
      )
      res.json(report)
    } catch (err) {
      next(err)
    }
  })

  app.post('/api/ads/:adId/clusters', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = clustersBody.parse(req.body)
      const comparison = await orchestrator.compareClusters(
        { id: req.params.adId, content: body.content, category: body.category },
        body.clusters
      )
      res.json(comparison)
    } catch (err) {
      next(err)
    }
  })

  app.post('/api/aggregate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = aggregateBody.parse(req.body)
      // without explicit neighbour scores, fall back to what the store holds for the ad
      const neighborScores =
        body.neighborScores ?? (body.adId ? await store.fetchNeighborScores(body.agentId, body.adId) : {})
      res.json(
        aggregateScore({ agentId: body.agentId, ownScore: body.ownScore, neighborScores }, { topology, similarity })
      )
    } catch (err) {
      next(err)
    }
  })

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err)
    if (status === 500) error('Request failed:', err)
    res.status(status).json({ error: err instanceof Error ? err.name : 'Error', message: errorMessage(err) })
  })

  return app
}

export async function startServer(panel: Panel, port = panel.settings.port): Promise<Server> {
  const app = createApp(panel)
  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      info(`Ad panel API listening on http://localhost:${port}`)
      resolve(server)
    })
  })
}

if (require.main === module) {
  loadEnvFiles()
  createPanel(loadSettings())
    .then((panel) => startServer(panel))
    .catch((err: unknown) => {
      console.error('Failed to start server:', errorMessage(err))
      process.exit(1)
    })
}
