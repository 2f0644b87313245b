import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'path'
import { z } from 'zod'
import { DEFAULT_DATA_DIR } from './data'
import { PROVIDERS, type Provider, type RetryPolicy } from './llm'

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  DATA_DIR: z.string().min(1).optional(),
  LLM_PROVIDER: z.enum(PROVIDERS).default('ollama'),
  LLM_MODEL: z.string().min(1).default('llama3.2'),
  LLM_MAX_ATTEMPTS: intFrom(3),
  LLM_BACKOFF_MS: z
    .string()
    .default('200,400')
    .transform((s) => s.split(',').map((v) => v.trim()).filter(Boolean).map(Number))
    .refine((ms) => ms.every((n) => Number.isFinite(n) && n >= 0), { message: 'must be comma separated milliseconds' }),
  SCORING_TIMEOUT_MS: intFrom(60_000),
  MAX_NEIGHBORS: intFrom(5),
  PORT: intFrom(3000)
})

export type Settings = {
  dataDir: string
  llm: {
    provider: Provider
    model: string
    retry: RetryPolicy
  }
  scoringTimeoutMs: number
  maxNeighbors: number
  port: number
}

let envLoaded = false

/** Load `.env`, `.env.local`, `.env.<NODE_ENV>` from the project root once. */
export function loadEnvFiles() {
  if (envLoaded) return
  dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
  envLoaded = true
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid configuration: ${issues.join('; ')}`)
  }
  const e = parsed.data
  return {
    dataDir: e.DATA_DIR ? path.resolve(appRootPath.path, e.DATA_DIR) : DEFAULT_DATA_DIR,
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      retry: { maxAttempts: e.LLM_MAX_ATTEMPTS, backoffMs: e.LLM_BACKOFF_MS }
    },
    scoringTimeoutMs: e.SCORING_TIMEOUT_MS,
    maxNeighbors: e.MAX_NEIGHBORS,
    port: e.PORT
  }
}
