import { spawn } from 'child_process'
import ollama from 'ollama'
import { debug, warn } from './logger'

const modelSettings: Record<string, { maxContext: number }> = {
  'llama3.2': {
    maxContext: 128000
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'qwen2.5:7b': {
    maxContext: 32000
  }
}

const MODEL_MAX_CTX = 128000

export type JSONObject = Record<string, unknown>

export type LLMResponse = { success: true; data: JSONObject; raw: string } | { success: false; error: string }

export const PROVIDERS = ['ollama', 'ollama-cli'] as const

export type Provider = (typeof PROVIDERS)[number]

export type RetryPolicy = {
  maxAttempts: number
  // delay before retry n (1-based) is backoffMs[n - 1], the last entry repeats
  backoffMs: number[]
}

export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, backoffMs: [200, 400] }

export type CallOptions = {
  provider?: Provider
  model?: string
  retry?: RetryPolicy
  signal?: AbortSignal
}

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value)
}

export function backoffFor(policy: RetryPolicy, retry: number): number {
  if (!policy.backoffMs.length) return 0
  return policy.backoffMs[Math.min(retry, policy.backoffMs.length) - 1]
}

export async function runCLI(command: string, args: string[], input: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], signal })
    let out = ''
    let err = ''

    child.stdout.on('data', (chunk) => (out += String(chunk)))
    child.stderr.on('data', (chunk) => (err += String(chunk)))

    child.on('error', (e) => reject(e))
    child.on('close', (code) => {
      if (code !== 0) {
        return reject(new Error(`CLI exited ${code}: ${err}`))
      }
      resolve(out)
    })

    if (input) {
      child.stdin.write(input)
    }
    child.stdin.end()
  })
}

function isObject(value: unknown): value is JSONObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function unwrap(obj: JSONObject): JSONObject {
  for (const key of ['text', 'message', 'content']) {
    const nested = obj[key]
    if (typeof nested !== 'string') continue
    const inner = tryParse(nested)
    if (isObject(inner)) return inner
  }
  return obj
}

/**
 * Pull the first usable JSON object out of a model reply. Models often wrap
 * the object in prose or a code fence, or nest it as a string under
 * `text` / `message` / `content`.
 */
export function extractJSON(fullMessage: string): JSONObject | null {
  const direct = tryParse(fullMessage.trim())
  if (isObject(direct)) return unwrap(direct)

  const fenced = fullMessage.match(/```(?:json)?\s*([\s\S]*?)```/)
  if (fenced) {
    const inner = tryParse(fenced[1].trim())
    if (isObject(inner)) return unwrap(inner)
  }

  const greedy = fullMessage.match(/\{[\s\S]*\}/)
  if (greedy) {
    const parsed = tryParse(greedy[0])
    if (isObject(parsed)) return unwrap(parsed)
  }

  for (const m of fullMessage.matchAll(/\{[^{}]*\}/g)) {
    const parsed = tryParse(m[0])
    if (isObject(parsed) && Object.keys(parsed).length > 0) return parsed
  }
  return null
}

async function callOllama(systemPrompt: string, userQuery: string, model: string, signal?: AbortSignal) {
  const response = await ollama.chat({
    model,
    format: 'json',
    options: {
      num_ctx: modelSettings[model]?.maxContext || MODEL_MAX_CTX,
      temperature: 0.2
    },
    stream: true,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  const onAbort = () => response.abort()
  signal?.addEventListener('abort', onAbort, { once: true })
  try {
    let fullMessage = ''
    for await (const chunk of response) {
      if (chunk.message?.content) {
        fullMessage += chunk.message.content
      }
    }
    return fullMessage
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}

async function callOllamaCLI(systemPrompt: string, userQuery: string, model: string, signal?: AbortSignal) {
  const combined = `${systemPrompt}\n${userQuery}`
  return runCLI('ollama', ['run', model, combined, '--format', 'json'], '', signal)
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms))

/**
 * callLLM - provider-agnostic chat call that returns a parsed JSON object.
 * Retries follow the given policy; a reply without any JSON object counts as a
 * failed attempt.
 */
export async function callLLM(systemPrompt: string, userQuery: string, opts: CallOptions = {}): Promise<LLMResponse> {
  const provider = opts.provider ?? 'ollama'
  const model = opts.model ?? 'llama3.2'
  const retry = opts.retry ?? DEFAULT_RETRY
  const attempts = Math.max(1, retry.maxAttempts)

  const tokenCount = `${systemPrompt}\n${userQuery}`.length / 4 // rough estimate
  debug('LLM token count', tokenCount)
  const maxContext = modelSettings[model]?.maxContext || MODEL_MAX_CTX
  if (tokenCount > maxContext) {
    warn(`LLM prompt token count (${tokenCount}) exceeds model max context (${maxContext}).`)
  }

  let lastErr: unknown = null
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (opts.signal?.aborted) break
    try {
      const raw =
        provider === 'ollama'
          ? await callOllama(systemPrompt, userQuery, model, opts.signal)
          : await callOllamaCLI(systemPrompt, userQuery, model, opts.signal)

      debug('LLM raw response', raw)
      const data = extractJSON(raw)
      if (!data) throw new Error('LLM reply contained no JSON object')
      return { success: true, data, raw }
    } catch (err) {
      lastErr = err
      debug(`LLM attempt ${attempt} failed`, err)
      if (attempt < attempts && !opts.signal?.aborted) {
        await sleep(backoffFor(retry, attempt))
      }
    }
  }

  if (opts.signal?.aborted && lastErr === null) lastErr = new Error('aborted')
  return { success: false, error: lastErr instanceof Error ? lastErr.message : String(lastErr) }
}
