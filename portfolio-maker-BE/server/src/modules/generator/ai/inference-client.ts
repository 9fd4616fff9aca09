/**
 * Client for the hosted text-generation endpoint (OpenAI-compatible chat
 * completions with SSE streaming).
 *
 * `streamChat` is the raw fragment producer and throws provider errors.
 * `generate`/`generateContent` sit on top of it: they concatenate the stream,
 * memoize successful results, and turn every failure into fixed placeholder text.
 */

import type { Logger } from 'pino'
import { GENERATION_FALLBACK_TEXT, type GenerationOutcome, type GenerationResponseData } from '@shared/types'
import { env } from '../../../config/env'
import { logger } from '../../../logger'
import { ProviderError, ProviderUsageLimitError } from '../../errors'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export const GENERATION_PARAMETERS = {
  max_tokens: 2048,
  temperature: 0.7,
} as const

const MEMO_CAPACITY = 100
const USAGE_LIMIT_STATUS = 402

type StreamChunk = {
  choices?: Array<{ delta?: { content?: string | null } }>
}

export interface InferenceClientOptions {
  baseUrl?: string
  apiToken?: string
  model?: string
  fetchImpl?: typeof fetch
  log?: Logger
}

export class InferenceClient {
  private readonly baseUrl: string
  private readonly apiToken: string
  private readonly model: string
  private readonly fetchImpl: typeof fetch
  private readonly log: Logger
  private readonly memo = new Map<string, string>()

  constructor(options: InferenceClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.INFERENCE_BASE_URL).replace(/\/+$/, '')
    this.apiToken = options.apiToken ?? env.INFERENCE_API_TOKEN
    this.model = options.model ?? env.INFERENCE_MODEL
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.log = options.log ?? logger.child({ module: 'InferenceClient' })
  }

  /**
   * Stream a chat completion, yielding content fragments in arrival order.
   * Each iteration issues a fresh request.
   */
  async *streamChat(messages: ChatMessage[]): AsyncGenerator<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'text/event-stream',
        Authorization: `Bearer ${this.apiToken}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        ...GENERATION_PARAMETERS,
        stream: true,
      }),
    })

    if (response.status === USAGE_LIMIT_STATUS) {
      throw new ProviderUsageLimitError(response.status)
    }

    if (!response.ok || !response.body) {
      const body = await response.text().catch(() => '')
      throw new ProviderError(`Inference request failed (HTTP ${response.status}): ${body.slice(0, 200)}`, response.status)
    }

    const reader = response.body.getReader()
    const decoder = new TextDecoder()
    let buffer = ''

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        buffer += decoder.decode(value, { stream: true })
        const lines = buffer.split('\n')
        buffer = lines.pop() ?? ''

        for (const line of lines) {
          const fragment = this.parseLine(line)
          if (fragment === null) return
          if (fragment) yield fragment
        }
      }

      buffer += decoder.decode()
      const trailing = this.parseLine(buffer)
      if (trailing) yield trailing
    } finally {
      // Release the provider connection however the loop ends.
      await reader.cancel().catch((err: unknown) => this.log.debug({ err }, 'Stream cancel failed'))
      reader.releaseLock()
    }
  }

  /**
   * Content of one SSE line: '' for lines without content, null at [DONE].
   */
  private parseLine(line: string): string | null {
    const trimmed = line.trim()
    if (!trimmed.startsWith('data:')) return ''
    const data = trimmed.slice(5).trim()
    if (data === '[DONE]') return null

    try {
      const parsed: StreamChunk = JSON.parse(data)
      return parsed.choices?.[0]?.delta?.content ?? ''
    } catch {
      this.log.debug({ data: data.slice(0, 100) }, 'Skipping malformed stream chunk')
      return ''
    }
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<GenerationResponseData> {
    const key = JSON.stringify([systemPrompt, userPrompt])
    const cached = this.memo.get(key)
    if (cached !== undefined) {
      return { content: cached, outcome: 'ok' }
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt },
    ]

    let text = ''
    try {
      for await (const fragment of this.streamChat(messages)) {
        text += fragment
      }
    } catch (err) {
      const outcome = this.classify(err)
      this.log.error({ err, outcome }, 'Content generation failed')
      return { content: GENERATION_FALLBACK_TEXT[outcome], outcome }
    }

    const content = text.trim()
    this.remember(key, content)
    return { content, outcome: 'ok' }
  }

  async generateContent(systemPrompt: string, userPrompt: string): Promise<string> {
    return (await this.generate(systemPrompt, userPrompt)).content
  }

  clearCache(): void {
    this.memo.clear()
  }

  private classify(err: unknown): Exclude<GenerationOutcome, 'ok'> {
    if (err instanceof ProviderUsageLimitError) return 'usage_limit'
    if (err instanceof ProviderError) return 'provider_error'
    return 'failed'
  }

  private remember(key: string, content: string): void {
    if (this.memo.size >= MEMO_CAPACITY) {
      const oldest = this.memo.keys().next()
      if (!oldest.done) this.memo.delete(oldest.value)
    }
    this.memo.set(key, content)
  }
}

let inferenceClient: InferenceClient | null = null

export function getInferenceClient(): InferenceClient {
  if (!inferenceClient) {
    inferenceClient = new InferenceClient()
  }
  return inferenceClient
}
