import { describe, expect, it, vi } from 'vitest'
import { InferenceClient, GENERATION_PARAMETERS } from '../inference-client'

const encoder = new TextEncoder()

function sseResponse(...chunks: string[]): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk))
      controller.close()
    },
  })
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } })
}

const delta = (content: string) => `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`

function createClient(fetchImpl: typeof fetch) {
  return new InferenceClient({
    baseUrl: 'http://inference.test/',
    apiToken: 'test-token',
    model: 'test-model',
    fetchImpl,
  })
}

describe('InferenceClient.streamChat', () => {
  it('posts a streaming chat completion request', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => sseResponse(delta('hi'), 'data: [DONE]\n\n'))
    const client = createClient(fetchImpl)

    const fragments: string[] = []
    for await (const fragment of client.streamChat([{ role: 'user', content: 'hello' }])) {
      fragments.push(fragment)
    }

    expect(fragments).toEqual(['hi'])
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    const [url, init] = fetchImpl.mock.calls[0]
    expect(url).toBe('http://inference.test/v1/chat/completions')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' })
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hello' }],
      ...GENERATION_PARAMETERS,
      stream: true,
    })
  })

  it('reassembles events split across chunks and stops at [DONE]', async () => {
    const event = delta('world')
    const client = createClient(async () =>
      sseResponse(
        delta('Hello '),
        event.slice(0, 10),
        event.slice(10),
        ': keep-alive\n',
        'data: {not json}\n\n',
        'data: [DONE]\n\n',
        delta('ignored')
      )
    )

    const fragments: string[] = []
    for await (const fragment of client.streamChat([{ role: 'user', content: 'x' }])) {
      fragments.push(fragment)
    }

    expect(fragments).toEqual(['Hello ', 'world'])
  })

  it('cancels the response body once [DONE] arrives', async () => {
    const cancel = vi.fn()
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode(delta('x')))
        controller.enqueue(encoder.encode('data: [DONE]\n\n'))
      },
      cancel,
    })
    const client = createClient(async () => new Response(body, { status: 200 }))

    await expect(client.generate('system', 'user')).resolves.toEqual({ content: 'x', outcome: 'ok' })
    expect(cancel).toHaveBeenCalledTimes(1)
    expect(body.locked).toBe(false)
  })

  it('cancels the response body when the consumer stops early', async () => {
    const cancel = vi.fn()
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode(delta('first')))
        controller.enqueue(encoder.encode(delta('second')))
      },
      cancel,
    })
    const client = createClient(async () => new Response(body, { status: 200 }))

    for await (const fragment of client.streamChat([{ role: 'user', content: 'x' }])) {
      expect(fragment).toBe('first')
      break
    }

    expect(cancel).toHaveBeenCalledTimes(1)
    expect(body.locked).toBe(false)
  })
})

describe('InferenceClient.generate', () => {
  it('concatenates and trims the streamed text', async () => {
    const client = createClient(async () => sseResponse(delta('  # Resume'), delta('\n\nBody  '), 'data: [DONE]\n\n'))

    await expect(client.generate('system', 'user')).resolves.toEqual({ content: '# Resume\n\nBody', outcome: 'ok' })
  })

  it.each([
    ['usage limit', async () => new Response(null, { status: 402 }), 'usage_limit', 'Service temporarily unavailable.'],
    ['provider error', async () => new Response('boom', { status: 500 }), 'provider_error', 'Unable to generate content at this time.'],
    [
      'transport failure',
      async () => {
        throw new TypeError('fetch failed')
      },
      'failed',
      'Content generation failed.',
    ],
  ])('maps a %s to placeholder text', async (_label, impl: () => Promise<Response>, outcome, content) => {
    const client = createClient(impl)

    await expect(client.generate('system', 'user')).resolves.toEqual({ content, outcome })
  })

  it('memoizes successful results per prompt pair', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => sseResponse(delta('cached')))
    const client = createClient(fetchImpl)

    await client.generate('system', 'user')
    const second = await client.generate('system', 'user')
    await client.generate('system', 'other user')

    expect(second).toEqual({ content: 'cached', outcome: 'ok' })
    expect(fetchImpl).toHaveBeenCalledTimes(2)

    client.clearCache()
    await client.generateContent('system', 'user')
    expect(fetchImpl).toHaveBeenCalledTimes(3)
  })

  it('does not memoize failures', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('boom', { status: 503 }))
      .mockResolvedValueOnce(sseResponse(delta('recovered')))
    const client = createClient(fetchImpl)

    expect((await client.generate('s', 'u')).outcome).toBe('provider_error')
    await expect(client.generateContent('s', 'u')).resolves.toBe('recovered')
  })
})
