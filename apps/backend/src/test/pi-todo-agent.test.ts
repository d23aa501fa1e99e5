import type { Api, AssistantMessageEvent, Context, Model, SimpleStreamOptions } from '@mariozechner/pi-ai'
import { describe, expect, it } from 'vitest'
import type { AgentStreamEvent } from '../agent/agent-types.js'
import { PiTodoAgent, resolveCatalogModel } from '../agent/pi-todo-agent.js'

const FAKE_MODEL = { id: 'test-model', provider: 'test-provider', api: 'openai-completions' } as unknown as Model<Api>

function textDelta(delta: string): AssistantMessageEvent {
  return { type: 'text_delta', contentIndex: 0, delta, partial: {} } as unknown as AssistantMessageEvent
}

function done(content: unknown[]): AssistantMessageEvent {
  return {
    type: 'done',
    reason: 'stop',
    message: { role: 'assistant', content },
  } as unknown as AssistantMessageEvent
}

function failure(errorMessage: string): AssistantMessageEvent {
  return {
    type: 'error',
    reason: 'error',
    error: { role: 'assistant', content: [], errorMessage },
  } as unknown as AssistantMessageEvent
}

function createAgent(events: AssistantMessageEvent[]) {
  const calls: Array<{ model: Model<Api>; context: Context; options?: SimpleStreamOptions }> = []
  const agent = new PiTodoAgent({
    model: { provider: 'test-provider', modelId: 'test-model' },
    apiKey: 'test-secret',
    resolveModel: () => FAKE_MODEL,
    now: () => 1_700_000_000_000,
    streamFn: async function* (model, context, options) {
      calls.push({ model, context, options })
      for (const event of events) {
        yield event
      }
    },
  })

  return { agent, calls }
}

async function collect<T>(events: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = []
  for await (const event of events) {
    collected.push(event)
  }
  return collected
}

describe('PiTodoAgent', () => {
  it('streams text deltas as tokens and ends with the final text', async () => {
    const { agent, calls } = createAgent([
      textDelta('Hi'),
      textDelta(''),
      textDelta(' there'),
      done([{ type: 'text', text: 'Hi there' }]),
    ])

    const events = await collect(
      agent.decide({ utterance: 'hello', history: [{ role: 'user', content: 'earlier question' }] }),
    )

    expect(events).toEqual<AgentStreamEvent[]>([
      { type: 'token', content: 'Hi' },
      { type: 'token', content: ' there' },
      { type: 'final', content: 'Hi there' },
    ])

    expect(calls).toHaveLength(1)
    expect(calls[0]?.model).toBe(FAKE_MODEL)
    expect(calls[0]?.options).toEqual({ apiKey: 'test-secret' })
    expect(calls[0]?.context.tools?.map((tool) => tool.name)).toEqual([
      'create_todo',
      'read_todos',
      'update_todo',
      'delete_todo',
      'search_todos',
    ])
    expect(calls[0]?.context.messages).toEqual([{ role: 'user', content: 'hello', timestamp: 1_700_000_000_000 }])
    expect(calls[0]?.context.systemPrompt).toContain('User: earlier question')
  })

  it('emits the first tool call from the final message', async () => {
    const { agent } = createAgent([
      done([
        { type: 'toolCall', id: 'call-1', name: 'delete_todo', arguments: { todo_id: 3 } },
        { type: 'toolCall', id: 'call-2', name: 'read_todos', arguments: {} },
      ]),
    ])

    const events = await collect(agent.decide({ utterance: 'Delete todo 3', history: [] }))

    expect(events).toEqual<AgentStreamEvent[]>([
      { type: 'tool_call', name: 'delete_todo', arguments: { todo_id: 3 } },
      { type: 'final', content: '' },
    ])
  })

  it('synthesizes from search results without tools', async () => {
    const { agent, calls } = createAgent([textDelta('You have one exam todo.'), done([{ type: 'text', text: 'You have one exam todo.' }])])

    const events = await collect(
      agent.synthesize({
        utterance: 'Find todos related to exams',
        history: [],
        query: 'exams',
        results: [
          {
            id: 4,
            title: 'Study for exam',
            description: null,
            created_at: '2026-01-01T00:00:00.000Z',
            text: 'Study for exam',
            score: 3,
          },
        ],
      }),
    )

    expect(events).toEqual([
      { type: 'token', content: 'You have one exam todo.' },
      { type: 'final', content: 'You have one exam todo.' },
    ])
    expect(calls[0]?.context.tools).toBeUndefined()
    expect(calls[0]?.context.systemPrompt).toContain('- [ID: 4] Study for exam')
    expect(calls[0]?.context.systemPrompt).toContain('Search query: exams')
  })

  it('throws on model error events', async () => {
    const { agent } = createAgent([textDelta('partial'), failure('quota exceeded')])

    await expect(collect(agent.decide({ utterance: 'hello', history: [] }))).rejects.toThrow('quota exceeded')
  })

  it('throws when the stream ends without a final message', async () => {
    const { agent } = createAgent([textDelta('partial')])

    await expect(collect(agent.decide({ utterance: 'hello', history: [] }))).rejects.toThrow(
      'Model stream ended without a final message',
    )
  })

  it('throws when the model cannot be resolved', async () => {
    const agent = new PiTodoAgent({
      model: { provider: 'nowhere', modelId: 'missing' },
      resolveModel: () => undefined,
      streamFn: async function* () {},
    })

    await expect(collect(agent.decide({ utterance: 'hello', history: [] }))).rejects.toThrow(
      'Unable to resolve model nowhere/missing.',
    )
  })
})

describe('resolveCatalogModel', () => {
  it('returns undefined for unknown providers', () => {
    expect(resolveCatalogModel({ provider: 'not-a-provider', modelId: 'x' })).toBeUndefined()
  })
})
