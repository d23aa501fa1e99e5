import { once } from 'node:events'
import type { ServerEvent } from '@todo-agent/protocol'
import WebSocket from 'ws'
import { afterEach, describe, expect, it } from 'vitest'
import { AgentOrchestrator } from '../agent/agent-orchestrator.js'
import type { AgentStreamEvent } from '../agent/agent-types.js'
import { JsonTodoStore } from '../todos/json-todo-store.js'
import { LexicalTodoSearch } from '../todos/lexical-todo-search.js'
import { TodoAgentServer } from '../ws/server.js'
import { ScriptedTodoAgent } from './scripted-agent.js'

const cleanups: Array<() => Promise<void>> = []

afterEach(async () => {
  while (cleanups.length > 0) {
    const cleanup = cleanups.pop()
    if (cleanup) {
      await cleanup()
    }
  }
})

async function startServer(options: { agent?: ScriptedTodoAgent; historyLimit?: number } = {}) {
  const store = new JsonTodoStore({ now: () => '2026-01-01T00:00:00.000Z' })
  await store.create('Study for exam')

  const agent = options.agent ?? new ScriptedTodoAgent()
  const server = new TodoAgentServer({
    orchestrator: new AgentOrchestrator({
      agent,
      store,
      search: new LexicalTodoSearch(store),
      searchResultLimit: 5,
    }),
    store,
    host: '127.0.0.1',
    port: 0,
    historyLimit: options.historyLimit ?? 20,
    logDebug: () => {},
  })

  const { port } = await server.start()
  cleanups.push(() => server.stop())

  return { server, store, agent, port }
}

async function connect(port: number): Promise<{ client: WebSocket; events: ServerEvent[] }> {
  const client = new WebSocket(`ws://127.0.0.1:${port}/ws/chat`)
  const events: ServerEvent[] = []

  client.on('message', (raw) => {
    events.push(JSON.parse(raw.toString()) as ServerEvent)
  })

  await once(client, 'open')
  cleanups.push(async () => {
    if (client.readyState === WebSocket.OPEN) {
      client.close()
      await once(client, 'close')
    }
  })

  return { client, events }
}

async function waitForEvent(
  events: ServerEvent[],
  predicate: (event: ServerEvent) => boolean,
  timeoutMs = 2000,
): Promise<ServerEvent> {
  const started = Date.now()

  while (Date.now() - started < timeoutMs) {
    const found = events.find(predicate)
    if (found) return found

    await new Promise((resolve) => setTimeout(resolve, 10))
  }

  throw new Error('Timed out waiting for websocket event')
}

function countTerminals(events: ServerEvent[]): number {
  return events.filter((event) => event.type === 'complete' || event.type === 'error').length
}

async function waitForTerminals(events: ServerEvent[], count: number, timeoutMs = 2000): Promise<void> {
  const started = Date.now()

  while (Date.now() - started < timeoutMs) {
    if (countTerminals(events) >= count) return

    await new Promise((resolve) => setTimeout(resolve, 10))
  }

  throw new Error('Timed out waiting for terminal events')
}

describe('TodoAgentServer chat socket', () => {
  it('sends the current snapshot on connect', async () => {
    const { port } = await startServer()
    const { events } = await connect(port)

    const initial = await waitForEvent(events, (event) => event.type === 'todos_update')

    expect(initial).toEqual({
      type: 'todos_update',
      todos: [
        {
          id: 1,
          title: 'Study for exam',
          description: null,
          created_at: '2026-01-01T00:00:00.000Z',
          updated_at: null,
        },
      ],
    })
  })

  it('streams a tool cycle with the request id and pushes the snapshot to other connections', async () => {
    const { port } = await startServer()
    const requester = await connect(port)
    const observer = await connect(port)
    await waitForEvent(requester.events, (event) => event.type === 'todos_update')
    await waitForEvent(observer.events, (event) => event.type === 'todos_update')

    requester.client.send(JSON.stringify({ message: 'Add a task to buy milk', requestId: 'req-1' }))
    await waitForTerminals(requester.events, 1)

    const cycle = requester.events.slice(1)
    expect(cycle[0]).toEqual({ type: 'thinking', requestId: 'req-1' })
    expect(cycle.slice(1, -1).every((event) => event.type === 'token' && event.requestId === 'req-1')).toBe(true)

    const complete = cycle.at(-1)
    expect(complete?.type).toBe('complete')
    if (complete?.type === 'complete') {
      expect(complete.requestId).toBe('req-1')
      expect(complete.content).toBe("Successfully created todo: 'buy milk'")
      expect(complete.todos?.map((todo) => todo.title)).toEqual(['Study for exam', 'buy milk'])
    }

    const pushed = await waitForEvent(
      observer.events,
      (event) => event.type === 'todos_update' && event.todos.length === 2,
    )
    expect(pushed.type).toBe('todos_update')
    expect(requester.events.filter((event) => event.type === 'todos_update')).toHaveLength(1)
  })

  it('answers invalid payloads with an error and keeps the session open', async () => {
    const { port } = await startServer()
    const { client, events } = await connect(port)

    client.send('{ not json ')
    client.send(JSON.stringify({ message: '   ' }))
    client.send(JSON.stringify({ message: 'hello' }))
    await waitForTerminals(events, 3)

    const terminals = events.filter((event) => event.type === 'complete' || event.type === 'error')
    expect(terminals).toEqual([
      { type: 'error', content: 'Message must be valid JSON' },
      { type: 'error', content: 'Please enter a message' },
      { type: 'complete', content: 'Hello there' },
    ])
    expect(client.readyState).toBe(WebSocket.OPEN)
  })

  it('processes requests one at a time in arrival order', async () => {
    const { port } = await startServer()
    const { client, events } = await connect(port)
    await waitForEvent(events, (event) => event.type === 'todos_update')

    client.send(JSON.stringify({ message: 'hello', requestId: 'a' }))
    client.send(JSON.stringify({ message: 'Delete todo 9', requestId: 'b' }))
    await waitForTerminals(events, 2)

    const sequence = events
      .filter((event) => event.type !== 'todos_update' && event.type !== 'token')
      .map((event) => `${event.type}:${'requestId' in event ? event.requestId : ''}`)

    expect(sequence).toEqual(['thinking:a', 'complete:a', 'thinking:b', 'error:b'])
  })

  it('keeps a bounded conversation history per connection', async () => {
    const agent = new ScriptedTodoAgent()
    const { port } = await startServer({ agent, historyLimit: 2 })
    const { client, events } = await connect(port)

    client.send(JSON.stringify({ message: 'first' }))
    client.send(JSON.stringify({ message: 'Delete todo 9' }))
    client.send(JSON.stringify({ message: 'second' }))
    client.send(JSON.stringify({ message: 'third' }))
    await waitForTerminals(events, 4)

    expect(agent.decisions.map((decision) => decision.history)).toEqual([
      [],
      [
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'Hello there' },
      ],
      [
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'Hello there' },
      ],
      [
        { role: 'user', content: 'second' },
        { role: 'assistant', content: 'Hello there' },
      ],
    ])
  })

  it('keeps sessions independent across connections', async () => {
    const agent = new ScriptedTodoAgent((): AgentStreamEvent[] => [{ type: 'final', content: 'ok' }])
    const { port } = await startServer({ agent })
    const first = await connect(port)
    const second = await connect(port)

    first.client.send(JSON.stringify({ message: 'from first' }))
    await waitForTerminals(first.events, 1)
    second.client.send(JSON.stringify({ message: 'from second' }))
    await waitForTerminals(second.events, 1)

    expect(agent.decisions[1]?.history).toEqual([])
  })
})
