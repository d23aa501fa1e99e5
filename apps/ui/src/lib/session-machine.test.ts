import { describe, expect, it } from 'vitest'
import { applySessionEvent, type SessionEvent } from './session-machine.js'
import { createInitialTodoChatState, type TodoChatState } from './ws-state.js'
import type { TodoItem } from './ws-types.js'

const AT = '2026-01-01T00:00:00.000Z'

function todo(id: number, title: string): TodoItem {
  return { id, title, description: null, created_at: AT, updated_at: null }
}

function connectedState(overrides: Partial<TodoChatState> = {}): TodoChatState {
  return { ...createInitialTodoChatState(), status: 'connected', ...overrides }
}

function run(state: TodoChatState, events: SessionEvent[]): TodoChatState {
  return events.reduce(applySessionEvent, state)
}

function submit(text: string, requestId = 'req-1'): SessionEvent {
  return { type: 'submit', text, timestamp: AT, requestId }
}

describe('applySessionEvent', () => {
  it('records a trimmed user turn and waits for the reply', () => {
    const state = applySessionEvent(connectedState(), submit('  buy milk  '))

    expect(state.turns).toEqual([{ role: 'user', text: 'buy milk', createdAt: AT }])
    expect(state.phase).toBe('awaiting')
    expect(state.pendingRequestId).toBe('req-1')
  })

  it('rejects empty submissions and submissions while busy or offline', () => {
    const connected = connectedState()
    expect(applySessionEvent(connected, submit('   '))).toBe(connected)

    const busy = connectedState({ phase: 'streaming', pendingRequestId: 'req-0' })
    expect(applySessionEvent(busy, submit('hello'))).toBe(busy)

    const offline = createInitialTodoChatState()
    expect(applySessionEvent(offline, submit('hello'))).toBe(offline)
  })

  it('accumulates streamed tokens in arrival order', () => {
    const state = run(connectedState(), [
      submit('hello'),
      { type: 'envelope', envelope: { type: 'thinking', requestId: 'req-1' }, receivedAt: AT },
      { type: 'envelope', envelope: { type: 'token', content: 'Hel', requestId: 'req-1' }, receivedAt: AT },
      { type: 'envelope', envelope: { type: 'token', content: 'lo ', requestId: 'req-1' }, receivedAt: AT },
      { type: 'envelope', envelope: { type: 'token', content: 'there', requestId: 'req-1' }, receivedAt: AT },
    ])

    expect(state.phase).toBe('streaming')
    expect(state.streamingBuffer).toBe('Hello there')
  })

  it('finalizes the reply on complete and applies the attached snapshot', () => {
    const state = run(connectedState({ todos: [todo(1, 'old')] }), [
      submit('add a task'),
      { type: 'envelope', envelope: { type: 'token', content: 'Done', requestId: 'req-1' }, receivedAt: AT },
      {
        type: 'envelope',
        envelope: { type: 'complete', content: 'Done', todos: [todo(1, 'old'), todo(2, 'new')], requestId: 'req-1' },
        receivedAt: '2026-01-01T00:00:05.000Z',
      },
    ])

    expect(state.phase).toBe('idle')
    expect(state.streamingBuffer).toBe('')
    expect(state.pendingRequestId).toBeNull()
    expect(state.todos.map((item) => item.id)).toEqual([1, 2])
    expect(state.turns.at(-1)).toEqual({ role: 'assistant', text: 'Done', createdAt: '2026-01-01T00:00:05.000Z' })
  })

  it('keeps the current todos when complete carries no snapshot', () => {
    const todos = [todo(1, 'keep')]
    const state = run(connectedState({ todos }), [
      submit('hi'),
      { type: 'envelope', envelope: { type: 'complete', content: 'Hello', requestId: 'req-1' }, receivedAt: AT },
    ])

    expect(state.todos).toBe(todos)
  })

  it('turns an error envelope into an error turn and returns to idle', () => {
    const state = run(connectedState(), [
      submit('delete todo 9'),
      { type: 'envelope', envelope: { type: 'thinking', requestId: 'req-1' }, receivedAt: AT },
      { type: 'envelope', envelope: { type: 'error', content: 'No todo found with ID 9', requestId: 'req-1' }, receivedAt: AT },
    ])

    expect(state.phase).toBe('idle')
    expect(state.turns.map((turn) => turn.role)).toEqual(['user', 'error'])
    expect(state.turns[1]?.text).toBe('No todo found with ID 9')
  })

  it('discards envelopes correlated to a different request', () => {
    const pending = applySessionEvent(connectedState(), submit('hi', 'req-2'))
    const next = applySessionEvent(pending, {
      type: 'envelope',
      envelope: { type: 'complete', content: 'late', requestId: 'req-1' },
      receivedAt: AT,
    })

    expect(next).toBe(pending)
  })

  it('applies todos_update snapshots in any phase', () => {
    const pending = applySessionEvent(connectedState(), submit('hi'))
    const next = applySessionEvent(pending, {
      type: 'envelope',
      envelope: { type: 'todos_update', todos: [todo(3, 'from elsewhere')] },
      receivedAt: AT,
    })

    expect(next.todos).toEqual([todo(3, 'from elsewhere')])
    expect(next.phase).toBe('awaiting')
  })

  it('abandons the in-flight cycle on transport loss without adding a turn', () => {
    const streaming = run(connectedState(), [
      submit('hi'),
      { type: 'envelope', envelope: { type: 'token', content: 'Hel', requestId: 'req-1' }, receivedAt: AT },
    ])

    for (const status of ['disconnected', 'errored'] as const) {
      const next = applySessionEvent(streaming, { type: 'connection', status })
      expect(next.status).toBe(status)
      expect(next.phase).toBe('idle')
      expect(next.streamingBuffer).toBe('')
      expect(next.pendingRequestId).toBeNull()
      expect(next.turns).toEqual(streaming.turns)
    }
  })

  it('tracks the reconnect attempt only when one is given', () => {
    const retrying = applySessionEvent(createInitialTodoChatState(), {
      type: 'connection',
      status: 'disconnected',
      reconnectAttempt: 3,
    })
    expect(retrying.reconnectAttempt).toBe(3)

    const connecting = applySessionEvent(retrying, { type: 'connection', status: 'connecting' })
    expect(connecting.reconnectAttempt).toBe(3)
  })

  it('clears the transcript but keeps the todos', () => {
    const todos = [todo(1, 'keep')]
    const state = run(connectedState({ todos }), [
      submit('hi'),
      { type: 'envelope', envelope: { type: 'complete', content: 'Hello', requestId: 'req-1' }, receivedAt: AT },
      { type: 'clear_chat' },
    ])

    expect(state.turns).toEqual([])
    expect(state.todos).toEqual(todos)
  })
})
