import { applyTodoSnapshot } from './todo-sync.js'
import type { TodoChatState } from './ws-state.js'
import type { ConnectionStatus, ServerEvent } from './ws-types.js'

export type SessionEvent =
  | { type: 'connection'; status: ConnectionStatus; reconnectAttempt?: number }
  | { type: 'envelope'; envelope: ServerEvent; receivedAt: string }
  | { type: 'submit'; text: string; timestamp: string; requestId: string }
  | { type: 'clear_chat' }

/**
 * Pure transition function for the chat session. Returns the input state unchanged
 * (same reference) when an event is rejected or discarded.
 */
export function applySessionEvent(state: TodoChatState, event: SessionEvent): TodoChatState {
  switch (event.type) {
    case 'connection':
      return applyConnectionEvent(state, event.status, event.reconnectAttempt)

    case 'envelope':
      return applyEnvelope(state, event.envelope, event.receivedAt)

    case 'submit': {
      const text = event.text.trim()
      if (!text || state.phase !== 'idle' || state.status !== 'connected') {
        return state
      }

      return {
        ...state,
        turns: [...state.turns, { role: 'user', text, createdAt: event.timestamp }],
        streamingBuffer: '',
        phase: 'awaiting',
        pendingRequestId: event.requestId,
      }
    }

    case 'clear_chat':
      return {
        ...state,
        turns: [],
        streamingBuffer: '',
      }
  }
}

function applyConnectionEvent(
  state: TodoChatState,
  status: ConnectionStatus,
  reconnectAttempt: number | undefined,
): TodoChatState {
  const next: TodoChatState = {
    ...state,
    status,
    reconnectAttempt: reconnectAttempt ?? state.reconnectAttempt,
  }

  if (status === 'connected' || status === 'connecting' || state.phase === 'idle') {
    return next
  }

  // Transport loss abandons the in-flight cycle without adding a turn.
  return {
    ...next,
    phase: 'idle',
    streamingBuffer: '',
    pendingRequestId: null,
  }
}

function applyEnvelope(state: TodoChatState, envelope: ServerEvent, receivedAt: string): TodoChatState {
  if (envelope.type === 'todos_update') {
    return { ...state, todos: applyTodoSnapshot(state.todos, envelope.todos) }
  }

  if (envelope.requestId !== undefined && envelope.requestId !== state.pendingRequestId) {
    return state
  }

  switch (envelope.type) {
    case 'thinking':
      return { ...state, phase: 'streaming', streamingBuffer: '' }

    case 'token':
      return { ...state, phase: 'streaming', streamingBuffer: state.streamingBuffer + envelope.content }

    case 'complete':
      return {
        ...state,
        turns: [...state.turns, { role: 'assistant', text: envelope.content, createdAt: receivedAt }],
        streamingBuffer: '',
        phase: 'idle',
        pendingRequestId: null,
        todos: envelope.todos ? applyTodoSnapshot(state.todos, envelope.todos) : state.todos,
      }

    case 'error':
      return {
        ...state,
        turns: [...state.turns, { role: 'error', text: envelope.content, createdAt: receivedAt }],
        streamingBuffer: '',
        phase: 'idle',
        pendingRequestId: null,
      }
  }
}
