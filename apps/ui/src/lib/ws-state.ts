import type { ChatTurn, ConnectionStatus, RequestPhase, TodoItem } from './ws-types.js'

export interface TodoChatState {
  status: ConnectionStatus
  reconnectAttempt: number
  turns: ChatTurn[]
  streamingBuffer: string
  phase: RequestPhase
  todos: TodoItem[]
  pendingRequestId: string | null
}

export function createInitialTodoChatState(): TodoChatState {
  return {
    status: 'disconnected',
    reconnectAttempt: 0,
    turns: [],
    streamingBuffer: '',
    phase: 'idle',
    todos: [],
    pendingRequestId: null,
  }
}
