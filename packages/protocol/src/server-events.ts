import type { TodoItem } from './shared-types.js'

export interface ThinkingEvent {
  type: 'thinking'
  requestId?: string
}

export interface TokenEvent {
  type: 'token'
  content: string
  requestId?: string
}

export interface CompleteEvent {
  type: 'complete'
  content: string
  todos?: TodoItem[]
  requestId?: string
}

export interface TodosUpdateEvent {
  type: 'todos_update'
  todos: TodoItem[]
}

export interface AgentErrorEvent {
  type: 'error'
  content: string
  requestId?: string
}

export type TerminalEvent = CompleteEvent | AgentErrorEvent

export type ServerEvent =
  | ThinkingEvent
  | TokenEvent
  | CompleteEvent
  | TodosUpdateEvent
  | AgentErrorEvent

export type ServerEventType = ServerEvent['type']
