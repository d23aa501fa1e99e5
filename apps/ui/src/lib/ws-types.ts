export type {
  AgentErrorEvent,
  ClientCommand,
  CompleteEvent,
  ServerEvent,
  ServerEventType,
  TerminalEvent,
  ThinkingEvent,
  TodoItem,
  TodosUpdateEvent,
  TokenEvent,
  UserMessageEnvelope,
} from '@todo-agent/protocol'

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'errored'

export type RequestPhase = 'idle' | 'awaiting' | 'streaming'

export type ChatRole = 'user' | 'assistant' | 'error'

export interface ChatTurn {
  role: ChatRole
  text: string
  createdAt: string
}
