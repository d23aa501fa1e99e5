export { computeReconnectDelay, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from './lib/reconnect-backoff.js'
export { applySessionEvent, type SessionEvent } from './lib/session-machine.js'
export { applyTodoSnapshot } from './lib/todo-sync.js'
export { TodoChatClient, type SocketFactory, type TodoChatClientOptions } from './lib/ws-client.js'
export { decodeServerEvent, encodeUserMessage } from './lib/ws-codec.js'
export { createInitialTodoChatState, type TodoChatState } from './lib/ws-state.js'
export type * from './lib/ws-types.js'
