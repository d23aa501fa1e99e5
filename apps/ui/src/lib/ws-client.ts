import { computeReconnectDelay, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from './reconnect-backoff.js'
import { applySessionEvent, type SessionEvent } from './session-machine.js'
import { decodeServerEvent, encodeUserMessage } from './ws-codec.js'
import { createInitialTodoChatState, type TodoChatState } from './ws-state.js'

const SOCKET_OPEN = 1

export type SocketFactory = (url: string) => WebSocket

type Listener = (state: TodoChatState) => void

export interface TodoChatClientOptions {
  createSocket?: SocketFactory
  reconnectPolicy?: ReconnectPolicy
  now?: () => string
  generateRequestId?: () => string
}

export class TodoChatClient {
  private readonly url: string
  private readonly createSocket: SocketFactory
  private readonly reconnectPolicy: ReconnectPolicy
  private readonly now: () => string
  private readonly generateRequestId: () => string

  private socket: WebSocket | null = null
  private reconnectTimer: ReturnType<typeof setTimeout> | undefined
  private destroyed = false

  private state: TodoChatState = createInitialTodoChatState()
  private readonly listeners = new Set<Listener>()
  private requestCounter = 0

  constructor(url: string, options: TodoChatClientOptions = {}) {
    this.url = url
    this.createSocket = options.createSocket ?? ((socketUrl) => new WebSocket(socketUrl))
    this.reconnectPolicy = options.reconnectPolicy ?? DEFAULT_RECONNECT_POLICY
    this.now = options.now ?? (() => new Date().toISOString())
    this.generateRequestId = options.generateRequestId ?? (() => this.nextRequestId())
  }

  getState(): TodoChatState {
    return this.state
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener)
    listener(this.state)

    return () => {
      this.listeners.delete(listener)
    }
  }

  connect(): void {
    if (this.destroyed || this.socket) {
      return
    }

    this.clearReconnectTimer()
    this.openSocket()
  }

  disconnect(): void {
    this.clearReconnectTimer()

    const socket = this.socket
    this.socket = null
    if (socket) {
      socket.close()
    }

    if (this.state.status !== 'disconnected') {
      this.dispatch({ type: 'connection', status: 'disconnected' })
    }
  }

  /** Manual retry after exhaustion; also resets the attempt counter. */
  reconnect(): void {
    if (this.destroyed) {
      return
    }

    this.disconnect()
    this.dispatch({ type: 'connection', status: 'disconnected', reconnectAttempt: 0 })
    this.openSocket()
  }

  destroy(): void {
    this.disconnect()
    this.destroyed = true
    this.listeners.clear()
  }

  sendUserMessage(text: string): boolean {
    const socket = this.socket
    if (!socket || socket.readyState !== SOCKET_OPEN) {
      return false
    }

    const requestId = this.generateRequestId()
    const next = applySessionEvent(this.state, {
      type: 'submit',
      text,
      timestamp: this.now(),
      requestId,
    })

    if (next === this.state) {
      return false
    }

    socket.send(encodeUserMessage(text.trim(), requestId))
    this.setState(next)
    return true
  }

  clearChat(): void {
    this.dispatch({ type: 'clear_chat' })
  }

  private openSocket(): void {
    this.dispatch({ type: 'connection', status: 'connecting' })

    let socket: WebSocket
    try {
      socket = this.createSocket(this.url)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[ws-client] Failed to open socket: ${message}`)
      this.dispatch({ type: 'connection', status: 'disconnected' })
      this.scheduleReconnect()
      return
    }

    this.socket = socket

    socket.addEventListener('open', () => {
      if (socket !== this.socket) return
      this.dispatch({ type: 'connection', status: 'connected', reconnectAttempt: 0 })
    })

    socket.addEventListener('message', (event) => {
      if (socket !== this.socket) return

      const envelope = decodeServerEvent(event.data)
      if (envelope) {
        this.dispatch({ type: 'envelope', envelope, receivedAt: this.now() })
      }
    })

    socket.addEventListener('error', () => {
      if (socket !== this.socket) return
      this.dispatch({ type: 'connection', status: 'errored' })
    })

    socket.addEventListener('close', () => {
      if (socket !== this.socket) return

      this.socket = null
      this.dispatch({ type: 'connection', status: 'disconnected' })
      this.scheduleReconnect()
    })
  }

  private scheduleReconnect(): void {
    if (this.destroyed || this.reconnectTimer) {
      return
    }

    const attempt = this.state.reconnectAttempt
    const delayMs = computeReconnectDelay(attempt, this.reconnectPolicy)
    if (delayMs === null) {
      return
    }

    this.dispatch({ type: 'connection', status: 'disconnected', reconnectAttempt: attempt + 1 })
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined
      if (!this.destroyed && !this.socket) {
        this.openSocket()
      }
    }, delayMs)
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = undefined
    }
  }

  private dispatch(event: SessionEvent): void {
    const next = applySessionEvent(this.state, event)
    if (next !== this.state) {
      this.setState(next)
    }
  }

  private setState(next: TodoChatState): void {
    this.state = next
    for (const listener of this.listeners) {
      listener(this.state)
    }
  }

  private nextRequestId(): string {
    this.requestCounter += 1
    return `req-${Date.now()}-${this.requestCounter}`
  }
}
