import type { ServerEvent, TodoItem, UserMessageEnvelope } from './ws-types.js'

const textDecoder = new TextDecoder()

export function encodeUserMessage(message: string, requestId?: string): string {
  const envelope: UserMessageEnvelope = requestId ? { message, requestId } : { message }
  return JSON.stringify(envelope)
}

export function decodeServerEvent(raw: unknown): ServerEvent | null {
  const text = decodePayloadText(raw)
  if (text === null) {
    console.warn('[ws-codec] Dropping frame with unsupported payload type')
    return null
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    console.warn('[ws-codec] Dropping frame with invalid JSON')
    return null
  }

  const event = parseServerEvent(parsed)
  if (!event) {
    console.warn('[ws-codec] Dropping malformed envelope', parsed)
  }

  return event
}

function decodePayloadText(raw: unknown): string | null {
  if (typeof raw === 'string') {
    return raw
  }

  if (raw instanceof ArrayBuffer) {
    return textDecoder.decode(raw)
  }

  if (ArrayBuffer.isView(raw)) {
    return textDecoder.decode(raw)
  }

  return null
}

function parseServerEvent(value: unknown): ServerEvent | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null
  }

  const maybe = value as { type?: unknown; content?: unknown; todos?: unknown; requestId?: unknown }
  if (maybe.requestId !== undefined && typeof maybe.requestId !== 'string') {
    return null
  }

  const requestId = maybe.requestId
  const withRequestId = <T extends object>(event: T): T | (T & { requestId: string }) =>
    requestId === undefined ? event : { ...event, requestId }

  switch (maybe.type) {
    case 'thinking':
      return withRequestId({ type: 'thinking' as const })

    case 'token':
      if (typeof maybe.content !== 'string') return null
      return withRequestId({ type: 'token' as const, content: maybe.content })

    case 'error':
      if (typeof maybe.content !== 'string') return null
      return withRequestId({ type: 'error' as const, content: maybe.content })

    case 'complete': {
      if (typeof maybe.content !== 'string') return null
      if (maybe.todos === undefined) {
        return withRequestId({ type: 'complete' as const, content: maybe.content })
      }

      const todos = parseTodoSnapshot(maybe.todos)
      if (!todos) return null
      return withRequestId({ type: 'complete' as const, content: maybe.content, todos })
    }

    case 'todos_update': {
      const todos = parseTodoSnapshot(maybe.todos)
      if (!todos) return null
      return { type: 'todos_update', todos }
    }

    default:
      return null
  }
}

function parseTodoSnapshot(value: unknown): TodoItem[] | null {
  if (!Array.isArray(value)) {
    return null
  }

  const todos: TodoItem[] = []
  for (const entry of value) {
    const todo = parseTodoItem(entry)
    if (!todo) {
      return null
    }
    todos.push(todo)
  }

  return todos
}

function parseTodoItem(value: unknown): TodoItem | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null
  }

  const maybe = value as Partial<Record<keyof TodoItem, unknown>>
  if (typeof maybe.id !== 'number' || !Number.isInteger(maybe.id) || maybe.id <= 0) return null
  if (typeof maybe.title !== 'string') return null
  if (maybe.description !== undefined && maybe.description !== null && typeof maybe.description !== 'string') {
    return null
  }
  if (typeof maybe.created_at !== 'string') return null
  if (maybe.updated_at !== undefined && maybe.updated_at !== null && typeof maybe.updated_at !== 'string') {
    return null
  }

  return {
    id: maybe.id,
    title: maybe.title,
    description: maybe.description ?? null,
    created_at: maybe.created_at,
    updated_at: maybe.updated_at ?? null,
  }
}
