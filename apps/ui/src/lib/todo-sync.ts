import type { TodoItem } from './ws-types.js'

// Snapshots are authoritative: the previous collection is never merged.
export function applyTodoSnapshot(_previous: readonly TodoItem[], snapshot: readonly TodoItem[]): TodoItem[] {
  return snapshot.map((todo) => ({ ...todo }))
}
