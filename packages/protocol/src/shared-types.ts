export interface TodoItem {
  id: number
  title: string
  description: string | null
  created_at: string
  updated_at: string | null
}

export type TodoSnapshot = TodoItem[]
