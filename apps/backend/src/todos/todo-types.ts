import type { TodoItem } from "@todo-agent/protocol";

export type { TodoItem };

export interface TodoUpdateFields {
  title?: string;
  description?: string | null;
}

export interface TodoStore {
  list(): Promise<TodoItem[]>;
  get(id: number): Promise<TodoItem>;
  create(title: string, description?: string | null): Promise<TodoItem>;
  update(id: number, fields: TodoUpdateFields): Promise<TodoItem>;
  delete(id: number): Promise<TodoItem>;
}

export interface TodoSearchResult {
  id: number;
  title: string;
  description: string | null;
  created_at: string;
  text: string;
  score: number;
}

export interface TodoSearch {
  search(query: string, limit: number): Promise<TodoSearchResult[]>;
}

export interface TodosFile {
  nextId: number;
  todos: TodoItem[];
}
