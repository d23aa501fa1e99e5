import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { TodoNotFoundError, TodoValidationError } from "./todo-errors.js";
import type { TodoItem, TodosFile, TodoStore, TodoUpdateFields } from "./todo-types.js";

const MAX_TITLE_LENGTH = 255;

export interface JsonTodoStoreOptions {
  /** Omit to keep todos in memory only. */
  filePath?: string;
  now?: () => string;
}

export class JsonTodoStore implements TodoStore {
  private readonly filePath: string | undefined;
  private readonly now: () => string;
  private todos = new Map<number, TodoItem>();
  private nextId = 1;
  private loading: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: JsonTodoStoreOptions = {}) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  async list(): Promise<TodoItem[]> {
    await this.ensureLoaded();
    return this.sortedTodos();
  }

  async get(id: number): Promise<TodoItem> {
    await this.ensureLoaded();
    return { ...this.requireTodo(id) };
  }

  async create(title: string, description?: string | null): Promise<TodoItem> {
    await this.ensureLoaded();

    const normalizedTitle = normalizeTitle(title);
    const normalizedDescription = normalizeDescription(description);

    return this.runExclusive(async () => {
      const todo: TodoItem = {
        id: this.nextId,
        title: normalizedTitle,
        description: normalizedDescription,
        created_at: this.now(),
        updated_at: null
      };

      const todos = new Map(this.todos).set(todo.id, todo);
      await this.commit(todos, this.nextId + 1);

      return { ...todo };
    });
  }

  async update(id: number, fields: TodoUpdateFields): Promise<TodoItem> {
    await this.ensureLoaded();

    if (fields.title === undefined && fields.description === undefined) {
      throw new TodoValidationError("Provide a new title or description to update.");
    }

    const title = fields.title === undefined ? undefined : normalizeTitle(fields.title);
    const description = fields.description === undefined ? undefined : normalizeDescription(fields.description);

    return this.runExclusive(async () => {
      const existing = this.requireTodo(id);
      const updated: TodoItem = {
        ...existing,
        title: title ?? existing.title,
        description: description === undefined ? existing.description : description,
        updated_at: this.now()
      };

      const todos = new Map(this.todos).set(id, updated);
      await this.commit(todos, this.nextId);

      return { ...updated };
    });
  }

  async delete(id: number): Promise<TodoItem> {
    await this.ensureLoaded();

    return this.runExclusive(async () => {
      const existing = this.requireTodo(id);
      const todos = new Map(this.todos);
      todos.delete(id);
      await this.commit(todos, this.nextId);

      return { ...existing };
    });
  }

  private requireTodo(id: number): TodoItem {
    const todo = Number.isInteger(id) ? this.todos.get(id) : undefined;
    if (!todo) {
      throw new TodoNotFoundError(id);
    }

    return todo;
  }

  private sortedTodos(todos: ReadonlyMap<number, TodoItem> = this.todos): TodoItem[] {
    return Array.from(todos.values(), (todo) => ({ ...todo })).sort((left, right) => left.id - right.id);
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }

    return this.loading;
  }

  private async load(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isEnoentError(error)) {
        return;
      }

      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[todo-agent] Ignoring unreadable todo store at ${this.filePath}`);
      return;
    }

    if (!parsed || typeof parsed !== "object" || !Array.isArray((parsed as Partial<TodosFile>).todos)) {
      return;
    }

    const stored = parsed as { nextId?: unknown; todos: unknown[] };
    let maxId = 0;

    for (const [index, candidate] of stored.todos.entries()) {
      const todo = validateStoredTodo(candidate);
      if (!todo) {
        console.warn(`[todo-agent] Skipping invalid todo (index=${index}) in ${this.filePath}`);
        continue;
      }

      this.todos.set(todo.id, todo);
      maxId = Math.max(maxId, todo.id);
    }

    const storedNextId = typeof stored.nextId === "number" && Number.isInteger(stored.nextId) ? stored.nextId : 1;
    this.nextId = Math.max(storedNextId, maxId + 1);
  }

  /** Mutations take turns; the new state is only visible once it is on disk. */
  private runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const next = this.writeQueue.then(task, task);
    this.writeQueue = next.then(
      () => undefined,
      () => undefined
    );

    return next;
  }

  private async commit(todos: Map<number, TodoItem>, nextId: number): Promise<void> {
    if (this.filePath) {
      await writeTodosFile(this.filePath, { nextId, todos: this.sortedTodos(todos) });
    }

    this.todos = todos;
    this.nextId = nextId;
  }
}

export function normalizeTitle(title: unknown): string {
  if (typeof title !== "string") {
    throw new TodoValidationError("title must be a string");
  }

  const trimmed = title.trim();
  if (!trimmed) {
    throw new TodoValidationError("title must be a non-empty string");
  }

  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new TodoValidationError(`title must be at most ${MAX_TITLE_LENGTH} characters`);
  }

  return trimmed;
}

export function normalizeDescription(description: unknown): string | null {
  if (description === undefined || description === null) {
    return null;
  }

  if (typeof description !== "string") {
    throw new TodoValidationError("description must be a string when provided");
  }

  const trimmed = description.trim();
  return trimmed.length > 0 ? trimmed : null;
}

async function writeTodosFile(target: string, payload: TodosFile): Promise<void> {
  const tmp = `${target}.tmp`;
  await mkdir(dirname(target), { recursive: true });
  await writeFile(tmp, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  await rename(tmp, target);
}

function validateStoredTodo(value: unknown): TodoItem | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }

  const maybe = value as Partial<Record<keyof TodoItem, unknown>>;
  if (typeof maybe.id !== "number" || !Number.isInteger(maybe.id) || maybe.id <= 0) {
    return undefined;
  }

  if (typeof maybe.title !== "string" || maybe.title.trim().length === 0) {
    return undefined;
  }

  if (typeof maybe.created_at !== "string") {
    return undefined;
  }

  return {
    id: maybe.id,
    title: maybe.title,
    description: typeof maybe.description === "string" ? maybe.description : null,
    created_at: maybe.created_at,
    updated_at: typeof maybe.updated_at === "string" ? maybe.updated_at : null
  };
}

function isEnoentError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error as { code?: string }).code === "ENOENT"
  );
}
