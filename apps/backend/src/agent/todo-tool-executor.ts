import type { TodoItem, TodoStore } from "../todos/todo-types.js";
import type { CrudToolCall } from "./agent-types.js";

export interface TodoToolOutcome {
  summary: string;
  mutated: boolean;
}

export async function executeTodoTool(store: TodoStore, call: CrudToolCall): Promise<TodoToolOutcome> {
  switch (call.name) {
    case "create_todo": {
      const todo = await store.create(call.arguments.title, call.arguments.description);
      return { summary: `Successfully created todo: '${todo.title}'`, mutated: true };
    }

    case "read_todos": {
      const todos = await store.list();
      return { summary: formatTodoList(todos), mutated: false };
    }

    case "update_todo": {
      const { todo_id: todoId, title, description } = call.arguments;
      const todo = await store.update(todoId, { title, description });
      return { summary: `Successfully updated todo: '${todo.title}' (ID: ${todo.id})`, mutated: true };
    }

    case "delete_todo": {
      const todo = await store.delete(call.arguments.todo_id);
      return { summary: `Successfully deleted todo: '${todo.title}' (ID: ${todo.id})`, mutated: true };
    }
  }
}

export function formatTodoList(todos: TodoItem[]): string {
  if (todos.length === 0) {
    return "Your todo list is empty. Would you like to add a task?";
  }

  const lines = todos.map((todo) =>
    todo.description ? `- [ID: ${todo.id}] ${todo.title}: ${todo.description}` : `- [ID: ${todo.id}] ${todo.title}`
  );

  return `Found ${todos.length} todo(s):\n${lines.join("\n")}`;
}
