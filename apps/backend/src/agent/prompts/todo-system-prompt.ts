import type { ConversationTurn } from "../agent-types.js";
import type { TodoSearchResult } from "../../todos/todo-types.js";

export const TODO_SYSTEM_PROMPT = `You are a helpful todo list assistant.

You manage the user's todo list with these tools:
- create_todo: add a new todo with a title and an optional description.
- read_todos: list every todo.
- update_todo: change the title or description of a todo by its ID.
- delete_todo: remove a todo by its ID.
- search_todos: find todos related to a topic when the user asks about a subject rather than an ID.

Rules:
1. Call at most one tool per message.
2. Use the exact todo ID the user gives. Never guess an ID.
3. Keep titles short; put extra detail in the description.
4. If the user is just chatting, answer briefly without calling a tool.
`;

export const TODO_SYNTHESIS_PROMPT = `You are a helpful todo list assistant.

Answer the user's question using only the related todos listed below.
Mention todo IDs when referring to specific todos.
If none of them are relevant, say so and offer to create one.
`;

export function buildDecisionPrompt(history: ConversationTurn[]): string {
  return appendHistory(TODO_SYSTEM_PROMPT, history);
}

export function buildSynthesisPrompt(
  history: ConversationTurn[],
  query: string,
  results: TodoSearchResult[]
): string {
  const related =
    results.length === 0
      ? "(no related todos found)"
      : results.map((result) => `- [ID: ${result.id}] ${result.text}`).join("\n");

  return appendHistory(`${TODO_SYNTHESIS_PROMPT}\nSearch query: ${query}\nRelated todos:\n${related}\n`, history);
}

function appendHistory(prompt: string, history: ConversationTurn[]): string {
  if (history.length === 0) {
    return prompt;
  }

  const lines = history.map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`);
  return `${prompt}\nConversation so far:\n${lines.join("\n")}\n`;
}
