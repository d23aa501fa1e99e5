import type { TodoSearchResult } from "../todos/todo-types.js";

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export type TodoToolCall =
  | { name: "create_todo"; arguments: { title: string; description?: string | null } }
  | { name: "read_todos"; arguments: Record<string, never> }
  | { name: "update_todo"; arguments: { todo_id: number; title?: string; description?: string | null } }
  | { name: "delete_todo"; arguments: { todo_id: number } }
  | { name: "search_todos"; arguments: { query: string } };

export type CrudToolCall = Exclude<TodoToolCall, { name: "search_todos" }>;

export interface AgentTokenEvent {
  type: "token";
  content: string;
}

/** Raw tool selection as the model produced it; arguments are validated downstream. */
export interface AgentToolCallEvent {
  type: "tool_call";
  name: string;
  arguments: unknown;
}

export interface AgentFinalEvent {
  type: "final";
  content: string;
}

export type AgentStreamEvent = AgentTokenEvent | AgentToolCallEvent | AgentFinalEvent;
export type SynthesisStreamEvent = AgentTokenEvent | AgentFinalEvent;

export interface AgentDecisionInput {
  utterance: string;
  history: ConversationTurn[];
}

export interface AgentSynthesisInput extends AgentDecisionInput {
  query: string;
  results: TodoSearchResult[];
}

export interface TodoAgent {
  decide(input: AgentDecisionInput): AsyncIterable<AgentStreamEvent>;
  synthesize(input: AgentSynthesisInput): AsyncIterable<SynthesisStreamEvent>;
}
