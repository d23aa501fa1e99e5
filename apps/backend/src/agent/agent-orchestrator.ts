import type { AgentErrorEvent, CompleteEvent, ThinkingEvent, TokenEvent } from "@todo-agent/protocol";
import { isTodoNotFoundError, isTodoValidationError } from "../todos/todo-errors.js";
import type { TodoSearch, TodoStore } from "../todos/todo-types.js";
import type { DebugLogger } from "../utils/debug-log.js";
import type { AgentDecisionInput, AgentToolCallEvent, TodoAgent } from "./agent-types.js";
import { executeTodoTool } from "./todo-tool-executor.js";
import { parseTodoToolCall } from "./todo-tools.js";

export type OrchestratorEvent = ThinkingEvent | TokenEvent | CompleteEvent | AgentErrorEvent;

export interface AgentOrchestratorOptions {
  agent: TodoAgent;
  store: TodoStore;
  search: TodoSearch;
  searchResultLimit: number;
  debug?: DebugLogger;
}

interface StreamedText {
  content: string;
  streamed: boolean;
}

export class AgentOrchestrator {
  private readonly agent: TodoAgent;
  private readonly store: TodoStore;
  private readonly search: TodoSearch;
  private readonly searchResultLimit: number;
  private readonly debug: DebugLogger;

  constructor(options: AgentOrchestratorOptions) {
    this.agent = options.agent;
    this.store = options.store;
    this.search = options.search;
    this.searchResultLimit = options.searchResultLimit;
    this.debug = options.debug ?? (() => {});
  }

  /** Runs one request cycle: `thinking`, zero or more `token`s, then exactly one terminal event. */
  async *run(input: AgentDecisionInput): AsyncGenerator<OrchestratorEvent> {
    yield { type: "thinking" };

    let streamed = false;
    try {
      let toolCall: AgentToolCallEvent | undefined;
      let finalText = "";
      let tokenText = "";

      for await (const event of this.agent.decide(input)) {
        if (event.type === "token") {
          if (event.content.length > 0) {
            streamed = true;
            tokenText += event.content;
            yield { type: "token", content: event.content };
          }
        } else if (event.type === "tool_call") {
          toolCall ??= event;
        } else {
          finalText = event.content;
        }
      }

      if (!toolCall) {
        this.debug("agent:direct_reply", { streamed });
        yield* this.finish({ content: finalText || tokenText, streamed });
        return;
      }

      const parsed = parseTodoToolCall(toolCall.name, toolCall.arguments);
      if (!parsed.ok) {
        this.debug("agent:invalid_tool_call", { tool: toolCall.name, error: parsed.error });
        yield { type: "error", content: parsed.error };
        return;
      }

      const call = parsed.call;
      this.debug("agent:tool_call", { tool: call.name });

      if (call.name === "search_todos") {
        const results = await this.search.search(call.arguments.query, this.searchResultLimit);
        this.debug("agent:search", { query: call.arguments.query, results: results.length });

        let synthesisText = "";
        let synthesisTokens = "";
        let synthesisStreamed = false;
        for await (const event of this.agent.synthesize({ ...input, query: call.arguments.query, results })) {
          if (event.type === "token") {
            if (event.content.length > 0) {
              synthesisStreamed = true;
              synthesisTokens += event.content;
              yield { type: "token", content: event.content };
            }
          } else {
            synthesisText = event.content;
          }
        }

        yield* this.finish({
          content: synthesisText || synthesisTokens,
          streamed: streamed || synthesisStreamed
        });
        return;
      }

      const outcome = await executeTodoTool(this.store, call);
      const todos = outcome.mutated ? await this.store.list() : undefined;
      yield* this.finish({ content: outcome.summary, streamed }, todos);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.debug("agent:error", { message });

      if (isTodoNotFoundError(error) || isTodoValidationError(error)) {
        yield { type: "error", content: message };
        return;
      }

      yield { type: "error", content: `Agent error: ${message || "unknown failure"}` };
    }
  }

  private async *finish(
    result: StreamedText,
    todos?: CompleteEvent["todos"]
  ): AsyncGenerator<OrchestratorEvent> {
    const content = result.content.trim();
    if (!content) {
      yield { type: "error", content: "Agent error: the model returned an empty response" };
      return;
    }

    if (!result.streamed) {
      for (const token of splitWordTokens(result.content)) {
        yield { type: "token", content: token };
      }
    }

    yield todos ? { type: "complete", content: result.content, todos } : { type: "complete", content: result.content };
  }
}

/** Splits text into word-sized tokens whose concatenation is the input text. */
export function splitWordTokens(text: string): string[] {
  return text.match(/\s*\S+\s*/g) ?? [];
}
