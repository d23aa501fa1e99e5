import {
  getModels,
  getProviders,
  streamSimple,
  type Api,
  type AssistantMessageEvent,
  type Context,
  type Model,
  type SimpleStreamOptions,
  type ToolCall
} from "@mariozechner/pi-ai";
import type { AgentModelDescriptor } from "../types.js";
import type {
  AgentDecisionInput,
  AgentStreamEvent,
  AgentSynthesisInput,
  SynthesisStreamEvent,
  TodoAgent
} from "./agent-types.js";
import { buildDecisionPrompt, buildSynthesisPrompt } from "./prompts/todo-system-prompt.js";
import { TODO_TOOLS } from "./todo-tools.js";

export type PiStreamFn = (
  model: Model<Api>,
  context: Context,
  options?: SimpleStreamOptions
) => AsyncIterable<AssistantMessageEvent>;

export interface PiTodoAgentOptions {
  model: AgentModelDescriptor;
  apiKey?: string;
  streamFn?: PiStreamFn;
  resolveModel?: (descriptor: AgentModelDescriptor) => Model<Api> | undefined;
  now?: () => number;
}

export class PiTodoAgent implements TodoAgent {
  private readonly descriptor: AgentModelDescriptor;
  private readonly apiKey: string | undefined;
  private readonly streamFn: PiStreamFn;
  private readonly resolveModel: (descriptor: AgentModelDescriptor) => Model<Api> | undefined;
  private readonly now: () => number;
  private model: Model<Api> | undefined;

  constructor(options: PiTodoAgentOptions) {
    this.descriptor = options.model;
    this.apiKey = options.apiKey;
    this.streamFn = options.streamFn ?? streamSimple;
    this.resolveModel = options.resolveModel ?? resolveCatalogModel;
    this.now = options.now ?? Date.now;
  }

  async *decide(input: AgentDecisionInput): AsyncGenerator<AgentStreamEvent> {
    const context: Context = {
      systemPrompt: buildDecisionPrompt(input.history),
      messages: [{ role: "user", content: input.utterance, timestamp: this.now() }],
      tools: TODO_TOOLS
    };

    yield* this.streamTurn(context);
  }

  async *synthesize(input: AgentSynthesisInput): AsyncGenerator<SynthesisStreamEvent> {
    const context: Context = {
      systemPrompt: buildSynthesisPrompt(input.history, input.query, input.results),
      messages: [{ role: "user", content: input.utterance, timestamp: this.now() }]
    };

    for await (const event of this.streamTurn(context)) {
      if (event.type !== "tool_call") {
        yield event;
      }
    }
  }

  private async *streamTurn(context: Context): AsyncGenerator<AgentStreamEvent> {
    const model = this.requireModel();
    const stream = this.streamFn(model, context, this.apiKey ? { apiKey: this.apiKey } : undefined);

    for await (const event of stream) {
      if (event.type === "text_delta") {
        if (event.delta.length > 0) {
          yield { type: "token", content: event.delta };
        }
        continue;
      }

      if (event.type === "error") {
        throw new Error(event.error.errorMessage ?? `Model request failed (${event.reason})`);
      }

      if (event.type === "done") {
        const text = event.message.content
          .map((block) => (block.type === "text" ? block.text : ""))
          .join("");
        const toolCall = event.message.content.find(isToolCallBlock);

        if (toolCall) {
          yield { type: "tool_call", name: toolCall.name, arguments: toolCall.arguments };
        }

        yield { type: "final", content: text };
        return;
      }
    }

    throw new Error("Model stream ended without a final message");
  }

  private requireModel(): Model<Api> {
    if (!this.model) {
      this.model = this.resolveModel(this.descriptor);
    }

    if (!this.model) {
      throw new Error(
        `Unable to resolve model ${this.descriptor.provider}/${this.descriptor.modelId}. ` +
          "Set TODO_AGENT_MODEL_PROVIDER/TODO_AGENT_MODEL_ID to a model supported by @mariozechner/pi-ai."
      );
    }

    return this.model;
  }
}

export function resolveCatalogModel(descriptor: AgentModelDescriptor): Model<Api> | undefined {
  const provider = getProviders().find((candidate) => candidate === descriptor.provider);
  if (!provider) {
    return undefined;
  }

  return getModels(provider).find((model) => model.id === descriptor.modelId);
}

function isToolCallBlock(block: { type: string }): block is ToolCall {
  return block.type === "toolCall";
}
