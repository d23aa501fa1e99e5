import type { Tool } from "@mariozechner/pi-ai";
import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { TodoToolCall } from "./agent-types.js";

const todoIdSchema = Type.Integer({ minimum: 1, description: "The numeric ID of the todo." });
const titleSchema = Type.String({ minLength: 1, maxLength: 255, description: "Short title of the todo." });
const descriptionSchema = Type.Union([Type.String(), Type.Null()], {
  description: "Optional longer description."
});

export const createTodoParameters = Type.Object({
  title: titleSchema,
  description: Type.Optional(descriptionSchema)
});

export const readTodosParameters = Type.Object({});

export const updateTodoParameters = Type.Object({
  todo_id: todoIdSchema,
  title: Type.Optional(titleSchema),
  description: Type.Optional(descriptionSchema)
});

export const deleteTodoParameters = Type.Object({
  todo_id: todoIdSchema
});

export const searchTodosParameters = Type.Object({
  query: Type.String({ minLength: 1, description: "Topic or keywords to look for." })
});

export const TODO_TOOLS: Tool[] = [
  {
    name: "create_todo",
    description: "Create a new todo item.",
    parameters: createTodoParameters
  },
  {
    name: "read_todos",
    description: "List every todo item.",
    parameters: readTodosParameters
  },
  {
    name: "update_todo",
    description: "Update the title and/or description of an existing todo by ID.",
    parameters: updateTodoParameters
  },
  {
    name: "delete_todo",
    description: "Delete a todo item by ID.",
    parameters: deleteTodoParameters
  },
  {
    name: "search_todos",
    description: "Find todos related to a topic or keyword.",
    parameters: searchTodosParameters
  }
];

export type ParsedTodoToolCall =
  | { ok: true; call: TodoToolCall }
  | { ok: false; error: string };

export function parseTodoToolCall(name: string, rawArguments: unknown): ParsedTodoToolCall {
  const args = rawArguments === undefined || rawArguments === null ? {} : rawArguments;

  switch (name) {
    case "create_todo": {
      const value = Value.Convert(createTodoParameters, args);
      if (!Value.Check(createTodoParameters, value)) {
        return invalidArguments(name, createTodoParameters, value);
      }
      return { ok: true, call: { name, arguments: value } };
    }

    case "read_todos":
      return { ok: true, call: { name, arguments: {} } };

    case "update_todo": {
      const value = Value.Convert(updateTodoParameters, args);
      if (!Value.Check(updateTodoParameters, value)) {
        return invalidArguments(name, updateTodoParameters, value);
      }
      return { ok: true, call: { name, arguments: value } };
    }

    case "delete_todo": {
      const value = Value.Convert(deleteTodoParameters, args);
      if (!Value.Check(deleteTodoParameters, value)) {
        return invalidArguments(name, deleteTodoParameters, value);
      }
      return { ok: true, call: { name, arguments: value } };
    }

    case "search_todos": {
      const value = Value.Convert(searchTodosParameters, args);
      if (!Value.Check(searchTodosParameters, value)) {
        return invalidArguments(name, searchTodosParameters, value);
      }
      return { ok: true, call: { name, arguments: value } };
    }

    default:
      return { ok: false, error: `Unknown tool: ${name}` };
  }
}

function invalidArguments(name: string, schema: TSchema, value: unknown): ParsedTodoToolCall {
  const first = Value.Errors(schema, value).First();
  const detail = first ? `${first.path || "/"} ${first.message}` : "arguments do not match the schema";
  return { ok: false, error: `Invalid arguments for ${name}: ${detail}` };
}
