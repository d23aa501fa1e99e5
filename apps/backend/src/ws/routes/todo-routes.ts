import type { IncomingMessage, ServerResponse } from "node:http";
import type { TodoStore, TodoUpdateFields } from "../../todos/todo-types.js";
import { applyCorsHeaders, HttpRequestError, readJsonBody, sendJson, sendMethodNotAllowed } from "../http-utils.js";
import type { HttpRoute } from "./http-route.js";

const TODOS_ENDPOINT_PATH = "/api/todos";
const TODO_ITEM_ENDPOINT_PATTERN = /^\/api\/todos\/([^/]+)\/?$/;
const TODOS_METHODS = "GET, POST, OPTIONS";
const TODO_ITEM_METHODS = "GET, PUT, PATCH, DELETE, OPTIONS";

export interface TodoRoutesOptions {
  store: TodoStore;
  onTodosChanged: () => Promise<void>;
}

export function createTodoRoutes(options: TodoRoutesOptions): HttpRoute[] {
  const { store, onTodosChanged } = options;

  return [
    {
      methods: TODOS_METHODS,
      matches: (pathname) => pathname === TODOS_ENDPOINT_PATH || pathname === `${TODOS_ENDPOINT_PATH}/`,
      handle: async (request, response) => {
        applyCorsHeaders(request, response, TODOS_METHODS);

        if (request.method === "OPTIONS") {
          response.statusCode = 204;
          response.end();
          return;
        }

        if (request.method === "GET") {
          sendJson(response, 200, await store.list());
          return;
        }

        if (request.method === "POST") {
          const body = await readTodoBody(request);
          if (typeof body.title !== "string") {
            throw new HttpRequestError(400, "title must be a string");
          }

          const todo = await store.create(body.title, parseDescription(body.description));
          sendJson(response, 201, todo);
          await onTodosChanged();
          return;
        }

        sendMethodNotAllowed(request, response, TODOS_METHODS);
      }
    },
    {
      methods: TODO_ITEM_METHODS,
      matches: (pathname) => TODO_ITEM_ENDPOINT_PATTERN.test(pathname),
      handle: async (request, response, requestUrl) => {
        applyCorsHeaders(request, response, TODO_ITEM_METHODS);

        if (request.method === "OPTIONS") {
          response.statusCode = 204;
          response.end();
          return;
        }

        const todoId = parseTodoId(requestUrl.pathname);

        if (request.method === "GET") {
          sendJson(response, 200, await store.get(todoId));
          return;
        }

        if (request.method === "PUT" || request.method === "PATCH") {
          const body = await readTodoBody(request);
          const fields: TodoUpdateFields = {};

          if (body.title !== undefined) {
            if (typeof body.title !== "string") {
              throw new HttpRequestError(400, "title must be a string when provided");
            }
            fields.title = body.title;
          }

          if (body.description !== undefined) {
            fields.description = parseDescription(body.description);
          }

          const todo = await store.update(todoId, fields);
          sendJson(response, 200, todo);
          await onTodosChanged();
          return;
        }

        if (request.method === "DELETE") {
          await store.delete(todoId);
          sendJson(response, 200, { message: "Todo deleted successfully", id: todoId });
          await onTodosChanged();
          return;
        }

        sendMethodNotAllowed(request, response, TODO_ITEM_METHODS);
      }
    }
  ];
}

async function readTodoBody(request: IncomingMessage): Promise<{ title?: unknown; description?: unknown }> {
  const body = await readJsonBody(request);
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw new HttpRequestError(400, "Request body must be a JSON object");
  }

  return body as { title?: unknown; description?: unknown };
}

function parseDescription(value: unknown): string | null | undefined {
  if (value === undefined || value === null || typeof value === "string") {
    return value;
  }

  throw new HttpRequestError(400, "description must be a string or null when provided");
}

function parseTodoId(pathname: string): number {
  const rawId = pathname.match(TODO_ITEM_ENDPOINT_PATTERN)?.[1] ?? "";
  if (!/^\d+$/.test(rawId)) {
    throw new HttpRequestError(400, "Todo id must be a positive integer");
  }

  return Number.parseInt(rawId, 10);
}
