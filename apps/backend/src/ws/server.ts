import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import { WebSocketServer } from "ws";
import type { AgentOrchestrator } from "../agent/agent-orchestrator.js";
import { isTodoNotFoundError, isTodoValidationError } from "../todos/todo-errors.js";
import type { TodoStore } from "../todos/todo-types.js";
import type { DebugLogger } from "../utils/debug-log.js";
import { HttpRequestError, resolveRequestUrl, sendJson, sendMethodNotAllowed } from "./http-utils.js";
import { CHAT_SOCKET_PATH, createHealthRoutes } from "./routes/health-routes.js";
import type { HttpRoute } from "./routes/http-route.js";
import { createTodoRoutes } from "./routes/todo-routes.js";
import { WsHandler } from "./ws-handler.js";

export class TodoAgentServer {
  private readonly host: string;
  private readonly port: number;
  private readonly logDebug: DebugLogger;
  private readonly wsHandler: WsHandler;
  private readonly routes: HttpRoute[];

  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;

  constructor(options: {
    orchestrator: AgentOrchestrator;
    store: TodoStore;
    host: string;
    port: number;
    historyLimit: number;
    logDebug: DebugLogger;
  }) {
    this.host = options.host;
    this.port = options.port;
    this.logDebug = options.logDebug;
    this.wsHandler = new WsHandler({
      orchestrator: options.orchestrator,
      store: options.store,
      historyLimit: options.historyLimit,
      logDebug: options.logDebug
    });
    this.routes = [
      ...createHealthRoutes(),
      ...createTodoRoutes({
        store: options.store,
        onTodosChanged: () => this.wsHandler.broadcastTodos()
      })
    ];
  }

  async start(): Promise<{ host: string; port: number }> {
    if (this.httpServer) {
      return this.resolveBoundAddress(this.httpServer);
    }

    const httpServer = createServer((request, response) => {
      void this.handleHttpRequest(request, response);
    });
    const wss = new WebSocketServer({
      server: httpServer,
      path: CHAT_SOCKET_PATH
    });

    this.httpServer = httpServer;
    this.wss = wss;
    this.wsHandler.attach(wss);

    await new Promise<void>((resolve, reject) => {
      const onListening = (): void => {
        cleanup();
        resolve();
      };

      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };

      const cleanup = (): void => {
        httpServer.off("listening", onListening);
        httpServer.off("error", onError);
      };

      httpServer.on("listening", onListening);
      httpServer.on("error", onError);
      httpServer.listen(this.port, this.host);
    });

    return this.resolveBoundAddress(httpServer);
  }

  async stop(): Promise<void> {
    const currentWss = this.wss;
    const currentHttpServer = this.httpServer;

    this.wss = null;
    this.httpServer = null;
    this.wsHandler.reset();

    if (currentWss) {
      await closeWebSocketServer(currentWss);
    }

    if (currentHttpServer) {
      await closeHttpServer(currentHttpServer);
    }
  }

  private resolveBoundAddress(server: HttpServer): { host: string; port: number } {
    const address = server.address();
    if (address && typeof address === "object") {
      return { host: this.host, port: address.port };
    }

    return { host: this.host, port: this.port };
  }

  private async handleHttpRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const requestUrl = resolveRequestUrl(request, `${this.host}:${this.port}`);
    this.logDebug("http:request", { method: request.method, path: requestUrl.pathname });

    try {
      const route = this.routes.find((candidate) => candidate.matches(requestUrl.pathname));
      if (!route) {
        sendJson(response, 404, { error: "Not Found" });
        return;
      }

      if (!routeAllowsMethod(route, request.method)) {
        sendMethodNotAllowed(request, response, route.methods);
        return;
      }

      await route.handle(request, response, requestUrl);
    } catch (error) {
      if (response.writableEnded || response.headersSent) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[todo-agent] HTTP handler failed after response was sent: ${message}`);
        return;
      }

      if (isTodoNotFoundError(error)) {
        sendJson(response, 404, { error: "Todo not found" });
        return;
      }

      if (isTodoValidationError(error)) {
        sendJson(response, 400, { error: error.message });
        return;
      }

      if (error instanceof HttpRequestError) {
        sendJson(response, error.statusCode, { error: error.message });
        return;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[todo-agent] HTTP request failed: ${message}`);
      sendJson(response, 500, { error: "Internal Server Error" });
    }
  }
}

function routeAllowsMethod(route: HttpRoute, method: string | undefined): boolean {
  return method !== undefined && route.methods.split(",").some((allowed) => allowed.trim() === method);
}

async function closeWebSocketServer(server: WebSocketServer): Promise<void> {
  for (const client of server.clients) {
    client.terminate();
  }

  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function closeHttpServer(server: HttpServer): Promise<void> {
  server.closeAllConnections();

  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}
