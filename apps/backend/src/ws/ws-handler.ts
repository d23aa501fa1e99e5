import type { ServerEvent } from "@todo-agent/protocol";
import { WebSocket, type RawData, type WebSocketServer } from "ws";
import type { AgentOrchestrator } from "../agent/agent-orchestrator.js";
import type { ConversationTurn } from "../agent/agent-types.js";
import type { TodoStore } from "../todos/todo-types.js";
import type { DebugLogger } from "../utils/debug-log.js";
import { parseClientCommand } from "./ws-command-parser.js";

const BUFFERED_AMOUNT_WARNING_BYTES = 1024 * 1024;

interface ChatSession {
  history: ConversationTurn[];
  queue: Promise<void>;
}

export class WsHandler {
  private readonly orchestrator: AgentOrchestrator;
  private readonly store: TodoStore;
  private readonly historyLimit: number;
  private readonly logDebug: DebugLogger;

  private wss: WebSocketServer | null = null;
  private readonly sessions = new Map<WebSocket, ChatSession>();

  constructor(options: {
    orchestrator: AgentOrchestrator;
    store: TodoStore;
    historyLimit: number;
    logDebug: DebugLogger;
  }) {
    this.orchestrator = options.orchestrator;
    this.store = options.store;
    this.historyLimit = options.historyLimit;
    this.logDebug = options.logDebug;
  }

  attach(server: WebSocketServer): void {
    this.wss = server;

    server.on("connection", (socket) => {
      const session: ChatSession = {
        history: [],
        queue: this.sendTodosSnapshot(socket)
      };
      this.sessions.set(socket, session);
      this.logDebug("connection:open", { sessions: this.sessions.size });

      socket.on("message", (raw) => {
        this.enqueue(session, () => this.handleSocketMessage(socket, session, raw));
      });

      socket.on("close", () => {
        this.sessions.delete(socket);
        this.logDebug("connection:close", { sessions: this.sessions.size });
      });

      socket.on("error", (error) => {
        this.sessions.delete(socket);
        console.warn(`[todo-agent] WebSocket error: ${error.message}`);
      });
    });
  }

  reset(): void {
    this.wss = null;
    this.sessions.clear();
  }

  /** Pushes the current snapshot to every open chat connection except `exclude`. */
  async broadcastTodos(exclude?: WebSocket): Promise<void> {
    if (!this.wss) {
      return;
    }

    const todos = await this.store.list();
    for (const client of this.wss.clients) {
      if (client === exclude) {
        continue;
      }

      this.send(client, { type: "todos_update", todos });
    }
  }

  private enqueue(session: ChatSession, task: () => Promise<void>): void {
    session.queue = session.queue.then(task).catch((error) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[todo-agent] Failed to process chat message: ${message}`);
    });
  }

  private async sendTodosSnapshot(socket: WebSocket): Promise<void> {
    try {
      this.send(socket, { type: "todos_update", todos: await this.store.list() });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[todo-agent] Failed to load todos for new connection: ${message}`);
    }
  }

  private async handleSocketMessage(socket: WebSocket, session: ChatSession, raw: RawData): Promise<void> {
    const parsed = parseClientCommand(raw);
    if (!parsed.ok) {
      this.logDebug("message:invalid", { message: parsed.error });
      this.send(
        socket,
        parsed.requestId
          ? { type: "error", content: parsed.error, requestId: parsed.requestId }
          : { type: "error", content: parsed.error }
      );
      return;
    }

    const { message, requestId } = parsed.command;
    this.logDebug("message:received", { requestId, length: message.length });

    let reply: string | undefined;
    for await (const event of this.orchestrator.run({ utterance: message, history: session.history.slice() })) {
      this.send(socket, requestId ? { ...event, requestId } : event);

      if (event.type === "complete") {
        reply = event.content;
        if (event.todos) {
          await this.broadcastTodos(socket);
        }
      }
    }

    if (reply === undefined) {
      return;
    }

    session.history.push({ role: "user", content: message }, { role: "assistant", content: reply });
    if (session.history.length > this.historyLimit) {
      session.history.splice(0, session.history.length - this.historyLimit);
    }
  }

  private send(socket: WebSocket, event: ServerEvent): void {
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }

    if (socket.bufferedAmount > BUFFERED_AMOUNT_WARNING_BYTES) {
      this.logDebug("socket:backpressure", { bufferedAmount: socket.bufferedAmount, type: event.type });
    }

    socket.send(JSON.stringify(event));
  }
}
