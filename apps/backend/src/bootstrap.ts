import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { AgentOrchestrator } from "./agent/agent-orchestrator.js";
import type { TodoAgent } from "./agent/agent-types.js";
import { PiTodoAgent } from "./agent/pi-todo-agent.js";
import { createConfig, detectRootDir, type ConfigOverrides } from "./config.js";
import { JsonTodoStore } from "./todos/json-todo-store.js";
import { LexicalTodoSearch } from "./todos/lexical-todo-search.js";
import type { TodoSearch, TodoStore } from "./todos/todo-types.js";
import type { TodoAgentConfig } from "./types.js";
import { createDebugLogger } from "./utils/debug-log.js";
import { CHAT_SOCKET_PATH } from "./ws/routes/health-routes.js";
import { TodoAgentServer } from "./ws/server.js";

export interface BootstrapOptions {
  rootDir?: string;
  dataDir?: string;
  envPath?: string | null;
  host?: string;
  port?: number;
  agent?: TodoAgent;
  store?: TodoStore;
  search?: TodoSearch;
}

export interface BootstrapResult {
  config: TodoAgentConfig;
  host: string;
  port: number;
  wsUrl: string;
  httpUrl: string;
  store: TodoStore;
  stop: () => Promise<void>;
}

export async function startTodoAgentBackend(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  const resolvedRootDir = options.rootDir ? resolve(options.rootDir) : detectRootDir();
  loadBootstrapDotenv(resolvedRootDir, options.envPath);

  const configOverrides: ConfigOverrides = {
    rootDir: resolvedRootDir,
    dataDir: options.dataDir,
    host: options.host,
    port: options.port
  };
  const config = createConfig(configOverrides);

  const store = options.store ?? new JsonTodoStore({ filePath: config.paths.todosFile });
  const search = options.search ?? new LexicalTodoSearch(store);
  const agent =
    options.agent ??
    new PiTodoAgent({
      model: config.model,
      apiKey: config.apiKey
    });

  const orchestrator = new AgentOrchestrator({
    agent,
    store,
    search,
    searchResultLimit: config.searchResultLimit,
    debug: createDebugLogger(config.debug, "agent")
  });

  const server = new TodoAgentServer({
    orchestrator,
    store,
    host: config.host,
    port: config.port,
    historyLimit: config.historyLimit,
    logDebug: createDebugLogger(config.debug, "ws")
  });

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) {
      return;
    }

    stopped = true;
    await server.stop();
  };

  let bound: { host: string; port: number };
  try {
    await store.list();
    bound = await server.start();
  } catch (error) {
    await stop();
    throw error;
  }

  return {
    config,
    host: bound.host,
    port: bound.port,
    wsUrl: `ws://${bound.host}:${bound.port}${CHAT_SOCKET_PATH}`,
    httpUrl: `http://${bound.host}:${bound.port}`,
    store,
    stop
  };
}

function loadBootstrapDotenv(rootDir: string, envPath: string | null | undefined): void {
  if (envPath === null) {
    return;
  }

  const pathToLoad = typeof envPath === "string" ? resolve(envPath) : resolve(rootDir, ".env");

  if (!existsSync(pathToLoad)) {
    return;
  }

  loadDotenv({ path: pathToLoad, override: false });
}
