import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import type { TodoAgentConfig } from "./types.js";

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8000;
const DEFAULT_MODEL_PROVIDER = "groq";
const DEFAULT_MODEL_ID = "llama-3.3-70b-versatile";
const DEFAULT_HISTORY_LIMIT = 20;
const DEFAULT_SEARCH_RESULT_LIMIT = 5;

export interface ConfigOverrides {
  rootDir?: string;
  dataDir?: string;
  host?: string;
  port?: number;
}

/** Nearest ancestor whose package.json declares workspaces; works from sources and from dist/. */
export function detectRootDir(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let current = resolve(startDir);

  while (true) {
    if (isWorkspaceRoot(current)) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      return resolve(startDir, "..", "..", "..");
    }

    current = parent;
  }
}

function isWorkspaceRoot(dir: string): boolean {
  const packageJsonPath = resolve(dir, "package.json");
  if (!existsSync(packageJsonPath)) {
    return false;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
    return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[todo-agent] Ignoring unreadable ${packageJsonPath}: ${message}`);
    return false;
  }
}

export function createConfig(overrides: ConfigOverrides = {}): TodoAgentConfig {
  const debugEnv = process.env.TODO_AGENT_DEBUG?.trim().toLowerCase();
  const debug = debugEnv ? !["0", "false", "off", "no"].includes(debugEnv) : true;

  const rootDir = overrides.rootDir ? resolve(overrides.rootDir) : detectRootDir();

  const nodeEnv = process.env.NODE_ENV?.trim().toLowerCase();
  const defaultDataDir = resolve(homedir(), nodeEnv === "production" ? ".todo-agent" : ".todo-agent-dev");

  const dataDirEnv = process.env.TODO_AGENT_DATA_DIR?.trim();
  const dataDir = overrides.dataDir
    ? resolvePathLike(rootDir, overrides.dataDir)
    : dataDirEnv
      ? resolvePathLike(rootDir, dataDirEnv)
      : defaultDataDir;

  const apiKey = process.env.TODO_AGENT_API_KEY?.trim();

  return {
    host: overrides.host ?? normalizeOptionalString(process.env.TODO_AGENT_HOST) ?? DEFAULT_HOST,
    port: overrides.port ?? parsePositiveInteger(process.env.TODO_AGENT_PORT, DEFAULT_PORT),
    debug,
    model: {
      provider: normalizeOptionalString(process.env.TODO_AGENT_MODEL_PROVIDER) ?? DEFAULT_MODEL_PROVIDER,
      modelId: normalizeOptionalString(process.env.TODO_AGENT_MODEL_ID) ?? DEFAULT_MODEL_ID
    },
    apiKey: apiKey ? apiKey : undefined,
    historyLimit: parsePositiveInteger(process.env.TODO_AGENT_HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT),
    searchResultLimit: parsePositiveInteger(process.env.TODO_AGENT_SEARCH_RESULTS, DEFAULT_SEARCH_RESULT_LIMIT),
    paths: {
      rootDir,
      dataDir,
      todosFile: resolve(dataDir, "todos.json")
    }
  };
}

function normalizeOptionalString(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const normalized = normalizeOptionalString(value);
  if (!normalized) {
    return fallback;
  }

  const parsed = Number.parseInt(normalized, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function resolvePathLike(rootDir: string, rawPath: string): string {
  if (rawPath === "~") {
    return homedir();
  }

  if (rawPath.startsWith("~/")) {
    return resolve(homedir(), rawPath.slice(2));
  }

  if (isAbsolute(rawPath)) {
    return resolve(rawPath);
  }

  return resolve(rootDir, rawPath);
}
