export interface AgentModelDescriptor {
  provider: string;
  modelId: string;
}

export interface TodoAgentConfig {
  host: string;
  port: number;
  debug: boolean;
  model: AgentModelDescriptor;
  apiKey?: string;
  historyLimit: number;
  searchResultLimit: number;
  paths: {
    rootDir: string;
    dataDir: string;
    todosFile: string;
  };
}
