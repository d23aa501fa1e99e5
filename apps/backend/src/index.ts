import { startTodoAgentBackend } from "./bootstrap.js";
import { createConfig } from "./config.js";

async function main(): Promise<void> {
  const backend = await startTodoAgentBackend();

  console.log(`Todo agent backend listening on ${backend.httpUrl} (chat socket ${backend.wsUrl})`);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`Received ${signal}. Shutting down...`);
    await backend.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

void main().catch((error) => {
  if (
    error &&
    typeof error === "object" &&
    "code" in error &&
    (error as { code?: string }).code === "EADDRINUSE"
  ) {
    const config = createConfig();
    console.error(
      `Failed to start backend: http://${config.host}:${config.port} is already in use. ` +
        `Stop the other process or run with TODO_AGENT_PORT=<port>.`
    );
  } else {
    console.error(error);
  }
  process.exit(1);
});
