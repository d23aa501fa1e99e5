export type DebugLogger = (message: string, details?: unknown) => void;

export function createDebugLogger(enabled: boolean, scope: string): DebugLogger {
  return (message, details) => {
    if (!enabled) {
      return;
    }

    const prefix = `[todo-agent][${new Date().toISOString()}] ${scope}:${message}`;
    if (details === undefined) {
      console.log(prefix);
      return;
    }

    console.log(prefix, details);
  };
}
