import type { ClientCommand } from "@todo-agent/protocol";
import { type RawData } from "ws";

export type ParsedClientCommand =
  | { ok: true; command: ClientCommand }
  | { ok: false; error: string; requestId?: string };

export function parseClientCommand(raw: RawData | string): ParsedClientCommand {
  const text = rawDataToString(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, error: "Message must be valid JSON" };
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { ok: false, error: "Message must be a JSON object" };
  }

  const maybe = parsed as { message?: unknown; requestId?: unknown };
  const requestId = typeof maybe.requestId === "string" && maybe.requestId.length > 0 ? maybe.requestId : undefined;

  if (maybe.requestId !== undefined && typeof maybe.requestId !== "string") {
    return { ok: false, error: "requestId must be a string when provided" };
  }

  if (typeof maybe.message !== "string" || maybe.message.trim().length === 0) {
    return { ok: false, error: "Please enter a message", requestId };
  }

  return {
    ok: true,
    command: requestId ? { message: maybe.message.trim(), requestId } : { message: maybe.message.trim() }
  };
}

function rawDataToString(raw: RawData | string): string {
  if (typeof raw === "string") {
    return raw;
  }

  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }

  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }

  return raw.toString("utf8");
}
