import type { IncomingMessage, ServerResponse } from "node:http";

export const DEFAULT_MAX_HTTP_BODY_SIZE_BYTES = 64 * 1024;

export class HttpRequestError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "HttpRequestError";
  }
}

export function resolveRequestUrl(request: IncomingMessage, fallbackHost: string): URL {
  return new URL(request.url ?? "/", `http://${request.headers.host ?? fallbackHost}`);
}

export async function readRequestBody(request: IncomingMessage, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of request) {
    const chunkBuffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    totalBytes += chunkBuffer.length;

    if (totalBytes > maxBytes) {
      throw new HttpRequestError(413, `Request body too large. Max ${maxBytes} bytes.`);
    }

    chunks.push(chunkBuffer);
  }

  return Buffer.concat(chunks);
}

export async function readJsonBody(
  request: IncomingMessage,
  maxBytes = DEFAULT_MAX_HTTP_BODY_SIZE_BYTES
): Promise<unknown> {
  const body = await readRequestBody(request, maxBytes);

  if (body.length === 0) {
    return {};
  }

  const raw = body.toString("utf8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpRequestError(400, "Request body must be valid JSON");
  }
}

export function applyCorsHeaders(request: IncomingMessage, response: ServerResponse, methods: string): void {
  const origin = typeof request.headers.origin === "string" ? request.headers.origin : "*";

  response.setHeader("Access-Control-Allow-Origin", origin);
  response.setHeader("Vary", "Origin");
  response.setHeader("Access-Control-Allow-Methods", methods);
  response.setHeader("Access-Control-Allow-Headers", "content-type");
}

export function sendJson(response: ServerResponse, statusCode: number, body: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json; charset=utf-8");
  response.end(JSON.stringify(body));
}

export function sendMethodNotAllowed(request: IncomingMessage, response: ServerResponse, methods: string): void {
  applyCorsHeaders(request, response, methods);
  response.setHeader("Allow", methods);
  sendJson(response, 405, { error: "Method Not Allowed" });
}
