import { sendJson } from "../http-utils.js";
import type { HttpRoute } from "./http-route.js";

export const SERVICE_NAME = "todo-agent";
export const SERVICE_VERSION = "1.0.0";
export const CHAT_SOCKET_PATH = "/ws/chat";

export function createHealthRoutes(): HttpRoute[] {
  return [
    {
      methods: "GET",
      matches: (pathname) => pathname === "/",
      handle: async (_request, response) => {
        sendJson(response, 200, {
          name: SERVICE_NAME,
          version: SERVICE_VERSION,
          status: "running",
          websocket: CHAT_SOCKET_PATH
        });
      }
    },
    {
      methods: "GET",
      matches: (pathname) => pathname === "/health",
      handle: async (_request, response) => {
        sendJson(response, 200, { status: "healthy" });
      }
    }
  ];
}
