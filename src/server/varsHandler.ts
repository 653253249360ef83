import { createServer, type Server } from "http";
import { renderError } from "../vars/render";
import { VarRegistry } from "../vars/registry";

export const VARS_PATH = "/debug/vars";
const HEALTH_PATH = "/health";

/** The parts of node's request and response the handler touches. */
export interface VarsRequest {
  method?: string;
  url?: string;
  headers: { host?: string };
}

export interface VarsResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export type RequestHandler = (req: VarsRequest, res: VarsResponse) => Promise<void>;

function sendJson(res: VarsResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body, null, 2));
}

function getPathname(url: string | undefined, host: string | undefined): string {
  if (url === undefined) return "/";
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base).pathname;
  } catch {
    return "/";
  }
}

export function createVarsHandler(registry: VarRegistry): RequestHandler {
  return async (req, res) => {
    const pathname = getPathname(req.url, req.headers.host);
    const method = req.method ?? "GET";

    if (method === "GET" && pathname === HEALTH_PATH) {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    if (method === "GET" && pathname === VARS_PATH) {
      sendJson(res, 200, await registry.render());
      return;
    }

    sendJson(res, 404, { error: "Not Found" });
  };
}

export function startVarsServer(registry: VarRegistry, port: number, onListening?: () => void): Server {
  const handle = createVarsHandler(registry);
  const server = createServer((req, res) => {
    void handle(req, res).catch((error: unknown) => {
      sendJson(res, 500, renderError(error));
    });
  });
  server.listen(port, onListening);
  return server;
}
