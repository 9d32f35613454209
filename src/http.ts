import { createAdaptorServer, type HttpBindings } from "@hono/node-server";
import { RESPONSE_ALREADY_SENT } from "@hono/node-server/utils/response";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { Server } from "node:http";

import { createServer, type ServerDeps } from "./server.js";

export const MCP_PATH = "/mcp";

/** Origins of the conversational clients allowed to call the server from a browser. */
export const CLIENT_ORIGINS = ["https://chatgpt.com", "https://chat.openai.com"];

function rpcError(code: number, message: string) {
  return { jsonrpc: "2.0" as const, error: { code, message }, id: null };
}

/**
 * Stateless streamable HTTP host: every POST gets a fresh McpServer and
 * transport over the shared stores.
 */
export function createHttpApp(deps: ServerDeps, origins: readonly string[] = CLIENT_ORIGINS) {
  const { logger } = deps;
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.use(
    "/*",
    cors({
      origin: (origin) => (origins.includes(origin) ? origin : null),
      allowMethods: ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      exposeHeaders: ["Mcp-Session-Id"],
      credentials: true
    })
  );

  app.post(MCP_PATH, async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      logger.debug({ err }, "rejected request body");
      return c.json(rpcError(-32700, "Parse error"), 400);
    }

    const { incoming, outgoing } = c.env;
    const server = createServer(deps);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    outgoing.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        logger.warn({ err }, "failed to close MCP request");
      });
    });

    // cors() has put its headers on c.res; the transport writes to the raw response.
    c.res.headers.forEach((value, key) => outgoing.setHeader(key, value));

    await server.connect(transport);
    await transport.handleRequest(incoming, outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  // No sessions, so no server-initiated stream and nothing to terminate.
  app.on(["GET", "DELETE"], MCP_PATH, (c) => c.json(rpcError(-32000, "Method not allowed."), 405));

  app.get("/", (c) => c.text("OK"));

  return app;
}

export interface HttpServerOpts {
  host: string;
  port: number;
}

export function startHttpServer(deps: ServerDeps, { host, port }: HttpServerOpts): Promise<Server> {
  const app = createHttpApp(deps);
  const server = createAdaptorServer({ fetch: app.fetch, hostname: host });
  if (!(server instanceof Server)) {
    return Promise.reject(new TypeError("expected an HTTP/1.1 server"));
  }

  return new Promise((resolvePromise, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const info = server.address();
      const actualPort = typeof info === "object" && info ? info.port : port;
      deps.logger.info({ host, port: actualPort, path: MCP_PATH }, `listening on http://${host}:${actualPort}${MCP_PATH}`);
      resolvePromise(server);
    });
  });
}
