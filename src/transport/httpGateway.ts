import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { App, createAppServer, healthReport } from "../app.js";
import { describeError } from "../domain/errors.js";
import type { Logger } from "../infra/logging/logger.js";

export const MCP_PATH = "/mcp";
export const HEALTH_PATH = "/healthz";

/** Request bodies above this size are rejected with 413. */
export const MAX_BODY_BYTES = 1024 * 1024;

// JSON-RPC error codes; -32001 is the session error the MCP SDK clients expect.
const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const INTERNAL_ERROR = -32603;
const SESSION_NOT_FOUND = -32001;

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly rpcCode: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * Streamable HTTP front end: one MCP server per session, all sharing the same
 * app. `/healthz` reports index and queue state without a session.
 */
export class McpHttpGateway {
  private readonly sessions = new Map<string, Session>();

  private readonly httpServer: Server;

  constructor(
    private readonly app: App,
    private readonly logger: Logger,
  ) {
    this.httpServer = createServer((req, res) => {
      void this.handle(req, res);
    });
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async listen(port: number, host: string): Promise<AddressInfo> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off("error", reject);
        resolve();
      });
    });
    const address = this.httpServer.address();
    if (!address || typeof address === "string") {
      throw new Error("HTTP server is not bound to a TCP port.");
    }
    return address;
  }

  /** Ends every session, then stops accepting connections. */
  async close(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    for (const session of sessions) {
      await session.transport.close();
      await session.server.close();
    }

    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
      this.httpServer.closeAllConnections();
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const { pathname } = new URL(req.url ?? "/", "http://localhost");
      if (pathname === HEALTH_PATH && req.method === "GET") {
        writeJson(res, 200, await healthReport(this.app));
        return;
      }
      if (pathname !== MCP_PATH) {
        writeJson(res, 404, { error: `No route for ${req.method ?? "GET"} ${pathname}` });
        return;
      }

      switch (req.method) {
        case "POST":
          await this.handlePost(req, res, await readJsonBody(req));
          return;
        case "GET":
        case "DELETE":
          await this.requireSession(req).transport.handleRequest(req, res);
          return;
        default:
          res.setHeader("Allow", "GET, POST, DELETE");
          writeRpcError(res, 405, INVALID_REQUEST, `Method ${req.method ?? ""} not allowed`);
      }
    } catch (error) {
      if (error instanceof HttpError) {
        writeRpcError(res, error.status, error.rpcCode, error.message);
        return;
      }
      this.logger.error("HTTP request failed", { url: req.url, error: describeError(error) });
      writeRpcError(res, 500, INTERNAL_ERROR, "Internal error");
    }
  }

  private async handlePost(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    if (sessionIdOf(req)) {
      await this.requireSession(req).transport.handleRequest(req, res, body);
      return;
    }
    if (!isInitializeRequest(body)) {
      throw new HttpError(400, INVALID_REQUEST, "Send an initialize request to open a session first");
    }

    const server = createAppServer(this.app);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        this.logger.info("MCP session opened", { sessionId });
      },
    });
    transport.onclose = () => this.dropSession(transport.sessionId);

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private requireSession(req: IncomingMessage): Session {
    const sessionId = sessionIdOf(req);
    if (!sessionId) {
      throw new HttpError(400, INVALID_REQUEST, "Missing mcp-session-id header");
    }
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new HttpError(404, SESSION_NOT_FOUND, "Session not found");
    }
    return session;
  }

  private dropSession(sessionId: string | undefined): void {
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      return;
    }
    this.sessions.delete(sessionId);
    this.logger.info("MCP session closed", { sessionId });
    session.server.close().catch((error: unknown) => {
      this.logger.warn("Failed to close MCP session", { sessionId, error: describeError(error) });
    });
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, INVALID_REQUEST, `Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, PARSE_ERROR, "Parse error");
  }
}

function sessionIdOf(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value || null;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
