/**
 * Shared helpers for CLI tests: a route-table HTTP mock, a fake operator
 * feed WebSocket server, and stdout/stderr capture.
 */

import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { vi, type MockInstance } from "vitest";
import { stripAnsi } from "../lib/formatters.js";

// ---------------------------------------------------------------------------
// Mock HTTP server
// ---------------------------------------------------------------------------

export interface RecordedRequest {
  method: string;
  path: string;
  contentType: string | undefined;
  body: unknown;
}

export interface MockResponse {
  status: number;
  /** Sent as JSON */
  body?: unknown;
  /** Sent verbatim instead of body */
  raw?: string;
  /** Wait before answering */
  delayMs?: number;
}

export type MockHandler = (req: RecordedRequest) => MockResponse;

export interface MockServer {
  url: string;
  requests: RecordedRequest[];
  /** Answer `METHOD /path` (exact match) with a fixed response or a handler */
  route(method: string, path: string, response: MockResponse | MockHandler): void;
  reset(): void;
  close(): Promise<void>;
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

export function startMockServer(): Promise<MockServer> {
  const routes = new Map<string, MockResponse | MockHandler>();
  const requests: RecordedRequest[] = [];

  const httpServer: HttpServer = createServer((req, res) => {
    void readBody(req).then(async (text) => {
      const recorded: RecordedRequest = {
        method: req.method ?? "GET",
        path: req.url ?? "/",
        contentType: req.headers["content-type"],
        body: text.length > 0 ? JSON.parse(text) : undefined,
      };
      requests.push(recorded);

      const route = routes.get(`${recorded.method} ${recorded.path}`);
      const response: MockResponse =
        route === undefined
          ? { status: 404, body: { error: "Not found" } }
          : typeof route === "function"
            ? route(recorded)
            : route;

      if (response.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, response.delayMs));
      }
      if (response.raw !== undefined) {
        res.writeHead(response.status, { "Content-Type": "text/plain" });
        res.end(response.raw);
        return;
      }
      res.writeHead(response.status, { "Content-Type": "application/json" });
      res.end(response.body === undefined ? "" : JSON.stringify(response.body));
    });
  });

  return new Promise((resolve) => {
    httpServer.listen(0, "127.0.0.1", () => {
      const addr = httpServer.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        requests,
        route(method, path, response) {
          routes.set(`${method} ${path}`, response);
        },
        reset() {
          routes.clear();
          requests.length = 0;
        },
        close() {
          return new Promise((done) => {
            httpServer.closeAllConnections();
            httpServer.close(() => done());
          });
        },
      });
    });
  });
}

// ---------------------------------------------------------------------------
// Fake operator feed
// ---------------------------------------------------------------------------

export interface FakeFeed {
  /** http:// origin, as the CLI config would hold it */
  url: string;
  /** Open server-side sockets, in connection order */
  sockets: WebSocket[];
  /** Paths clients connected to */
  paths: string[];
  /** Parsed client messages, in arrival order */
  received: Array<Record<string, unknown>>;
  /** Send a message to every open client */
  broadcast(msg: unknown): void;
  close(): Promise<void>;
}

export function startFakeFeed(): Promise<FakeFeed> {
  const sockets: WebSocket[] = [];
  const paths: string[] = [];
  const received: Array<Record<string, unknown>> = [];
  const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });

  wss.on("connection", (ws, req) => {
    sockets.push(ws);
    paths.push(req.url ?? "");
    ws.on("message", (data) => {
      const msg: Record<string, unknown> = JSON.parse(data.toString());
      received.push(msg);
    });
  });

  return new Promise((resolve) => {
    wss.on("listening", () => {
      const addr = wss.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        sockets,
        paths,
        received,
        broadcast(msg) {
          for (const ws of wss.clients) {
            if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
          }
        },
        close() {
          return new Promise((done) => {
            for (const ws of wss.clients) ws.terminate();
            wss.close(() => done());
          });
        },
      });
    });
  });
}

// ---------------------------------------------------------------------------
// Timing
// ---------------------------------------------------------------------------

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until a condition holds */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await delay(5);
  }
}

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

export interface CapturedOutput {
  /** Everything written to process.stdout, ANSI stripped */
  stdout(): string;
  /** console.log lines, ANSI stripped */
  logs(): string[];
  /** console.error lines, ANSI stripped */
  errors(): string[];
  restore(): void;
}

export function captureOutput(): CapturedOutput {
  const write: MockInstance = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  const log: MockInstance = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const error: MockInstance = vi.spyOn(console, "error").mockImplementation(() => undefined);

  const lines = (spy: MockInstance): string[] =>
    spy.mock.calls.map((args: unknown[]) => stripAnsi(String(args[0] ?? "")));

  return {
    stdout: () => lines(write).join(""),
    logs: () => lines(log),
    errors: () => lines(error),
    restore() {
      write.mockRestore();
      log.mockRestore();
      error.mockRestore();
    },
  };
}
