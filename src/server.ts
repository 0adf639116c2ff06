// Seat Posture Server - WebSocket Handler and HTTP Servers
//
// Two listeners: the WebSocket endpoint that sensor clients stream frames to,
// and the statistics API. Each WebSocket message is one JSON sensor frame and
// is answered with one JSON message on the same connection.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import type { SessionManager } from "./session-manager.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Close code sent when the server already serves MAX_CLIENTS connections ("try again later") */
export const CLOSE_CODE_AT_CAPACITY = 1013;

export const DEFAULT_PING_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_CLIENTS = 100;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Statistics API. Omit to run the WebSocket side alone. */
  apiApp?: Express;
  logger?: Logger;
  /** 0 disables heartbeats */
  pingIntervalMs?: number;
  maxClients?: number;
}

export interface ListenOptions {
  host?: string;
  websocketPort: number;
  apiPort?: number;
}

export interface BoundPorts {
  websocketPort: number;
  apiPort: number | null;
}

export interface AppServer {
  wsApp: Express;
  wsHttpServer: HttpServer;
  apiServer: HttpServer | null;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start both listeners. Resolves with the bound ports (useful with port 0). */
  listen(options: ListenOptions): Promise<BoundPorts>;
  /** Disconnect every client and close both listeners. */
  close(): Promise<void>;
}

/**
 * Creates the HTTP servers and the WebSocket server.
 * Does NOT start listening; call `listen()` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    apiApp,
    logger = createConsoleLogger("Server"),
    pingIntervalMs = DEFAULT_PING_INTERVAL_MS,
    maxClients = DEFAULT_MAX_CLIENTS,
  } = options;

  const wsApp = express();
  wsApp.get("/health", (_req, res) => {
    res.json({ status: "ok", clients: sessionManager.clientCount });
  });

  const wsHttpServer = createServer(wsApp);
  const apiServer = apiApp ? createServer(apiApp) : null;
  const wss = new WebSocketServer({ server: wsHttpServer });

  const alive = new WeakMap<WebSocket, boolean>();

  wss.on("connection", (ws: WebSocket) => {
    if (sessionManager.clientCount >= maxClients) {
      logger.warn(`Rejecting connection: ${maxClients} clients already connected`);
      ws.close(CLOSE_CODE_AT_CAPACITY, "Server at capacity");
      return;
    }
    alive.set(ws, true);
    ws.on("pong", () => alive.set(ws, true));
    handleConnection(ws, sessionManager, logger);
  });

  let heartbeat: ReturnType<typeof setInterval> | null = null;
  if (pingIntervalMs > 0) {
    heartbeat = setInterval(() => {
      for (const ws of wss.clients) {
        if (alive.get(ws) === false) {
          logger.warn("Terminating connection that missed a heartbeat");
          ws.terminate();
          continue;
        }
        alive.set(ws, false);
        ws.ping();
      }
    }, pingIntervalMs);
    heartbeat.unref();
  }

  return {
    wsApp,
    wsHttpServer,
    apiServer,
    wss,
    sessionManager,
    async listen({ host, websocketPort, apiPort }: ListenOptions): Promise<BoundPorts> {
      const boundWs = await listenOn(wsHttpServer, websocketPort, host);
      logger.info(`WebSocket server listening on ${host ?? "*"}:${boundWs}`);
      let boundApi: number | null = null;
      if (apiServer) {
        boundApi = await listenOn(apiServer, apiPort ?? 0, host);
        logger.info(`Statistics API listening on ${host ?? "*"}:${boundApi}`);
      }
      return { websocketPort: boundWs, apiPort: boundApi };
    },
    async close(): Promise<void> {
      if (heartbeat) {
        clearInterval(heartbeat);
        heartbeat = null;
      }
      await sessionManager.shutdown();
      for (const client of wss.clients) {
        client.close(1001, "Server shutting down");
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await closeServer(wsHttpServer);
      if (apiServer) await closeServer(apiServer);
      logger.info("Servers closed");
    },
  };
}

function listenOn(server: HttpServer, port: number, host: string | undefined): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      resolve(isAddressInfo(address) ? address.port : port);
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

function closeServer(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
    server.closeAllConnections();
  });
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, sessionManager: SessionManager, logger: Logger): void {
  const session = sessionManager.registerClient({
    send: (data) => sendText(ws, data),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  });
  const { clientId } = session;

  ws.on("message", (data: RawData) => {
    sessionManager.submitFrame(clientId, rawDataToString(data));
  });

  ws.on("close", (code: number) => {
    logger.info(`WebSocket closed for ${clientId} (code ${code})`);
    cleanupConnection(sessionManager, clientId, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for ${clientId}: ${err.message}`);
    cleanupConnection(sessionManager, clientId, logger);
  });
}

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Sends text on an open WebSocket. Rejects when the socket is not open or
 * the write fails.
 */
export function sendText(ws: WebSocket, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ws.readyState !== WebSocket.OPEN) {
      reject(new Error("WebSocket is not open"));
      return;
    }
    ws.send(data, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(sessionManager: SessionManager, clientId: string, logger: Logger): void {
  sessionManager.unregisterClient(clientId).catch((e: unknown) => {
    logger.error(`Cleanup for ${clientId} failed: ${errorMessage(e)}`);
  });
}
