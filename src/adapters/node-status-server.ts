import type { Server } from "node:http";
import type { WebSocket } from "ws";
import { WebSocketServer as WSServer } from "ws";
import type { Logger } from "../interfaces/logger.js";
import type {
  OnStatusConnection,
  StatusSocket,
  WebSocketServerLike,
} from "../interfaces/ws-server.js";
import { noopLogger } from "./noop-logger.js";

export const STATUS_PATH = "/ws/status";

function wrapSocket(ws: WebSocket): StatusSocket {
  return {
    send: (data: string) => ws.send(data),
    close: (code?: number, reason?: string) => ws.close(code, reason),
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    on: ((event: string, handler: (...args: unknown[]) => void) => {
      ws.on(event, handler);
    }) as StatusSocket["on"],
  };
}

export interface NodeStatusServerOptions {
  /** Port to listen on. Use 0 for a random free port. Ignored when `server` is provided. */
  port: number;
  /** Hostname to bind to. Defaults to "127.0.0.1" (localhost only). Ignored when `server` is provided. */
  host?: string;
  /** Maximum inbound payload size in bytes (default: 64KB). Observers only listen. */
  maxPayload?: number;
  /** External HTTP server to attach to instead of listening on a port of its own. */
  server?: Server;
  logger?: Logger;
}

/**
 * Status-channel server on the `ws` package.
 * Accepts observers on `/ws/status`; every other path is closed with 4000.
 */
export class NodeStatusServer implements WebSocketServerLike {
  private wss: WSServer | null = null;
  private options: NodeStatusServerOptions;
  private logger: Logger;

  constructor(options: NodeStatusServerOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  /** Actual port after listen (useful when constructed with port: 0). */
  get port(): number | undefined {
    const addr = this.wss?.address();
    if (addr && typeof addr === "object") return addr.port;
    if (this.options.server) {
      const httpAddr = this.options.server.address();
      if (httpAddr && typeof httpAddr === "object") return httpAddr.port;
    }
    return undefined;
  }

  async listen(onStatusConnection: OnStatusConnection): Promise<void> {
    const maxPayload = this.options.maxPayload ?? 65_536;

    if (this.options.server) {
      this.wss = new WSServer({ server: this.options.server, maxPayload });
      this.wireConnectionHandler(onStatusConnection);
      return;
    }

    return new Promise((resolve, reject) => {
      this.wss = new WSServer({
        port: this.options.port,
        host: this.options.host ?? "127.0.0.1",
        maxPayload,
      });

      this.wss.on("listening", () => {
        this.logger.info("Status channel listening", { port: this.port });
        resolve();
      });
      this.wss.on("error", (err) => reject(err));

      this.wireConnectionHandler(onStatusConnection);
    });
  }

  private wireConnectionHandler(onStatusConnection: OnStatusConnection): void {
    if (!this.wss) return;

    this.wss.on("connection", (ws, req) => {
      // Strip query string for path matching
      const pathOnly = (req.url ?? "").split("?")[0];
      if (pathOnly !== STATUS_PATH) {
        ws.close(4000, "Invalid path");
        return;
      }
      this.logger.debug?.("Status observer connected", { remoteAddress: req.socket.remoteAddress });
      onStatusConnection(wrapSocket(ws), req.socket.remoteAddress);
    });
  }

  async close(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.wss) {
        resolve();
        return;
      }

      for (const client of this.wss.clients) {
        client.close(1001, "Server shutting down");
      }

      // When attached to an external server, only close the WSServer (caller manages the HTTP server)
      this.wss.close(() => {
        this.wss = null;
        resolve();
      });
    });
  }
}
