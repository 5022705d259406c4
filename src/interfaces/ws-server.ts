import type { WebSocketLike } from "./transport.js";

/** A status-channel socket as seen by the core: send, close and lifecycle events. */
export type StatusSocket = WebSocketLike & {
  on(event: "message", handler: (data: string | Buffer) => void): void;
  on(event: "close", handler: () => void): void;
  on(event: "error", handler: (err: Error) => void): void;
};

/**
 * Callback invoked when an observer connects to the status endpoint.
 */
export type OnStatusConnection = (socket: StatusSocket, remoteAddress: string | undefined) => void;

/** Runtime-agnostic WebSocket server abstraction. */
export interface WebSocketServerLike {
  /** Start listening. Calls the callback for every status connection. */
  listen(onStatusConnection: OnStatusConnection): Promise<void>;
  /** Stop the server and close all connections. */
  close(): Promise<void>;
}
