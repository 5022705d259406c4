/** Runtime-agnostic WebSocket abstraction. Only the methods the status channel uses. */
export interface WebSocketLike {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  readonly bufferedAmount?: number;
}
