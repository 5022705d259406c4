/**
 * Observable state of the publishing session.
 *
 * @module SessionControl
 */

export type SessionState =
  | { readonly kind: "idle" }
  | { readonly kind: "preparing" }
  | { readonly kind: "connecting" }
  | { readonly kind: "streaming"; readonly bitrateBps: number }
  | { readonly kind: "reconnecting" }
  | { readonly kind: "error"; readonly message: string };

export type SessionStateKind = SessionState["kind"];

export const SessionStates = {
  idle: (): SessionState => ({ kind: "idle" }),
  preparing: (): SessionState => ({ kind: "preparing" }),
  connecting: (): SessionState => ({ kind: "connecting" }),
  streaming: (bitrateBps = 0): SessionState => ({ kind: "streaming", bitrateBps }),
  reconnecting: (): SessionState => ({ kind: "reconnecting" }),
  error: (message: string): SessionState => ({ kind: "error", message }),
} as const;

/** A new session may only be started from these states. */
export function canStart(state: SessionState): boolean {
  return state.kind === "idle" || state.kind === "error";
}

export function formatBitrate(bps: number): string {
  if (bps >= 1_000_000) return `${(bps / 1_000_000).toFixed(1)} Mbps`;
  if (bps >= 1000) return `${Math.floor(bps / 1000)} kbps`;
  return `${bps} bps`;
}

export function describeSessionState(state: SessionState): string {
  switch (state.kind) {
    case "idle":
      return "Idle";
    case "preparing":
      return "Preparing";
    case "connecting":
      return "Connecting";
    case "streaming":
      return `Streaming (${formatBitrate(state.bitrateBps)})`;
    case "reconnecting":
      return "Reconnecting";
    case "error":
      return `Error: ${state.message}`;
  }
}
