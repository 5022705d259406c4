/**
 * Reconnect delay policy and the backoff bookkeeping it reads.
 *
 * @module SessionControl
 */

import type { ReconnectConfig } from "../types/config.js";

/** Progress through one run of consecutive failures. */
export interface BackoffState {
  /** Reconnects scheduled since the last success or reset. */
  readonly attempts: number;
  /** Start of the current failure run; null when no failure is pending. */
  readonly firstFailureAt: number | null;
  readonly lastDelayMs: number;
}

export const INITIAL_BACKOFF: BackoffState = Object.freeze({
  attempts: 0,
  firstFailureAt: null,
  lastDelayMs: 0,
});

/**
 * Delay before reconnect number `attempts + 1`.
 *
 * `random` must return a value in [0, 1); it only scales the jitter.
 */
export function computeDelay(
  config: ReconnectConfig,
  attempts: number,
  random: () => number = Math.random,
): number {
  if (config.policy === "fixed") return config.fixedDelayMs;

  // 2^n overflows to Infinity long before attempts stop counting; the clamp absorbs it
  const raw = config.baseDelayMs * 2 ** attempts;
  const jittered = raw * (1 + config.jitterRatio * random());
  return Math.min(Math.floor(jittered), config.maxDelayMs);
}

/** True when the failure run has lasted longer than the retry window allows. */
export function isRetryWindowExhausted(
  state: BackoffState,
  config: ReconnectConfig,
  now: number,
): boolean {
  return state.firstFailureAt !== null && now - state.firstFailureAt > config.maxRetryWindowMs;
}

export function advanceBackoff(state: BackoffState, now: number, delayMs: number): BackoffState {
  return Object.freeze({
    attempts: state.attempts + 1,
    firstFailureAt: state.firstFailureAt ?? now,
    lastDelayMs: delayMs,
  });
}
