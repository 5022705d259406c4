/** Time source for the watchdog and reconnect timers. Tests swap in fake timers instead. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
