export type Sleep = (ms: number) => Promise<void>;

/** Milliseconds from an arbitrary origin; only differences are meaningful. */
export type Clock = () => number;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export const monotonicClock: Clock = () => performance.now();
