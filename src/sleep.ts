export type Sleep = (ms: number) => Promise<void>;

/** Awaited delay; the run stays strictly sequential while it waits. */
export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
