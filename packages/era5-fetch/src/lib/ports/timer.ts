/**
 * Promise-based delay function type.
 * Used by retry backoff and job polling.
 */
export type DelayFn = (ms: number) => Promise<void>;
