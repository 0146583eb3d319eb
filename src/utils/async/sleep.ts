/**
 * Promise-based delay; resolves immediately for ms <= 0
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type SleepFn = (ms: number) => Promise<void>;
