/** Resolve after `ms` milliseconds; non-positive values resolve on the next tick. */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
