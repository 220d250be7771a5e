/**
 * Lets every already-resolved promise chain run to completion.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
