import { errorMessage } from "../errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("callbacks");

/** Call an optional user callback. A throw is logged and goes no further. */
export function invokeCallback<A extends unknown[]>(
  name: string,
  fn: ((...args: A) => void) | undefined,
  ...args: A
): void {
  if (!fn) return;
  try {
    fn(...args);
  } catch (err) {
    log.error(`${name} callback threw`, { error: errorMessage(err) });
  }
}
