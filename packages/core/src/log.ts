/**
 * Console logging with the `[utilkit]` prefix.
 * `debug` is silent unless `config.debug` is on; `warn` always writes.
 */

import { debugOnly } from "./safety.js";

const PREFIX = "[utilkit]";

export function debug(message: string, ...details: unknown[]): void {
  debugOnly(() => {
    console.debug(`${PREFIX} ${message}`, ...details);
  });
}

export function warn(message: string, ...details: unknown[]): void {
  console.warn(`${PREFIX} ${message}`, ...details);
}
