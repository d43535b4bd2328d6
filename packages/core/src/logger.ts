import type { EngineLogger } from './types.js';

const PREFIX = '[deepcall]';

export function createConsoleLogger(debug: boolean): EngineLogger {
  return {
    debug: (message) => {
      if (debug) console.debug(`${PREFIX} ${message}`);
    },
    warn: (message) => console.warn(`${PREFIX} ${message}`),
  };
}
