import type { Logger } from '../lib/logger.js';

export type AppEnv = {
  Variables: {
    requestId: string;
    sessionId: string;
    log: Logger;
  };
};
