import type { Logger } from '../../config/logger.js';

export type SourceContext = {
  logger: Logger;
  timeoutMs: number;
};
