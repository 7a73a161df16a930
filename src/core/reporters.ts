import { ErrorReporter } from '../types/sequence.js';
import { logger } from '../utils/logger.js';

export const loggerReporter: ErrorReporter = {
  reportError(title: string, message: string): void {
    logger.error(`${title}: ${message}`);
  },
};
