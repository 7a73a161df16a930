import { SequenceEngine } from '../core/sequence-engine.js';
import { isOverflowError } from '../core/errors.js';
import { loggerReporter } from '../core/reporters.js';
import { ERROR_TITLE } from '../constants.js';
import { logger } from '../utils/logger.js';

export async function termCommand(position: number, options: { bits?: number }): Promise<void> {
  const engine = new SequenceEngine({ bitWidth: options.bits });

  try {
    const value = engine.fetchTerm(position);
    if (value === null) {
      logger.warn(`No term available at position ${position}.`);
      process.exitCode = 1;
      return;
    }
    logger.info(`F(${position}) = ${value}`);
  } catch (err) {
    if (!isOverflowError(err)) throw err;
    loggerReporter.reportError(ERROR_TITLE, err.message);
    process.exitCode = 1;
  }
}
