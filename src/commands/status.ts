import { SequenceEngine } from '../core/sequence-engine.js';
import { isOverflowError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Walk a fresh engine up to its first overflow and return the last term
 * that fits.
 */
export function lastRepresentableTerm(engine: SequenceEngine): { position: number; value: bigint } {
  let last = { position: 0, value: 0n };
  for (let position = 0; ; position++) {
    try {
      const value = engine.fetchTerm(position);
      if (value === null) return last;
      last = { position, value };
    } catch (err) {
      if (isOverflowError(err)) return last;
      throw err;
    }
  }
}

export async function statusCommand(options: { bits?: number }): Promise<void> {
  const engine = new SequenceEngine({ bitWidth: options.bits });
  const last = lastRepresentableTerm(engine);

  logger.info(`Word width: ${engine.bitWidth} bits`);
  logger.info(`Max value:  ${engine.maxValue}`);
  logger.info(`Last term:  F(${last.position}) = ${last.value}`);
  logger.info(`Cached:     ${engine.computedCount()} terms`);
}
