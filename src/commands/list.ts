import { SequenceEngine } from '../core/sequence-engine.js';
import { PagingConsumer } from '../core/paging-consumer.js';
import { scrollThrough } from '../core/scroll-driver.js';
import { loggerReporter } from '../core/reporters.js';
import { logger } from '../utils/logger.js';

export async function listCommand(options: { pageSize?: number; bits?: number; limit?: number }): Promise<void> {
  const engine = new SequenceEngine({ bitWidth: options.bits });
  const consumer = new PagingConsumer(engine, {
    pageSize: options.pageSize,
    reporter: loggerReporter,
  });

  const rows = await scrollThrough(consumer, {
    limit: options.limit,
    onRow: (position, value) => logger.info(`${position}: ${value}`),
  });

  if (consumer.isExhausted()) {
    logger.success(`Displayed ${rows} terms (${engine.bitWidth}-bit limit reached)`);
  } else {
    logger.success(`Displayed ${rows} terms`);
  }
}
