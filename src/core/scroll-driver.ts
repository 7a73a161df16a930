import { PagingConsumer } from './paging-consumer.js';

export interface ScrollOptions {
  onRow: (position: number, value: bigint) => void;
  limit?: number;
}

/**
 * Display rows in order the way a scrolling list would, signalling the
 * consumer before each row and waiting on it whenever the reader catches
 * up with the materialized results. Returns the number of rows shown.
 */
export async function scrollThrough(consumer: PagingConsumer, options: ScrollOptions): Promise<number> {
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  consumer.initialize();

  let row = 0;
  while (row < limit) {
    let results = consumer.getResults();
    if (row >= results.length) {
      await consumer.whenIdle();
      results = consumer.getResults();
    }
    const value = results[row];
    if (value === undefined) {
      break;
    }

    consumer.notifyApproachingEnd(row);
    options.onRow(row, value);
    row++;
  }

  await consumer.whenIdle();
  return row;
}
