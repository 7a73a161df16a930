import { ConsumerOptions, ErrorReporter, PageListener, PageResult } from '../types/sequence.js';
import { DEFAULT_PAGE_SIZE, ERROR_TITLE } from '../constants.js';
import { SequenceEngine } from './sequence-engine.js';
import { isOverflowError } from './errors.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { logger } from '../utils/logger.js';

/**
 * Fetch `count` consecutive terms starting at `start`.
 * Stops at the first overflow and hands it back instead of throwing.
 */
export function computePage(engine: SequenceEngine, start: number, count: number): PageResult {
  const values: bigint[] = [];
  for (let position = start; position < start + count; position++) {
    try {
      const value = engine.fetchTerm(position);
      if (value !== null) {
        values.push(value);
      }
    } catch (err) {
      if (isOverflowError(err)) {
        return { values, error: err };
      }
      throw err;
    }
  }
  return { values };
}

/**
 * Materializes the sequence a page at a time for a scrolling reader.
 *
 * `results[i]` is always the term at position i. Pages after the first are
 * computed on a serial queue, and at most one page is pending at once: end
 * signals that arrive while a page is pending are folded into it.
 */
export class PagingConsumer {
  readonly pageSize: number;
  private readonly engine: SequenceEngine;
  private readonly reporter: ErrorReporter;
  private readonly onPageReady?: PageListener;
  private readonly queue = new SerialQueue();
  private readonly results: bigint[] = [];
  private pendingPage: Promise<void> | null = null;
  private pageFailure: unknown = undefined;

  constructor(engine: SequenceEngine, options: ConsumerOptions) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error('Page size must be a positive integer');
    }
    this.engine = engine;
    this.pageSize = pageSize;
    this.reporter = options.reporter;
    this.onPageReady = options.onPageReady;
  }

  /**
   * Compute the first page synchronously and publish it.
   * A consumer that already holds results only republishes them.
   */
  initialize(): bigint[] {
    if (this.results.length === 0) {
      this.applyPage(computePage(this.engine, 0, this.pageSize));
    }
    this.publish();
    return this.getResults();
  }

  /**
   * Signal that the reader is displaying `currentPosition`.
   * Returns true when a new page was scheduled.
   */
  notifyApproachingEnd(currentPosition: number): boolean {
    if (!Number.isSafeInteger(currentPosition) || currentPosition < 0) {
      throw new Error('Position must be a non-negative integer');
    }
    const nearEnd = currentPosition + this.pageSize >= this.results.length;
    if (!nearEnd || this.engine.isExhausted()) {
      return false;
    }
    if (this.pendingPage) {
      logger.debug(`Page already pending, signal at ${currentPosition} folded into it`);
      return false;
    }

    // Start is read when the task runs, after any page ahead of it has landed
    const page = this.queue.enqueue(() => computePage(this.engine, this.results.length, this.pageSize));
    logger.debug(`Scheduled page after position ${this.results.length - 1}`);

    this.pendingPage = page
      .then(result => {
        this.applyPage(result);
        this.publish();
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.debug(`Page failed: ${message}`);
        // The first unread failure wins
        if (this.pageFailure === undefined) {
          this.pageFailure = err;
        }
      })
      .finally(() => {
        this.pendingPage = null;
      });
    return true;
  }

  /**
   * Resolves when no page is pending. Rejects with the earliest unread
   * error of a page that failed for any reason other than overflow.
   */
  async whenIdle(): Promise<void> {
    await this.pendingPage;
    if (this.pageFailure !== undefined) {
      const failure = this.pageFailure;
      this.pageFailure = undefined;
      throw failure;
    }
  }

  /**
   * Snapshot of the terms materialized so far.
   */
  getResults(): bigint[] {
    return [...this.results];
  }

  isExhausted(): boolean {
    return this.engine.isExhausted();
  }

  private applyPage(page: PageResult): void {
    this.results.push(...page.values);
    if (page.error) {
      logger.debug(`Overflow after ${this.results.length} terms`);
      this.reporter.reportError(ERROR_TITLE, page.error.message);
    }
  }

  private publish(): void {
    logger.debug(`Publishing ${this.results.length} terms`);
    this.onPageReady?.([...this.results]);
  }
}
