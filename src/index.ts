import { Command } from 'commander';
import { termCommand } from './commands/term.js';
import { listCommand } from './commands/list.js';
import { statusCommand } from './commands/status.js';
import { parseBitWidth, parseNonNegativeInt, parsePositiveInt } from './utils/options.js';

export { SequenceEngine, addReportingOverflow, maxUnsigned } from './core/sequence-engine.js';
export { PagingConsumer, computePage } from './core/paging-consumer.js';
export { scrollThrough } from './core/scroll-driver.js';
export { OverflowError, isOverflowError } from './core/errors.js';
export { SerialQueue } from './utils/serial-queue.js';
export type {
  CacheSlot,
  CheckedAdder,
  CheckedSum,
  ConsumerOptions,
  EngineOptions,
  ErrorReporter,
  PageListener,
  PageResult,
} from './types/sequence.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fibpager')
    .description('Paged, overflow-checked Fibonacci terms')
    .version('0.1.0');

  program
    .command('term')
    .description('Print the Fibonacci term at a position')
    .argument('<position>', 'Position in the sequence (0-based)', parseNonNegativeInt)
    .option('--bits <n>', 'Word width in bits (default: 64)', parseBitWidth)
    .action(async (position: number, opts: { bits?: number }) => {
      await termCommand(position, { bits: opts.bits });
    });

  program
    .command('list', { isDefault: true })
    .description('Scroll through the sequence a page at a time until the word overflows')
    .option('--page-size <n>', 'Terms computed per page (default: 5)', parsePositiveInt)
    .option('--bits <n>', 'Word width in bits (default: 64)', parseBitWidth)
    .option('--limit <n>', 'Stop after this many rows', parsePositiveInt)
    .action(async (opts: { pageSize?: number; bits?: number; limit?: number }) => {
      await listCommand({ pageSize: opts.pageSize, bits: opts.bits, limit: opts.limit });
    });

  program
    .command('status')
    .description('Show the word width and the last term that fits in it')
    .option('--bits <n>', 'Word width in bits (default: 64)', parseBitWidth)
    .action(async (opts: { bits?: number }) => {
      await statusCommand({ bits: opts.bits });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
