import { CacheSlot, CheckedAdder, CheckedSum, EngineOptions } from '../types/sequence.js';
import { DEFAULT_BIT_WIDTH, MAX_BIT_WIDTH } from '../constants.js';
import { OverflowError } from './errors.js';
import { logger } from '../utils/logger.js';

const UNSET: CacheSlot = { kind: 'unset' };

export function maxUnsigned(bitWidth: number): bigint {
  return (1n << BigInt(bitWidth)) - 1n;
}

/**
 * Add two unsigned words, wrapping modulo 2^bitWidth.
 * `overflow` is true when the exact sum does not fit in the word.
 */
export function addReportingOverflow(a: bigint, b: bigint, bitWidth: number): CheckedSum {
  const exact = a + b;
  const sum = BigInt.asUintN(bitWidth, exact);
  return { sum, overflow: sum !== exact };
}

/**
 * Memoized Fibonacci terms over a fixed-width unsigned word.
 *
 * Slots are filled in position order, so every slot below `slots.length`
 * holds a value unless it is the one that overflowed. The first overflow
 * exhausts the engine: terms already cached stay readable, nothing new is
 * computed.
 */
export class SequenceEngine {
  readonly bitWidth: number;
  private readonly adder: CheckedAdder;
  private readonly slots: CacheSlot[] = [
    { kind: 'value', value: 0n },
    { kind: 'value', value: 1n },
  ];
  private exhausted = false;

  constructor(options: EngineOptions = {}) {
    const bitWidth = options.bitWidth ?? DEFAULT_BIT_WIDTH;
    if (!Number.isInteger(bitWidth) || bitWidth < 1 || bitWidth > MAX_BIT_WIDTH) {
      throw new Error(`Bit width must be an integer between 1 and ${MAX_BIT_WIDTH}`);
    }
    this.bitWidth = bitWidth;
    this.adder = options.adder ?? addReportingOverflow;
  }

  get maxValue(): bigint {
    return maxUnsigned(this.bitWidth);
  }

  /**
   * Term at `position`, or null once the engine is exhausted and the term
   * was never computed. Throws OverflowError on the call that first
   * exceeds the word width.
   */
  fetchTerm(position: number): bigint | null {
    if (!Number.isSafeInteger(position) || position < 0) {
      throw new Error('Input must be a non-negative integer');
    }

    const slot = this.slotAt(position);
    if (slot.kind === 'value') {
      return slot.value;
    }

    if (this.exhausted) {
      return null;
    }

    return this.fillThrough(position);
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  computedCount(): number {
    return this.slots.filter(slot => slot.kind === 'value').length;
  }

  private fillThrough(position: number): bigint {
    for (let i = this.slots.length; i <= position; i++) {
      const { sum, overflow } = this.adder(this.valueAt(i - 1), this.valueAt(i - 2), this.bitWidth);
      if (overflow) {
        this.slots[i] = { kind: 'overflowed' };
        this.exhausted = true;
        logger.debug(`Engine exhausted at position ${i} (${this.bitWidth}-bit)`);
        throw new OverflowError(this.bitWidth);
      }
      this.slots[i] = { kind: 'value', value: sum };
    }
    return this.valueAt(position);
  }

  private slotAt(position: number): CacheSlot {
    return this.slots[position] ?? UNSET;
  }

  private valueAt(position: number): bigint {
    const slot = this.slotAt(position);
    if (slot.kind !== 'value') {
      throw new Error(`No cached term at position ${position}`);
    }
    return slot.value;
  }
}
