import type { OverflowError } from '../core/errors.js';

export type CacheSlot =
  | { kind: 'unset' }
  | { kind: 'overflowed' }
  | { kind: 'value'; value: bigint };

export interface CheckedSum {
  sum: bigint;
  overflow: boolean;
}

export type CheckedAdder = (a: bigint, b: bigint, bitWidth: number) => CheckedSum;

export interface EngineOptions {
  bitWidth?: number;
  adder?: CheckedAdder;
}

export interface ErrorReporter {
  reportError(title: string, message: string): void;
}

export type PageListener = (results: readonly bigint[]) => void;

export interface PageResult {
  values: bigint[];
  error?: OverflowError;
}

export interface ConsumerOptions {
  pageSize?: number;
  reporter: ErrorReporter;
  onPageReady?: PageListener;
}
