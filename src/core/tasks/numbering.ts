/**
 * Dotted task numbers ("1.2.3"): parsing and sibling numbering.
 *
 * Segments stay decimal strings end to end, so arbitrarily long numbers
 * survive unchanged apart from leading zeros.
 */

import { LedgerError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';

const SEGMENT = /^\d+$/;

/** Drop leading zeros, keeping a lone "0". */
function canonicalSegment(segment: string): string {
  return segment.replace(/^0+(?=\d)/, '');
}

/**
 * Split a dotted number into canonical decimal levels.
 * Every segment must be a non-negative decimal integer.
 */
export function parseTaskNumber(number: string | number): string[] {
  const text = String(number).trim();
  const segments = text.split('.');
  if (!segments.every(segment => SEGMENT.test(segment))) {
    throw new LedgerError(ExitCode.INVALID_INPUT, `Invalid task number: ${text}`, {
      fix: 'Use dot-separated integers, e.g. "1.2.3"',
    });
  }
  return segments.map(canonicalSegment);
}

/** Canonical text form of parsed levels. */
export function formatTaskNumber(levels: readonly string[]): string {
  return levels.join('.');
}

/**
 * Number of the `index`-th child (1-based) of `parent`.
 * Children of a root are numbered from the top ("1", "2"); the root's own
 * number is not part of its descendants' numbers.
 */
export function childNumber(parent: Pick<Task, 'parentId' | 'number'>, index: bigint): string {
  return parent.parentId === 0 ? `${index}` : `${parent.number}.${index}`;
}

/** Next free sibling index after the largest one already in use. */
export function nextChildIndex(siblings: ReadonlyArray<Pick<Task, 'number'>>): bigint {
  let max = 0n;
  for (const sibling of siblings) {
    const last = sibling.number.split('.').pop() ?? '';
    if (SEGMENT.test(last)) {
      const value = BigInt(last);
      if (value > max) max = value;
    }
  }
  return max + 1n;
}
