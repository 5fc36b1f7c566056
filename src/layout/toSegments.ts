import { LayoutError } from '../errors';
import { MAX_CODE_WIDTH, codeSegment, patternSegment, type Segment } from '../segments';
import type { LayoutDocument, LayoutEntry, LayoutLocation, LayoutStatement } from './types';

/** Upper bound on codes a single range may expand to. */
export const MAX_RANGE_LENGTH = 1 << 24;

function fail(message: string, location: LayoutLocation): never {
  throw new LayoutError(message, location.line, location.column);
}

function checkNonNegative(value: number, what: string, location: LayoutLocation): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    fail(`${what} must be a non-negative safe integer, got ${value}`, location);
  }
}

function expandEntries(entries: readonly LayoutEntry[]): number[] {
  const codes: number[] = [];
  for (const entry of entries) {
    if (entry.kind === 'value') {
      checkNonNegative(entry.value, 'code', entry.location);
      codes.push(entry.value);
    } else if (entry.kind === 'range') {
      checkNonNegative(entry.first, 'range start', entry.location);
      checkNonNegative(entry.last, 'range end', entry.location);
      if (entry.first > entry.last) {
        fail(`descending range ${entry.first}..${entry.last}`, entry.location);
      }
      if (entry.last - entry.first + 1 > MAX_RANGE_LENGTH) {
        fail(`range ${entry.first}..${entry.last} exceeds ${MAX_RANGE_LENGTH} codes`, entry.location);
      }
      for (let code = entry.first; code <= entry.last; code++) {
        codes.push(code);
      }
    }
  }

  // Overrides index into the expanded list, so they apply once it is complete.
  for (const entry of entries) {
    if (entry.kind !== 'override') continue;
    checkNonNegative(entry.value, 'override value', entry.location);
    if (!Number.isSafeInteger(entry.index) || entry.index >= codes.length) {
      fail(`override index ${entry.index} outside segment of ${codes.length} codes`, entry.location);
    }
    codes[entry.index] = entry.value;
  }
  return codes;
}

function toSegment(statement: LayoutStatement): Segment {
  if (statement.kind === 'repeat') {
    if (statement.pattern.length === 0) {
      fail('repeat pattern must not be empty', statement.location);
    }
    checkNonNegative(statement.count, 'repeat count', statement.location);
    return patternSegment(statement.pattern, statement.count);
  }

  if (!Number.isInteger(statement.width) || statement.width < 1 || statement.width > MAX_CODE_WIDTH) {
    fail(`width must be in 1..${MAX_CODE_WIDTH}, got ${statement.width}`, statement.location);
  }
  return codeSegment(statement.width, expandEntries(statement.entries));
}

/**
 * Convert a parsed layout into packer segments.
 * @throws LayoutError on values no segment can hold
 */
export function convertLayoutToSegments(document: LayoutDocument): Segment[] {
  return document.statements.map(toSegment);
}
