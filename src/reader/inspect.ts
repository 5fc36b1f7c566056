import type { Segment } from '../segments';
import { readCodes, scheduleBitLength, scheduleOf, trailingBits } from './CodeReader';

export interface CodeMismatch {
  /** Index within the segment. */
  index: number;
  expected: number;
  actual: number;
}

export interface SegmentReport {
  segmentIndex: number;
  width: number;
  count: number;
  mismatches: CodeMismatch[];
}

export interface InspectionReport {
  segments: SegmentReport[];
  /** Bits left after the schedule, as a binary string. */
  trailing: string;
  /** Whether the trailing bits are all zero. */
  cleanPadding: boolean;
}

function expectedCodes(segment: Segment): number[] {
  if (segment.kind === 'codes') {
    return [...segment.codes];
  }
  return new Array<number>(segment.repeat).fill(parseInt(segment.pattern, 2));
}

/**
 * Read `bytes` back with the width schedule of `segments` and compare every
 * code against what the segments declare. Codes written wider than their
 * segment width shift everything after them, which shows up as mismatches.
 *
 * @param maxMismatches  mismatches kept per segment
 * @throws CodeReaderError if the buffer is shorter than the layout
 */
export function inspectPacked(
  bytes: Uint8Array,
  segments: readonly Segment[],
  maxMismatches = 10,
): InspectionReport {
  const schedule = scheduleOf(segments);
  const consumed = scheduleBitLength(schedule);
  const codes = readCodes(bytes, schedule);

  let cursor = 0;
  const reports = segments.map((segment, segmentIndex): SegmentReport => {
    const { width, count } = schedule[segmentIndex];
    const expected = expectedCodes(segment);
    const mismatches: CodeMismatch[] = [];
    for (let i = 0; i < count && mismatches.length < maxMismatches; i++) {
      const actual = codes[cursor + i];
      if (actual !== expected[i]) {
        mismatches.push({ index: i, expected: expected[i], actual });
      }
    }
    cursor += count;
    return { segmentIndex, width, count, mismatches };
  });

  const trailing = trailingBits(bytes, consumed);
  return {
    segments: reports,
    trailing,
    cleanPadding: !trailing.includes('1'),
  };
}
