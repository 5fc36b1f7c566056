import { BitBuffer } from '../BitBuffer';
import { CodeReaderError } from '../errors';
import { MAX_CODE_WIDTH, type Segment } from '../segments';

/** `count` consecutive codes of `width` bits. */
export interface ScheduleEntry {
  width: number;
  count: number;
}

/**
 * Width schedule a reader needs to split the packed form of `segments`
 * back into codes. Pattern segments read as `repeat` codes of the pattern's
 * length; patterns wider than 53 bits have no numeric reading.
 */
export function scheduleOf(segments: readonly Segment[]): ScheduleEntry[] {
  return segments.map(segment => {
    if (segment.kind === 'codes') {
      return { width: segment.width, count: segment.codes.length };
    }
    if (segment.pattern.length > MAX_CODE_WIDTH) {
      throw new CodeReaderError(
        `Pattern of ${segment.pattern.length} bits cannot be read as a code`,
      );
    }
    return { width: segment.pattern.length, count: segment.repeat };
  });
}

/** Total bits a schedule consumes. */
export function scheduleBitLength(schedule: readonly ScheduleEntry[]): number {
  return schedule.reduce((sum, entry) => sum + entry.width * entry.count, 0);
}

/**
 * Read fixed-width MSB-first codes from a packed buffer, entry by entry.
 * @throws CodeReaderError if the buffer ends before the schedule does
 */
export function readCodes(bytes: Uint8Array, schedule: readonly ScheduleEntry[]): number[] {
  const needed = scheduleBitLength(schedule);
  if (needed > bytes.length * 8) {
    throw new CodeReaderError(
      `Schedule needs ${needed} bits but buffer holds ${bytes.length * 8}`,
    );
  }
  const buf = BitBuffer.from(bytes);
  const codes: number[] = [];
  for (const { width, count } of schedule) {
    for (let i = 0; i < count; i++) {
      codes.push(width <= 32 ? buf.readBits(width) : Number(buf.readBigBits(width)));
    }
  }
  return codes;
}

/** Bits after the first `consumedBits`, as a binary string. */
export function trailingBits(bytes: Uint8Array, consumedBits: number): string {
  return BitBuffer.from(bytes).toBinaryString(consumedBits);
}
