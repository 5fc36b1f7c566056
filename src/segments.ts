/** A contiguous run of integer codes sharing one bit width. */
export interface CodeSegment {
  kind: 'codes';
  /** Bits per code (1..53). */
  width: number;
  /** Non-negative integers; values wider than `width` are allowed. */
  codes: readonly number[];
}

/** A raw bit pattern appended `repeat` times. */
export interface PatternSegment {
  kind: 'pattern';
  /** '0'/'1' characters, most significant bit first. */
  pattern: string;
  repeat: number;
}

export type Segment = CodeSegment | PatternSegment;

/** Largest width whose codes stay exact as JavaScript numbers. */
export const MAX_CODE_WIDTH = 53;

export function codeSegment(width: number, codes: readonly number[]): CodeSegment {
  return { kind: 'codes', width, codes };
}

export function patternSegment(pattern: string, repeat: number): PatternSegment {
  return { kind: 'pattern', pattern, repeat };
}

/** Inclusive integer range as an array. */
export function range(first: number, last: number): number[] {
  const result: number[] = [];
  for (let i = first; i <= last; i++) {
    result.push(i);
  }
  return result;
}
