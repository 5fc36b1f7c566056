/**
 * Raised in strict mode when a code needs more bits than its segment's width.
 */
export class CodeWidthOverflowError extends Error {
  readonly code: number;
  readonly width: number;
  readonly segmentIndex: number;
  readonly codeIndex: number;

  constructor(code: number, width: number, segmentIndex: number, codeIndex: number) {
    super(
      `Code ${code} does not fit in ${width} bits ` +
        `(segment ${segmentIndex}, index ${codeIndex}, max ${2 ** width - 1})`,
    );
    this.name = 'CodeWidthOverflowError';
    this.code = code;
    this.width = width;
    this.segmentIndex = segmentIndex;
    this.codeIndex = codeIndex;
  }
}

/** A segment that cannot be encoded at all, whatever the overflow mode. */
export class SegmentError extends Error {
  readonly segmentIndex: number;

  constructor(segmentIndex: number, message: string) {
    super(`Segment ${segmentIndex}: ${message}`);
    this.name = 'SegmentError';
    this.segmentIndex = segmentIndex;
  }
}

/** Syntax or semantic error in a layout description. */
export class LayoutError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`Layout error at ${line}:${column}: ${message}`);
    this.name = 'LayoutError';
    this.line = line;
    this.column = column;
  }
}

export class CodeReaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodeReaderError';
  }
}
