import * as peggy from 'peggy';
import { LayoutError } from '../errors';
import type { Segment } from '../segments';
import { LAYOUT_GRAMMAR } from './grammar';
import { convertLayoutToSegments } from './toSegments';
import type { LayoutDocument } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(LAYOUT_GRAMMAR);
  }
  return cachedParser;
}

interface PositionedError {
  message: string;
  location: { start: { line: number; column: number } };
}

function isPositionedError(err: unknown): err is PositionedError {
  if (!(err instanceof Error) || !('location' in err)) return false;
  const { location } = err;
  return (
    typeof location === 'object' &&
    location !== null &&
    'start' in location &&
    typeof location.start === 'object' &&
    location.start !== null &&
    'line' in location.start &&
    typeof location.start.line === 'number' &&
    'column' in location.start &&
    typeof location.start.column === 'number'
  );
}

/**
 * Parse layout text into its AST.
 *
 * @throws LayoutError with the position of the first syntax error
 */
export function parseLayoutDocument(input: string): LayoutDocument {
  try {
    const document: LayoutDocument = getParser().parse(input);
    return document;
  } catch (err) {
    if (isPositionedError(err)) {
      throw new LayoutError(err.message, err.location.start.line, err.location.start.column);
    }
    throw err;
  }
}

/** Parse layout text straight into packer segments. */
export function parseLayout(input: string): Segment[] {
  return convertLayoutToSegments(parseLayoutDocument(input));
}
