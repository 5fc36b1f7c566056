/**
 * AST types for parsed segment layouts.
 */

/** Position of a statement or entry in the layout text (1-based). */
export interface LayoutLocation {
  line: number;
  column: number;
}

/** A complete layout: statements in stream order. */
export interface LayoutDocument {
  statements: LayoutStatement[];
}

export type LayoutStatement = LayoutWidthStatement | LayoutRepeatStatement;

/** `width 9: 256..511, [1] = 0xFF` */
export interface LayoutWidthStatement {
  kind: 'width';
  width: number;
  entries: LayoutEntry[];
  location: LayoutLocation;
}

/** `repeat "111111111111" x 273679` */
export interface LayoutRepeatStatement {
  kind: 'repeat';
  pattern: string;
  count: number;
  location: LayoutLocation;
}

export type LayoutEntry = LayoutValue | LayoutRange | LayoutOverride;

export interface LayoutValue {
  kind: 'value';
  value: number;
  location: LayoutLocation;
}

/** Inclusive range `first..last`. */
export interface LayoutRange {
  kind: 'range';
  first: number;
  last: number;
  location: LayoutLocation;
}

/** `[index] = value`, applied after the segment's codes are expanded. */
export interface LayoutOverride {
  kind: 'override';
  index: number;
  value: number;
  location: LayoutLocation;
}
