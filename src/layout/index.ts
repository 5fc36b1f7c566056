export { parseLayout, parseLayoutDocument } from './LayoutParser';
export { convertLayoutToSegments, MAX_RANGE_LENGTH } from './toSegments';
export type {
  LayoutDocument,
  LayoutStatement,
  LayoutWidthStatement,
  LayoutRepeatStatement,
  LayoutEntry,
  LayoutValue,
  LayoutRange,
  LayoutOverride,
  LayoutLocation,
} from './types';
