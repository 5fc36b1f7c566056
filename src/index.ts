export { BitBuffer, parseBitPattern } from './BitBuffer';
export {
  CodeWidthOverflowError,
  SegmentError,
  LayoutError,
  CodeReaderError,
} from './errors';
export {
  codeSegment,
  patternSegment,
  range,
  MAX_CODE_WIDTH,
} from './segments';
export type { CodeSegment, PatternSegment, Segment } from './segments';
export {
  codeBitLength,
  fitsWidth,
  encodedCodeLength,
  formatCode,
  paddingBits,
} from './helpers';
export type { PaddingPolicy } from './helpers';
export { BitstreamPacker, pack } from './packer/BitstreamPacker';
export type { OverflowMode, PackerOptions, PackedSize } from './packer/BitstreamPacker';
export {
  readCodes,
  scheduleOf,
  scheduleBitLength,
  trailingBits,
} from './reader/CodeReader';
export type { ScheduleEntry } from './reader/CodeReader';
export { inspectPacked } from './reader/inspect';
export type { CodeMismatch, SegmentReport, InspectionReport } from './reader/inspect';
export {
  LIMIT_FOR_1GIB,
  FILLER_PATTERN,
  DEFAULT_MALICIOUS_LZW_CONFIG,
  MALICIOUS_LZW_PRESETS,
  buildMaliciousLzwSegments,
  generateMaliciousLzwFixture,
  isMaliciousLzwPresetName,
} from './fixture/MaliciousLzwFixture';
export type {
  MaliciousLzwConfig,
  MaliciousLzwPreset,
  MaliciousLzwPresetName,
} from './fixture/MaliciousLzwFixture';
export { parseLayout, parseLayoutDocument, convertLayoutToSegments } from './layout';
export type { LayoutDocument, LayoutStatement, LayoutEntry } from './layout';
