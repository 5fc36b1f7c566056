import { pack } from '../../src/packer/BitstreamPacker';
import { inspectPacked } from '../../src/reader/inspect';
import { codeSegment, patternSegment } from '../../src/segments';

describe('inspectPacked', () => {
  it('finds no mismatches in a well-formed stream', () => {
    const segments = [codeSegment(9, [256, 300]), patternSegment('11', 2)];
    const report = inspectPacked(pack(segments), segments);
    expect(report.segments).toEqual([
      { segmentIndex: 0, width: 9, count: 2, mismatches: [] },
      { segmentIndex: 1, width: 2, count: 2, mismatches: [] },
    ]);
    expect(report.trailing).toBe('00');
    expect(report.cleanPadding).toBe(true);
  });

  it('shows the shift an oversized code causes', () => {
    const segments = [codeSegment(4, [0x1f, 1, 2])];
    const bytes = pack(segments);
    expect(bytes).toEqual(new Uint8Array([0xf8, 0x90]));

    const report = inspectPacked(bytes, segments);
    expect(report.segments[0].mismatches).toEqual([
      { index: 0, expected: 31, actual: 15 },
      { index: 1, expected: 1, actual: 8 },
      { index: 2, expected: 2, actual: 9 },
    ]);
    expect(report.trailing).toBe('0000');
  });

  it('caps mismatches per segment', () => {
    const segments = [codeSegment(4, [1, 2, 3])];
    const report = inspectPacked(new Uint8Array([0xff, 0xff]), segments, 2);
    expect(report.segments[0].mismatches).toHaveLength(2);
    expect(report.trailing).toBe('1111');
    expect(report.cleanPadding).toBe(false);
  });
});
