import { BitstreamPacker, type PackerOptions } from '../packer/BitstreamPacker';
import { codeSegment, patternSegment, range, type Segment } from '../segments';

/** Filler repetitions end here; sized to push a naive decoder past 1 GiB of output. */
export const LIMIT_FOR_1GIB = 277_775;

/** Twelve one-bits: the highest 12-bit code. */
export const FILLER_PATTERN = '111111111111';

export interface MaliciousLzwConfig {
  /** Exclusive end of the filler loop. */
  limit: number;
  /** Inclusive start of the filler loop; repetitions are `limit - fillerStart`. */
  fillerStart: number;
  fillerPattern: string;
  /** Index in the 9-bit segment whose code is replaced. */
  injectedIndex: number;
  /** Out-of-sequence code written at `injectedIndex`. Any byte value works. */
  injectedValue: number;
}

export const DEFAULT_MALICIOUS_LZW_CONFIG: Readonly<MaliciousLzwConfig> = {
  limit: LIMIT_FOR_1GIB,
  fillerStart: 1 << 12,
  fillerPattern: FILLER_PATTERN,
  injectedIndex: 1,
  injectedValue: 0xff,
};

export interface MaliciousLzwPreset {
  description: string;
  config: MaliciousLzwConfig;
  packer: Required<PackerOptions>;
}

export type MaliciousLzwPresetName = 'reference' | 'legacy';

export const MALICIOUS_LZW_PRESETS: Record<MaliciousLzwPresetName, MaliciousLzwPreset> = {
  reference: {
    description: 'Widths 9-12 over their full ranges, then limit - 4096 all-ones 12-bit fillers',
    config: { ...DEFAULT_MALICIOUS_LZW_CONFIG },
    packer: { overflow: 'passthrough', padding: 'when-misaligned' },
  },
  // The historical generator started its filler loop at 1 and always padded,
  // which yields the 422070-byte file decoders were first tested against.
  legacy: {
    description: 'Byte-exact copy of the historical fixture (limit - 1 fillers, trailing zero byte)',
    config: { ...DEFAULT_MALICIOUS_LZW_CONFIG, fillerStart: 1 },
    packer: { overflow: 'passthrough', padding: 'always' },
  },
};

export function isMaliciousLzwPresetName(name: string): name is MaliciousLzwPresetName {
  return Object.prototype.hasOwnProperty.call(MALICIOUS_LZW_PRESETS, name);
}

/**
 * Segments of the malicious LZW fixture:
 *
 *   9 bits:  256..511, with `injectedIndex` replaced by `injectedValue`
 *  10 bits:  512..1023
 *  11 bits:  1024..2047
 *  12 bits:  2048..4095
 *  filler:   `fillerPattern` repeated `limit - fillerStart` times
 */
export function buildMaliciousLzwSegments(config?: Partial<MaliciousLzwConfig>): Segment[] {
  const cfg: MaliciousLzwConfig = { ...DEFAULT_MALICIOUS_LZW_CONFIG, ...config };

  const nine = range(1 << 8, (1 << 9) - 1);
  if (cfg.injectedIndex >= 0 && cfg.injectedIndex < nine.length) {
    nine[cfg.injectedIndex] = cfg.injectedValue;
  }

  return [
    codeSegment(9, nine),
    codeSegment(10, range(1 << 9, (1 << 10) - 1)),
    codeSegment(11, range(1 << 10, (1 << 11) - 1)),
    codeSegment(12, range(1 << 11, (1 << 12) - 1)),
    patternSegment(cfg.fillerPattern, Math.max(0, cfg.limit - cfg.fillerStart)),
  ];
}

/** Packed bytes of a preset, optionally overriding parts of its config. */
export function generateMaliciousLzwFixture(
  preset: MaliciousLzwPresetName = 'reference',
  overrides?: Partial<MaliciousLzwConfig>,
): Uint8Array {
  const { config, packer } = MALICIOUS_LZW_PRESETS[preset];
  const segments = buildMaliciousLzwSegments({ ...config, ...overrides });
  return new BitstreamPacker(packer).pack(segments);
}
