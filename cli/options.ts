import * as fs from 'fs';
import * as path from 'path';
import type { PaddingPolicy } from '../src/helpers';
import type { PackerOptions } from '../src/packer/BitstreamPacker';
import type { Segment } from '../src/segments';
import { parseLayout } from '../src/layout';
import {
  MALICIOUS_LZW_PRESETS,
  buildMaliciousLzwSegments,
  isMaliciousLzwPresetName,
  type MaliciousLzwPresetName,
} from '../src/fixture/MaliciousLzwFixture';

/** Options shared by the fixture CLIs. */
export interface FixtureCliOptions {
  /** Positional file argument, if given. */
  file?: string;
  layout?: string;
  preset: MaliciousLzwPresetName;
  padding?: PaddingPolicy;
  strict: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isPaddingPolicy(value: string): value is PaddingPolicy {
  return value === 'when-misaligned' || value === 'always';
}

/** Parse `process.argv.slice(2)`-style arguments. */
export function parseFixtureArgs(args: readonly string[]): FixtureCliOptions {
  const options: FixtureCliOptions = { preset: 'reference', strict: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = (): string => {
      const value = args[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} needs a value`);
      }
      return value;
    };

    switch (arg) {
      case '--layout':
        options.layout = next();
        break;
      case '--preset': {
        const name = next();
        if (!isMaliciousLzwPresetName(name)) {
          throw new UsageError(
            `Unknown preset '${name}'. Supported: ${Object.keys(MALICIOUS_LZW_PRESETS).join(', ')}`,
          );
        }
        options.preset = name;
        break;
      }
      case '--padding': {
        const policy = next();
        if (!isPaddingPolicy(policy)) {
          throw new UsageError(`Unknown padding '${policy}'. Supported: when-misaligned, always`);
        }
        options.padding = policy;
        break;
      }
      case '--strict':
        options.strict = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        if (options.file !== undefined) {
          throw new UsageError(`Unexpected argument ${arg}`);
        }
        options.file = arg;
    }
  }

  return options;
}

/** Packer options: the preset's, then any command-line overrides. */
export function packerOptionsFor(options: FixtureCliOptions): Required<PackerOptions> {
  const preset = MALICIOUS_LZW_PRESETS[options.preset].packer;
  return {
    overflow: options.strict ? 'strict' : preset.overflow,
    padding: options.padding ?? preset.padding,
  };
}

/** Segments from `--layout` when given, otherwise from the preset. */
export function segmentsFor(options: FixtureCliOptions): Segment[] {
  if (options.layout !== undefined) {
    const layoutPath = path.resolve(options.layout);
    return parseLayout(fs.readFileSync(layoutPath, 'utf-8'));
  }
  return buildMaliciousLzwSegments(MALICIOUS_LZW_PRESETS[options.preset].config);
}

export function describeSegment(segment: Segment): string {
  if (segment.kind === 'pattern') {
    return `pattern "${segment.pattern}" x ${segment.repeat}`;
  }
  return `${segment.codes.length} code(s) at ${segment.width} bits`;
}
