#!/usr/bin/env npx tsx
/**
 * CLI tool to write a packed LZW code stream to disk.
 *
 * Usage:
 *   npx tsx cli/generate-fixture.ts [output.bin] [--preset reference|legacy]
 *       [--layout file.layout] [--padding when-misaligned|always] [--strict]
 *
 * Without --layout the malicious LZW fixture of the chosen preset is built.
 * Defaults to NO_ID_lzw_malicious.bin in the current directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BitstreamPacker } from '../src/packer/BitstreamPacker';
import {
  describeSegment,
  packerOptionsFor,
  parseFixtureArgs,
  segmentsFor,
  UsageError,
  type FixtureCliOptions,
} from './options';

const DEFAULT_OUTPUT = 'NO_ID_lzw_malicious.bin';

const USAGE =
  'Usage: npx tsx cli/generate-fixture.ts [output.bin] [--preset reference|legacy] ' +
  '[--layout file.layout] [--padding when-misaligned|always] [--strict]';

function readOptions(): FixtureCliOptions {
  try {
    return parseFixtureArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const options = readOptions();

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const outputPath = path.resolve(options.file ?? DEFAULT_OUTPUT);

  try {
    const segments = segmentsFor(options);
    const packer = new BitstreamPacker(packerOptionsFor(options));
    const size = packer.measure(segments);
    const bytes = packer.pack(segments);

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, bytes);

    for (const [i, segment] of segments.entries()) {
      console.log(`  segment ${i}: ${describeSegment(segment)}`);
    }
    console.log(
      `Wrote ${bytes.length} bytes (${size.bitLength} bits + ${size.paddingBits} padding) to ${outputPath}`,
    );
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
