#!/usr/bin/env npx tsx
/**
 * CLI tool to read a packed code stream back with a known width schedule.
 *
 * Usage:
 *   npx tsx cli/inspect-fixture.ts <fixture.bin> [--preset reference|legacy] [--layout file.layout]
 *
 * Prints, per segment, how many codes were read and the first codes that
 * differ from the layout, then the padding left after the last code.
 */

import * as fs from 'fs';
import * as path from 'path';
import { inspectPacked } from '../src/reader/inspect';
import { describeSegment, parseFixtureArgs, segmentsFor, UsageError } from './options';

const USAGE =
  'Usage: npx tsx cli/inspect-fixture.ts <fixture.bin> [--preset reference|legacy] [--layout file.layout]';

function main(): void {
  try {
    const options = parseFixtureArgs(process.argv.slice(2));
    if (options.help) {
      console.log(USAGE);
      return;
    }
    if (options.file === undefined) {
      throw new UsageError('missing fixture path');
    }

    const inputPath = path.resolve(options.file);
    if (!fs.existsSync(inputPath)) {
      console.error(`Error: input file not found: ${inputPath}`);
      process.exit(1);
    }

    const bytes = new Uint8Array(fs.readFileSync(inputPath));
    const segments = segmentsFor(options);
    const report = inspectPacked(bytes, segments);

    console.log(`${inputPath}: ${bytes.length} bytes`);
    for (const seg of report.segments) {
      console.log(`  segment ${seg.segmentIndex}: ${describeSegment(segments[seg.segmentIndex])}`);
      for (const m of seg.mismatches) {
        console.log(`    [${m.index}] expected ${m.expected}, read ${m.actual}`);
      }
    }
    console.log(
      `  trailing: ${report.trailing.length} bit(s)${report.cleanPadding ? ', all zero' : `: ${report.trailing}`}`,
    );
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
