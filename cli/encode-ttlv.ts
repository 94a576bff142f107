#!/usr/bin/env npx tsx
/**
 * CLI tool to encode a text notation file to TTLV hex.
 *
 * Usage:
 *   npx tsx cli/encode-ttlv.ts <input.ttlv> [--tags tags.json]
 */

import * as fs from 'fs';
import * as path from 'path';
import { encodeToHex } from '../src/encoder';
import { parseNotation } from '../src/notation';
import { parseCliArgs, loadTagNames } from './args';

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.positional.length < 1) {
    console.error('Usage: npx tsx cli/encode-ttlv.ts <input.ttlv> [--tags tags.json]');
    process.exit(1);
  }

  const inputPath = path.resolve(args.positional[0]);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  try {
    const names = args.tagsPath ? loadTagNames(path.resolve(args.tagsPath)) : undefined;
    const node = parseNotation(fs.readFileSync(inputPath, 'utf-8'), names);
    process.stdout.write(encodeToHex(node) + '\n');
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
