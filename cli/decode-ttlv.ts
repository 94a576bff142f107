#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a TTLV hex dump and print it as text notation.
 *
 * Usage:
 *   npx tsx cli/decode-ttlv.ts [path-to-hex-file] [--tags tags.json]
 *
 * Defaults to tests/fixtures/request.hex (with tests/fixtures/tags.json)
 * if no file is given. Whitespace in the hex file is ignored.
 */

import * as fs from 'fs';
import * as path from 'path';
import { decodeWithMetadata, type DecodedTtlv, type StructureTruncation } from '../src/decoder';
import { fromHex } from '../src/helpers';
import { formatNotation } from '../src/notation';
import { parseCliArgs, loadTagNames } from './args';

const FIXTURES_DIR = path.join(__dirname, '..', 'tests', 'fixtures');

function collectTruncations(decoded: DecodedTtlv, out: StructureTruncation[]): StructureTruncation[] {
  for (const child of decoded.children) {
    collectTruncations(child, out);
  }
  if (decoded.meta.truncation) out.push(decoded.meta.truncation);
  return out;
}

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));
  const hexPath = args.positional[0] ?? path.join(FIXTURES_DIR, 'request.hex');
  const tagsPath = args.tagsPath ?? (args.positional[0] ? undefined : path.join(FIXTURES_DIR, 'tags.json'));

  if (!fs.existsSync(hexPath)) {
    console.error(`Error: file not found: ${hexPath}`);
    process.exit(1);
  }

  try {
    const names = tagsPath ? loadTagNames(tagsPath) : undefined;
    const bytes = fromHex(fs.readFileSync(hexPath, 'utf-8'));
    const decoded = decodeWithMetadata(bytes);

    console.log(formatNotation(decoded.node, names));
    console.log(`\n${decoded.meta.length} of ${bytes.length} bytes decoded`);

    for (const t of collectTruncations(decoded, [])) {
      console.error(
        `warning: structure 0x${t.tag.toString(16).padStart(4, '0')} at offset ${t.offset} ` +
        `stopped at offset ${t.childOffset}, ${t.unreadBytes} bytes unread: ${t.error.message}`,
      );
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
