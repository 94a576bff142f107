/**
 * Standalone continuous fuzzer for the TTLV codec and notation parser.
 *
 * Alternates generated trees (round trip through bytes and text) with
 * mutated encodings, reporting any input that breaks a round trip or
 * makes the decoder throw something other than a TtlvError.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { decode } from '../src/decoder';
import { encodeToBytes } from '../src/encoder';
import { TtlvError } from '../src/errors';
import { toHex } from '../src/helpers';
import { formatNotation, parseNotation } from '../src/notation';
import { generateTtlvTree, Rng } from './generators/ttlv-generator';
import { mutateBytes } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

interface FuzzIssue {
  seed: number;
  strategy: 'generation' | 'mutation';
  input: string;
  problem: string;
}

function describeError(e: unknown): string {
  return e instanceof Error ? `${e.name}: ${e.message}` : String(e);
}

function fuzzGenerated(seed: number): FuzzIssue | undefined {
  const tree = generateTtlvTree(new Rng(seed));
  const text = formatNotation(tree);
  try {
    if (!decode(encodeToBytes(tree)).node.equals(tree)) {
      return { seed, strategy: 'generation', input: text, problem: 'byte round trip changed the tree' };
    }
    if (!parseNotation(text).equals(tree)) {
      return { seed, strategy: 'generation', input: text, problem: 'text round trip changed the tree' };
    }
  } catch (e) {
    return { seed, strategy: 'generation', input: text, problem: describeError(e) };
  }
  return undefined;
}

function fuzzMutated(seed: number, seeds: readonly Uint8Array[]): { issue?: FuzzIssue; decoded: boolean } {
  const rng = new Rng(seed);
  const input = mutateBytes(seeds[seed % seeds.length], rng, rng.int(1, 5));
  try {
    decode(input);
    return { decoded: true };
  } catch (e) {
    if (e instanceof TtlvError) return { decoded: false };
    return {
      decoded: false,
      issue: { seed, strategy: 'mutation', input: toHex(input), problem: describeError(e) },
    };
  }
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log(`TTLV Codec Fuzzer`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  const seeds = ALL_SEEDS.map(text => encodeToBytes(parseNotation(text)));
  let iteration = 0;
  let generated = 0;
  let mutated = 0;
  let decodeOk = 0;
  const issues: FuzzIssue[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    let issue: FuzzIssue | undefined;

    if (iteration % 2 === 0) {
      issue = fuzzGenerated(iteration + 1);
      generated++;
    } else {
      const result = fuzzMutated(iteration + 1, seeds);
      issue = result.issue;
      if (result.decoded) decodeOk++;
      mutated++;
    }

    if (issue) {
      issues.push(issue);
      console.error(`\n[!] ${issue.problem} at iteration ${iteration} (${issue.strategy}):`);
      console.error(`    Input: ${issue.input.slice(0, 200)}...`);
    }

    iteration++;

    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `generated=${generated} mutated=${mutated} ` +
        `decodeOk=${decodeOk} issues=${issues.length}`
      );
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Generated: ${generated}`);
  console.log(`Mutated: ${mutated}`);
  console.log(`Mutated inputs that decoded: ${decodeOk}`);

  if (issues.length > 0) {
    console.log('');
    console.log(`=== ${issues.length} issue(s) found ===`);
    for (const issue of issues) {
      console.log(`  Seed: ${issue.seed}, Strategy: ${issue.strategy}, Problem: ${issue.problem}`);
      console.log(`  Input: ${issue.input.slice(0, 300)}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
