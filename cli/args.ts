import * as fs from 'fs';
import { namedTags, type TagNames } from '../src/tag';

export interface CliArgs {
  positional: string[];
  tagsPath?: string;
}

/** Split argv into positional arguments and the `--tags <file>` flag. */
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let tagsPath: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--tags' && argv[i + 1]) {
      tagsPath = argv[i + 1];
      i++;
    } else {
      positional.push(argv[i]);
    }
  }
  return { positional, tagsPath };
}

/** Load a `{ "Name": number }` JSON file of tag names. */
export function loadTagNames(filePath: string): TagNames {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${filePath}: expected an object of tag names`);
  }
  const record: Record<string, number> = {};
  for (const [name, wire] of Object.entries(parsed)) {
    if (typeof wire !== 'number') {
      throw new Error(`${filePath}: tag "${name}" is not a number`);
    }
    record[name] = wire;
  }
  return namedTags(record);
}
