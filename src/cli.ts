#!/usr/bin/env node

/**
 * triequery — CLI tool for loading a key list into a trie and querying it.
 *
 * Usage:
 *   triequery --input words.txt --prefix te
 *   triequery --input data.json --member tea
 *   triequery -i data.csv -d tea -d ten -p te --limit 5
 *
 * Deletions run before the query. Each matching entry is printed as
 * "<key>\t<value>", one per line.
 */

import { readInput } from './input.js';
import { runQuery } from './query.js';
import { Trie } from './trie.js';

// ─── Argument parsing ───────────────────────────────────────────────

interface Args {
  input: string;
  prefix: string;
  member: string | undefined;
  deletes: string[];
  limit: number;
  ignoreCase: boolean;
}

function parseArgs(argv: string[]): Args {
  let input: string | undefined;
  const args: Omit<Args, 'input'> = {
    prefix: '',
    member: undefined,
    deletes: [],
    limit: Infinity,
    ignoreCase: false,
  };
  let i = 2; // skip node and script path

  const next = (flag: string): string => {
    const value = argv[++i];
    if (value === undefined) fail(`${flag} requires a value`);
    return value;
  };

  while (i < argv.length) {
    switch (argv[i]) {
      case '--input':
      case '-i':
        input = next('--input');
        break;
      case '--prefix':
      case '-p':
        args.prefix = next('--prefix');
        break;
      case '--member':
      case '-m':
        args.member = next('--member');
        break;
      case '--delete':
      case '-d':
        args.deletes.push(next('--delete'));
        break;
      case '--limit':
      case '-l': {
        const limit = parseInt(next('--limit'), 10);
        if (isNaN(limit) || limit < 0) fail('--limit must be a non-negative integer');
        args.limit = limit;
        break;
      }
      case '--ignore-case':
        args.ignoreCase = true;
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        fail(`Unknown argument: ${argv[i]}`);
    }
    i++;
  }

  if (!input) fail('--input is required');

  return { input, ...args };
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  printUsage();
  process.exit(1);
}

function printUsage(): void {
  console.log(`
Usage: triequery --input <file> [options]

Options:
  --input,  -i <file>    Input key list (required)
  --prefix, -p <text>    Print every key starting with <text> (default: all keys)
  --member, -m <key>     Print whether <key> is stored, then exit
  --delete, -d <key>     Delete <key> before querying (repeatable)
  --limit,  -l <n>       Print at most <n> results
  --ignore-case          Match keys case-insensitively
  --help,   -h           Show this help

Input formats:
  .json    JSON array of strings, or array of { key, value } objects
  .csv     Two columns: key,value (header row auto-detected)
  .txt     One key per line (value = key)

Examples:
  triequery -i words.txt -p te
  triequery -i cities.json -m Paris --ignore-case
`);
}

// ─── Main ───────────────────────────────────────────────────────────

function main(): void {
  const args = parseArgs(process.argv);

  let trie: Trie<unknown>;
  try {
    trie = Trie.fromEntries(readInput(args.input), { caseSensitive: !args.ignoreCase });
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  if (trie.size === 0) {
    console.error('Error: no entries found in input file');
    process.exit(1);
  }

  const { lines, warnings } = runQuery(trie, {
    prefix: args.prefix,
    member: args.member,
    deletes: args.deletes,
    limit: args.limit,
  });
  for (const line of warnings) console.error(line);
  for (const line of lines) console.log(line);
}

main();
