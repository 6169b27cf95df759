/**
 * Key list parsing for the command-line tool.
 *
 * Input formats:
 *   - .json: Array of strings, or array of { key, value } objects
 *   - .csv:  Two columns: key,value (header optional)
 *   - .txt:  One key per line
 *
 * Wherever a value is missing, the key itself is stored as the value.
 */

import { readFileSync } from 'node:fs';
import { resolve, extname } from 'node:path';

export interface InputEntry {
  key: string;
  value: unknown;
}

export function readInput(filepath: string): InputEntry[] {
  const content = readFileSync(resolve(filepath), 'utf-8');
  return parseInput(content, extname(filepath).toLowerCase());
}

export function parseInput(content: string, ext: string): InputEntry[] {
  switch (ext) {
    case '.json':
      return parseJson(content);
    case '.csv':
      return parseCsv(content);
    case '.txt':
      return parseTxt(content);
    default:
      // Try JSON first, fall back to text
      try {
        return parseJson(content);
      } catch {
        return parseTxt(content);
      }
  }
}

export function parseJson(content: string): InputEntry[] {
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error('JSON input must be an array');
  }

  return data.map((item: unknown): InputEntry => {
    if (typeof item === 'string') {
      return { key: item, value: item };
    }
    if (typeof item === 'object' && item !== null && 'key' in item && typeof item.key === 'string') {
      return { key: item.key, value: 'value' in item ? item.value : item.key };
    }
    throw new Error(`Invalid JSON entry: ${JSON.stringify(item)}`);
  });
}

export function parseCsv(content: string): InputEntry[] {
  const rows = content
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map(splitRow);
  if (rows.length === 0) return [];

  // A header row names its first column "key"
  const startIdx = rows[0].key.toLowerCase() === 'key' ? 1 : 0;

  const entries: InputEntry[] = [];
  for (const { key, value } of rows.slice(startIdx)) {
    if (key.length > 0) entries.push({ key, value: value ? value : key });
  }
  return entries;
}

/** Split a CSV line into its key and optional value. Only the key column may be quoted. */
function splitRow(line: string): { key: string; value: string | undefined } {
  if (line.startsWith('"')) {
    const endQuote = line.indexOf('"', 1);
    if (endQuote === -1) return { key: line.slice(1), value: undefined };

    const rest = line.slice(endQuote + 1);
    const comma = rest.indexOf(',');
    return {
      key: line.slice(1, endQuote),
      value: comma === -1 ? undefined : rest.slice(comma + 1).trim(),
    };
  }

  const comma = line.indexOf(',');
  if (comma === -1) return { key: line, value: undefined };
  return { key: line.slice(0, comma).trim(), value: line.slice(comma + 1).trim() };
}

export function parseTxt(content: string): InputEntry[] {
  return content
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map((key) => ({ key, value: key }));
}
