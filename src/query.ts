import type { Trie } from './trie.js';

export interface QueryOptions {
  /** Print every key starting with this prefix. */
  prefix: string;
  /** Answer membership for this key instead of running a prefix query. */
  member?: string;
  /** Keys deleted before querying. */
  deletes?: string[];
  /** Maximum result lines. */
  limit?: number;
}

export interface QueryOutput {
  /** Lines for stdout. */
  lines: string[];
  /** Lines for stderr. */
  warnings: string[];
}

/**
 * Apply the deletions, then run a membership or prefix query.
 * Prefix results come out as "<key>\t<value>", one per stored value.
 */
export function runQuery<V>(trie: Trie<V>, options: QueryOptions): QueryOutput {
  const { prefix, member, deletes = [], limit = Infinity } = options;
  const output: QueryOutput = { lines: [], warnings: [] };

  for (const key of deletes) {
    if (!trie.delete(key)) output.warnings.push(`Warning: ${key} not found, nothing deleted`);
  }

  if (member !== undefined) {
    output.lines.push(String(trie.isMember(member)));
    return output;
  }

  const results = trie.search(prefix);
  if (results.size === 0) {
    output.warnings.push(`No keys start with "${prefix}"`);
    return output;
  }

  for (const entry of results) {
    if (output.lines.length >= limit) break;
    output.lines.push(`${entry.key ?? ''}\t${formatValue(entry.value)}`);
  }
  return output;
}

export function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
