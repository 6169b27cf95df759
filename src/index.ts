// React component
export { TrieSearch, groupByKey } from './TrieSearch.js';
export type { TrieSearchProps, KeySuggestion, QueryMatch } from './TrieSearch.js';

// Trie (character-per-node)
export { Trie } from './trie.js';
export type { TrieOptions, TrieInput } from './trie.js';

// Query results
export { ResultEntry, ResultCollection } from './result.js';

// Command-line query step
export { runQuery, formatValue } from './query.js';
export type { QueryOptions, QueryOutput } from './query.js';

export { InvalidArgumentError } from './errors.js';
