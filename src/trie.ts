/**
 * Character-indexed prefix trie with multi-value keys.
 *
 * Supports:
 * - Exact lookup: whether a path exists, and whether a key holds values
 * - Prefix search: every stored key starting with a given prefix
 * - Duplicate values: adding to an existing key appends rather than overwrites
 * - Deletion with pruning: no dead-end branches survive a delete
 *
 * Keys are walked one UTF-16 code unit at a time.
 */

import { InvalidArgumentError } from './errors.js';
import { ResultCollection, ResultEntry } from './result.js';

// ─── Types ──────────────────────────────────────────────────────────

interface TrieNode<V> {
  /** Values stored at this key, or null if the node is only a path to longer keys. */
  values: V[] | null;
  children: Map<string, TrieNode<V>>;
}

export interface TrieOptions {
  /** Match keys case-sensitively. Default true. */
  caseSensitive?: boolean;
}

export type TrieInput<V> = Iterable<readonly [string, V] | { key: string; value: V }>;

function createNode<V>(): TrieNode<V> {
  return { children: new Map(), values: null };
}

// ─── Trie ───────────────────────────────────────────────────────────

export class Trie<V = unknown> {
  private readonly root: TrieNode<V> = createNode<V>();
  private _size = 0;
  private caseSensitive: boolean;

  constructor(options?: TrieOptions) {
    this.caseSensitive = options?.caseSensitive ?? true;
  }

  /** Store `value` under `key`, keeping any values already there. */
  add(key: string, value: V): void {
    if (key.length === 0) {
      throw new InvalidArgumentError('key', 'Trie keys must be non-empty');
    }
    const node = this.walk(this.normalize(key), true);
    if (node.values === null) {
      node.values = [value];
      this._size++;
    } else {
      node.values.push(value);
    }
  }

  /**
   * Remove the values stored at `key`.
   *
   * A node that still leads to longer keys is kept as a path; a leaf is
   * removed along with every ancestor left childless and valueless.
   * Returns false only when no node exists at `key`.
   */
  delete(key: string): boolean {
    const normalized = this.normalize(key);
    const trail: TrieNode<V>[] = [];
    const node = this.walk(normalized, false, trail);
    if (!node) return false;

    if (node.values !== null) this._size--;
    if (node.children.size > 0) {
      node.values = null;
    } else {
      this.prune(normalized, trail);
    }
    return true;
  }

  /** True if `key` is stored or is a prefix of a stored key. */
  isNode(key: string): boolean {
    return this.walk(this.normalize(key)) !== undefined;
  }

  /** True if `key` was added and still holds values. */
  isMember(key: string): boolean {
    const node = this.walk(this.normalize(key));
    return node !== undefined && node.values !== null;
  }

  /** Values stored at `key`, in insertion order. */
  get(key: string): V[] | undefined {
    const node = this.walk(this.normalize(key));
    return node?.values ? [...node.values] : undefined;
  }

  /**
   * Every stored value whose key starts with `prefix`.
   *
   * Values at a node come before its children's; children are visited in
   * insertion order. The empty prefix returns everything.
   */
  search(prefix: string): ResultCollection<V> {
    const normalized = this.normalize(prefix);
    const node = this.walk(normalized);
    if (!node) return new ResultCollection<V>();
    return this.collect(node, normalized);
  }

  /** Number of keys currently holding values. */
  get size(): number {
    return this._size;
  }

  /** Total number of nodes, root included. */
  get nodeCount(): number {
    let count = 0;
    const stack = [this.root];
    for (let node = stack.pop(); node; node = stack.pop()) {
      count++;
      stack.push(...node.children.values());
    }
    return count;
  }

  clear(): void {
    this.root.children.clear();
    this.root.values = null;
    this._size = 0;
  }

  /**
   * Resolve the node at `key`. Without `create`, stops at the first missing
   * child; with it, fills in empty nodes along the way. When `trail` is given,
   * the node at every proper prefix of `key` is pushed onto it, root first.
   */
  private walk(key: string, create: true, trail?: TrieNode<V>[]): TrieNode<V>;
  private walk(key: string, create?: false, trail?: TrieNode<V>[]): TrieNode<V> | undefined;
  private walk(key: string, create = false, trail?: TrieNode<V>[]): TrieNode<V> | undefined {
    let node = this.root;
    for (let i = 0; i < key.length; i++) {
      trail?.push(node);
      const char = key[i];
      let child = node.children.get(char);
      if (!child) {
        if (!create) return undefined;
        child = createNode<V>();
        node.children.set(char, child);
      }
      node = child;
    }
    return node;
  }

  /**
   * Detach the leaf at `key`, then peel one trailing unit per step while the
   * parent is left childless and valueless. `trail[i]` is the node at
   * `key.slice(0, i)`, as recorded by `walk`.
   */
  private prune(key: string, trail: TrieNode<V>[]): void {
    for (let i = key.length - 1; i >= 0; i--) {
      const parent = trail[i];
      parent.children.delete(key[i]);
      if (i === 0 || parent.children.size > 0 || parent.values !== null) return;
    }
  }

  /** Depth-first, values before children, children in insertion order. */
  private collect(start: TrieNode<V>, prefix: string): ResultCollection<V> {
    const results = new ResultCollection<V>();
    const stack: Array<[TrieNode<V>, string]> = [[start, prefix]];

    for (let top = stack.pop(); top; top = stack.pop()) {
      const [node, path] = top;

      if (node.values !== null) {
        for (const value of node.values) {
          const entry = new ResultEntry(value, path);
          // Stored entries keep the key they were created with
          if (value instanceof ResultEntry && value.key !== undefined) {
            entry.key = value.key;
          }
          results.add(entry);
        }
      }

      // Pushed in reverse so the first child is popped first
      const children = [...node.children];
      for (let i = children.length - 1; i >= 0; i--) {
        const [char, child] = children[i];
        stack.push([child, path + char]);
      }
    }
    return results;
  }

  private normalize(key: string): string {
    return this.caseSensitive ? key : key.toLowerCase();
  }

  /** Build from `[key, value]` pairs or `{ key, value }` objects. */
  static fromEntries<V>(entries: TrieInput<V>, options?: TrieOptions): Trie<V> {
    const trie = new Trie<V>(options);
    for (const e of entries) {
      if ('key' in e) trie.add(e.key, e.value);
      else trie.add(e[0], e[1]);
    }
    return trie;
  }
}
