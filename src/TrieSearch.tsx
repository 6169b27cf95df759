/**
 * TrieSearch — a prefix-search combobox over a Trie.
 *
 * Each suggestion is one stored key together with every value stored under
 * it. A status line tells whether the typed text is itself a stored key, only
 * a prefix of stored keys, or matches nothing.
 *
 * The trie is read on every render that changes the query; callers that
 * mutate a trie in place bump `revision` to refresh the suggestions.
 */

import { useMemo, useReducer, useState, type ChangeEvent, type KeyboardEvent, type ReactNode } from 'react';
import { Trie } from './trie.js';

// ─── Types ──────────────────────────────────────────────────────────

export interface KeySuggestion<V> {
  key: string;
  /** Every value stored under `key`, in insertion order. */
  values: V[];
}

/** How the typed text relates to the stored keys. */
export type QueryMatch = 'member' | 'prefix' | 'none';

export interface TrieSearchProps<V = unknown> {
  /** A pre-built trie. Takes precedence over `entries`. */
  trie?: Trie<V>;
  entries?: Array<{ key: string; value: V }>;
  /** Change this after mutating `trie` in place. */
  revision?: number;

  /** Controlled value. */
  value?: string;
  defaultValue?: string;
  onChange?: (value: string) => void;
  onSelect?: (suggestion: KeySuggestion<V>) => void;

  placeholder?: string;
  /** Maximum keys listed. Default 8. */
  maxSuggestions?: number;
  /** Minimum characters before querying. Default 1. */
  minChars?: number;

  /** Render the content of one option. The option element itself is provided. */
  renderSuggestion?: (suggestion: KeySuggestion<V>, query: string) => ReactNode;
  /** Render the status line. Return null to hide it. */
  renderStatus?: (match: QueryMatch, query: string, keyCount: number) => ReactNode;

  className?: string;
  listClassName?: string;
  disabled?: boolean;
  id?: string;
}

// ─── Navigation state ───────────────────────────────────────────────

interface NavState {
  open: boolean;
  /** Index of the highlighted option, -1 for none. */
  highlight: number;
}

type NavAction =
  | { type: 'open' }
  | { type: 'close' }
  | { type: 'move'; step: 1 | -1; count: number }
  | { type: 'hover'; index: number };

function navigate(state: NavState, action: NavAction): NavState {
  switch (action.type) {
    case 'open':
      return { open: true, highlight: -1 };
    case 'close':
      return { open: false, highlight: -1 };
    case 'hover':
      return { ...state, highlight: action.index };
    case 'move': {
      if (action.count === 0) return state;
      const { highlight } = state;
      const next =
        action.step === 1
          ? (highlight + 1) % action.count
          : highlight <= 0
            ? action.count - 1
            : highlight - 1;
      return { open: true, highlight: next };
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

/** Group search results by key, keeping the order keys first appear in. */
export function groupByKey<V>(trie: Trie<V>, prefix: string): KeySuggestion<V>[] {
  const groups = new Map<string, V[]>();
  for (const entry of trie.search(prefix)) {
    const key = entry.key ?? prefix;
    const values = groups.get(key);
    if (values) values.push(entry.value);
    else groups.set(key, [entry.value]);
  }
  return Array.from(groups, ([key, values]) => ({ key, values }));
}

function matchOf<V>(trie: Trie<V>, query: string): QueryMatch {
  if (trie.isMember(query)) return 'member';
  return trie.isNode(query) ? 'prefix' : 'none';
}

function defaultStatus(match: QueryMatch, query: string, keyCount: number): ReactNode {
  switch (match) {
    case 'member':
      return `"${query}" is stored`;
    case 'prefix':
      return `${keyCount} ${keyCount === 1 ? 'key starts' : 'keys start'} with "${query}"`;
    case 'none':
      return `No keys start with "${query}"`;
  }
}

function defaultSuggestion<V>({ key, values }: KeySuggestion<V>, query: string): ReactNode {
  return (
    <>
      <strong>{key.slice(0, query.length)}</strong>
      {key.slice(query.length)}
      {values.length > 1 && <small> ×{values.length}</small>}
    </>
  );
}

// ─── Component ──────────────────────────────────────────────────────

export function TrieSearch<V = unknown>(props: TrieSearchProps<V>) {
  const {
    trie: externalTrie,
    entries,
    revision = 0,
    value: controlledValue,
    defaultValue = '',
    onChange,
    onSelect,
    placeholder = 'Search...',
    maxSuggestions = 8,
    minChars = 1,
    renderSuggestion = defaultSuggestion,
    renderStatus = defaultStatus,
    className,
    listClassName,
    disabled = false,
    id = 'trie-search',
  } = props;

  const trie = useMemo(
    () => externalTrie ?? Trie.fromEntries<V>(entries ?? []),
    [externalTrie, entries],
  );

  const [internalValue, setInternalValue] = useState(defaultValue);
  const query = controlledValue ?? internalValue;
  const active = query.length >= minChars;

  // `revision` is a dependency only so in-place mutations re-run the search
  const { groups, match } = useMemo<{ groups: KeySuggestion<V>[]; match: QueryMatch }>(() => {
    if (!active) return { groups: [], match: 'none' };
    return { groups: groupByKey(trie, query), match: matchOf(trie, query) };
  }, [trie, query, active, revision]);
  const suggestions = groups.slice(0, maxSuggestions);

  const [nav, dispatch] = useReducer(navigate, { open: false, highlight: -1 });
  const listId = `${id}-list`;
  const expanded = nav.open && active && suggestions.length > 0;

  const setQuery = (text: string) => {
    if (controlledValue === undefined) setInternalValue(text);
    onChange?.(text);
  };

  const select = (suggestion: KeySuggestion<V>) => {
    setQuery(suggestion.key);
    onSelect?.(suggestion);
    dispatch({ type: 'close' });
  };

  const handleChange = (e: ChangeEvent<HTMLInputElement>) => {
    setQuery(e.target.value);
    dispatch({ type: 'open' });
  };

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
    switch (e.key) {
      case 'ArrowDown':
      case 'ArrowUp':
        e.preventDefault();
        dispatch({ type: 'move', step: e.key === 'ArrowDown' ? 1 : -1, count: suggestions.length });
        break;
      case 'Enter': {
        const chosen = expanded ? suggestions[nav.highlight] : undefined;
        if (chosen) {
          e.preventDefault();
          select(chosen);
        }
        break;
      }
      case 'Escape':
        dispatch({ type: 'close' });
        break;
    }
  };

  return (
    <div className={className} data-match={active ? match : undefined}>
      <input
        id={id}
        type="text"
        role="combobox"
        aria-expanded={expanded}
        aria-autocomplete="list"
        aria-controls={listId}
        aria-activedescendant={expanded && nav.highlight >= 0 ? `${listId}-${nav.highlight}` : undefined}
        value={query}
        placeholder={placeholder}
        disabled={disabled}
        autoComplete="off"
        onChange={handleChange}
        onKeyDown={handleKeyDown}
        onFocus={() => dispatch({ type: 'open' })}
        onBlur={() => dispatch({ type: 'close' })}
      />

      {active && <output role="status">{renderStatus(match, query, groups.length)}</output>}

      {expanded && (
        <ul id={listId} role="listbox" className={listClassName}>
          {suggestions.map((suggestion, i) => (
            <li
              key={suggestion.key}
              id={`${listId}-${i}`}
              role="option"
              aria-selected={i === nav.highlight}
              data-count={suggestion.values.length}
              // mousedown fires before the input's blur closes the list
              onMouseDown={(e) => {
                e.preventDefault();
                select(suggestion);
              }}
              onMouseEnter={() => dispatch({ type: 'hover', index: i })}
            >
              {renderSuggestion(suggestion, query)}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
