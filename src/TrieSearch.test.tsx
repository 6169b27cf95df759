// @vitest-environment jsdom
import { describe, test, expect, vi, afterEach } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { TrieSearch, groupByKey, type KeySuggestion } from './TrieSearch.js';
import { Trie } from './trie.js';

const entries = [
  { key: 'to', value: 7 },
  { key: 'tea', value: 3 },
  { key: 'ted', value: 4 },
  { key: 'ten', value: 12 },
];

function optionTexts(): Array<string | null> {
  return screen.queryAllByRole('option').map((o) => o.textContent);
}

function type(text: string): HTMLInputElement {
  const input = screen.getByRole<HTMLInputElement>('combobox');
  fireEvent.change(input, { target: { value: text } });
  return input;
}

afterEach(cleanup);

describe('groupByKey', () => {
  test('collects duplicate values under one key', () => {
    const trie = new Trie<string>();
    trie.add('cat', 'feline');
    trie.add('car', 'vehicle');
    trie.add('cat', 'tool');
    expect(groupByKey(trie, 'ca')).toEqual([
      { key: 'cat', values: ['feline', 'tool'] },
      { key: 'car', values: ['vehicle'] },
    ]);
  });
});

describe('TrieSearch', () => {
  test('typing a prefix lists matching keys', () => {
    render(<TrieSearch entries={entries} />);
    type('te');
    expect(optionTexts()).toEqual(['tea', 'ted', 'ten']);
  });

  test('keys with several values appear once, with a count', () => {
    const trie = new Trie<string>();
    trie.add('cat', 'feline');
    trie.add('cat', 'tool');
    trie.add('cats', 'plural');
    render(<TrieSearch trie={trie} />);
    type('ca');
    expect(optionTexts()).toEqual(['cat ×2', 'cats']);
    expect(screen.getAllByRole('option')[0].getAttribute('data-count')).toBe('2');
  });

  test('status tells a stored key from a path-only prefix', () => {
    render(<TrieSearch entries={entries} />);
    type('te');
    expect(screen.getByRole('status').textContent).toBe('3 keys start with "te"');
    type('tea');
    expect(screen.getByRole('status').textContent).toBe('"tea" is stored');
    type('tx');
    expect(screen.getByRole('status').textContent).toBe('No keys start with "tx"');
    expect(screen.queryByRole('listbox')).toBeNull();
  });

  test('maxSuggestions caps the list but not the key count', () => {
    render(<TrieSearch entries={entries} maxSuggestions={2} />);
    type('t');
    expect(optionTexts()).toEqual(['to', 'tea']);
    expect(screen.getByRole('status').textContent).toBe('4 keys start with "t"');
  });

  test('nothing is queried below minChars', () => {
    render(<TrieSearch entries={entries} minChars={2} />);
    type('t');
    expect(screen.queryByRole('listbox')).toBeNull();
    expect(screen.queryByRole('status')).toBeNull();
  });

  test('arrow keys wrap and Enter selects with every value', () => {
    const onSelect = vi.fn<(suggestion: KeySuggestion<number>) => void>();
    const onChange = vi.fn<(value: string) => void>();
    render(<TrieSearch entries={entries} onSelect={onSelect} onChange={onChange} />);
    const input = type('te');

    fireEvent.keyDown(input, { key: 'ArrowDown' });
    fireEvent.keyDown(input, { key: 'ArrowDown' });
    fireEvent.keyDown(input, { key: 'ArrowUp' });
    fireEvent.keyDown(input, { key: 'ArrowUp' });
    expect(screen.getAllByRole('option')[2].getAttribute('aria-selected')).toBe('true');
    expect(input.getAttribute('aria-activedescendant')).toBe('trie-search-list-2');

    fireEvent.keyDown(input, { key: 'Enter' });
    expect(onSelect).toHaveBeenCalledWith({ key: 'ten', values: [12] });
    expect(onChange).toHaveBeenLastCalledWith('ten');
    expect(input.value).toBe('ten');
    expect(screen.queryByRole('listbox')).toBeNull();
  });

  test('Enter without a highlight selects nothing', () => {
    const onSelect = vi.fn<(suggestion: KeySuggestion<number>) => void>();
    render(<TrieSearch entries={entries} onSelect={onSelect} />);
    fireEvent.keyDown(type('te'), { key: 'Enter' });
    expect(onSelect).not.toHaveBeenCalled();
  });

  test('Escape closes the list', () => {
    render(<TrieSearch entries={entries} />);
    fireEvent.keyDown(type('te'), { key: 'Escape' });
    expect(screen.queryByRole('listbox')).toBeNull();
  });

  test('clicking a suggestion selects it', () => {
    const onSelect = vi.fn<(suggestion: KeySuggestion<number>) => void>();
    render(<TrieSearch entries={entries} onSelect={onSelect} />);
    type('te');
    fireEvent.mouseDown(screen.getAllByRole('option')[1]);
    expect(onSelect).toHaveBeenCalledWith({ key: 'ted', values: [4] });
  });

  test('bumping revision picks up in-place mutations', () => {
    const trie = Trie.fromEntries(entries);
    const { rerender } = render(<TrieSearch trie={trie} revision={0} />);
    type('te');
    expect(optionTexts()).toEqual(['tea', 'ted', 'ten']);

    trie.delete('ted');
    trie.add('tee', 1);
    rerender(<TrieSearch trie={trie} revision={1} />);
    expect(optionTexts()).toEqual(['tea', 'ten', 'tee']);
  });

  test('custom renderers receive the query', () => {
    render(
      <TrieSearch
        entries={entries}
        renderSuggestion={(s, query) => `${query}:${s.key}=${s.values.join(',')}`}
        renderStatus={(match) => match}
      />,
    );
    type('to');
    expect(optionTexts()).toEqual(['to:to=7']);
    expect(screen.getByRole('status').textContent).toBe('member');
  });
});
