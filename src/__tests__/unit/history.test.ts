import { describe, it, expect } from 'vitest';

import { SearchHistory } from '../../core/history.js';

describe('SearchHistory', () => {
  it('defaults to a capacity of 20', () => {
    expect(new SearchHistory().capacity).toBe(20);
  });

  it('evicts the oldest entry when the 21st is appended', () => {
    const history = new SearchHistory();
    for (let i = 1; i <= 21; i++) history.push(`query ${String(i)}`);

    expect(history.size).toBe(20);
    expect(history.toArray()[0]).toBe('query 2');
    expect(history.toArray()[19]).toBe('query 21');
  });

  it('never grows past capacity over a long run', () => {
    const history = new SearchHistory(5);
    for (let i = 0; i < 500; i++) {
      history.push(`q${String(i)}`);
      expect(history.size).toBeLessThanOrEqual(5);
    }
    expect(history.toArray()).toEqual(['q495', 'q496', 'q497', 'q498', 'q499']);
  });

  it('returns the most recent entries, oldest first', () => {
    const history = new SearchHistory();
    ['a', 'b', 'c', 'd'].forEach((q) => history.push(q));

    expect(history.recent(3)).toEqual(['b', 'c', 'd']);
    expect(history.recent(10)).toEqual(['a', 'b', 'c', 'd']);
    expect(history.recent(0)).toEqual([]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new SearchHistory(0)).toThrow(RangeError);
  });
});
