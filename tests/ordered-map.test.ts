import { describe, expect, it } from 'vitest';
import { OrderedMap } from '../src/utils/ordered-map.js';

describe('OrderedMap', () => {
  it('iterates in insertion order regardless of key order', () => {
    const map = new OrderedMap<number, string>();
    map.insert(30, 'c');
    map.insert(10, 'a');
    map.insert(20, 'b');
    expect([...map.keys()]).toEqual([30, 10, 20]);
    expect([...map.values()]).toEqual(['c', 'a', 'b']);
  });

  it('refuses duplicate keys on insert', () => {
    const map = new OrderedMap<string, number>();
    expect(map.insert('x', 1)).toBe(true);
    expect(map.insert('x', 2)).toBe(false);
    expect(map.get('x')).toBe(1);
    expect(map.size).toBe(1);
  });

  it('replaces values in place on set', () => {
    const map = new OrderedMap<string, number>();
    map.set('a', 1).set('b', 2).set('a', 3);
    expect([...map]).toEqual([
      ['a', 3],
      ['b', 2],
    ]);
  });

  it('reindexes after delete', () => {
    const map = new OrderedMap<string, number>();
    map.insert('a', 1);
    map.insert('b', 2);
    map.insert('c', 3);
    expect(map.delete('a')).toBe(true);
    expect(map.delete('a')).toBe(false);
    expect(map.indexOf('c')).toBe(1);
    expect(map.at(0)).toEqual(['b', 2]);
    expect(map.at(2)).toBeUndefined();
    expect(map.at(-1)).toBeUndefined();
  });
});
