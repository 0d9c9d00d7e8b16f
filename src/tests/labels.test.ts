import { describe, it, expect } from 'vitest';
import { mapLabels, labelsToMap } from '../transform/labels.ts';

describe('mapLabels', () => {
  it('splits the metric name from the dimensions', () => {
    const out = mapLabels([
      { name: '__name__', value: 'http_requests_total' },
      { name: 'method', value: 'GET' },
    ]);
    expect(out.name).toBe('http_requests_total');
    expect(out.dimensions).toEqual({ method: 'GET' });
  });

  it('reports an absent name as undefined, not an empty string', () => {
    const out = mapLabels([{ name: 'job', value: 'node' }]);
    expect(out.name).toBeUndefined();
    expect(out.dimensions).toEqual({ job: 'node' });
  });

  it('keeps an explicitly empty name distinguishable', () => {
    const out = mapLabels([{ name: '__name__', value: '' }]);
    expect(out.name).toBe('');
    expect(out.dimensions).toEqual({});
  });

  it('lets the last occurrence of a repeated label win', () => {
    const out = mapLabels([
      { name: 'env', value: 'staging' },
      { name: '__name__', value: 'first' },
      { name: 'env', value: 'prod' },
      { name: '__name__', value: 'second' },
    ]);
    expect(out.name).toBe('second');
    expect(out.dimensions).toEqual({ env: 'prod' });
  });

  it('returns frozen dimensions', () => {
    expect(Object.isFrozen(mapLabels([{ name: 'a', value: 'b' }]).dimensions)).toBe(true);
  });

  it('stores a __proto__ label as plain data', () => {
    const out = mapLabels([{ name: '__proto__', value: 'x' }]);
    expect(Object.keys(out.dimensions)).toEqual(['__proto__']);
    expect(out.dimensions['__proto__']).toBe('x');
  });
});

describe('labelsToMap', () => {
  it('has one entry per distinct name', () => {
    const map = labelsToMap([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
      { name: 'a', value: '3' },
    ]);
    expect([...map.entries()]).toEqual([
      ['a', '3'],
      ['b', '2'],
    ]);
  });
});
