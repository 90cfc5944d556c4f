import {
  readBoolean,
  readMillisMap,
  readNumberMap,
  readOptionalString,
  readString,
  readStringArray,
  toMillis,
} from './document-fields';

describe('toMillis', () => {
  it('should accept millis, dates and timestamp-like objects', () => {
    expect(toMillis(1500)).toBe(1500);
    expect(toMillis(new Date(2000))).toBe(2000);
    expect(toMillis({ toMillis: () => 42 })).toBe(42);
    expect(toMillis({ seconds: 3, nanoseconds: 0 })).toBe(3000);
  });

  it('should return undefined for anything else', () => {
    expect(toMillis(null)).toBeUndefined();
    expect(toMillis('yesterday')).toBeUndefined();
    expect(toMillis(Number.NaN)).toBeUndefined();
    expect(toMillis({})).toBeUndefined();
  });
});

describe('field readers', () => {
  const data = {
    name: 'Alice',
    empty: '',
    flag: 'true',
    ids: ['a', 1, 'b'],
    counts: { a: 1, b: 'x' },
    reads: { a: { seconds: 2 }, b: 5, c: 'never' },
  };

  it('should read strings with fallbacks', () => {
    expect(readString(data, 'name')).toBe('Alice');
    expect(readString(data, 'missing', 'n/a')).toBe('n/a');
    expect(readOptionalString(data, 'empty')).toBeUndefined();
  });

  it('should only treat true as true', () => {
    expect(readBoolean(data, 'flag')).toBe(false);
    expect(readBoolean({ flag: true }, 'flag')).toBe(true);
  });

  it('should drop entries of the wrong type', () => {
    expect(readStringArray(data, 'ids')).toEqual(['a', 'b']);
    expect(readNumberMap(data, 'counts')).toEqual({ a: 1 });
    expect(readMillisMap(data, 'reads')).toEqual({ a: 2000, b: 5 });
    expect(readNumberMap(data, 'ids')).toEqual({});
  });
});
