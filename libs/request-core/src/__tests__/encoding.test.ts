import { describe, expect, it, vi } from 'vitest';
import {
  ParamsEncoder,
  buildMultipartBody,
  encodeParameters,
  flattenParams,
  hasFileParams,
  objectsToIds,
  toIdentifier,
  type Identifiable,
} from '../encoding';
import { NotImplementedError } from '../errors/errors';

const ref = (id: string | number): Identifiable => ({ [toIdentifier]: () => id });

describe('encodeParameters', () => {
  it('uses bracket notation for arrays and nested objects', () => {
    expect(encodeParameters({ a: [1, 2], b: { c: 3 } })).toBe('a[0]=1&a[1]=2&b[c]=3');
  });

  it('yields the same string on every call', () => {
    const params = { a: [1, 2], b: { c: 3 } };
    expect(encodeParameters(params)).toBe(encodeParameters(params));
  });

  it('preserves key and sequence order', () => {
    expect(encodeParameters({ z: 1, a: ['y', 'x'] })).toBe('z=1&a[0]=y&a[1]=x');
  });

  it('form-escapes values', () => {
    expect(encodeParameters({ q: 'hello world', tag: 'a&b' })).toBe('q=hello+world&tag=a%26b');
  });

  it('encodes arrays of objects', () => {
    expect(encodeParameters({ items: [{ id: 1 }, { id: 2 }] })).toBe('items[0][id]=1&items[1][id]=2');
  });

  it('sends an empty array as an empty bracket key', () => {
    expect(encodeParameters({ ids: [] })).toBe('ids[]=');
  });

  it('sends null as an empty value and skips undefined', () => {
    expect(encodeParameters({ title: null, skipped: undefined, flag: true })).toBe('title=&flag=true');
  });

  it('encodes dates as ISO strings', () => {
    expect(encodeParameters({ at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) })).toBe(
      'at=2024-01-02T03%3A04%3A05.000Z',
    );
  });

  it('sends identifiable objects as their id', () => {
    expect(encodeParameters({ episode: ref(7) })).toBe('episode=7');
  });
});

describe('flattenParams', () => {
  it('applies a prefix to every key', () => {
    expect(flattenParams({ a: 1, b: { c: 'd' } }, 'meta')).toEqual([
      ['meta[a]', '1'],
      ['meta[b][c]', 'd'],
    ]);
  });

  it('keeps blobs as values', () => {
    const file = new Blob(['abc']);
    expect(flattenParams({ file })).toEqual([['file', file]]);
  });
});

describe('objectsToIds', () => {
  it('replaces identifiable objects at any depth', () => {
    expect(objectsToIds({ episode: ref(7), list: [ref('a'), 2], nested: { sub: ref(3) }, plain: 'x' })).toEqual({
      episode: 7,
      list: ['a', 2],
      nested: { sub: 3 },
      plain: 'x',
    });
  });
});

describe('multipart helpers', () => {
  it('detects nested blobs', () => {
    expect(hasFileParams({ file: new Blob(['x']) })).toBe(true);
    expect(hasFileParams({ a: { b: [new Blob([])] } })).toBe(true);
    expect(hasFileParams({ a: 1, b: { c: 'd' } })).toBe(false);
  });

  it('builds form data from flattened params', () => {
    const form = buildMultipartBody({ title: 'Pilot', meta: { season: 1 }, audio: new Blob(['abc']) });

    expect(form.get('title')).toBe('Pilot');
    expect(form.get('meta[season]')).toBe('1');
    expect(form.get('audio')).toBeInstanceOf(Blob);
  });
});

describe('ParamsEncoder', () => {
  it('encodes each params object once', () => {
    const serialize = vi.fn(encodeParameters);
    const encoder = new ParamsEncoder({ serialize });
    const params = { a: [1, 2], b: { c: 3 } };

    const first = encoder.encode(params);
    const second = encoder.encode(params);

    expect(first).toBe('a[0]=1&a[1]=2&b[c]=3');
    expect(second).toBe(first);
    expect(serialize).toHaveBeenCalledTimes(1);
  });

  it('keys the cache by identity', () => {
    const serialize = vi.fn(encodeParameters);
    const encoder = new ParamsEncoder({ serialize });

    encoder.encode({ a: 1 });
    encoder.encode({ a: 1 });

    expect(serialize).toHaveBeenCalledTimes(2);
  });

  it('does not share its cache with other encoders', () => {
    const serialize = vi.fn(encodeParameters);
    const params = { a: 1 };

    new ParamsEncoder({ serialize }).encode(params);
    new ParamsEncoder({ serialize }).encode(params);

    expect(serialize).toHaveBeenCalledTimes(2);
  });

  it('does not decode', () => {
    expect(() => new ParamsEncoder().decode()).toThrow(NotImplementedError);
  });
});
