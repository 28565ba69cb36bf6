import { NotImplementedError } from './errors/errors';

/**
 * Objects implementing this symbol are sent as their identifier when they
 * appear in request params (a resource passed where an id is expected).
 */
export const toIdentifier: unique symbol = Symbol('restwell.toIdentifier');

export interface Identifiable {
  [toIdentifier](): string | number;
}

export type ParamScalar = string | number | boolean | bigint | null | undefined | Date | Blob;

export type ParamValue = ParamScalar | ParamValue[] | Params | Identifiable;

export interface Params {
  [key: string]: ParamValue;
}

export type FlatParam = [key: string, value: string | Blob];

export function isIdentifiable(value: unknown): value is Identifiable {
  return typeof value === 'object' && value !== null && toIdentifier in value && typeof Reflect.get(value, toIdentifier) === 'function';
}

function isParams(value: ParamValue): value is Params {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Blob) &&
    !isIdentifiable(value)
  );
}

function flattenValue(key: string, value: ParamValue, out: FlatParam[]): void {
  if (value === undefined) return;

  if (value === null) {
    out.push([key, '']);
  } else if (Array.isArray(value)) {
    if (value.length === 0) {
      out.push([`${key}[]`, '']);
      return;
    }
    value.forEach((entry, index) => flattenValue(`${key}[${index}]`, entry, out));
  } else if (value instanceof Date) {
    out.push([key, value.toISOString()]);
  } else if (value instanceof Blob) {
    out.push([key, value]);
  } else if (isIdentifiable(value)) {
    out.push([key, String(value[toIdentifier]())]);
  } else if (isParams(value)) {
    for (const [subKey, subValue] of Object.entries(value)) {
      flattenValue(`${key}[${subKey}]`, subValue, out);
    }
  } else {
    out.push([key, String(value)]);
  }
}

/**
 * Flattens nested params into ordered key/value pairs using bracket notation:
 * `{ a: [1], b: { c: 2 } }` -> `[['a[0]', '1'], ['b[c]', '2']]`.
 */
export function flattenParams(params: Params, prefix?: string): FlatParam[] {
  const out: FlatParam[] = [];
  for (const [key, value] of Object.entries(params)) {
    flattenValue(prefix ? `${prefix}[${key}]` : key, value, out);
  }
  return out;
}

/**
 * Form-encodes params. Brackets are left unescaped so nested keys stay
 * readable in URLs and logs.
 */
export function encodeParameters(params: Params): string {
  const pairs = flattenParams(params).map(([key, value]): [string, string] => [
    key,
    typeof value === 'string' ? value : `[Blob ${value.size} bytes]`,
  ]);
  return new URLSearchParams(pairs).toString().replace(/%5B/gi, '[').replace(/%5D/gi, ']');
}

function replaceIds(value: ParamValue): ParamValue {
  if (isIdentifiable(value)) {
    return value[toIdentifier]();
  }
  if (Array.isArray(value)) {
    return value.map(replaceIds);
  }
  if (isParams(value)) {
    return objectsToIds(value);
  }
  return value;
}

/**
 * Returns a copy of `params` with every identifiable object, at any depth,
 * replaced by its identifier.
 */
export function objectsToIds(params: Params): Params {
  const result: Params = {};
  for (const [key, value] of Object.entries(params)) {
    result[key] = replaceIds(value);
  }
  return result;
}

function containsBlob(value: ParamValue): boolean {
  if (value instanceof Blob) return true;
  if (Array.isArray(value)) return value.some(containsBlob);
  if (isParams(value)) return Object.values(value).some(containsBlob);
  return false;
}

export function hasFileParams(params: Params): boolean {
  return containsBlob(params);
}

export function buildMultipartBody(params: Params): FormData {
  const form = new FormData();
  for (const [key, value] of flattenParams(params)) {
    form.append(key, value);
  }
  return form;
}

// ============================================================================
// Per-call encoder
// ============================================================================

export interface ParamsEncoderOptions {
  serialize?: (params: Params) => string;
}

/**
 * Write-only encoder owned by one logical call. The same params object is
 * needed for the wire and again for logging; the second `encode` returns the
 * cached string.
 */
export class ParamsEncoder {
  private readonly cache = new WeakMap<Params, string>();
  private readonly serialize: (params: Params) => string;

  constructor(options: ParamsEncoderOptions = {}) {
    this.serialize = options.serialize ?? encodeParameters;
  }

  encode(params: Params): string {
    const cached = this.cache.get(params);
    if (cached !== undefined) {
      return cached;
    }
    const encoded = this.serialize(params);
    this.cache.set(params, encoded);
    return encoded;
  }

  decode(): never {
    throw new NotImplementedError('ParamsEncoder does not implement decode');
  }
}
