/**
 * JSON field readers
 *
 * Small building blocks the push decoders are assembled from. A reader takes
 * an untrusted value plus its path and either returns the narrowed value or
 * aborts with a `DecodeFailure`. `runDecoder` is the only place that catches
 * it, so failures never cross the public API as exceptions.
 */

import type { DecodeError, DecodeErrorKind, DecodeResult } from './types.js';

/** Narrows an untrusted value or aborts the enclosing decode */
export type Reader<T> = (value: unknown, path: string) => T;

/** Internal abort signal carrying the decode error */
export class DecodeFailure extends Error {
  readonly error: DecodeError;

  constructor(error: DecodeError) {
    super(error.path ? `${error.path}: ${error.message}` : error.message);
    this.name = 'DecodeFailure';
    this.error = error;
  }
}

export function fail(kind: DecodeErrorKind, path: string, message: string): never {
  throw new DecodeFailure({ kind, path, message });
}

/**
 * Run a decoder and convert an abort into a failed result. Anything other
 * than a `DecodeFailure` is a programming error and is rethrown.
 */
export function runDecoder<T>(decode: () => T): DecodeResult<T> {
  try {
    return { success: true, value: decode() };
  } catch (err) {
    if (err instanceof DecodeFailure) {
      return { success: false, error: err.error };
    }
    throw err;
  }
}

/**
 * Parse a raw response body. Returns an `invalid-json` failure instead of
 * throwing on malformed text.
 */
export function parseJsonText(text: string): DecodeResult<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { success: true, value };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: { kind: 'invalid-json', path: '', message: `Invalid JSON: ${reason}` },
    };
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectObject(
  value: unknown,
  path: string,
  message: string,
): Record<string, unknown> {
  if (!isJsonObject(value)) {
    fail('malformed-shape', path, message);
  }
  return value;
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ---------------------------------------------------------------------------
// Fields
// ---------------------------------------------------------------------------

/**
 * Read a mandatory key. An absent key and an explicit `null` are both
 * reported as a missing field.
 */
export function requiredField<T>(
  obj: Record<string, unknown>,
  key: string,
  read: Reader<T>,
  path: string,
): T {
  const fieldPath = childPath(path, key);
  const value = obj[key];
  if (value === undefined || value === null) {
    fail('missing-field', fieldPath, `Missing required field: ${key}`);
  }
  return read(value, fieldPath);
}

/** Read an optional key; absent and `null` both yield `null` */
export function optionalField<T>(
  obj: Record<string, unknown>,
  key: string,
  read: Reader<T>,
  path: string,
): T | null {
  const value = obj[key];
  if (value === undefined || value === null) {
    return null;
  }
  return read(value, childPath(path, key));
}

// ---------------------------------------------------------------------------
// Primitive readers
// ---------------------------------------------------------------------------

export const readString: Reader<string> = (value, path) => {
  if (typeof value !== 'string') {
    fail('invalid-value', path, `Expected string, got ${typeName(value)}`);
  }
  return value;
};

export const readBoolean: Reader<boolean> = (value, path) => {
  if (typeof value !== 'boolean') {
    fail('invalid-value', path, `Expected boolean, got ${typeName(value)}`);
  }
  return value;
};

export const readNumber: Reader<number> = (value, path) => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail('invalid-value', path, `Expected number, got ${typeName(value)}`);
  }
  return value;
};

export const readInteger: Reader<number> = (value, path) => {
  const n = readNumber(value, path);
  if (!Number.isInteger(n)) {
    fail('invalid-value', path, `Expected integer, got ${n}`);
  }
  return n;
};
