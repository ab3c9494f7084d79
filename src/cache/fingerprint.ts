/**
 * Deterministic fingerprints for cacheable invocations.
 *
 * Inputs are first canonicalized into plain JSON values, then serialized with
 * sorted keys and hashed with sha256. Canonicalization rules:
 *
 * - object keys are sorted (by the serializer) and members holding `undefined`
 *   or functions are dropped
 * - strings and object keys are NFC-normalized
 * - `-0` becomes `0`; `NaN` and the infinities are tagged
 * - arrays keep their order
 * - `Date` becomes its ISO string, `bigint` its decimal string (both tagged)
 * - `Set` members and `Map` entries are sorted by their canonical serialization
 * - byte arrays become tagged base64
 *
 * Floats are kept as-is otherwise: `0.1 + 0.2` and `0.3` are different inputs.
 */

import { createHash } from 'node:crypto';
import stringify from 'fast-json-stable-stringify';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

const TAG = '$canonical';

function tagged(type: string, value: Canonical): Canonical {
  return { [TAG]: type, value };
}

function canonicalNumber(value: number): Canonical {
  if (Number.isNaN(value)) {
    return tagged('number', 'NaN');
  }
  if (!Number.isFinite(value)) {
    return tagged('number', value > 0 ? 'Infinity' : '-Infinity');
  }
  return Object.is(value, -0) ? 0 : value;
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function canonicalize(value: unknown, seen: Set<object>): Canonical | undefined {
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
    case 'boolean':
      return value;
    case 'number':
      return canonicalNumber(value);
    case 'string':
      return value.normalize('NFC');
    case 'bigint':
      return tagged('bigint', value.toString());
    default:
      break;
  }

  if (value === null) {
    return null;
  }

  if (typeof value !== 'object') {
    return undefined;
  }

  if (value instanceof Date) {
    return tagged('date', Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString());
  }
  if (value instanceof Uint8Array) {
    return tagged('bytes', Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64'));
  }
  if (value instanceof ArrayBuffer) {
    return tagged('bytes', Buffer.from(value).toString('base64'));
  }

  if (seen.has(value)) {
    throw new TypeError('Cannot fingerprint a circular structure');
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => canonicalize(item, seen) ?? null);
    }
    if (value instanceof Set) {
      const members = Array.from(value, (item) => canonicalize(item, seen) ?? null);
      return tagged('set', sortCanonical(members));
    }
    if (value instanceof Map) {
      const entries: Canonical[] = Array.from(value, ([key, item]) => [
        canonicalize(key, seen) ?? null,
        canonicalize(item, seen) ?? null,
      ]);
      return tagged('map', sortCanonical(entries));
    }
    if (hasToJSON(value)) {
      return canonicalize(value.toJSON(), seen);
    }

    const result: { [key: string]: Canonical } = {};
    for (const [key, item] of Object.entries(value)) {
      const canonical = canonicalize(item, seen);
      if (canonical !== undefined) {
        result[key.normalize('NFC')] = canonical;
      }
    }
    return result;
  } finally {
    seen.delete(value);
  }
}

function sortCanonical(values: Canonical[]): Canonical[] {
  return values
    .map((item) => ({ item, key: stringify(item) }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ item }) => item);
}

/**
 * Canonical serialization of an input value.
 *
 * @example
 * canonicalJson({ b: 1, a: -0 }) === canonicalJson({ a: 0, b: 1 }); // true
 */
export function canonicalJson(value: unknown): string {
  return stringify(canonicalize(value, new Set()) ?? tagged('undefined', null));
}

export interface FingerprintParts {
  /** Resource identity (dotted path and binding tier) */
  identity: string;

  input: unknown;

  /** Caller scope, only for scope-sensitive policies */
  scope?: string;
}

/**
 * Hash an invocation into a hex sha256 fingerprint.
 *
 * @throws TypeError if the input contains a circular reference
 */
export function fingerprint(parts: FingerprintParts): string {
  const material = stringify({
    identity: parts.identity,
    input: canonicalize(parts.input, new Set()) ?? tagged('undefined', null),
    ...(parts.scope !== undefined ? { scope: parts.scope } : {}),
  });
  return createHash('sha256').update(material).digest('hex');
}
