import { createHash } from 'blake3';

const textEncoder = new TextEncoder();

export const bytesToHex = (bytes: Uint8Array): string => {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += bytes[i].toString(16).padStart(2, '0');
  }
  return result;
};

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

const canonicalNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

const compareKeys = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Converts an arbitrary value into its canonical form: object keys sorted,
 * `undefined` members dropped (or `null` inside arrays), Maps flattened into
 * sorted objects, `-0` folded into `0`.
 */
export const toCanonicalValue = (value: unknown, inArray = false): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return inArray ? null : undefined;
    case 'number':
      return canonicalNumber(value);
    case 'string':
    case 'boolean':
      return value;
    case 'bigint':
      throw new TypeError('Canonical JSON does not support bigint values');
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => toCanonicalValue(entry, true) ?? null);
  }
  if (value instanceof Map) {
    const entries = Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]);
    entries.sort(([a], [b]) => compareKeys(a, b));
    const result: Record<string, CanonicalValue> = {};
    for (const [key, raw] of entries) {
      const entry = toCanonicalValue(raw);
      if (entry !== undefined) {
        result[key] = entry;
      }
    }
    return result;
  }
  if (value instanceof Set) {
    return Array.from(value)
      .map((entry) => toCanonicalValue(entry, true) ?? null)
      .sort((a, b) => compareKeys(JSON.stringify(a), JSON.stringify(b)));
  }
  if (typeof value !== 'object') {
    return undefined;
  }
  const fields = new Map<string, unknown>(Object.entries(value));
  const result: Record<string, CanonicalValue> = {};
  for (const key of Array.from(fields.keys()).sort(compareKeys)) {
    const entry = toCanonicalValue(fields.get(key));
    if (entry !== undefined) {
      result[key] = entry;
    }
  }
  return result;
};

const stringify = (value: CanonicalValue, indent: string | undefined, depth: number): string => {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  const pad = indent === undefined ? '' : `\n${indent.repeat(depth + 1)}`;
  const close = indent === undefined ? '' : `\n${indent.repeat(depth)}`;
  const separator = indent === undefined ? ':' : ': ';
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }
    const parts = value.map((entry) => `${pad}${stringify(entry, indent, depth + 1)}`);
    return `[${parts.join(',')}${close}]`;
  }
  // integer-like keys would otherwise enumerate in numeric order
  const keys = Object.keys(value).sort(compareKeys);
  if (keys.length === 0) {
    return '{}';
  }
  const parts = keys.map(
    (key) => `${pad}${JSON.stringify(key)}${separator}${stringify(value[key], indent, depth + 1)}`,
  );
  return `{${parts.join(',')}${close}}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const canonical = toCanonicalValue(value) ?? null;
  const indent =
    typeof options.indent === 'number' && options.indent > 0
      ? ' '.repeat(Math.min(Math.floor(options.indent), 10))
      : undefined;
  return stringify(canonical, indent, 0);
};

export const hashCanonicalJsonString = (json: string): string =>
  bytesToHex(createHash().update(textEncoder.encode(json)).digest());

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
