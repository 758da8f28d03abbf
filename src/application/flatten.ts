import type { FlatValue, NormalizedRecord, ObjectProperties } from '../domain/index.js';

const SEPARATOR = '.';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Flattens nested properties into a single-level map keyed by dotted path.
 *
 * `{ user: { name: 'a', tags: ['x'] } }` becomes
 * `{ 'user.name': 'a', 'user.tags': ['x'] }`. Arrays are leaves and are
 * kept as-is. Dates become ISO strings. Empty nested objects vanish.
 *
 * Throws on values that have no JSON representation (functions, symbols,
 * bigints, class instances) so the caller can exclude the record.
 */
export function flattenProperties(properties: ObjectProperties): NormalizedRecord {
  const out: NormalizedRecord = {};
  visit(out, properties, '', new Set());
  return out;
}

function visit(
  out: NormalizedRecord,
  node: Record<string, unknown>,
  prefix: string,
  seen: Set<object>,
): void {
  if (seen.has(node)) {
    throw new TypeError(`Circular reference at "${prefix || '<root>'}"`);
  }
  seen.add(node);

  for (const [key, value] of Object.entries(node)) {
    const path = prefix + key;
    if (isPlainObject(value)) {
      visit(out, value, path + SEPARATOR, seen);
      continue;
    }
    out[path] = toLeaf(path, value);
  }

  seen.delete(node);
}

function toLeaf(path: string, value: unknown): FlatValue {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      // JSON has no NaN/Infinity
      return Number.isFinite(value) ? value : null;
    case 'object':
      if (Array.isArray(value)) return value;
      break;
    default:
      break;
  }

  throw new TypeError(`Unsupported value of type ${describe(value)} at "${path}"`);
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
