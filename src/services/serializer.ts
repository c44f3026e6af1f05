/**
 * Serializer
 * Converts documents coming out of MongoDB (ObjectId, Date, Timestamp, Binary, ...)
 * into plain JSON-safe trees before they are written to a client channel
 */

import mongoose from 'mongoose';

export type TransportValue =
  | null
  | boolean
  | number
  | string
  | TransportValue[]
  | { [key: string]: TransportValue };

/**
 * Every kind of value the store can hand us, after classification.
 * `render` switches over this union exhaustively.
 */
export type StoreValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'map'; entries: ReadonlyArray<readonly [string, unknown]> }
  | { kind: 'datetime'; value: Date }
  | { kind: 'identifier'; text: string }
  | { kind: 'timestamp'; seconds: number; increment: number }
  | { kind: 'binary'; base64: string }
  | { kind: 'decimal'; text: string }
  | { kind: 'marker'; text: string }
  | { kind: 'reference'; collection: string; id: unknown; db?: string };

const {
  Binary,
  BSONRegExp,
  BSONSymbol,
  Code,
  DBRef,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
  UUID,
} = mongoose.mongo;

const NULL: StoreValue = { kind: 'null' };

function hasBsonTag(value: object): value is { _bsontype: string } {
  return '_bsontype' in value && typeof value._bsontype === 'string';
}

function classifyBson(value: { _bsontype: string }): StoreValue {
  if (value instanceof ObjectId) {
    return { kind: 'identifier', text: value.toHexString() };
  }
  // UUID extends Binary, so it must be checked first
  if (value instanceof UUID) {
    return { kind: 'identifier', text: value.toHexString() };
  }
  if (value instanceof Binary) {
    return { kind: 'binary', base64: value.toString('base64') };
  }
  if (value instanceof Timestamp) {
    return {
      kind: 'timestamp',
      seconds: value.getHighBitsUnsigned(),
      increment: value.getLowBitsUnsigned(),
    };
  }
  if (value instanceof Decimal128 || value instanceof Long) {
    return { kind: 'decimal', text: value.toString() };
  }
  if (value instanceof Int32 || value instanceof Double) {
    return { kind: 'number', value: value.valueOf() };
  }
  if (value instanceof MinKey) return { kind: 'marker', text: 'MinKey' };
  if (value instanceof MaxKey) return { kind: 'marker', text: 'MaxKey' };
  if (value instanceof BSONRegExp) {
    return { kind: 'marker', text: `/${value.pattern}/${value.options}` };
  }
  if (value instanceof BSONSymbol) {
    return { kind: 'marker', text: value.toString() };
  }
  if (value instanceof Code) {
    return { kind: 'marker', text: String(value.code) };
  }
  if (value instanceof DBRef) {
    return { kind: 'reference', collection: value.collection, id: value.oid, db: value.db };
  }
  return { kind: 'marker', text: String(value) };
}

/**
 * Map an arbitrary value onto the closed StoreValue union.
 */
export function classify(value: unknown): StoreValue {
  if (value === null || value === undefined) return NULL;

  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      return { kind: 'number', value };
    case 'string':
      return { kind: 'string', value };
    case 'bigint':
      return { kind: 'decimal', text: value.toString() };
    case 'function':
    case 'symbol':
      return NULL;
    default:
      break;
  }

  if (typeof value !== 'object') return NULL;

  if (value instanceof Date) return { kind: 'datetime', value };
  if (value instanceof Uint8Array) {
    return { kind: 'binary', base64: Buffer.from(value).toString('base64') };
  }
  if (Array.isArray(value)) return { kind: 'sequence', items: value };
  if (hasBsonTag(value)) return classifyBson(value);
  if (value instanceof RegExp) return { kind: 'marker', text: value.toString() };
  if (value instanceof Set) return { kind: 'sequence', items: [...value] };
  if (value instanceof Map) {
    return {
      kind: 'map',
      entries: [...value.entries()].map(([key, item]) => [String(key), item] as const),
    };
  }
  if (value instanceof mongoose.Document) {
    return { kind: 'map', entries: Object.entries(value.toObject()) };
  }
  return { kind: 'map', entries: Object.entries(value) };
}

function render(value: unknown, ancestors: Set<object>): TransportValue {
  // A container that contains itself cannot be represented as a tree
  if (typeof value === 'object' && value !== null && ancestors.has(value)) {
    return null;
  }

  const node = classify(value);
  switch (node.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'string':
      return node.value;
    case 'number':
      return Number.isFinite(node.value) ? node.value : null;
    case 'datetime':
      return Number.isNaN(node.value.getTime()) ? null : node.value.toISOString();
    case 'identifier':
    case 'decimal':
    case 'marker':
      return node.text;
    case 'binary':
      return node.base64;
    case 'timestamp':
      return `Timestamp(${node.seconds}, ${node.increment})`;
    case 'sequence':
    case 'map':
    case 'reference': {
      if (typeof value !== 'object' || value === null) return null;
      ancestors.add(value);
      try {
        if (node.kind === 'sequence') {
          return node.items.map((item) => render(item, ancestors));
        }
        if (node.kind === 'reference') {
          const ref: { [key: string]: TransportValue } = {
            $ref: node.collection,
            $id: render(node.id, ancestors),
          };
          if (node.db !== undefined) ref.$db = node.db;
          return ref;
        }
        const out: { [key: string]: TransportValue } = {};
        for (const [key, item] of node.entries) {
          out[key] = render(item, ancestors);
        }
        return out;
      } finally {
        ancestors.delete(value);
      }
    }
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

/**
 * Convert any value into a transport-safe tree of primitives, arrays and
 * string-keyed objects. Never throws.
 */
export function serialize(value: unknown): TransportValue {
  return render(value, new Set());
}
