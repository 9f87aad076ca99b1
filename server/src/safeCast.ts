// Best-effort coercion of loosely typed values (catalog payloads, env vars,
// settings files) with a caller-supplied default on failure.

export type CastKind = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export type CastResult = {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
  array: unknown[];
  object: Record<string, unknown>;
};

const TRUTHY = new Set(['true', 'yes', '1', 'y', 't']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

const EMPTY: { [K in CastKind]: () => CastResult[K] } = {
  string: () => '',
  number: () => 0,
  integer: () => 0,
  boolean: () => false,
  array: () => [],
  object: () => ({}),
};

const CONVERTERS: { [K in CastKind]: (value: unknown) => CastResult[K] | undefined } = {
  string: value => {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
    return undefined;
  },
  number: toNumber,
  integer: value => {
    if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : undefined;
    // "3.5" is not an integer literal
    if (typeof value === 'string' && !/^\s*[-+]?\d+\s*$/.test(value)) return undefined;
    return toNumber(value);
  },
  boolean: value => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return TRUTHY.has(value.trim().toLowerCase());
    if (typeof value === 'number') return value !== 0;
    return undefined;
  },
  array: value => {
    if (Array.isArray(value)) return value;
    if (typeof value === 'string') return Array.from(value);
    return undefined;
  },
  object: value => (isRecord(value) ? value : undefined),
};

/**
 * Casts `value` to `kind`. `null` and `undefined` become the kind's empty
 * value; anything that cannot be converted yields `fallback`.
 */
export function safeCast<K extends CastKind>(kind: K, value: unknown): CastResult[K] | null;
export function safeCast<K extends CastKind>(kind: K, value: unknown, fallback: CastResult[K]): CastResult[K];
export function safeCast<K extends CastKind>(kind: K, value: unknown, fallback: CastResult[K] | null = null): CastResult[K] | null {
  if (value === null || value === undefined) return EMPTY[kind]();
  const converted = CONVERTERS[kind](value);
  return converted === undefined ? fallback : converted;
}
