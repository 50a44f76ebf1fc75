import type { ContextValue } from '../core/types.js';
import { fromJson, NULL_VALUE } from './context-value.js';

const NUMERIC_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const LEADING_NUMBER_RE = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const INTEGER_TOKEN_RE = /^-?\d+$/;
const SIGNED_DIGITS_RE = /^[+-]?\d+$/;

/**
 * Converts a raw input into a typed value, then applies the declared type as an
 * authoritative cast. Pure; never throws.
 */
export function coerceContextValue(raw: unknown, dataType?: string): ContextValue {
  const value = typeof raw === 'string' ? coerceText(raw) : fromJson(raw);
  return dataType ? castByDataType(value, dataType) : value;
}

/** Generic pass for textual input: JSON, then literals, then numbers, then trimmed text. */
export function coerceText(raw: string): ContextValue {
  const trimmed = raw.trim();

  const decoded = tryParseJson(trimmed);
  if (decoded.ok) {
    if (typeof decoded.value === 'number') {
      if (INTEGER_TOKEN_RE.test(trimmed) && !Number.isSafeInteger(decoded.value)) return { type: 'string', value: trimmed };
      return INTEGER_TOKEN_RE.test(trimmed) ? { type: 'integer', value: decoded.value } : { type: 'float', value: decoded.value };
    }
    return fromJson(decoded.value);
  }

  const lower = trimmed.toLowerCase();
  if (lower === 'true') return { type: 'boolean', value: true };
  if (lower === 'false') return { type: 'boolean', value: false };
  if (lower === 'null') return NULL_VALUE;

  if (NUMERIC_RE.test(trimmed)) {
    const n = Number(trimmed);
    // Digit runs past 2^53 would lose precision as numbers.
    if (SIGNED_DIGITS_RE.test(trimmed) && !Number.isSafeInteger(n)) return { type: 'string', value: trimmed };
    return trimmed.includes('.') ? { type: 'float', value: n } : { type: 'integer', value: Math.trunc(n) };
  }

  return { type: 'string', value: trimmed };
}

export function castByDataType(value: ContextValue, dataType: string): ContextValue {
  // Absent stays absent whatever the declared type.
  if (value.type === 'null') return value;
  const t = dataType.toLowerCase();

  if (t.startsWith('bool')) return { type: 'boolean', value: toBoolean(value) };
  if (t.startsWith('int')) {
    if (isStructured(value)) return value;
    return { type: 'integer', value: toInteger(value) };
  }
  if (t.startsWith('float') || t === 'decimal') {
    if (isStructured(value)) return value;
    return { type: 'float', value: toFloat(value) };
  }
  if (t === 'list' && value.type === 'string') {
    const items = value.value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .map((s): ContextValue => ({ type: 'string', value: s }));
    return { type: 'list', items };
  }
  return value;
}

function isStructured(value: ContextValue): boolean {
  return value.type === 'list' || value.type === 'map' || value.type === 'entity';
}

function toBoolean(value: ContextValue): boolean {
  switch (value.type) {
    case 'boolean':
      return value.value;
    case 'integer':
    case 'float':
      return value.value !== 0;
    case 'string':
      return value.value !== '' && value.value !== '0';
    case 'list':
      return value.items.length > 0;
    case 'map':
      return Object.keys(value.entries).length > 0;
    case 'entity':
      return true;
    case 'null':
      return false;
  }
}

function toFloat(value: ContextValue): number {
  switch (value.type) {
    case 'integer':
    case 'float':
      return value.value;
    case 'boolean':
      return value.value ? 1 : 0;
    case 'string': {
      const m = LEADING_NUMBER_RE.exec(value.value);
      if (!m) return 0;
      const n = Number(m[0]);
      return Number.isFinite(n) ? n : 0;
    }
    default:
      return 0;
  }
}

function toInteger(value: ContextValue): number {
  return Math.trunc(toFloat(value));
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text === '') return { ok: false };
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
