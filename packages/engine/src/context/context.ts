/**
 * The shared context store.
 *
 * A nested mapping threaded by reference through every action execution.
 * It is the namespace templates render against and that import_context
 * actions merge into. Keys are identifier-safe strings or non-negative
 * integers (stored as their decimal string).
 *
 * Numeric keys resolve with floor semantics per nesting level: asking for
 * `fonts.3` when only `1` and `2` exist yields the value at `2`.
 */

import { ConfigurationError } from '../errors.js';
import { isRecord } from '../utils/guards.js';

export type ContextScalar = string | number | boolean | null;
export type ContextValue = ContextScalar | ContextValue[] | Context;

const KEY_PATTERN = /^(?:[A-Za-z_][A-Za-z0-9_]*|\d+)$/;
const NUMERIC_KEY = /^\d+$/;

export function isValidContextKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}


export class Context {
  private readonly entries: Map<string, ContextValue> = new Map();
  /** Sorted numeric keys present at this level, kept for floor lookups */
  private numericKeys: number[] = [];

  constructor(content?: Context | Record<string, unknown>) {
    if (content !== undefined) {
      this.merge(content);
    }
  }

  /** Convert arbitrary parsed YAML/JSON into a context value */
  static toValue(value: unknown): ContextValue {
    if (value instanceof Context) return value;
    if (value === undefined || value === null) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map((item) => Context.toValue(item));
    if (isRecord(value)) return new Context(value);
    return String(value);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  has(key: string | number): boolean {
    return this.entries.has(String(key));
  }

  set(key: string | number, value: unknown): void {
    const normalized = String(key);
    if (!isValidContextKey(normalized)) {
      throw new ConfigurationError(`Invalid context key "${normalized}"`);
    }
    if (NUMERIC_KEY.test(normalized) && !this.entries.has(normalized)) {
      this.numericKeys.push(Number(normalized));
      this.numericKeys.sort((a, b) => a - b);
    }
    this.entries.set(normalized, Context.toValue(value));
  }

  delete(key: string | number): boolean {
    const normalized = String(key);
    if (NUMERIC_KEY.test(normalized)) {
      this.numericKeys = this.numericKeys.filter((n) => n !== Number(normalized));
    }
    return this.entries.delete(normalized);
  }

  /**
   * Look up a key at this level.
   * An absent integer key falls back to the greatest numeric key below it.
   */
  get(key: string | number): ContextValue | undefined {
    const normalized = String(key);
    const hit = this.entries.get(normalized);
    if (hit !== undefined || !NUMERIC_KEY.test(normalized)) {
      return hit;
    }

    const floorKey = this.floorKey(Number(normalized));
    return floorKey === undefined ? undefined : this.entries.get(String(floorKey));
  }

  /** Nested Context under `key`, if the value there is a section */
  section(key: string | number): Context | undefined {
    const value = this.get(key);
    return value instanceof Context ? value : undefined;
  }

  /** Resolve a dotted reference such as `fonts.3` or `colors.primary` */
  resolve(reference: string): ContextValue | undefined {
    const parts = reference.split('.').filter((part) => part.length > 0);
    let current: ContextValue | undefined = this;

    for (const part of parts) {
      if (current instanceof Context) {
        current = current.get(part);
      } else if (Array.isArray(current) && NUMERIC_KEY.test(part)) {
        current = current[Number(part)];
      } else {
        return undefined;
      }
    }

    return current;
  }

  /**
   * Deep-update this context with `other`.
   * Sections present on both sides are merged recursively; everything else
   * is overwritten.
   */
  merge(other: Context | Record<string, unknown>): void {
    const pairs: Array<[string, unknown]> =
      other instanceof Context ? other.keys().map((k) => [k, other.entries.get(k)]) : Object.entries(other);

    for (const [key, incoming] of pairs) {
      const existing = this.entries.get(key);
      if (existing instanceof Context && (incoming instanceof Context || isRecord(incoming))) {
        existing.merge(incoming);
      } else {
        this.set(key, incoming);
      }
    }
  }

  /** Plain-object snapshot, suitable for YAML/JSON serialization */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      result[key] = plain(value);
    }
    return result;
  }

  /**
   * Object view handed to the template renderer.
   * Nested sections become proxies so subscript lookups like
   * `fonts[3]` get the same floor resolution as `get()`.
   */
  toRenderable(): Record<string, unknown> {
    const target: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      target[key] = renderable(value);
    }

    const numericKeys = [...this.numericKeys];
    return new Proxy(target, {
      get(obj, prop, receiver): unknown {
        if (typeof prop === 'string' && !(prop in obj) && NUMERIC_KEY.test(prop)) {
          const floorKey = floorOf(numericKeys, Number(prop));
          return floorKey === undefined ? undefined : obj[String(floorKey)];
        }
        return Reflect.get(obj, prop, receiver);
      },
    });
  }

  private floorKey(requested: number): number | undefined {
    return floorOf(this.numericKeys, requested);
  }
}

function floorOf(sortedKeys: readonly number[], requested: number): number | undefined {
  let result: number | undefined;
  for (const key of sortedKeys) {
    if (key > requested) break;
    result = key;
  }
  return result;
}

function plain(value: ContextValue): unknown {
  if (value instanceof Context) return value.toJSON();
  if (Array.isArray(value)) return value.map(plain);
  return value;
}

function renderable(value: ContextValue): unknown {
  if (value instanceof Context) return value.toRenderable();
  if (Array.isArray(value)) return value.map(renderable);
  return value;
}
