// Key-style translation between the wire (camelCase) and the domain model
// (snake_case). Only object keys are rewritten; values are left alone.

export function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

export function camelToSnake(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function transformKeys(value: unknown, rename: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => transformKeys(item, rename));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[rename(k)] = transformKeys(v, rename);
    }
    return out;
  }
  return value;
}

export function camelizeKeys(value: unknown): unknown {
  return transformKeys(value, snakeToCamel);
}

export function snakifyKeys(value: unknown): unknown {
  return transformKeys(value, camelToSnake);
}
