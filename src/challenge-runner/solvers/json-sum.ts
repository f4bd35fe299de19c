// Sums every leaf of a JSON object, descending into nested objects.
// Leaves may be integers, other numbers (truncated), integer strings or booleans.
// The sum is exact; number literals beyond 2^53 are already rounded by JSON.parse,
// so only integer strings carry larger values through unchanged.

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function leafValue(value: unknown, key: string): bigint {
  if (typeof value === 'number' && Number.isFinite(value)) return BigInt(Math.trunc(value));
  if (typeof value === 'boolean') return value ? 1n : 0n;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return BigInt(value.trim());
  throw new Error(`Value of "${key}" is not an integer: ${JSON.stringify(value)}`);
}

export function findSum(obj: JsonObject): bigint {
  let total = 0n;
  for (const [key, value] of Object.entries(obj)) {
    total += isJsonObject(value) ? findSum(value) : leafValue(value, key);
  }
  return total;
}

export function solveJsonSum(question: string): string {
  const parsed: unknown = JSON.parse(question);
  if (!isJsonObject(parsed)) {
    throw new Error('Expected a JSON object');
  }
  return findSum(parsed).toString();
}
