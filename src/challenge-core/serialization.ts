import type { z } from 'zod';
import { camelizeKeys, snakifyKeys } from './case-keys';
import type { Contract } from './contracts';
import { DeserializationError } from './errors';

/**
 * Decode a JSON response body into the contract's domain type.
 *
 * @throws DeserializationError if the text is not JSON or does not match the schema
 */
export function decode<S extends z.ZodTypeAny>(raw: string, contract: Contract<S>): z.output<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DeserializationError(raw, contract.name, err);
  }

  const result = contract.schema.safeParse(snakifyKeys(parsed));
  if (!result.success) {
    throw new DeserializationError(raw, contract.name, result.error);
  }
  return result.data;
}

/**
 * Encode a domain value as the JSON text the API would send for it.
 */
export function encode<S extends z.ZodTypeAny>(value: z.output<S>, contract: Contract<S>): string {
  return JSON.stringify(camelizeKeys(contract.encode(value)));
}
