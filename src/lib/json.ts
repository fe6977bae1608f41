import type { z } from 'zod';

import { toValidationErrorFromZod } from '../mcp/errors.js';
import { SerializationError } from './errors.js';

/**
 * Serialize a value as pretty-printed JSON. Throws SerializationError when the
 * value has no JSON form (cycles, BigInt, a bare `undefined` or function).
 */
export const encodeJson = (value: unknown): string => {
  let text: string | undefined;
  try {
    text = JSON.stringify(value, null, 2);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SerializationError(`Payload is not serializable as JSON: ${message}`, {
      cause: error,
    });
  }
  if (text === undefined) {
    throw new SerializationError(`Payload of type ${typeof value} has no JSON representation.`);
  }
  return text;
};

/**
 * Check a payload against its declared schema and serialize the parsed value.
 */
export const encodePayload = <Schema extends z.ZodType>(
  schema: Schema,
  payload: z.input<Schema>,
  label = 'payload'
): string => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const { fieldErrors } = toValidationErrorFromZod(
      `Invalid ${label}.`,
      result.error.issues
    );
    throw new SerializationError(`${label} does not match its declared shape.`, {
      fieldErrors,
    });
  }
  return encodeJson(result.data);
};

export const isJsonText = (text: string): boolean => {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
};
