import { err, ok, type Result } from 'neverthrow';

import { DecodeError, type JsonSchema } from '../types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * UTF-8 JSON. Non-ASCII characters and slashes are written as-is.
 */
export const encodeJson = (value: unknown): Uint8Array => {
  const text = JSON.stringify(value);
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} cannot be encoded as JSON`);
  }
  return encoder.encode(text);
};

export const decodeText = (bytes: Uint8Array): Result<string, DecodeError> => {
  try {
    return ok(decoder.decode(bytes));
  } catch (error) {
    return err(new DecodeError('Response body is not valid UTF-8', [], { cause: error }));
  }
};

export function decodeJson(bytes: Uint8Array): Result<unknown, DecodeError>;
export function decodeJson<T>(bytes: Uint8Array, schema: JsonSchema<T>): Result<T, DecodeError>;
export function decodeJson<T>(bytes: Uint8Array, schema?: JsonSchema<T>): Result<unknown, DecodeError> {
  return decodeText(bytes).andThen((text) => {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new DecodeError(`Response body is not valid JSON: ${reason}`, [], { cause: error }));
    }

    if (!schema) {
      return ok(data);
    }

    const parseResult = schema.safeParse(data);
    if (!parseResult.success) {
      const issues = parseResult.error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path.join('.'),
      }));
      const summary = issues
        .slice(0, 5)
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ');
      return err(new DecodeError(`Response validation failed: ${summary}`, issues));
    }

    return ok(parseResult.data);
  });
}
