import type { z } from 'zod';

type SafeParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Validate a request body. A missing body validates as an empty object,
 * so schemas with defaults accept it.
 */
export function parseRequestBody<T extends z.ZodType>(
  body: unknown,
  schema: T,
): SafeParseResult<z.output<T>> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: result.data };
}
