import { z } from 'zod';

const endpointListSchema = z.array(z.string().trim().min(1, 'mirror URL must not be empty'), {
  invalid_type_error: 'mirrors must be a list',
});

export type EndpointParseResult =
  | { ok: true; endpoints: string[] }
  | { ok: false; error: string };

/**
 * Validates a caller-supplied mirror list. `undefined` falls back to the
 * configured list; anything else must be an array of non-empty strings.
 */
export function parseEndpoints(
  input: unknown,
  fallback: readonly string[],
): EndpointParseResult {
  if (input === undefined) return { ok: true, endpoints: [...fallback] };

  const parsed = endpointListSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'invalid mirror list' };
  }
  return { ok: true, endpoints: parsed.data };
}
