import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { z } from 'zod';
import type { AppEnv } from './env.js';

/**
 * Reads and validates a JSON request body
 *
 * @throws {HTTPException} 400 with `invalidMessage` when the body is not JSON or does not match
 */
export const readJsonBody = async <S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
  invalidMessage: string,
): Promise<z.infer<S>> => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new HTTPException(400, { message: 'Request body must be valid JSON.' });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new HTTPException(400, { message: invalidMessage });
  }
  return result.data;
};
