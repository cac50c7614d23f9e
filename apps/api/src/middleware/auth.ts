import type { Context, Next } from 'hono'

/**
 * Middleware to verify the function key for /api endpoints
 * Accepts: x-functions-key: <FUNCTION_KEY> header, or ?code=<FUNCTION_KEY>
 *
 * If FUNCTION_KEY is not set, all requests are rejected (fail-secure).
 */
export async function requireFunctionKey(c: Context, next: Next) {
  const functionKey = process.env.FUNCTION_KEY

  if (!functionKey) {
    console.error('[AUTH] FUNCTION_KEY not configured - rejecting request')
    return c.json({ error: 'Server misconfigured: authentication not set up' }, 500)
  }

  const provided = c.req.header('x-functions-key') ?? c.req.query('code')

  if (!provided) {
    return c.json({ error: 'Unauthorized: Missing function key' }, 401)
  }

  if (provided !== functionKey) {
    return c.json({ error: 'Unauthorized: Invalid function key' }, 401)
  }

  await next()
}
