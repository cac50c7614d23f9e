import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z } from 'zod'

const app = new Hono()

// A repeated ?name= arrives as an array; the first value wins
const GreetingQuerySchema = z.object({
  name: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((name) => (Array.isArray(name) ? name[0] : name) ?? 'World'),
})

// An empty name or an age of 0 counts as missing
const GreetingBodySchema = z.object({
  name: z.string().min(1),
  age: z.number().int().refine((age) => age !== 0),
})

// GET /api/httpget?name=...
app.get('/httpget', zValidator('query', GreetingQuerySchema), (c) => {
  const { name } = c.req.valid('query')
  console.log(`[GREETING] Processing GET request. Name: ${name}`)
  return c.text(`Hello, ${name}!`)
})

// POST /api/httppost
app.post('/httppost', async (c) => {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.text('Invalid JSON in request body', 400)
  }

  const parsed = GreetingBodySchema.safeParse(body)
  if (!parsed.success) {
    return c.text("Please provide both 'name' and 'age' in the request body.", 400)
  }

  const { name, age } = parsed.data
  console.log(`[GREETING] Processing POST request. Name: ${name}`)
  return c.text(`Hello, ${name}! You are ${age} years old!`)
})

export default app
