import { Hono } from 'hono'
import { logger } from 'hono/logger'

import greetings from './routes/greetings.js'
import sharepoint from './routes/sharepoint.js'
import { requireFunctionKey } from './middleware/auth.js'

const app = new Hono()

// Middleware
app.use('*', logger())

// Health check (public - no auth required)
app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }))

// Protected routes - require function key
app.use('/api/*', requireFunctionKey)

// Mount routes
app.route('/api', greetings)
app.route('/api', sharepoint)

app.onError((err, c) => {
  console.error('[API] Unhandled error:', err)
  return c.text(`An error occurred: ${err.message}`, 500)
})

export default app
