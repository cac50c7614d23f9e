import { serve } from '@hono/node-server'

import app from './app.js'
import { initScheduler } from './scheduler.js'

// Start server
const port = parseInt(process.env.PORT || '7071', 10)

serve({
  fetch: app.fetch,
  port,
}, (info) => {
  console.log(`🚀 SharePoint document API running on http://localhost:${info.port}`)

  // Scheduled document processing is opt-in
  if (process.env.ENABLE_SCHEDULER === 'true') {
    initScheduler()
  }
})
