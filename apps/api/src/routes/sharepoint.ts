import { Hono, type Context } from 'hono'
import {
  ConfigurationError,
  listAllDocuments,
  loadClientConfig,
  type ClientConfig,
} from '../lib/sharepoint/index.js'

const app = new Hono()

async function listSharePointDocuments(c: Context) {
  console.log('[SHAREPOINT] Document listing triggered')

  let config: ClientConfig
  try {
    config = loadClientConfig(process.env)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[SHAREPOINT] ${error.message}`)
      return c.text(error.message, 400)
    }
    throw error
  }

  const result = await listAllDocuments(config)
  if (result.status === 'success') {
    return c.json({ documents: result.documents })
  }

  console.error(`[SHAREPOINT] Listing failed (${result.status}): ${result.error.message}`)
  console.error(result.error.stack)
  return c.text(`An error occurred: ${result.error.message}`, 500)
}

// GET /api/sharepoint
app.get('/sharepoint', listSharePointDocuments)

// GET /api/sharepoint_docs_list
app.get('/sharepoint_docs_list', listSharePointDocuments)

export default app
