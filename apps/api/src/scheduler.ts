import cron from 'node-cron'
import { ConfigurationError, listAllDocuments, loadClientConfig } from './lib/sharepoint/index.js'

export const DOCUMENT_PROCESSOR_SCHEDULE = '0 */4 * * *'

/**
 * Walk the configured library once and log the outcome.
 * Never throws: errors are logged so the cron job keeps running.
 */
export async function runDocumentProcessor(): Promise<void> {
  console.log('[SCHEDULER] SharePoint document processor triggered')
  try {
    const result = await listAllDocuments(loadClientConfig(process.env))
    if (result.status === 'success') {
      console.log(`[SCHEDULER] Successfully processed ${result.documents.length} files`)
    } else {
      console.error(`[SCHEDULER] Document processing failed (${result.status}): ${result.error.message}`)
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[SCHEDULER] ${error.message}`)
      return
    }
    console.error('[SCHEDULER] Document processor error:', error)
  }
}

/**
 * Initialize scheduled tasks for the API server.
 * Uses node-cron for in-process scheduling.
 */
export function initScheduler() {
  cron.schedule(DOCUMENT_PROCESSOR_SCHEDULE, runDocumentProcessor)

  console.log('[SCHEDULER] Cron jobs initialized:')
  console.log('  - sharepoint-document-processor: every 4 hours')
}
