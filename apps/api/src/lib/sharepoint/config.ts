import type { z } from 'zod'
import { ConfigurationError } from './errors.js'
import { ClientConfigSchema } from './schemas.js'
import type { ClientConfig } from './types.js'

export type ClientConfigInput = z.input<typeof ClientConfigSchema>

const ENV_NAMES: Record<string, string> = {
  tenantId: 'SHAREPOINT_TENANT_ID',
  siteName: 'SHAREPOINT_SITE_NAME',
  libraryName: 'SHAREPOINT_DOCUMENT_LIBRARY',
}

/**
 * Validate and freeze a client configuration.
 * Throws ConfigurationError before any network call when tenantId or siteName is missing.
 */
export function createClientConfig(input: Partial<ClientConfigInput>): ClientConfig {
  const result = ClientConfigSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = String(issue.path[0] ?? 'config')
    throw new ConfigurationError(issue.message, ENV_NAMES[field] ?? field)
  }
  return Object.freeze(result.data)
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return createClientConfig({
    tenantId: env.SHAREPOINT_TENANT_ID,
    siteName: env.SHAREPOINT_SITE_NAME,
    libraryName: env.SHAREPOINT_DOCUMENT_LIBRARY,
  })
}
