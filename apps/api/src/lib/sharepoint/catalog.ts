import { createClientConfig } from './config.js'
import { ListingError, ResolutionError, TransportError } from './errors.js'
import { listDocuments } from './enumerator.js'
import { resolveDrive, resolveSite } from './resolver.js'
import { createAzureTokenProvider } from './token-provider.js'
import { GraphTransport } from './transport.js'
import type { CatalogResult, ClientConfig, DocumentRecord, TokenProvider, Transport } from './types.js'

export interface CatalogDependencies {
  tokenProvider?: TokenProvider
  transport?: Transport
}

function isValidDocument(document: DocumentRecord): boolean {
  const missingFields = [
    ...(document.id ? [] : ['id']),
    ...(document.name ? [] : ['name']),
  ]
  if (missingFields.length > 0) {
    console.warn(
      `[CATALOG] Incomplete document metadata. Missing fields: ${missingFields.join(', ')}. ` +
        `Document data: ${JSON.stringify(document)}`
    )
    return false
  }

  const fullPath = document.path ? `${document.path}/${document.name}` : document.name
  console.log(
    `[CATALOG] Found document: ${fullPath} (ID: ${document.id}, Size: ${document.sizeBytes} bytes, URL: ${document.webUrl})`
  )
  return true
}

/**
 * List every document in the configured library.
 *
 * Site and drive are resolved on every call and each call gets its own transport
 * (and token) unless one is injected. Records without an id or name are dropped.
 * The config is checked again first, so untyped callers get a ConfigurationError
 * before any request is made.
 */
export async function listAllDocuments(input: ClientConfig, deps: CatalogDependencies = {}): Promise<CatalogResult> {
  const config = createClientConfig(input)
  const transport =
    deps.transport ?? new GraphTransport({ tokenProvider: deps.tokenProvider ?? createAzureTokenProvider() })

  try {
    const siteId = await resolveSite(transport, config.tenantId, config.siteName)
    const driveId = await resolveDrive(transport, siteId, config.libraryName)
    const documents = (await listDocuments(transport, siteId, driveId)).filter(isValidDocument)

    console.log(`[CATALOG] Processed ${documents.length} documents`)
    return { status: 'success', documents }
  } catch (error) {
    if (error instanceof ResolutionError) {
      return { status: 'resolution_failure', error }
    }
    if (error instanceof ListingError) {
      return { status: 'listing_failure', error }
    }
    if (error instanceof TransportError) {
      return { status: 'transport_failure', error }
    }
    throw error
  }
}
