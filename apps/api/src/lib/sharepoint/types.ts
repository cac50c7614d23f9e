/**
 * Types shared by the SharePoint document catalog
 */
import type { z } from 'zod'
import type { ClientConfigSchema, DriveIdSchema, SiteIdSchema } from './schemas.js'
import type { ListingError, ResolutionError, TransportError } from './errors.js'

export const DEFAULT_LIBRARY_NAME = 'Documents'

/** Only produced by createClientConfig / loadClientConfig */
export type ClientConfig = Readonly<z.output<typeof ClientConfigSchema>>

export interface AccessToken {
  readonly value: string
  /** Epoch milliseconds */
  readonly expiresAt: number
}

export interface TokenProvider {
  getToken(): Promise<AccessToken>
}

export type SiteId = z.infer<typeof SiteIdSchema>
export type DriveId = z.infer<typeof DriveIdSchema>

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type QueryParams = Record<string, string | number>

export interface Transport {
  execute(method: HttpMethod, endpoint: string, query?: QueryParams, body?: unknown): Promise<unknown>
}

export interface DocumentRecord {
  readonly id: string
  readonly name: string
  /** Folder path relative to the library root, '' for root-level files */
  readonly path: string
  readonly sizeBytes: number
  readonly webUrl: string
}

export interface FolderTask {
  path: string
}

export type CatalogResult =
  | { status: 'success'; documents: DocumentRecord[] }
  | { status: 'resolution_failure'; error: ResolutionError }
  | { status: 'listing_failure'; error: ListingError }
  | { status: 'transport_failure'; error: TransportError }
