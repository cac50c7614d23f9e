/**
 * Error taxonomy for the SharePoint document catalog
 */

export class ConfigurationError extends Error {
  constructor(message: string, readonly setting: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

// Retries exhausted; `cause` holds the last underlying failure
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

export class ResolutionError extends Error {
  readonly response: unknown
  readonly availableDrives?: string[]

  constructor(message: string, details: { response: unknown; availableDrives?: string[] }) {
    super(message)
    this.name = 'ResolutionError'
    this.response = details.response
    this.availableDrives = details.availableDrives
  }
}

export class ListingError extends Error {
  constructor(message: string, readonly folderPath: string) {
    super(message)
    this.name = 'ListingError'
  }
}
