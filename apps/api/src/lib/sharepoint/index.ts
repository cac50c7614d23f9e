export * from './types.js'
export * from './errors.js'
export { createClientConfig, loadClientConfig } from './config.js'
export { createAzureTokenProvider } from './token-provider.js'
export { GraphTransport } from './transport.js'
export { resolveSite, resolveDrive } from './resolver.js'
export { listDocuments } from './enumerator.js'
export { listAllDocuments } from './catalog.js'
