import { DefaultAzureCredential, type TokenCredential } from '@azure/identity'
import type { AccessToken, TokenProvider } from './types.js'

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default'

/**
 * Token provider backed by an Azure credential.
 * Uses DefaultAzureCredential (environment, managed identity, Azure CLI) unless one is given.
 */
export function createAzureTokenProvider(credential: TokenCredential = new DefaultAzureCredential()): TokenProvider {
  return {
    async getToken(): Promise<AccessToken> {
      const token = await credential.getToken(GRAPH_SCOPE)
      if (!token) {
        throw new Error(`Credential returned no token for scope ${GRAPH_SCOPE}`)
      }
      return { value: token.token, expiresAt: token.expiresOnTimestamp }
    },
  }
}
