import {
  AuthenticationHandler,
  Client,
  HTTPMessageHandler,
  type AuthenticationProvider,
} from '@microsoft/microsoft-graph-client'
import { TransportError } from './errors.js'
import type { AccessToken, HttpMethod, QueryParams, TokenProvider, Transport } from './types.js'

export const GRAPH_API_ENDPOINT = 'https://graph.microsoft.com/v1.0'

export const REQUEST_TIMEOUT_MS = 30_000
export const TOKEN_REFRESH_MARGIN_MS = 300_000
export const MAX_ATTEMPTS = 3
export const INITIAL_RETRY_DELAY_MS = 1_000

export interface GraphTransportOptions {
  tokenProvider: TokenProvider
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const status = 'statusCode' in error && typeof error.statusCode === 'number' ? `${error.statusCode} ` : ''
    return `${status}${error.message}`
  }
  return String(error)
}

/**
 * Authenticated Microsoft Graph calls with bounded retry.
 *
 * The transport is its own AuthenticationProvider: the Graph client asks it for a
 * bearer token on every attempt, and the token is refreshed when it is missing or
 * within TOKEN_REFRESH_MARGIN_MS of expiry. The middleware chain has no RetryHandler;
 * `execute` owns the retry policy.
 *
 * One instance per logical request; token state is not synchronized.
 */
export class GraphTransport implements Transport, AuthenticationProvider {
  private readonly client: Client
  private readonly tokenProvider: TokenProvider
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private token: AccessToken | null = null

  constructor(options: GraphTransportOptions) {
    this.tokenProvider = options.tokenProvider
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.client = Client.initWithMiddleware({
      middleware: [new AuthenticationHandler(this), new HTTPMessageHandler()],
    })
  }

  async getAccessToken(): Promise<string> {
    if (this.token === null || this.now() >= this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
      console.log('[GRAPH] Getting new access token')
      this.token = await this.tokenProvider.getToken()
      console.log(`[GRAPH] Token acquired, expires at: ${new Date(this.token.expiresAt).toISOString()}`)
    }
    return this.token.value
  }

  async execute(method: HttpMethod, endpoint: string, query?: QueryParams, body?: unknown): Promise<unknown> {
    const url = `${GRAPH_API_ENDPOINT}${endpoint}`
    let retryDelay = INITIAL_RETRY_DELAY_MS
    let lastError: unknown

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        console.log(`[GRAPH] Making ${method} request to ${url} with params: ${JSON.stringify(query ?? null)}`)
        return await this.send(method, endpoint, query, body)
      } catch (error) {
        lastError = error
        if (attempt < MAX_ATTEMPTS) {
          console.warn(
            `[GRAPH] Request failed (attempt ${attempt}/${MAX_ATTEMPTS}): ${describeError(error)}. ` +
              `Retrying in ${retryDelay / 1000} seconds...`
          )
          await this.sleep(retryDelay)
          retryDelay *= 2
        }
      }
    }

    console.error(`[GRAPH] Request failed after ${MAX_ATTEMPTS} attempts: ${describeError(lastError)}`)
    throw new TransportError(
      `${method} ${endpoint} failed after ${MAX_ATTEMPTS} attempts: ${describeError(lastError)}`,
      { cause: lastError }
    )
  }

  private send(method: HttpMethod, endpoint: string, query: QueryParams | undefined, body: unknown): Promise<unknown> {
    let request = this.client
      .api(endpoint)
      .header('Content-Type', 'application/json')
      .options({ signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) })
    if (query) {
      request = request.query(query)
    }

    switch (method) {
      case 'GET':
        return request.get()
      case 'POST':
        return request.post(body)
      case 'PUT':
        return request.put(body)
      case 'PATCH':
        return request.patch(body)
      case 'DELETE':
        return request.delete()
    }
  }
}
