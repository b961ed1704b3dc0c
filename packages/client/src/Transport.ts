/**
 * HTTP transport for the Dynamiq REST API.
 */
import { Context, Duration, Effect, Layer } from "effect"
import { ConnectionError, InvalidConfigError, TimeoutError } from "./errors.js"
import {
  API_VERSION,
  DEFAULT_CONNECTION_TIMEOUT,
  type DynamiqClientConfig,
  type TransportRequest,
  type TransportResponse,
} from "./types.js"

// =============================================================================
// Service Definition
// =============================================================================

/**
 * Sends a single request to the broker. Performs no retry: the request
 * envelope owns the only retry layer.
 */
export class DynamiqTransport extends Context.Tag(
  `@dynamiq/client/DynamiqTransport`
)<
  DynamiqTransport,
  {
    readonly request: (
      request: TransportRequest
    ) => Effect.Effect<TransportResponse, ConnectionError | TimeoutError>
  }
>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Whether `url` is an absolute http or https URL.
 */
export const isBrokerUrl = (url: string): boolean => {
  if (!URL.canParse(url)) {
    return false
  }
  const { protocol } = new URL(url)
  return protocol === `http:` || protocol === `https:`
}

export const isPort = (port: number): boolean =>
  Number.isInteger(port) && port >= 1 && port <= 65535

/**
 * Root URL every request path is resolved against.
 */
export const buildApiRoot = (
  url: string,
  port: number
): Effect.Effect<string, InvalidConfigError> =>
  Effect.gen(function* () {
    if (!isBrokerUrl(url)) {
      return yield* new InvalidConfigError({
        field: `url`,
        message: `Expected an http or https URL, got "${url}"`,
      })
    }
    if (!isPort(port)) {
      return yield* new InvalidConfigError({
        field: `port`,
        message: `Expected a port between 1 and 65535, got ${port}`,
      })
    }
    const root = new URL(url)
    root.port = String(port)
    root.pathname = `/${API_VERSION}/`
    return root.toString()
  })

/**
 * Create the fetch-backed transport implementation.
 */
const makeDynamiqTransport = (config: DynamiqClientConfig) =>
  Effect.gen(function* () {
    const apiRoot = yield* buildApiRoot(config.url, config.port)
    const timeout = Duration.decode(
      config.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT
    )
    const fetchClient = config.fetch ?? globalThis.fetch
    const persistent = config.persistent ?? true

    const request = Effect.fn(`DynamiqTransport.request`)(
      (
        options: TransportRequest
      ): Effect.Effect<TransportResponse, ConnectionError | TimeoutError> => {
        const url = new URL(options.path, apiRoot).toString()

        const headers: Record<string, string> = { ...options.headers }
        if (!persistent) {
          headers[`connection`] = `close`
        }

        // Body is read inside the same attempt so the timeout covers it
        return Effect.tryPromise({
          try: async (signal) => {
            const response = await fetchClient(url, {
              method: options.method,
              headers,
              body: options.body,
              signal,
            })
            const body = await response.text()
            return {
              status: response.status,
              body,
              headers: Object.fromEntries(response.headers.entries()),
            }
          },
          catch: (error) =>
            new ConnectionError({
              url,
              message: `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
              cause: error,
            }),
        }).pipe(
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () =>
              new TimeoutError({
                url,
                message: `Request timed out after ${Duration.format(timeout)}`,
              }),
          })
        )
      }
    )

    return { request }
  })

/**
 * Create a layer that provides the fetch-backed transport. The transport is
 * built once and shared by every operation run against the layer.
 */
export const DynamiqTransportLive = (
  config: DynamiqClientConfig
): Layer.Layer<DynamiqTransport, InvalidConfigError> =>
  Layer.effect(DynamiqTransport, makeDynamiqTransport(config))
