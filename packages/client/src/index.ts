/**
 * Effect-based client for the Dynamiq message-queue broker.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect"
 * import { DynamiqClient, DynamiqClientLiveNode } from "@dynamiq/client"
 *
 * const program = Effect.gen(function* () {
 *   const client = yield* DynamiqClient
 *
 *   yield* client.createTopic("orders")
 *   yield* client.createQueue("billing")
 *   yield* client.subscribeQueue("orders", "billing")
 *
 *   yield* client.publish("orders", JSON.stringify({ id: 1 }))
 *
 *   const messages = yield* client.receive("billing", 20)
 *   yield* client.acknowledgeMany("billing", messages.map((m) => m.id))
 * }).pipe(
 *   Effect.catchTag("AlreadyExistsError", () => Effect.void)
 * )
 *
 * Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(
 *       DynamiqClientLiveNode({ url: "http://localhost", port: 8081 })
 *     )
 *   )
 * )
 * ```
 *
 * @module
 */

// =============================================================================
// Main Client
// =============================================================================

export {
  DynamiqClient,
  DynamiqClientLive,
  DynamiqClientLiveNode,
  DynamiqClientFromConfig,
  DynamiqClientFromEnv,
} from "./DynamiqClient.js"

// =============================================================================
// Transport
// =============================================================================

export {
  DynamiqTransport,
  DynamiqTransportLive,
  buildApiRoot,
  isBrokerUrl,
  isPort,
} from "./Transport.js"

// =============================================================================
// Configuration
// =============================================================================

export {
  DynamiqConfig,
  dynamiqConfig,
  type DynamiqConfigShape,
} from "./Config.js"

// =============================================================================
// Errors
// =============================================================================

export {
  ConnectionError,
  TimeoutError,
  AlreadyExistsError,
  NotFoundError,
  InvalidArgumentError,
  RequestFailedError,
  DeliveryError,
  AcknowledgementError,
  ParseError,
  InvalidConfigError,
  type TransportError,
  type StatusError,
  type ClientError,
} from "./errors.js"

// =============================================================================
// Types
// =============================================================================

export {
  API_VERSION,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONNECTION_TIMEOUT,
  DEFAULT_RETRY_COUNT,
  PublishResult,
  QueueConfiguration,
  QueueDetails,
  ReceivedMessage,
  type DynamiqClientConfig,
  type HttpMethod,
  type TransportRequest,
  type TransportResponse,
} from "./types.js"

// =============================================================================
// Internal Utilities (for advanced use)
// =============================================================================

export {
  classify,
  decodeBody,
  errorMessage,
  send,
  type StatusPolicy,
} from "./internal/envelope.js"

export {
  isTerminal,
  retryUntil,
  type TerminalStatuses,
} from "./internal/retry.js"
