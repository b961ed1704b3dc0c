/**
 * Type definitions and wire schemas for the Dynamiq client.
 */
import { Schema } from "effect"
import type { Duration } from "effect"

// =============================================================================
// Constants
// =============================================================================

/**
 * API version path segment prefixed to every request.
 */
export const API_VERSION = `v1`

export const DEFAULT_CONNECTION_TIMEOUT: Duration.DurationInput = `2 seconds`

/**
 * Attempts made after the first one.
 */
export const DEFAULT_RETRY_COUNT = 2

export const DEFAULT_BATCH_SIZE = 10

// =============================================================================
// Client Options
// =============================================================================

/**
 * Configuration for the Dynamiq client, supplied at construction time.
 */
export interface DynamiqClientConfig {
  /**
   * Scheme and host of the broker, e.g. `http://dynamiq.local`.
   */
  readonly url: string

  readonly port: number

  /**
   * Per-request timeout enforced by the transport (default 2 seconds).
   */
  readonly connectionTimeout?: Duration.DurationInput

  /**
   * Number of attempts after the first when a response status is not
   * terminal for the operation (default 2).
   */
  readonly retryCount?: number

  /**
   * Keep connections alive between requests (default true).
   */
  readonly persistent?: boolean

  /**
   * Fetch implementation used by the transport (default `globalThis.fetch`).
   */
  readonly fetch?: typeof globalThis.fetch
}

// =============================================================================
// Transport Types
// =============================================================================

export type HttpMethod = `GET` | `PUT` | `PATCH` | `DELETE`

/**
 * A request relative to the versioned API root.
 */
export interface TransportRequest {
  readonly method: HttpMethod
  /**
   * Path below `/v1/`, e.g. `queues/orders/messages/10`.
   */
  readonly path: string
  readonly body?: string | Uint8Array
  readonly headers?: Record<string, string>
}

export interface TransportResponse {
  readonly status: number
  readonly body: string
  readonly headers: Record<string, string>
}

// =============================================================================
// Wire Schemas
// =============================================================================

/**
 * Queue settings accepted by `configureQueue`. Encoded to the broker's
 * snake_case keys; unset fields are left out of the body.
 */
export const QueueConfiguration = Schema.Struct({
  /**
   * Seconds a received message stays invisible before it is served again.
   */
  visibilityTimeout: Schema.optional(Schema.Number).pipe(
    Schema.fromKey(`visibility_timeout`)
  ),
  /**
   * Minimum number of partitions the queue serves messages from.
   */
  minPartitions: Schema.optional(Schema.Number).pipe(
    Schema.fromKey(`min_partitions`)
  ),
  /**
   * Maximum number of partitions the queue serves messages from.
   */
  maxPartitions: Schema.optional(Schema.Number).pipe(
    Schema.fromKey(`max_partitions`)
  ),
})

export type QueueConfiguration = typeof QueueConfiguration.Type

/**
 * A message returned by `receive`.
 */
export const ReceivedMessage = Schema.Struct({
  id: Schema.String,
  body: Schema.String,
})

export type ReceivedMessage = typeof ReceivedMessage.Type

export const ReceivedMessages = Schema.Array(ReceivedMessage)

/**
 * Message id assigned by each subscribed queue, keyed by queue name.
 */
export const PublishResult = Schema.Record({
  key: Schema.String,
  value: Schema.String,
})

export type PublishResult = typeof PublishResult.Type

export const SubscribeResponse = Schema.Struct({
  Queues: Schema.Array(Schema.String),
})

export const QueueListResponse = Schema.Struct({
  queues: Schema.Array(Schema.String),
})

export const TopicListResponse = Schema.Struct({
  topics: Schema.Array(Schema.String),
})

/**
 * Queue details are passed through as the broker reports them.
 */
export const QueueDetails = Schema.Record({
  key: Schema.String,
  value: Schema.Unknown,
})

export type QueueDetails = typeof QueueDetails.Type

/**
 * Body of a 422 response: `{ "error": "..." }`.
 */
export const ErrorBody = Schema.Struct({
  error: Schema.String,
})
