/**
 * Typed errors for the Dynamiq client using Effect's Schema.TaggedError.
 * These errors are yieldable in Effect generators and serializable.
 */
import { Schema } from "effect"

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * The broker could not be reached (connection refused, reset, DNS failure).
 */
export class ConnectionError extends Schema.TaggedError<ConnectionError>()(
  `ConnectionError`,
  {
    url: Schema.String,
    message: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  }
) {}

/**
 * The request did not complete within the configured connection timeout.
 */
export class TimeoutError extends Schema.TaggedError<TimeoutError>()(
  `TimeoutError`,
  { url: Schema.String, message: Schema.String }
) {}

// =============================================================================
// Resource Errors
// =============================================================================

/**
 * Topic or queue already exists (422 on create).
 */
export class AlreadyExistsError extends Schema.TaggedError<AlreadyExistsError>()(
  `AlreadyExistsError`,
  { path: Schema.String, message: Schema.String }
) {}

/**
 * Topic or queue does not exist (404).
 */
export class NotFoundError extends Schema.TaggedError<NotFoundError>()(
  `NotFoundError`,
  { path: Schema.String, message: Schema.String }
) {}

/**
 * An argument was rejected: by the broker (422 on receive, e.g. a batch size
 * out of range), or before sending (an empty id list, a `.` or `..` name).
 */
export class InvalidArgumentError extends Schema.TaggedError<InvalidArgumentError>()(
  `InvalidArgumentError`,
  { path: Schema.String, message: Schema.String }
) {}

// =============================================================================
// Status Errors
// =============================================================================

/**
 * Any status the operation does not recognize, with the body for diagnostics.
 */
export class RequestFailedError extends Schema.TaggedError<RequestFailedError>()(
  `RequestFailedError`,
  { path: Schema.String, status: Schema.Number, body: Schema.String }
) {}

/**
 * Publish or enqueue did not reach a success status.
 */
export class DeliveryError extends Schema.TaggedError<DeliveryError>()(
  `DeliveryError`,
  { path: Schema.String, status: Schema.Number, body: Schema.String }
) {}

/**
 * Acknowledgement did not reach a success status.
 */
export class AcknowledgementError extends Schema.TaggedError<AcknowledgementError>()(
  `AcknowledgementError`,
  { path: Schema.String, status: Schema.Number, body: Schema.String }
) {}

// =============================================================================
// Parsing Errors
// =============================================================================

/**
 * A success body was not JSON or did not have the expected shape.
 */
export class ParseError extends Schema.TaggedError<ParseError>()(
  `ParseError`,
  { path: Schema.String, message: Schema.String }
) {}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * The transport cannot be built from the given url or port.
 */
export class InvalidConfigError extends Schema.TaggedError<InvalidConfigError>()(
  `InvalidConfigError`,
  { field: Schema.String, message: Schema.String }
) {}

// =============================================================================
// Error Union Types
// =============================================================================

export type TransportError = ConnectionError | TimeoutError

/**
 * Errors a classified status can produce.
 */
export type StatusError =
  | AlreadyExistsError
  | NotFoundError
  | InvalidArgumentError
  | RequestFailedError
  | DeliveryError
  | AcknowledgementError

/**
 * Union of all client errors.
 */
export type ClientError = TransportError | StatusError | ParseError
