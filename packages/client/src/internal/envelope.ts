/**
 * Request envelope: bounded retry plus classification of the last status.
 */
import { Effect, Option, Schema } from "effect"
import {
  ParseError,
  RequestFailedError,
  type StatusError,
  type TransportError,
} from "../errors.js"
import { ErrorBody, type TransportRequest, type TransportResponse } from "../types.js"
import { retryUntil, type TerminalStatuses } from "./retry.js"

/**
 * How one operation treats the statuses it can observe.
 */
export interface StatusPolicy<E extends StatusError> {
  readonly terminal: TerminalStatuses
  readonly success: number
  /**
   * Recognized non-success statuses and the error each one signals.
   */
  readonly failures?: Readonly<
    Partial<Record<number, (path: string, body: string) => E>>
  >
  /**
   * Error for any other status.
   */
  readonly fallback: (path: string, status: number, body: string) => E
}

export const requestFailed = (
  path: string,
  status: number,
  body: string
): RequestFailedError => new RequestFailedError({ path, status, body })

/**
 * Server-supplied `error` field of a failure body, or the raw body.
 */
export const errorMessage = (body: string): string =>
  Schema.decodeUnknownOption(Schema.parseJson(ErrorBody))(body).pipe(
    Option.map(({ error }) => error),
    Option.getOrElse(() => body)
  )

/**
 * Map a terminal (or retry-exhausted) response onto success or a typed error.
 */
export const classify = <E extends StatusError>(
  path: string,
  response: TransportResponse,
  policy: StatusPolicy<E>
): Effect.Effect<TransportResponse, E> => {
  if (response.status === policy.success) {
    return Effect.succeed(response)
  }
  const recognized = policy.failures?.[response.status]
  if (recognized) {
    return Effect.fail(recognized(path, response.body))
  }
  return Effect.fail(policy.fallback(path, response.status, response.body))
}

/**
 * Send a request through the envelope: retry while the status is not
 * terminal, then classify whatever response came last.
 */
export const send = <E extends StatusError, R>(
  transport: (
    request: TransportRequest
  ) => Effect.Effect<TransportResponse, TransportError, R>,
  retryCount: number,
  request: TransportRequest,
  policy: StatusPolicy<E>
): Effect.Effect<TransportResponse, TransportError | E, R> =>
  retryUntil(transport(request), policy.terminal, retryCount).pipe(
    Effect.flatMap((response) => classify(request.path, response, policy)),
    Effect.annotateLogs({ method: request.method, path: request.path })
  )

/**
 * Decode a success body as JSON of the given shape.
 */
export const decodeBody = <A, I>(
  schema: Schema.Schema<A, I>,
  path: string,
  body: string
): Effect.Effect<A, ParseError> =>
  Schema.decodeUnknown(Schema.parseJson(schema))(body).pipe(
    Effect.mapError((error) => new ParseError({ path, message: error.message }))
  )
