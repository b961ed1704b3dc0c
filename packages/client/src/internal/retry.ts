/**
 * Bounded status-driven retry for the request envelope.
 */
import { Effect } from "effect"
import type { TransportResponse } from "../types.js"

/**
 * Statuses that stop the retry loop for one operation.
 */
export type TerminalStatuses = ReadonlyArray<number>

export const isTerminal = (
  terminal: TerminalStatuses,
  status: number
): boolean => terminal.includes(status)

/**
 * Run `attempt` until its status is terminal or `retryCount` further attempts
 * have been made, returning the last response either way.
 *
 * Failures of `attempt` (connection, timeout) are not retried: they end the
 * loop and propagate as they are.
 */
export const retryUntil = <E, R>(
  attempt: Effect.Effect<TransportResponse, E, R>,
  terminal: TerminalStatuses,
  retryCount: number
): Effect.Effect<TransportResponse, E, R> =>
  Effect.gen(function* () {
    let response = yield* attempt
    let retriesLeft = retryCount

    while (!isTerminal(terminal, response.status) && retriesLeft > 0) {
      retriesLeft--
      yield* Effect.logDebug(`Retrying on non-terminal status`).pipe(
        Effect.annotateLogs({
          status: response.status,
          attempt: retryCount - retriesLeft + 1,
        })
      )
      response = yield* attempt
    }

    if (!isTerminal(terminal, response.status)) {
      yield* Effect.logWarning(`Retries exhausted on non-terminal status`).pipe(
        Effect.annotateLogs({ status: response.status, attempts: retryCount + 1 })
      )
    }

    return response
  })
