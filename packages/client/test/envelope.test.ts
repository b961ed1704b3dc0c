import { Effect, Schema } from "effect"
import { describe, expect, it } from "vitest"
import {
  AlreadyExistsError,
  DeliveryError,
  RequestFailedError,
} from "../src/errors.js"
import {
  classify,
  decodeBody,
  errorMessage,
  requestFailed,
  send,
  type StatusPolicy,
} from "../src/internal/envelope.js"
import { makeFakeTransport, respond } from "./support/fake-transport.js"

const createPolicy: StatusPolicy<AlreadyExistsError | RequestFailedError> = {
  terminal: [201, 422],
  success: 201,
  failures: {
    422: (path, body) =>
      new AlreadyExistsError({ path, message: errorMessage(body) }),
  },
  fallback: requestFailed,
}

describe(`errorMessage`, () => {
  it(`should use the error field of a JSON body`, () => {
    expect(errorMessage(`{"error":"Topic already exists"}`)).toBe(
      `Topic already exists`
    )
  })

  it(`should fall back to the raw body`, () => {
    expect(errorMessage(`Unprocessable`)).toBe(`Unprocessable`)
    expect(errorMessage(`{"message":"other"}`)).toBe(`{"message":"other"}`)
  })
})

describe(`classify`, () => {
  it(`should pass the success status through`, async () => {
    const response = respond(201, `{}`)

    const result = await Effect.runPromise(
      classify(`topics/t`, response, createPolicy)
    )

    expect(result).toBe(response)
  })

  it(`should map a recognized status to its error`, async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        classify(`topics/t`, respond(422, `{"error":"exists"}`), createPolicy)
      )
    )

    expect(error).toBeInstanceOf(AlreadyExistsError)
    expect(error).toMatchObject({ path: `topics/t`, message: `exists` })
  })

  it(`should map any other status to the fallback error`, async () => {
    const error = await Effect.runPromise(
      Effect.flip(classify(`topics/t`, respond(500, `boom`), createPolicy))
    )

    expect(error).toBeInstanceOf(RequestFailedError)
    expect(error).toMatchObject({ path: `topics/t`, status: 500, body: `boom` })
  })
})

describe(`send`, () => {
  it(`should classify the response left after retries are exhausted`, async () => {
    const transport = makeFakeTransport(respond(503, `unavailable`))
    const policy: StatusPolicy<DeliveryError> = {
      terminal: [200],
      success: 200,
      fallback: (path, status, body) => new DeliveryError({ path, status, body }),
    }

    const error = await Effect.runPromise(
      Effect.flip(
        send(
          transport.request,
          2,
          { method: `PUT`, path: `queues/q/message`, body: `x` },
          policy
        )
      )
    )

    expect(transport.requests).toHaveLength(3)
    expect(error).toMatchObject({
      _tag: `DeliveryError`,
      path: `queues/q/message`,
      status: 503,
      body: `unavailable`,
    })
  })
})

describe(`decodeBody`, () => {
  it(`should decode JSON of the expected shape`, async () => {
    const value = await Effect.runPromise(
      decodeBody(Schema.Struct({ n: Schema.Number }), `p`, `{"n":3}`)
    )

    expect(value).toEqual({ n: 3 })
  })

  it(`should fail with a ParseError on malformed JSON`, async () => {
    const error = await Effect.runPromise(
      Effect.flip(decodeBody(Schema.Unknown, `queues`, `not json`))
    )

    expect(error._tag).toBe(`ParseError`)
    expect(error.path).toBe(`queues`)
  })
})
