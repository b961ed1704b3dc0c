/**
 * End-to-end tests against an in-process broker.
 */
import { Effect, LogLevel, Logger } from "effect"
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest"
import { DynamiqClient, DynamiqClientLiveNode } from "../src/DynamiqClient.js"
import { InvalidConfigError } from "../src/errors.js"
import { startFakeBroker } from "./support/fake-broker.js"
import type { DynamiqClientConfig } from "../src/types.js"
import type { FakeBroker } from "./support/fake-broker.js"

describe(`DynamiqClientLiveNode`, () => {
  let broker: FakeBroker

  beforeAll(async () => {
    broker = await startFakeBroker()
  })

  afterAll(async () => {
    await broker.close()
  })

  beforeEach(() => {
    broker.failNext(0)
    broker.stall(false)
    broker.requests.length = 0
  })

  const run = <A, E>(
    program: Effect.Effect<A, E, DynamiqClient>,
    config: Partial<DynamiqClientConfig> = {}
  ) =>
    Effect.runPromise(
      program.pipe(
        Effect.provide(
          DynamiqClientLiveNode({ url: broker.url, port: broker.port, ...config })
        ),
        Logger.withMinimumLogLevel(LogLevel.None)
      )
    )

  it(`should route messages from a topic to a subscribed queue and back`, async () => {
    const result = await run(
      Effect.gen(function* () {
        const client = yield* DynamiqClient
        yield* client.createTopic(`orders`)
        yield* client.createQueue(`billing`)
        const subscribed = yield* client.subscribeQueue(`orders`, `billing`)
        const published = yield* client.publish(`orders`, `{"order":1}`)
        const received = yield* client.receive(`billing`, 5)
        const acknowledged = yield* client.acknowledge(`billing`, received[0]?.id ?? ``)
        return { subscribed, published, received, acknowledged }
      })
    )

    expect(result).toEqual({
      subscribed: [`billing`],
      published: { billing: `1` },
      received: [{ id: `1`, body: `{"order":1}` }],
      acknowledged: true,
    })
  })

  it(`should return the enqueued message id as the raw body`, async () => {
    const result = await run(
      Effect.gen(function* () {
        const client = yield* DynamiqClient
        yield* client.createQueue(`raw`)
        const first = yield* client.enqueue(`raw`, `a`)
        const second = yield* client.enqueue(`raw`, `b`)
        const deleted = yield* client.acknowledgeMany(`raw`, [first, second])
        return { first, second, deleted }
      })
    )

    expect(result.first).toMatch(/^\d+$/)
    expect(result.second).toBe(String(Number(result.first) + 1))
    expect(result.deleted).toBe(2)
  })

  it(`should send requests under the versioned path`, async () => {
    await run(Effect.flatMap(DynamiqClient, (client) => client.knownTopics()))

    expect(broker.requests.map(({ method, path }) => ({ method, path }))).toEqual([
      { method: `GET`, path: `/v1/topics` },
    ])
  })

  it(`should fail with AlreadyExistsError carrying the server message`, async () => {
    const error = await run(
      Effect.gen(function* () {
        const client = yield* DynamiqClient
        yield* client.createTopic(`twice`)
        return yield* Effect.flip(client.createTopic(`twice`))
      })
    )

    expect(error).toMatchObject({
      _tag: `AlreadyExistsError`,
      path: `topics/twice`,
      message: `Topic twice already exists`,
    })
  })

  it(`should retry through transient server errors`, async () => {
    broker.failNext(2)

    const result = await run(
      Effect.flatMap(DynamiqClient, (client) => client.createQueue(`flaky`))
    )

    expect(result).toBe(true)
    expect(broker.requests).toHaveLength(3)
  })

  it(`should give up after the configured number of retries`, async () => {
    broker.failNext(5)

    const error = await run(
      Effect.flatMap(DynamiqClient, (client) =>
        Effect.flip(client.createQueue(`broken`))
      ),
      { retryCount: 1 }
    )

    expect(error).toMatchObject({ _tag: `RequestFailedError`, status: 500 })
    expect(broker.requests).toHaveLength(2)
  })

  it(`should map invalid batch sizes and missing queues on receive`, async () => {
    const tags = await run(
      Effect.gen(function* () {
        const client = yield* DynamiqClient
        yield* client.createQueue(`batch`)
        const invalid = yield* Effect.flip(client.receive(`batch`, 1000))
        const missing = yield* Effect.flip(client.receive(`missing`, 10))
        return [invalid._tag, missing._tag]
      })
    )

    expect(tags).toEqual([`InvalidArgumentError`, `NotFoundError`])
  })

  it(`should configure a queue and read its details back`, async () => {
    const details = await run(
      Effect.gen(function* () {
        const client = yield* DynamiqClient
        yield* client.createQueue(`configured`)
        yield* client.configureQueue(`configured`, {
          visibilityTimeout: 15,
          maxPartitions: 4,
        })
        return yield* client.queueDetails(`configured`)
      })
    )

    expect(details).toEqual({ visibility_timeout: 15, max_partitions: 4, size: 0 })
  })

  it(`should fail with NotFoundError when deleting an unknown topic`, async () => {
    const error = await run(
      Effect.flatMap(DynamiqClient, (client) =>
        Effect.flip(client.deleteTopic(`ghost`))
      )
    )

    expect(error._tag).toBe(`NotFoundError`)
  })

  it(`should ask the broker to close the connection when not persistent`, async () => {
    await run(
      Effect.flatMap(DynamiqClient, (client) => client.knownQueues()),
      { persistent: false }
    )

    expect(broker.requests[0]?.headers.connection).toBe(`close`)
  })

  it(`should fail with TimeoutError when the broker does not answer`, async () => {
    broker.stall(true)

    const error = await run(
      Effect.flatMap(DynamiqClient, (client) =>
        Effect.flip(client.knownQueues())
      ),
      { connectionTimeout: `50 millis` }
    )

    expect(error._tag).toBe(`TimeoutError`)
    expect(broker.requests).toHaveLength(1)
  })

  it(`should not let a ".." message id reach the queue path`, async () => {
    const error = await run(
      Effect.flatMap(DynamiqClient, (client) =>
        Effect.flip(client.acknowledge(`billing`, `..`))
      )
    )

    expect(error._tag).toBe(`InvalidArgumentError`)
    expect(broker.requests).toHaveLength(0)
  })
})

describe(`DynamiqClientLiveNode without a broker`, () => {
  it(`should fail with ConnectionError when nothing listens on the port`, async () => {
    const broker = await startFakeBroker()
    const { url, port } = broker
    await broker.close()

    const error = await Effect.runPromise(
      Effect.flatMap(DynamiqClient, (client) => Effect.flip(client.knownTopics())).pipe(
        Effect.provide(DynamiqClientLiveNode({ url, port })),
        Logger.withMinimumLogLevel(LogLevel.None)
      )
    )

    expect(error._tag).toBe(`ConnectionError`)
  })

  it(`should fail with InvalidConfigError for a malformed url`, async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        Effect.flatMap(DynamiqClient, (client) => client.knownTopics()).pipe(
          Effect.provide(DynamiqClientLiveNode({ url: `example.io`, port: 1 }))
        )
      )
    )

    expect(error).toBeInstanceOf(InvalidConfigError)
    expect(error).toMatchObject({
      field: `url`,
      message: `Expected an http or https URL, got "example.io"`,
    })
  })
})
