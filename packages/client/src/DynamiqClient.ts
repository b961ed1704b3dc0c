/**
 * Main client service for the Dynamiq broker.
 */
import { Context, Effect, Layer, Schema } from "effect"
import { DynamiqConfig } from "./Config.js"
import {
  AcknowledgementError,
  AlreadyExistsError,
  DeliveryError,
  InvalidArgumentError,
  NotFoundError,
  type ConnectionError,
  type InvalidConfigError,
  type ParseError,
  type RequestFailedError,
  type StatusError,
  type TimeoutError,
} from "./errors.js"
import {
  decodeBody,
  errorMessage,
  requestFailed,
  send,
  type StatusPolicy,
} from "./internal/envelope.js"
import { DynamiqTransport, DynamiqTransportLive } from "./Transport.js"
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_RETRY_COUNT,
  PublishResult,
  QueueConfiguration,
  QueueDetails,
  QueueListResponse,
  ReceivedMessages,
  SubscribeResponse,
  TopicListResponse,
  type DynamiqClientConfig,
  type ReceivedMessage,
  type TransportRequest,
} from "./types.js"

type TransportFailure = ConnectionError | TimeoutError

// =============================================================================
// Status Policies
// =============================================================================

const alreadyExists = (path: string, body: string) =>
  new AlreadyExistsError({ path, message: errorMessage(body) })

const notFound = (path: string, body: string) =>
  new NotFoundError({ path, message: errorMessage(body) })

const invalidArgument = (path: string, body: string) =>
  new InvalidArgumentError({ path, message: errorMessage(body) })

const deliveryFailed = (path: string, status: number, body: string) =>
  new DeliveryError({ path, status, body })

const acknowledgementFailed = (path: string, status: number, body: string) =>
  new AcknowledgementError({ path, status, body })

const CREATE: StatusPolicy<AlreadyExistsError | RequestFailedError> = {
  terminal: [201, 422],
  success: 201,
  failures: { 422: alreadyExists },
  fallback: requestFailed,
}

const DELETE: StatusPolicy<NotFoundError | RequestFailedError> = {
  terminal: [200, 404],
  success: 200,
  failures: { 404: notFound },
  fallback: requestFailed,
}

const SUBSCRIBE: StatusPolicy<RequestFailedError> = {
  terminal: [200, 422],
  success: 200,
  fallback: requestFailed,
}

const CONFIGURE: StatusPolicy<RequestFailedError> = {
  terminal: [200],
  success: 200,
  fallback: requestFailed,
}

const DELIVER: StatusPolicy<DeliveryError> = {
  terminal: [200],
  success: 200,
  fallback: deliveryFailed,
}

const ACKNOWLEDGE: StatusPolicy<AcknowledgementError> = {
  terminal: [200],
  success: 200,
  fallback: acknowledgementFailed,
}

const RECEIVE: StatusPolicy<
  NotFoundError | InvalidArgumentError | RequestFailedError
> = {
  terminal: [200, 404, 422],
  success: 200,
  failures: { 404: notFound, 422: invalidArgument },
  fallback: requestFailed,
}

const LOOKUP: StatusPolicy<NotFoundError | RequestFailedError> = DELETE

const LIST: StatusPolicy<RequestFailedError> = CONFIGURE

// =============================================================================
// Resource Paths
// =============================================================================

type PathValue = string | number | ReadonlyArray<string>

const segment = (value: string | number): string =>
  encodeURIComponent(String(value))

// URL resolution collapses these in any percent-encoding
const isDotSegment = (value: string | number): boolean =>
  value === `.` || value === `..`

/**
 * Build a request path, percent-encoding each interpolated topic, queue or
 * message id. A list of ids is joined with unencoded commas. Fails with
 * `InvalidArgumentError` when a value is `.` or `..`, which would address a
 * different resource.
 */
const resourcePath = (
  template: TemplateStringsArray,
  ...values: ReadonlyArray<PathValue>
): Effect.Effect<string, InvalidArgumentError> => {
  const path = String.raw(
    template,
    ...values.map((value) =>
      typeof value === `object` ? value.map(segment).join(`,`) : segment(value)
    )
  )
  const dotted = values
    .flatMap((value): ReadonlyArray<string | number> =>
      typeof value === `object` ? value : [value]
    )
    .find(isDotSegment)
  return dotted === undefined
    ? Effect.succeed(path)
    : Effect.fail(
        new InvalidArgumentError({
          path,
          message: `"${dotted}" cannot be used as a path segment`,
        })
      )
}

// =============================================================================
// Service Definition
// =============================================================================

/**
 * The Dynamiq client service.
 */
export class DynamiqClient extends Context.Tag(`@dynamiq/client/DynamiqClient`)<
  DynamiqClient,
  {
    /**
     * Create a topic; fails with `AlreadyExistsError` if it exists.
     */
    readonly createTopic: (
      topic: string
    ) => Effect.Effect<
      true,
      AlreadyExistsError | InvalidArgumentError | RequestFailedError | TransportFailure
    >

    /**
     * Create a queue; fails with `AlreadyExistsError` if it exists.
     */
    readonly createQueue: (
      queue: string
    ) => Effect.Effect<
      true,
      AlreadyExistsError | InvalidArgumentError | RequestFailedError | TransportFailure
    >

    readonly deleteTopic: (
      topic: string
    ) => Effect.Effect<
      true,
      NotFoundError | InvalidArgumentError | RequestFailedError | TransportFailure
    >

    readonly deleteQueue: (
      queue: string
    ) => Effect.Effect<
      true,
      NotFoundError | InvalidArgumentError | RequestFailedError | TransportFailure
    >

    /**
     * Subscribe a queue to a topic, returning every queue now subscribed.
     */
    readonly subscribeQueue: (
      topic: string,
      queue: string
    ) => Effect.Effect<
      ReadonlyArray<string>,
      InvalidArgumentError | RequestFailedError | ParseError | TransportFailure
    >

    readonly configureQueue: (
      queue: string,
      configuration: QueueConfiguration
    ) => Effect.Effect<
      true,
      InvalidArgumentError | RequestFailedError | TransportFailure
    >

    /**
     * Publish to a topic, which enqueues to every subscribed queue. Returns
     * the message id assigned by each queue.
     */
    readonly publish: (
      topic: string,
      data: string | Uint8Array
    ) => Effect.Effect<
      PublishResult,
      DeliveryError | InvalidArgumentError | ParseError | TransportFailure
    >

    /**
     * Enqueue directly to a queue. Returns the raw message id.
     */
    readonly enqueue: (
      queue: string,
      data: string | Uint8Array
    ) => Effect.Effect<
      string,
      DeliveryError | InvalidArgumentError | TransportFailure
    >

    readonly acknowledge: (
      queue: string,
      messageId: string
    ) => Effect.Effect<
      true,
      AcknowledgementError | InvalidArgumentError | TransportFailure
    >

    /**
     * Acknowledge several messages in one request. Returns the broker's
     * deletion count.
     */
    readonly acknowledgeMany: (
      queue: string,
      messageIds: ReadonlyArray<string>
    ) => Effect.Effect<
      number,
      AcknowledgementError | InvalidArgumentError | ParseError | TransportFailure
    >

    /**
     * Receive up to `batchSize` messages (default 10).
     */
    readonly receive: (
      queue: string,
      batchSize?: number
    ) => Effect.Effect<
      ReadonlyArray<ReceivedMessage>,
      | NotFoundError
      | InvalidArgumentError
      | RequestFailedError
      | ParseError
      | TransportFailure
    >

    readonly queueDetails: (
      queue: string
    ) => Effect.Effect<
      QueueDetails,
      | NotFoundError
      | InvalidArgumentError
      | RequestFailedError
      | ParseError
      | TransportFailure
    >

    readonly knownQueues: () => Effect.Effect<
      ReadonlyArray<string>,
      RequestFailedError | ParseError | TransportFailure
    >

    readonly knownTopics: () => Effect.Effect<
      ReadonlyArray<string>,
      RequestFailedError | ParseError | TransportFailure
    >
  }
>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create the Dynamiq client implementation.
 */
const makeDynamiqClient = (config: Pick<DynamiqClientConfig, `retryCount`>) =>
  Effect.gen(function* () {
    const transport = yield* DynamiqTransport
    const retryCount = config.retryCount ?? DEFAULT_RETRY_COUNT

    const call = <E extends StatusError>(
      request: TransportRequest,
      policy: StatusPolicy<E>
    ) => send(transport.request, retryCount, request, policy)

    const createTopic = Effect.fn(`DynamiqClient.createTopic`)(
      (topic: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`topics/${topic}`
          yield* call({ method: `PUT`, path }, CREATE)
          return true as const
        })
    )

    const createQueue = Effect.fn(`DynamiqClient.createQueue`)(
      (queue: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}`
          yield* call({ method: `PUT`, path }, CREATE)
          return true as const
        })
    )

    const deleteTopic = Effect.fn(`DynamiqClient.deleteTopic`)(
      (topic: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`topics/${topic}`
          yield* call({ method: `DELETE`, path }, DELETE)
          return true as const
        })
    )

    const deleteQueue = Effect.fn(`DynamiqClient.deleteQueue`)(
      (queue: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}`
          yield* call({ method: `DELETE`, path }, DELETE)
          return true as const
        })
    )

    const subscribeQueue = Effect.fn(`DynamiqClient.subscribeQueue`)(
      (topic: string, queue: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`topics/${topic}/queues/${queue}`
          const response = yield* call({ method: `PUT`, path }, SUBSCRIBE)
          const { Queues } = yield* decodeBody(SubscribeResponse, path, response.body)
          return Queues
        })
    )

    const configureQueue = Effect.fn(`DynamiqClient.configureQueue`)(
      (queue: string, configuration: QueueConfiguration) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}`
          const body = JSON.stringify(
            Schema.encodeSync(QueueConfiguration)(configuration)
          )
          yield* call(
            {
              method: `PATCH`,
              path,
              headers: { "content-type": `application/json` },
              body,
            },
            CONFIGURE
          )
          return true as const
        })
    )

    const publish = Effect.fn(`DynamiqClient.publish`)(
      (topic: string, data: string | Uint8Array) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`topics/${topic}/message`
          const response = yield* call({ method: `PUT`, path, body: data }, DELIVER)
          return yield* decodeBody(PublishResult, path, response.body)
        })
    )

    const enqueue = Effect.fn(`DynamiqClient.enqueue`)(
      (queue: string, data: string | Uint8Array) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}/message`
          const response = yield* call({ method: `PUT`, path, body: data }, DELIVER)
          return response.body
        })
    )

    const acknowledge = Effect.fn(`DynamiqClient.acknowledge`)(
      (queue: string, messageId: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}/message/${messageId}`
          yield* call({ method: `DELETE`, path }, ACKNOWLEDGE)
          return true as const
        })
    )

    const acknowledgeMany = Effect.fn(`DynamiqClient.acknowledgeMany`)(
      (queue: string, messageIds: ReadonlyArray<string>) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}/messages/${messageIds}`
          if (messageIds.length === 0) {
            return yield* new InvalidArgumentError({
              path,
              message: `At least one message id is required`,
            })
          }
          const response = yield* call({ method: `DELETE`, path }, ACKNOWLEDGE)
          return yield* decodeBody(Schema.Number, path, response.body)
        })
    )

    const receive = Effect.fn(`DynamiqClient.receive`)(
      (queue: string, batchSize: number = DEFAULT_BATCH_SIZE) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}/messages/${batchSize}`
          const response = yield* call({ method: `GET`, path }, RECEIVE)
          return yield* decodeBody(ReceivedMessages, path, response.body)
        })
    )

    const queueDetails = Effect.fn(`DynamiqClient.queueDetails`)(
      (queue: string) =>
        Effect.gen(function* () {
          const path = yield* resourcePath`queues/${queue}`
          const response = yield* call({ method: `GET`, path }, LOOKUP)
          return yield* decodeBody(QueueDetails, path, response.body)
        })
    )

    const knownQueues = Effect.fn(`DynamiqClient.knownQueues`)(() =>
      Effect.gen(function* () {
        const response = yield* call({ method: `GET`, path: `queues` }, LIST)
        const { queues } = yield* decodeBody(QueueListResponse, `queues`, response.body)
        return queues
      })
    )

    const knownTopics = Effect.fn(`DynamiqClient.knownTopics`)(() =>
      Effect.gen(function* () {
        const response = yield* call({ method: `GET`, path: `topics` }, LIST)
        const { topics } = yield* decodeBody(TopicListResponse, `topics`, response.body)
        return topics
      })
    )

    return {
      createTopic,
      createQueue,
      deleteTopic,
      deleteQueue,
      subscribeQueue,
      configureQueue,
      publish,
      enqueue,
      acknowledge,
      acknowledgeMany,
      receive,
      queueDetails,
      knownQueues,
      knownTopics,
    }
  })

/**
 * Layer that provides the Dynamiq client.
 * Requires DynamiqTransport.
 */
export const DynamiqClientLive = (
  config: Pick<DynamiqClientConfig, `retryCount`> = {}
): Layer.Layer<DynamiqClient, never, DynamiqTransport> =>
  Layer.effect(DynamiqClient, makeDynamiqClient(config))

/**
 * Complete layer that provides the Dynamiq client with the fetch transport.
 */
export const DynamiqClientLiveNode = (
  config: DynamiqClientConfig
): Layer.Layer<DynamiqClient, InvalidConfigError> =>
  DynamiqClientLive(config).pipe(Layer.provide(DynamiqTransportLive(config)))

/**
 * Complete layer built from the DynamiqConfig service.
 */
export const DynamiqClientFromConfig: Layer.Layer<
  DynamiqClient,
  InvalidConfigError,
  DynamiqConfig
> = Layer.unwrapEffect(Effect.map(DynamiqConfig, DynamiqClientLiveNode))

/**
 * Complete layer configured from `DYNAMIQ_*` environment variables.
 */
export const DynamiqClientFromEnv = DynamiqClientFromConfig.pipe(
  Layer.provide(DynamiqConfig.Default)
)
