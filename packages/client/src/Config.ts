/**
 * Environment configuration for the Dynamiq client.
 */
import { Config, Context, Duration, Layer } from "effect"
import { isBrokerUrl, isPort } from "./Transport.js"
import {
  DEFAULT_CONNECTION_TIMEOUT,
  DEFAULT_RETRY_COUNT,
  type DynamiqClientConfig,
} from "./types.js"

/**
 * Resolved client configuration; every optional setting has its default.
 */
export interface DynamiqConfigShape {
  readonly url: string
  readonly port: number
  readonly connectionTimeout: Duration.Duration
  readonly retryCount: number
  readonly persistent: boolean
}

/**
 * Reads `DYNAMIQ_URL`, `DYNAMIQ_PORT`, `DYNAMIQ_CONNECTION_TIMEOUT`,
 * `DYNAMIQ_RETRY_COUNT` and `DYNAMIQ_PERSISTENT`.
 */
export const dynamiqConfig: Config.Config<DynamiqConfigShape> = Config.all({
  url: Config.string(`DYNAMIQ_URL`).pipe(
    Config.validate({
      message: `Expected an http or https URL`,
      validation: isBrokerUrl,
    })
  ),
  port: Config.integer(`DYNAMIQ_PORT`).pipe(
    Config.validate({
      message: `Expected a port between 1 and 65535`,
      validation: isPort,
    })
  ),
  connectionTimeout: Config.duration(`DYNAMIQ_CONNECTION_TIMEOUT`).pipe(
    Config.withDefault(Duration.decode(DEFAULT_CONNECTION_TIMEOUT))
  ),
  retryCount: Config.integer(`DYNAMIQ_RETRY_COUNT`).pipe(
    Config.validate({
      message: `Expected a non-negative retry count`,
      validation: (count) => count >= 0,
    }),
    Config.withDefault(DEFAULT_RETRY_COUNT)
  ),
  persistent: Config.boolean(`DYNAMIQ_PERSISTENT`).pipe(
    Config.withDefault(true)
  ),
})

/**
 * Configuration service tag for Effect dependency injection.
 */
export class DynamiqConfig extends Context.Tag(`@dynamiq/client/DynamiqConfig`)<
  DynamiqConfig,
  DynamiqConfigShape
>() {
  /**
   * Configuration read from the environment.
   */
  static readonly Default = Layer.effect(DynamiqConfig, dynamiqConfig)

  /**
   * Layer with programmatic configuration values.
   */
  static readonly make = (config: Omit<DynamiqClientConfig, `fetch`>) =>
    Layer.succeed(DynamiqConfig, {
      url: config.url,
      port: config.port,
      connectionTimeout: Duration.decode(
        config.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT
      ),
      retryCount: config.retryCount ?? DEFAULT_RETRY_COUNT,
      persistent: config.persistent ?? true,
    })
}
