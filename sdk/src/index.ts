/**
 * @stripe-listener/sdk
 *
 * Streams events from the Stripe CLI event socket to your code.
 *
 * ## Flow
 *
 * - `authorize()` creates a CLI session (`POST /v1/stripecli/sessions`)
 * - `connect()` dials the session's socket with the `stripecli-devproxy-v1` subprotocol
 * - `listen()` runs the read loop and the keepalive loop until the socket
 *   closes, a loop fails, or the abort signal fires
 *
 * Every `webhook_event` and `v2_event` is acked before the handler sees it.
 *
 * @example
 * ```typescript
 * import { StripeListener, consoleLogger } from '@stripe-listener/sdk'
 *
 * const listener = StripeListener.create({
 *   apiKey: process.env.STRIPE_API_KEY ?? '',
 *   logger: consoleLogger('debug'),
 *   handler: {
 *     onWebhookEvent: (evt, parsed) => console.log(parsed.type, parsed.id),
 *     onV2Event: (evt, parsed) => console.log(parsed.type, parsed.id),
 *   },
 * })
 *
 * const ac = new AbortController()
 * process.on('SIGINT', () => ac.abort())
 * await listener.listenAll(ac.signal)
 * ```
 *
 * @packageDocumentation
 */

// Listener
export { StripeListener } from './listener'
export type { ListenerState } from './listener'

// Config
export {
  API_BASE,
  CLI_VERSION,
  DEFAULT_CLOSE_GRACE_MS,
  DEFAULT_DEVICE_NAME,
  DEFAULT_FEATURES,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_PONG_WAIT_MS,
  DEFAULT_WRITE_WAIT_MS,
  SESSION_PATH,
  SUBPROTOCOL,
  derivePingPeriod,
  resolveConfig,
} from './config'
export type { ListenerConfig, ResolvedConfig } from './config'

// Dispatch
export { Dispatcher, decodeFrame, parseV2Payload, parseWebhookPayload } from './dispatch'
export type { AckSender, EventHandler } from './dispatch'

// Transport
export { Transport, dialUrl } from './transport'
export { createWebSocket, NORMAL_CLOSURE, ReadyState } from './socket'
export type { SocketFactory, SocketLike } from './socket'

// Wire model
export { encodeAck, toSession } from './wire'
export type {
  InboundEnvelope,
  OutboundAck,
  Session,
  UnrecognizedEnvelope,
  V2EventEnvelope,
  V2EventPayload,
  WebhookEventEnvelope,
  WebhookEventPayload,
} from './wire'

// Errors
export {
  AckSendError,
  AuthError,
  CancellationError,
  ConfigError,
  ConnectError,
  FrameDecodeError,
  ListenerError,
  PayloadDecodeError,
  PreconditionError,
  ReadError,
  WriteError,
  errorMessage,
  isListenerError,
} from './errors'
export type { ListenerErrorCode } from './errors'

// Logging
export { consoleLogger, isLogLevel, nopLogger } from './logger'
export type { LogLevel, LogMeta, Logger } from './logger'
