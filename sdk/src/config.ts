import { z } from 'zod'
import { ConfigError } from './errors'
import { nopLogger, type Logger } from './logger'
import { createWebSocket, type SocketFactory } from './socket'
import type { EventHandler } from './dispatch'

// ============================================================================
// Protocol constants
// ============================================================================

export const CLI_VERSION = '1.21.0'
export const SUBPROTOCOL = 'stripecli-devproxy-v1'
export const SESSION_PATH = '/v1/stripecli/sessions'
export const API_BASE = 'https://api.stripe.com'

export const DEFAULT_DEVICE_NAME = 'custom-stripe-listener'
export const DEFAULT_FEATURES: readonly string[] = ['webhooks']
export const DEFAULT_PONG_WAIT_MS = 10_000
export const DEFAULT_WRITE_WAIT_MS = 1_000
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000
export const DEFAULT_CLOSE_GRACE_MS = 500

/** The keepalive period is a fifth of the read deadline unless set explicitly. */
export function derivePingPeriod(pongWaitMs: number): number {
  return Math.max(1, Math.floor(pongWaitMs / 5))
}

// ============================================================================
// Public config
// ============================================================================

export interface ListenerConfig {
  /** Secret key sent as the bearer token on the session request. Required. */
  apiKey: string
  /** Receives decoded events. Required. */
  handler: EventHandler
  /** `device_name` form field. Default: 'custom-stripe-listener'. */
  deviceName?: string
  /** Features requested at authorization. Default: ['webhooks']. */
  webSocketFeatures?: string[]
  /** Base URL of the session endpoint. Default: 'https://api.stripe.com'. */
  apiBase?: string
  /** Read deadline, refreshed on every frame and pong. Default: 10000. */
  pongWaitMs?: number
  /** Keepalive ping interval. Default: pongWaitMs / 5. */
  pingPeriodMs?: number
  /** Deadline for a single ping, ack or close write. Default: 1000. */
  writeWaitMs?: number
  handshakeTimeoutMs?: number
  /** Wait between sending the close frame and dropping the socket. Default: 500. */
  closeGraceMs?: number
  logger?: Logger
  /** HTTP primitive for the session request. Default: global fetch. */
  fetch?: typeof fetch
  /** Socket primitive. Default: a `ws` client. */
  createSocket?: SocketFactory
}

const positiveMs = z.number().int().positive()

const ListenerOptionsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  deviceName: z.string().min(1).default(DEFAULT_DEVICE_NAME),
  webSocketFeatures: z.array(z.string().min(1)).min(1).default([...DEFAULT_FEATURES]),
  apiBase: z.string().url().transform(url => url.replace(/\/$/, '')).default(API_BASE),
  pongWaitMs: positiveMs.default(DEFAULT_PONG_WAIT_MS),
  pingPeriodMs: positiveMs.optional(),
  writeWaitMs: positiveMs.default(DEFAULT_WRITE_WAIT_MS),
  handshakeTimeoutMs: positiveMs.default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  closeGraceMs: z.number().int().nonnegative().default(DEFAULT_CLOSE_GRACE_MS),
})
  .transform(opts => ({ ...opts, pingPeriodMs: opts.pingPeriodMs ?? derivePingPeriod(opts.pongWaitMs) }))
  .refine(opts => opts.pingPeriodMs < opts.pongWaitMs, {
    message: 'pingPeriodMs must be shorter than pongWaitMs',
    path: ['pingPeriodMs'],
  })

export type ListenerOptions = z.output<typeof ListenerOptionsSchema>

export interface ResolvedConfig extends ListenerOptions {
  handler: EventHandler
  logger: Logger
  fetch: typeof fetch
  createSocket: SocketFactory
}

export function resolveConfig(config: ListenerConfig): ResolvedConfig {
  const parsed = ListenerOptionsSchema.safeParse({
    apiKey: config.apiKey,
    deviceName: config.deviceName,
    webSocketFeatures: config.webSocketFeatures,
    apiBase: config.apiBase,
    pongWaitMs: config.pongWaitMs,
    pingPeriodMs: config.pingPeriodMs,
    writeWaitMs: config.writeWaitMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    closeGraceMs: config.closeGraceMs,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigError(`invalid listener config: ${issue.path.join('.')}: ${issue.message}`, { cause: parsed.error })
  }
  return {
    ...parsed.data,
    handler: config.handler,
    logger: config.logger ?? nopLogger,
    fetch: config.fetch ?? fetch,
    createSocket: config.createSocket ?? createWebSocket,
  }
}

// ============================================================================
// Shared headers
// ============================================================================

export function makeHeaders(apiKey?: string): Record<string, string> {
  const h: Record<string, string> = {
    'Accept-Encoding': 'identity',
    'User-Agent': `Stripe/v1 stripe-cli/${CLI_VERSION}`,
    'X-Stripe-Client-User-Agent': JSON.stringify({
      name: 'stripe-cli',
      version: CLI_VERSION,
      publisher: 'stripe',
      os: process.platform,
      uname: `${process.platform} ${process.arch}`,
    }),
  }
  if (apiKey) {
    h['Authorization'] = `Bearer ${apiKey}`
    h['Content-Type'] = 'application/x-www-form-urlencoded'
  }
  return h
}
