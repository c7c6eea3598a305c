import type { EventEmitter } from 'events'
import WebSocket from 'ws'
import type { ClientOptions, RawData } from 'ws'

/**
 * WebSocket ready state constants.
 * Mirrors the WebSocket.readyState values.
 */
export const ReadyState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const

/** RFC 6455 close code for a normal closure. */
export const NORMAL_CLOSURE = 1000

/**
 * The part of the `ws` client surface the listener drives. Events used:
 * `open`, `message`, `pong`, `close`, `error` and `unexpected-response`.
 */
export interface SocketLike extends EventEmitter {
  readonly readyState: number
  send(data: string, cb?: (err?: Error) => void): void
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void
  close(code?: number, data?: string): void
  terminate(): void
}

export type SocketFactory = (url: string, protocols: string[], options: ClientOptions) => SocketLike

export const createWebSocket: SocketFactory = (url, protocols, options) =>
  new WebSocket(url, protocols, options)

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}
