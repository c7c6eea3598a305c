import { EventEmitter } from 'events'
import { vi } from 'vitest'
import type { ClientOptions } from 'ws'
import { ReadyState, type SocketFactory, type SocketLike } from '../socket'

/**
 * In-process stand-in for a `ws` client. Frames written by the listener are
 * recorded in `writes` in the order they hit the socket.
 */
export class FakeSocket extends EventEmitter implements SocketLike {
  readyState: number = ReadyState.CONNECTING
  readonly writes: Array<{ kind: 'text'; data: string } | { kind: 'ping' } | { kind: 'close'; code?: number; reason?: string }> = []

  sendError: Error | null = null
  pingError: Error | null = null
  /** Answer every ping with a pong on the next tick. */
  autoPong = false
  /** Leave write callbacks uncalled, as a stalled connection would. */
  stallWrites = false
  /** Record writes but hold their callbacks until releaseCallbacks(). */
  holdCallbacks = false
  private held: Array<() => void> = []

  readonly terminate = vi.fn(() => {
    const wasOpen = this.readyState !== ReadyState.CLOSED
    this.readyState = ReadyState.CLOSED
    if (wasOpen) this.emit('close', 1006, Buffer.from(''))
  })

  constructor(
    readonly url: string,
    readonly protocols: string[],
    readonly options: ClientOptions,
  ) {
    super()
  }

  get sent(): string[] {
    return this.writes.flatMap(w => (w.kind === 'text' ? [w.data] : []))
  }

  get pings(): number {
    return this.writes.filter(w => w.kind === 'ping').length
  }

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.stallWrites) return
    const err = this.sendError
    if (!err) this.writes.push({ kind: 'text', data })
    this.callBack(() => cb?.(err ?? undefined))
  }

  ping(_data?: unknown, _mask?: boolean, cb?: (err?: Error) => void): void {
    if (this.stallWrites) return
    const err = this.pingError
    if (!err) this.writes.push({ kind: 'ping' })
    this.callBack(() => cb?.(err ?? undefined))
    if (!err && this.autoPong) setImmediate(() => this.emit('pong', Buffer.from('')))
  }

  close(code?: number, reason?: string): void {
    this.writes.push({ kind: 'close', code, reason })
    this.readyState = ReadyState.CLOSING
  }

  private callBack(fn: () => void): void {
    if (this.holdCallbacks) this.held.push(fn)
    else queueMicrotask(fn)
  }

  // ── Test drivers ──────────────────────────────────────────────────────────

  get heldCallbacks(): number {
    return this.held.length
  }

  releaseCallbacks(): void {
    this.holdCallbacks = false
    const held = this.held
    this.held = []
    for (const fn of held) fn()
  }

  open(): void {
    this.readyState = ReadyState.OPEN
    this.emit('open')
  }

  receive(frame: unknown): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame)
    this.emit('message', Buffer.from(text), false)
  }

  peerClose(code: number, reason = ''): void {
    this.readyState = ReadyState.CLOSED
    this.emit('close', code, Buffer.from(reason))
  }
}

/**
 * A socket factory whose sockets open on the next tick unless `autoOpen` is
 * false. Every socket created is kept in `sockets`.
 */
export function fakeSocketFactory(autoOpen = true): SocketFactory & { sockets: FakeSocket[] } {
  const sockets: FakeSocket[] = []
  const factory = (url: string, protocols: string[], options: ClientOptions) => {
    const socket = new FakeSocket(url, protocols, options)
    sockets.push(socket)
    if (autoOpen) setImmediate(() => socket.open())
    return socket
  }
  return Object.assign(factory, { sockets })
}

export const SESSION_BODY = {
  reconnect_delay: 5,
  secret: 'whsec_placeholder',
  websocket_authorized_feature: 'webhooks',
  websocket_id: 'ws_1',
  websocket_url: 'wss://events.example.test/subscribe',
  default_version: '2020-08-27',
  latest_version: '2024-06-20',
}

export function sessionFetch(body: unknown = SESSION_BODY, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }))
}
