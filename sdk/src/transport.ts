import type { ClientRequest, IncomingMessage } from 'http'
import { text } from 'stream/consumers'
import { makeHeaders, SESSION_PATH, SUBPROTOCOL, type ResolvedConfig } from './config'
import {
  AuthError,
  CancellationError,
  ConnectError,
  errorMessage,
  PreconditionError,
  WriteError,
} from './errors'
import { ReadyState, type SocketLike } from './socket'
import { encodeAck, toSession, type OutboundAck, type Session } from './wire'

/** The session's socket URL with the authorized feature appended as the query. */
export function dialUrl(session: Session): string {
  const url = `${session.socketUrl}?websocket_feature=${encodeURIComponent(session.authorizedFeature)}`
  // Throws on a URL the socket could not dial.
  new URL(url)
  return url
}

// ============================================================================
// Transport
//
// Owns the session and the socket. Every write is handed to the socket in the
// call that makes it; `ws` queues frames in that order. Each write carries its
// own writeWait deadline.
// ============================================================================

export class Transport {
  private _session: Session | null = null
  private _socket: SocketLike | null = null

  constructor(private readonly cfg: ResolvedConfig) { }

  get session(): Session | null {
    return this._session
  }

  get socket(): SocketLike | null {
    return this._socket
  }

  // ── authorize ─────────────────────────────────────────────────────────────

  async authorize(signal?: AbortSignal): Promise<Session> {
    const form = new URLSearchParams()
    form.append('device_name', this.cfg.deviceName)
    for (const f of this.cfg.webSocketFeatures) {
      form.append('websocket_features[]', f)
    }

    const { fetch } = this.cfg
    let status: number
    let ok: boolean
    let body: string
    try {
      const res = await fetch(`${this.cfg.apiBase}${SESSION_PATH}`, {
        method: 'POST',
        headers: makeHeaders(this.cfg.apiKey),
        body: form.toString(),
        signal,
      })
      status = res.status
      ok = res.ok
      body = await res.text()
    } catch (err) {
      if (signal?.aborted) throw new CancellationError('authorize cancelled', { cause: err })
      throw new AuthError(`authorize request: ${errorMessage(err)}`, { cause: err })
    }

    if (!ok) {
      throw new AuthError(`authorize failed (HTTP ${status}): ${body}`, { status, body })
    }

    const session = toSession(body)
    this._session = session
    this.cfg.logger.info('session created', {
      ws_id: session.socketId,
      feature: session.authorizedFeature,
    })
    return session
  }

  // ── connect ───────────────────────────────────────────────────────────────

  async connect(signal?: AbortSignal): Promise<SocketLike> {
    const session = this._session
    if (!session) throw new PreconditionError('authorize() must succeed before connect()')
    if (this._socket) throw new PreconditionError('socket is already open')
    if (signal?.aborted) throw new CancellationError('connect cancelled', { cause: signal.reason })

    let url: string
    try {
      url = dialUrl(session)
    } catch (err) {
      throw new ConnectError(`websocket dial: invalid socket url ${session.socketUrl}`, { cause: err })
    }

    const headers = { ...makeHeaders(), 'Websocket-Id': session.socketId }
    this.cfg.logger.debug('dialing', { url })
    const socket = this.cfg.createSocket(url, [SUBPROTOCOL], {
      headers,
      handshakeTimeout: this.cfg.handshakeTimeoutMs,
    })
    // Errors outside of a read loop (before listen, after teardown) are only logged.
    socket.on('error', (err: Error) => {
      this.cfg.logger.debug('socket error', { error: err.message })
    })

    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        socket.off('open', onOpen)
        socket.off('error', onError)
        socket.off('unexpected-response', onUnexpectedResponse)
        signal?.removeEventListener('abort', onAbort)
      }
      const onOpen = () => {
        cleanup()
        resolve()
      }
      const onError = (err: Error) => {
        cleanup()
        reject(new ConnectError(`websocket dial: ${err.message}`, { cause: err }))
      }
      const onUnexpectedResponse = (req: ClientRequest, res: IncomingMessage) => {
        cleanup()
        const status = res.statusCode ?? 0
        readBody(res)
          .then((body) => {
            req.destroy()
            const extra = body ? ` | ${body}` : ''
            reject(new ConnectError(`websocket dial: unexpected server response ${status}${extra}`, { status, body }))
          })
          .catch(reject)
      }
      const onAbort = () => {
        cleanup()
        socket.terminate()
        reject(new CancellationError('connect cancelled', { cause: signal?.reason }))
      }

      socket.on('open', onOpen)
      socket.on('error', onError)
      socket.on('unexpected-response', onUnexpectedResponse)
      signal?.addEventListener('abort', onAbort, { once: true })
    })

    this._socket = socket
    this.cfg.logger.info('websocket connected')
    return socket
  }

  // ── writes ────────────────────────────────────────────────────────────────

  sendAck(ack: OutboundAck): Promise<void> {
    const frame = encodeAck(ack)
    return this.write('ack', (socket, done) => socket.send(frame, done))
  }

  ping(): Promise<void> {
    return this.write('ping', (socket, done) => socket.ping(undefined, undefined, done))
  }

  /** Queues a close control frame. Resolves once it has been handed to the socket. */
  sendClose(code: number, reason: string): Promise<void> {
    return this.write('close', (socket, done) => {
      socket.close(code, reason)
      done()
    })
  }

  /** Drops the connection without a handshake. */
  terminate(): void {
    const socket = this._socket
    this._socket = null
    socket?.terminate()
  }

  private write(kind: string, op: (socket: SocketLike, done: (err?: Error) => void) => void): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = this._socket
      if (!socket || socket.readyState !== ReadyState.OPEN) {
        reject(new WriteError(`${kind}: socket is not open`))
        return
      }
      const timer = setTimeout(() => {
        reject(new WriteError(`${kind}: write timed out after ${this.cfg.writeWaitMs}ms`))
      }, this.cfg.writeWaitMs)
      const done = (err?: Error) => {
        clearTimeout(timer)
        if (err) reject(new WriteError(`${kind}: ${err.message}`, { cause: err }))
        else resolve()
      }
      try {
        op(socket, done)
      } catch (err) {
        done(err instanceof Error ? err : new Error(errorMessage(err)))
      }
    })
  }
}

async function readBody(res: IncomingMessage): Promise<string> {
  try {
    return await text(res)
  } catch (err) {
    return `<unreadable response body: ${errorMessage(err)}>`
  }
}
