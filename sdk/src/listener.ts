import type { RawData } from 'ws'
import { resolveConfig, type ListenerConfig, type ResolvedConfig } from './config'
import { Dispatcher } from './dispatch'
import {
  CancellationError,
  errorMessage,
  PreconditionError,
  ReadError,
  WriteError,
} from './errors'
import { NORMAL_CLOSURE, rawDataToString, type SocketLike } from './socket'
import { Transport } from './transport'
import type { Session } from './wire'

export type ListenerState = 'idle' | 'authorized' | 'connected' | 'listening' | 'closed'

function delay(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms))
}

/** Rejects with a CancellationError once `signal` aborts; never settles otherwise. */
function cancelledBy(signal: AbortSignal | undefined, stop: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) return
    const cleanup = () => {
      signal.removeEventListener('abort', onAbort)
      stop.removeEventListener('abort', cleanup)
    }
    const onAbort = () => {
      cleanup()
      reject(new CancellationError('listen cancelled', { cause: signal.reason }))
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    stop.addEventListener('abort', cleanup, { once: true })
  })
}

// ============================================================================
// StripeListener
// ============================================================================

/**
 * Authorizes a CLI session, opens the event socket and streams events to the
 * configured handler, acking each one.
 *
 * @example
 * ```typescript
 * const listener = StripeListener.create({ apiKey, handler })
 * const ac = new AbortController()
 * process.on('SIGINT', () => ac.abort())
 * await listener.listenAll(ac.signal)
 * ```
 */
export class StripeListener {
  private readonly transport: Transport
  private readonly dispatcher: Dispatcher
  private _state: ListenerState = 'idle'
  private stopListening: AbortController | null = null
  private closing: Promise<void> | null = null

  private constructor(private readonly cfg: ResolvedConfig) {
    this.transport = new Transport(cfg)
    this.dispatcher = new Dispatcher(cfg.handler, ack => this.transport.sendAck(ack), cfg.logger)
  }

  /** Validates `config` and builds a listener. Throws ConfigError on bad input. */
  static create(config: ListenerConfig): StripeListener {
    return new StripeListener(resolveConfig(config))
  }

  /** The session obtained during authorize(). Null before authorize(). */
  get session(): Session | null {
    return this.transport.session
  }

  get state(): ListenerState {
    return this._state
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────────

  async authorize(signal?: AbortSignal): Promise<Session> {
    this._assertOpen('authorize')
    const session = await this.transport.authorize(signal)
    this._assertNotClosing('authorize')
    this._state = 'authorized'
    return session
  }

  async connect(signal?: AbortSignal): Promise<void> {
    this._assertOpen('connect')
    await this.transport.connect(signal)
    if (this.closing) {
      this.transport.terminate()
    }
    this._assertNotClosing('connect')
    this._state = 'connected'
  }

  /**
   * Runs the read loop and the keepalive loop until one of them ends or
   * `signal` aborts, then closes the socket.
   *
   * Resolves when the peer closes normally or close() is called. Rejects with
   * ReadError or WriteError when a loop fails, and with CancellationError when
   * `signal` aborts first.
   */
  async listen(signal?: AbortSignal): Promise<void> {
    if (this._state === 'listening') throw new PreconditionError('listen() is already running')
    const socket = this.transport.socket
    if (this._state !== 'connected' || !socket) {
      throw new PreconditionError('connect() must succeed before listen()')
    }

    const stop = new AbortController()
    this.stopListening = stop
    this._state = 'listening'
    this.cfg.logger.info('listening for events')

    try {
      await Promise.race([
        cancelledBy(signal, stop.signal),
        this._readLoop(socket, stop.signal),
        this._keepaliveLoop(stop.signal),
      ])
      this.cfg.logger.info('listener stopped')
    } catch (err) {
      if (err instanceof CancellationError) this.cfg.logger.info('listener cancelled')
      else this.cfg.logger.error('listener failed', { error: errorMessage(err) })
      throw err
    } finally {
      stop.abort()
      this.stopListening = null
      await this.close()
    }
  }

  /** authorize → connect → listen; the first failure short-circuits the rest. */
  async listenAll(signal?: AbortSignal): Promise<void> {
    await this.authorize(signal)
    await this.connect(signal)
    await this.listen(signal)
  }

  /**
   * Stops listening and closes the socket: close frame, grace period, then a
   * forced close. Safe to call more than once.
   */
  close(): Promise<void> {
    this.stopListening?.abort()
    if (!this.closing) this.closing = this._shutdown()
    return this.closing
  }

  // ── Internal ──────────────────────────────────────────────────────────────

  private _assertOpen(op: string): void {
    if (this._state === 'closed') throw new PreconditionError(`${op}() called on a closed listener`)
  }

  private _assertNotClosing(op: string): void {
    if (this.closing) throw new CancellationError(`${op} cancelled: listener closed`)
  }

  private async _shutdown(): Promise<void> {
    if (this.transport.socket) {
      try {
        await this.transport.sendClose(NORMAL_CLOSURE, 'done')
        this.cfg.logger.debug('close frame sent')
      } catch (err) {
        this.cfg.logger.debug('close frame not sent', { error: errorMessage(err) })
      }
      await delay(this.cfg.closeGraceMs)
      this.transport.terminate()
    }
    this._state = 'closed'
  }

  private _readLoop(socket: SocketLike, stop: AbortSignal): Promise<void> {
    const { pongWaitMs, logger } = this.cfg

    return new Promise<void>((resolve, reject) => {
      let deadline: NodeJS.Timeout | undefined

      const refresh = () => {
        clearTimeout(deadline)
        deadline = setTimeout(onTimeout, pongWaitMs)
      }
      const finish = (err?: Error) => {
        clearTimeout(deadline)
        socket.off('message', onMessage)
        socket.off('pong', onPong)
        socket.off('close', onClose)
        socket.off('error', onError)
        stop.removeEventListener('abort', onAbort)
        if (err) reject(err)
        else resolve()
      }

      const onMessage = (data: RawData) => {
        refresh()
        this.dispatcher.handleFrame(rawDataToString(data))
      }
      const onPong = () => {
        logger.debug('pong received')
        refresh()
      }
      const onClose = (code: number, reason: Buffer) => {
        logger.info('websocket closed', { code, reason: reason.toString() })
        if (stop.aborted || code === NORMAL_CLOSURE) finish()
        else finish(new ReadError(`read: socket closed with code ${code}`))
      }
      const onError = (err: Error) => {
        if (stop.aborted) finish()
        else finish(new ReadError(`read: ${err.message}`, { cause: err }))
      }
      const onTimeout = () => {
        if (stop.aborted) finish()
        else finish(new ReadError(`read: no frame or pong within ${pongWaitMs}ms`))
      }
      const onAbort = () => finish()

      if (stop.aborted) {
        resolve()
        return
      }
      socket.on('message', onMessage)
      socket.on('pong', onPong)
      socket.on('close', onClose)
      socket.on('error', onError)
      stop.addEventListener('abort', onAbort, { once: true })
      refresh()
    })
  }

  private _keepaliveLoop(stop: AbortSignal): Promise<void> {
    const { pingPeriodMs, logger } = this.cfg

    return new Promise<void>((resolve, reject) => {
      const halt = () => {
        clearInterval(ticker)
        stop.removeEventListener('abort', onAbort)
      }
      const onAbort = () => {
        halt()
        resolve()
      }
      const ticker = setInterval(() => {
        this.transport.ping().then(
          () => logger.debug('ping sent'),
          (err: unknown) => {
            if (stop.aborted) {
              logger.debug('ping dropped during shutdown', { error: errorMessage(err) })
              return
            }
            halt()
            reject(err instanceof WriteError ? err : new WriteError(`ping: ${errorMessage(err)}`, { cause: err }))
          },
        )
      }, pingPeriodMs)

      if (stop.aborted) {
        onAbort()
        return
      }
      stop.addEventListener('abort', onAbort, { once: true })
    })
  }
}
