// ============================================================================
// Error taxonomy
//
// Only setup-phase and loop-fatal errors ever reach the caller of listen() or
// listenAll(). Frame, payload and ack failures are built so they can be logged
// with a stable code, then dropped.
// ============================================================================

export type ListenerErrorCode =
  | 'config'
  | 'auth'
  | 'connect'
  | 'precondition'
  | 'frame_decode'
  | 'payload_decode'
  | 'ack_send'
  | 'read'
  | 'write'
  | 'cancelled'

export class ListenerError extends Error {
  readonly code: ListenerErrorCode

  constructor(code: ListenerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** The listener configuration failed validation. */
export class ConfigError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options)
  }
}

/**
 * The session request failed. `status` and `body` are set when the server
 * answered with a non-2xx response; `body` is kept verbatim.
 */
export class AuthError extends ListenerError {
  readonly status?: number
  readonly body?: string

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super('auth', message, { cause: options.cause })
    this.status = options.status
    this.body = options.body
  }
}

/** The socket dial or upgrade failed. `body` carries the server's rejection text, if any. */
export class ConnectError extends ListenerError {
  readonly status?: number
  readonly body?: string

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super('connect', message, { cause: options.cause })
    this.status = options.status
    this.body = options.body
  }
}

export class PreconditionError extends ListenerError {
  constructor(message: string) {
    super('precondition', message)
  }
}

export class FrameDecodeError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('frame_decode', message, options)
  }
}

export class PayloadDecodeError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('payload_decode', message, options)
  }
}

export class AckSendError extends ListenerError {
  readonly eventId: string

  constructor(eventId: string, options?: { cause?: unknown }) {
    super('ack_send', `ack failed for ${eventId || '<no id>'}`, options)
    this.eventId = eventId
  }
}

export class ReadError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('read', message, options)
  }
}

export class WriteError extends ListenerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('write', message, options)
  }
}

export class CancellationError extends ListenerError {
  constructor(message = 'listener cancelled', options?: { cause?: unknown }) {
    super('cancelled', message, options)
  }
}

export function isListenerError(err: unknown): err is ListenerError {
  return err instanceof ListenerError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
