import { AckSendError, errorMessage, FrameDecodeError, PayloadDecodeError } from './errors'
import type { Logger } from './logger'
import {
  emptyV2Payload,
  emptyWebhookPayload,
  FrameTypeSchema,
  V2EventFrameSchema,
  V2PayloadSchema,
  WebhookEventFrameSchema,
  WebhookPayloadSchema,
  type InboundEnvelope,
  type OutboundAck,
  type V2EventEnvelope,
  type V2EventPayload,
  type WebhookEventEnvelope,
  type WebhookEventPayload,
} from './wire'

// ============================================================================
// EventHandler – the callbacks callers implement
// ============================================================================

type HandlerResult = void | Promise<void>

/**
 * Receives events in wire order, one frame at a time. The ack for an event is
 * already on its way when the callback runs. A returned promise is not awaited;
 * its rejection is logged.
 */
export interface EventHandler {
  onWebhookEvent(evt: WebhookEventEnvelope, parsed: WebhookEventPayload): HandlerResult
  onV2Event(evt: V2EventEnvelope, parsed: V2EventPayload): HandlerResult
  /** Frames with a type the listener does not model. No ack is sent for these. */
  onUnknownMessage?(rawType: string, raw: string): HandlerResult
}

// ============================================================================
// Decoding
// ============================================================================

function parseJson(text: string, fail: (cause: unknown) => Error): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    throw fail(err)
  }
}

/** Peeks `type`, then decodes the frame as the matching arm. */
export function decodeFrame(raw: string): InboundEnvelope {
  const json = parseJson(raw, cause => new FrameDecodeError('frame is not valid JSON', { cause }))
  const peek = FrameTypeSchema.safeParse(json)
  if (!peek.success) {
    throw new FrameDecodeError('frame has no readable type', { cause: peek.error })
  }
  const rawType = peek.data.type

  switch (rawType) {
    case 'webhook_event': {
      const frame = WebhookEventFrameSchema.safeParse(json)
      if (!frame.success) throw new FrameDecodeError('malformed webhook_event frame', { cause: frame.error })
      const f = frame.data
      return {
        kind: 'webhook_event',
        rawType,
        raw,
        endpointApiVersion: f.endpoint?.api_version ?? undefined,
        eventPayload: f.event_payload,
        headers: f.http_headers ?? {},
        conversationId: f.webhook_conversation_id,
        webhookId: f.webhook_id,
      }
    }
    case 'v2_event': {
      const frame = V2EventFrameSchema.safeParse(json)
      if (!frame.success) throw new FrameDecodeError('malformed v2_event frame', { cause: frame.error })
      const f = frame.data
      return {
        kind: 'v2_event',
        rawType,
        raw,
        payload: f.payload,
        headers: f.http_headers ?? {},
        destinationId: f.destination_id,
      }
    }
    default:
      return { kind: 'unrecognized', rawType, raw }
  }
}

export function parseWebhookPayload(text: string): WebhookEventPayload {
  const json = parseJson(text, cause => new PayloadDecodeError('event_payload is not valid JSON', { cause }))
  const parsed = WebhookPayloadSchema.safeParse(json)
  if (!parsed.success) {
    throw new PayloadDecodeError('event_payload is not a JSON object', { cause: parsed.error })
  }
  const p = parsed.data
  return {
    id: p.id,
    type: p.type,
    created: p.created,
    livemode: p.livemode,
    apiVersion: p.api_version,
    pendingWebhooks: p.pending_webhooks,
    data: p.data,
    fields: { ...p },
  }
}

export function parseV2Payload(text: string): V2EventPayload {
  const json = parseJson(text, cause => new PayloadDecodeError('payload is not valid JSON', { cause }))
  const parsed = V2PayloadSchema.safeParse(json)
  if (!parsed.success) {
    throw new PayloadDecodeError('payload is not a JSON object', { cause: parsed.error })
  }
  const { id, type } = parsed.data
  return { id, type, fields: { ...parsed.data } }
}

// ============================================================================
// Dispatcher
// ============================================================================

export type AckSender = (ack: OutboundAck) => Promise<void>

export class Dispatcher {
  constructor(
    private readonly handler: EventHandler,
    private readonly sendAck: AckSender,
    private readonly logger: Logger,
  ) { }

  /** Decodes and dispatches one frame. A frame that cannot be decoded is logged and dropped. */
  handleFrame(raw: string): void {
    let envelope: InboundEnvelope
    try {
      envelope = decodeFrame(raw)
    } catch (err) {
      this.logger.warn('malformed message', { error: errorMessage(err), frame: raw })
      return
    }
    this.dispatch(envelope)
  }

  dispatch(envelope: InboundEnvelope): void {
    switch (envelope.kind) {
      case 'webhook_event': {
        const parsed = this._parse(() => parseWebhookPayload(envelope.eventPayload), emptyWebhookPayload)
        this._ack({
          type: 'event_ack',
          eventId: parsed.id,
          conversationId: envelope.conversationId,
          webhookId: envelope.webhookId,
        })
        this._invoke('onWebhookEvent', () => this.handler.onWebhookEvent(envelope, parsed))
        break
      }

      case 'v2_event': {
        const parsed = this._parse(() => parseV2Payload(envelope.payload), emptyV2Payload)
        this._ack({
          type: 'event_ack',
          eventId: parsed.id,
          conversationId: '',
          webhookId: envelope.destinationId,
        })
        this._invoke('onV2Event', () => this.handler.onV2Event(envelope, parsed))
        break
      }

      case 'unrecognized': {
        const { onUnknownMessage } = this.handler
        if (!onUnknownMessage) {
          this.logger.debug('unhandled message type', { type: envelope.rawType })
          break
        }
        this._invoke('onUnknownMessage', () => onUnknownMessage.call(this.handler, envelope.rawType, envelope.raw))
        break
      }
    }
  }

  private _parse<T>(parse: () => T, empty: () => T): T {
    try {
      return parse()
    } catch (err) {
      this.logger.warn('could not parse event payload', { error: errorMessage(err) })
      return empty()
    }
  }

  private _ack(ack: OutboundAck): void {
    this.sendAck(ack).catch((err: unknown) => {
      const failure = new AckSendError(ack.eventId, { cause: err })
      this.logger.warn(failure.message, { error: errorMessage(err) })
    })
  }

  private _invoke(hook: keyof EventHandler, call: () => HandlerResult): void {
    try {
      const result = call()
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.logger.error(`${hook} rejected`, { error: errorMessage(err) })
        })
      }
    } catch (err) {
      this.logger.error(`${hook} threw`, { error: errorMessage(err) })
    }
  }
}
