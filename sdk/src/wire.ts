import { z } from 'zod'
import { AuthError } from './errors'

// ============================================================================
// Session (POST /v1/stripecli/sessions response)
// ============================================================================

export const SessionResponseSchema = z.object({
  reconnect_delay: z.number().default(0),
  secret: z.string().default(''),
  websocket_authorized_feature: z.string(),
  websocket_id: z.string(),
  websocket_url: z.string(),
  default_version: z.string().default(''),
  latest_version: z.string().default(''),
})

export type SessionResponse = z.infer<typeof SessionResponseSchema>

/**
 * Server-issued authorization result. Immutable once created; the only valid
 * input for dialing the event socket.
 */
export interface Session {
  /** Seconds the server asks clients to wait before reconnecting. */
  reconnectDelay: number
  secret: string
  /** The feature the socket is bound to, e.g. `webhooks`. */
  authorizedFeature: string
  socketId: string
  socketUrl: string
  /** Wire field `default_version`. */
  minVersion: string
  /** Wire field `latest_version`. */
  maxVersion: string
}

export function toSession(body: string): Session {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (err) {
    throw new AuthError('decode session: response is not JSON', { body, cause: err })
  }
  const parsed = SessionResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw new AuthError(`decode session: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`, {
      body,
      cause: parsed.error,
    })
  }
  const s = parsed.data
  return Object.freeze({
    reconnectDelay: s.reconnect_delay,
    secret: s.secret,
    authorizedFeature: s.websocket_authorized_feature,
    socketId: s.websocket_id,
    socketUrl: s.websocket_url,
    minVersion: s.default_version,
    maxVersion: s.latest_version,
  })
}

// ============================================================================
// Inbound frames
//
// Decoding is two-phase: the `type` discriminator is peeked first, then the
// frame is decoded against the schema of the matching arm.
// ============================================================================

export const FrameTypeSchema = z.object({
  type: z.string().nullish().transform(t => t ?? ''),
})

export const WebhookEventFrameSchema = z.object({
  type: z.literal('webhook_event'),
  endpoint: z.object({ api_version: z.string().nullish() }).nullish(),
  event_payload: z.string().default(''),
  http_headers: z.record(z.string()).nullish(),
  webhook_conversation_id: z.string().default(''),
  webhook_id: z.string().default(''),
})

export const V2EventFrameSchema = z.object({
  type: z.literal('v2_event'),
  payload: z.string().default(''),
  http_headers: z.record(z.string()).nullish(),
  destination_id: z.string().default(''),
})

interface EnvelopeBase {
  /** The `type` string exactly as it appeared on the wire. */
  rawType: string
  /** The full frame text. */
  raw: string
}

export interface WebhookEventEnvelope extends EnvelopeBase {
  kind: 'webhook_event'
  endpointApiVersion?: string
  /** Embedded event JSON, still encoded. */
  eventPayload: string
  headers: Record<string, string>
  conversationId: string
  webhookId: string
}

export interface V2EventEnvelope extends EnvelopeBase {
  kind: 'v2_event'
  /** Embedded event JSON, still encoded. */
  payload: string
  headers: Record<string, string>
  destinationId: string
}

export interface UnrecognizedEnvelope extends EnvelopeBase {
  kind: 'unrecognized'
}

export type InboundEnvelope = WebhookEventEnvelope | V2EventEnvelope | UnrecognizedEnvelope

// ============================================================================
// Parsed inner payloads
// ============================================================================

export const WebhookPayloadSchema = z.object({
  id: z.string().catch(''),
  type: z.string().catch(''),
  created: z.number().int().catch(0),
  livemode: z.boolean().catch(false),
  api_version: z.string().catch(''),
  pending_webhooks: z.number().int().catch(0),
  data: z.record(z.unknown()).catch({}),
}).passthrough()

export const V2PayloadSchema = z.object({
  id: z.string().catch(''),
  type: z.string().catch(''),
}).passthrough()

export interface WebhookEventPayload {
  id: string
  type: string
  /** Unix seconds. */
  created: number
  livemode: boolean
  apiVersion: string
  pendingWebhooks: number
  data: Record<string, unknown>
  /** Every top-level field of the decoded payload, modelled or not. */
  fields: Record<string, unknown>
}

export interface V2EventPayload {
  id: string
  type: string
  fields: Record<string, unknown>
}

export function emptyWebhookPayload(): WebhookEventPayload {
  return { id: '', type: '', created: 0, livemode: false, apiVersion: '', pendingWebhooks: 0, data: {}, fields: {} }
}

export function emptyV2Payload(): V2EventPayload {
  return { id: '', type: '', fields: {} }
}

// ============================================================================
// Outbound
// ============================================================================

export interface OutboundAck {
  type: 'event_ack'
  eventId: string
  conversationId: string
  webhookId: string
}

export interface EventAckFrame {
  type: 'event_ack'
  event_id: string
  webhook_conversation_id: string
  webhook_id: string
}

export function encodeAck(ack: OutboundAck): string {
  const frame: EventAckFrame = {
    type: ack.type,
    event_id: ack.eventId,
    webhook_conversation_id: ack.conversationId,
    webhook_id: ack.webhookId,
  }
  return JSON.stringify(frame)
}
