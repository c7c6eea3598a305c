import { describe, it, expect, vi } from 'vitest'
import { FakeSocket, fakeSocketFactory, sessionFetch } from './__test__/fake-socket'
import type { ListenerConfig } from './config'
import {
  AuthError,
  CancellationError,
  ConfigError,
  ConnectError,
  PreconditionError,
  ReadError,
  WriteError,
} from './errors'
import { StripeListener } from './listener'
import type { Logger } from './logger'

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger
}

function mockHandler() {
  return { onWebhookEvent: vi.fn(), onV2Event: vi.fn(), onUnknownMessage: vi.fn() }
}

function webhookFrame(payload: unknown) {
  return JSON.stringify({
    type: 'webhook_event',
    endpoint: { api_version: '2024-06-20' },
    event_payload: JSON.stringify(payload),
    http_headers: { 'Stripe-Signature': 't=1,v1=abc' },
    webhook_conversation_id: 'wc_1',
    webhook_id: 'we_1',
  })
}

function build(overrides: Partial<ListenerConfig> = {}) {
  const createSocket = fakeSocketFactory()
  const logger = mockLogger()
  const handler = mockHandler()
  const listener = StripeListener.create({
    apiKey: 'sk_test_placeholder',
    handler,
    logger,
    fetch: sessionFetch(),
    createSocket,
    pongWaitMs: 1_000,
    pingPeriodMs: 20,
    writeWaitMs: 50,
    closeGraceMs: 5,
    ...overrides,
  })
  return { listener, createSocket, logger, handler }
}

async function startListening(overrides: Partial<ListenerConfig> = {}) {
  const ctx = build(overrides)
  const ac = new AbortController()
  const outcome = ctx.listener.listenAll(ac.signal).then(() => 'resolved' as const, (err: unknown) => err)
  await vi.waitFor(() => expect(ctx.listener.state).toBe('listening'), { interval: 1 })
  const socket: FakeSocket = ctx.createSocket.sockets[0]
  return { ...ctx, ac, outcome, socket }
}

describe('StripeListener.create', () => {
  it('rejects an empty api key', () => {
    expect(() => StripeListener.create({ apiKey: '', handler: mockHandler() })).toThrow(ConfigError)
  })

  it('starts idle without a session', () => {
    const { listener } = build()

    expect(listener.state).toBe('idle')
    expect(listener.session).toBeNull()
  })
})

describe('StripeListener events', () => {
  it('acks a webhook event before handing it to the handler', async () => {
    const { socket, handler, ac, outcome, listener } = await startListening()
    const sentAtCallback: number[] = []
    handler.onWebhookEvent.mockImplementation(() => {
      sentAtCallback.push(socket.sent.length)
    })

    expect(listener.session?.socketId).toBe('ws_1')
    expect(socket.url).toBe('wss://events.example.test/subscribe?websocket_feature=webhooks')

    socket.receive(webhookFrame({ id: 'evt_1', type: 'charge.succeeded' }))

    expect(socket.sent).toEqual(['{"type":"event_ack","event_id":"evt_1","webhook_conversation_id":"wc_1","webhook_id":"we_1"}'])
    expect(handler.onWebhookEvent).toHaveBeenCalledTimes(1)
    expect(sentAtCallback).toEqual([1])
    const [evt, parsed] = handler.onWebhookEvent.mock.calls[0]
    expect(evt.conversationId).toBe('wc_1')
    expect(parsed.type).toBe('charge.succeeded')

    ac.abort()
    await outcome
  })

  it('puts each ack on the socket before its callback when frames arrive back to back', async () => {
    const { socket, handler, ac, outcome } = await startListening()
    const seen: Array<[string, number]> = []
    handler.onWebhookEvent.mockImplementation((_evt: unknown, parsed: { id: string }) => {
      seen.push([parsed.id, socket.sent.length])
    })

    socket.receive(webhookFrame({ id: 'evt_1', type: 'charge.succeeded' }))
    socket.receive(webhookFrame({ id: 'evt_2', type: 'charge.succeeded' }))

    expect(seen).toEqual([['evt_1', 1], ['evt_2', 2]])

    ac.abort()
    await outcome
  })

  it('puts the ack on the socket before its callback while a ping is in flight', async () => {
    const { socket, handler, ac, outcome } = await startListening({ writeWaitMs: 1_000 })
    const sentAtCallback: number[] = []
    handler.onWebhookEvent.mockImplementation(() => {
      sentAtCallback.push(socket.sent.length)
    })
    socket.holdCallbacks = true
    await vi.waitFor(() => expect(socket.heldCallbacks).toBeGreaterThan(0), { interval: 1 })

    socket.receive(webhookFrame({ id: 'evt_1', type: 'charge.succeeded' }))

    expect(sentAtCallback).toEqual([1])
    socket.releaseCallbacks()
    ac.abort()
    expect(await outcome).toBeInstanceOf(CancellationError)
  })

  it('acks a v2 event against its destination', async () => {
    const { socket, handler, ac, outcome } = await startListening()

    socket.receive({
      type: 'v2_event',
      payload: '{"id":"evt_v2_1","type":"v1.billing.meter.error_report_triggered"}',
      http_headers: {},
      destination_id: 'ed_1',
    })

    expect(socket.sent).toEqual(['{"type":"event_ack","event_id":"evt_v2_1","webhook_conversation_id":"","webhook_id":"ed_1"}'])
    expect(handler.onV2Event).toHaveBeenCalledTimes(1)

    ac.abort()
    await outcome
  })

  it('passes unknown frames through without an ack', async () => {
    const { socket, handler, ac, outcome } = await startListening()
    const raw = '{"type":"ping_custom"}'

    socket.receive(raw)

    expect(handler.onUnknownMessage).toHaveBeenCalledWith('ping_custom', raw)
    expect(handler.onWebhookEvent).not.toHaveBeenCalled()
    expect(socket.sent).toEqual([])

    ac.abort()
    await outcome
  })

  it('keeps reading after a malformed frame', async () => {
    const { socket, handler, logger, ac, outcome } = await startListening()

    socket.receive('not json')
    socket.receive(webhookFrame({ id: 'evt_2', type: 'charge.refunded' }))

    expect(logger.warn).toHaveBeenCalledWith('malformed message', { error: 'frame is not valid JSON', frame: 'not json' })
    expect(handler.onWebhookEvent).toHaveBeenCalledTimes(1)
    expect(socket.sent).toHaveLength(1)

    ac.abort()
    await outcome
  })

  it('logs a failed ack and keeps reading', async () => {
    const { socket, handler, logger, ac, outcome } = await startListening()
    socket.sendError = new Error('broken pipe')

    socket.receive(webhookFrame({ id: 'evt_3', type: 'charge.succeeded' }))
    await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledWith('ack failed for evt_3', { error: 'ack: broken pipe' }), { interval: 1 })

    socket.sendError = null
    socket.receive(webhookFrame({ id: 'evt_4', type: 'charge.succeeded' }))

    expect(handler.onWebhookEvent).toHaveBeenCalledTimes(2)
    expect(socket.sent).toEqual(['{"type":"event_ack","event_id":"evt_4","webhook_conversation_id":"wc_1","webhook_id":"we_1"}'])

    ac.abort()
    await outcome
  })
})

describe('StripeListener shutdown', () => {
  it('sends a close frame then terminates when the signal aborts', async () => {
    const { socket, ac, outcome, listener } = await startListening()

    ac.abort()

    expect(await outcome).toBeInstanceOf(CancellationError)
    expect(socket.writes.at(-1)).toEqual({ kind: 'close', code: 1000, reason: 'done' })
    expect(socket.terminate).toHaveBeenCalledTimes(1)
    expect(listener.state).toBe('closed')
  })

  it('resolves when close() is called', async () => {
    const { socket, outcome, listener } = await startListening()

    await listener.close()

    expect(await outcome).toBe('resolved')
    expect(socket.writes.filter(w => w.kind === 'close')).toHaveLength(1)
    expect(listener.state).toBe('closed')
  })

  it('resolves when the peer closes normally', async () => {
    const { socket, outcome, listener } = await startListening()

    socket.peerClose(1000, 'bye')

    expect(await outcome).toBe('resolved')
    expect(listener.state).toBe('closed')
  })

  it('terminates a socket that opens after close()', async () => {
    const createSocket = fakeSocketFactory(false)
    const { listener } = build({ createSocket })
    await listener.authorize()

    const connecting = listener.connect().then(() => 'resolved' as const, (err: unknown) => err)
    await listener.close()
    const socket = createSocket.sockets[0]
    socket.open()

    const err = await connecting
    expect(err).toBeInstanceOf(CancellationError)
    expect(err).toHaveProperty('message', 'connect cancelled: listener closed')
    expect(socket.terminate).toHaveBeenCalledTimes(1)
    expect(listener.state).toBe('closed')
  })

  it('refuses to start again once closed', async () => {
    const { socket, outcome, listener } = await startListening()
    socket.peerClose(1000)
    await outcome

    await expect(listener.authorize()).rejects.toThrow(new PreconditionError('authorize() called on a closed listener'))
  })
})

describe('StripeListener failures', () => {
  it('fails with ReadError on an abnormal close', async () => {
    const { socket, outcome, listener } = await startListening()

    socket.peerClose(1011, 'internal error')

    const err = await outcome
    expect(err).toBeInstanceOf(ReadError)
    expect(err).toHaveProperty('message', 'read: socket closed with code 1011')
    expect(listener.state).toBe('closed')
  })

  it('fails with ReadError on a socket error', async () => {
    const { socket, outcome } = await startListening()

    socket.emit('error', new Error('read ECONNRESET'))

    const err = await outcome
    expect(err).toBeInstanceOf(ReadError)
    expect(err).toHaveProperty('message', 'read: read ECONNRESET')
  })

  it('fails with ReadError when neither a frame nor a pong arrives in time', async () => {
    const { outcome, socket } = await startListening({ pongWaitMs: 60, pingPeriodMs: 20 })

    const err = await outcome
    expect(err).toBeInstanceOf(ReadError)
    expect(err).toHaveProperty('message', 'read: no frame or pong within 60ms')
    expect(socket.pings).toBeGreaterThan(0)
  })

  it('stays up while pongs keep arriving', async () => {
    const { socket, ac, outcome, listener } = await startListening({ pongWaitMs: 60, pingPeriodMs: 20 })
    socket.autoPong = true

    await new Promise(r => setTimeout(r, 150))

    expect(listener.state).toBe('listening')
    ac.abort()
    expect(await outcome).toBeInstanceOf(CancellationError)
  })

  it('fails with WriteError when a ping cannot be written', async () => {
    const { socket, outcome } = await startListening()
    socket.pingError = new Error('socket hang up')

    const err = await outcome
    expect(err).toBeInstanceOf(WriteError)
    expect(err).toHaveProperty('message', 'ping: socket hang up')
  })

  it('fails with AuthError and never dials when the key is rejected', async () => {
    const { listener, createSocket } = build({ fetch: sessionFetch('{"error":{"message":"Invalid API Key"}}', 401) })

    await expect(listener.listenAll()).rejects.toBeInstanceOf(AuthError)
    expect(createSocket.sockets).toHaveLength(0)
    expect(listener.state).toBe('idle')
  })

  it('fails with ConnectError when the dial fails', async () => {
    const { listener } = build({
      createSocket: (url, protocols, options) => {
        const s = new FakeSocket(url, protocols, options)
        setImmediate(() => s.emit('error', new Error('connect ECONNREFUSED')))
        return s
      },
    })

    await expect(listener.listenAll()).rejects.toThrow(new ConnectError('websocket dial: connect ECONNREFUSED'))
    expect(listener.state).toBe('authorized')
  })
})

describe('StripeListener preconditions', () => {
  it('requires authorize before connect', async () => {
    const { listener } = build()

    await expect(listener.connect()).rejects.toThrow(new PreconditionError('authorize() must succeed before connect()'))
  })

  it('requires a successful authorize before connect', async () => {
    const { listener } = build({ fetch: sessionFetch('unauthorized', 401) })
    await listener.authorize().catch(() => undefined)

    await expect(listener.connect()).rejects.toBeInstanceOf(PreconditionError)
  })

  it('requires connect before listen', async () => {
    const { listener } = build()
    await listener.authorize()

    await expect(listener.listen()).rejects.toThrow(new PreconditionError('connect() must succeed before listen()'))
  })

  it('refuses a second concurrent listen', async () => {
    const { listener, ac, outcome } = await startListening()

    await expect(listener.listen()).rejects.toThrow(new PreconditionError('listen() is already running'))

    ac.abort()
    await outcome
  })
})
