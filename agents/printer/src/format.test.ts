import { describe, it, expect } from 'vitest';
import { decodeFrame, parseV2Payload, parseWebhookPayload } from '@stripe-listener/sdk';
import { formatUnknownMessage, formatV2Event, formatWebhookEvent } from './format';

describe('formatWebhookEvent', () => {
    it('prints a banner and the pretty payload', () => {
        const env = decodeFrame(JSON.stringify({
            type: 'webhook_event',
            event_payload: '{"id":"evt_1","type":"charge.succeeded"}',
            webhook_conversation_id: 'wc_1',
            webhook_id: 'we_1',
        }));
        if (env.kind !== 'webhook_event') throw new Error(`unexpected kind ${env.kind}`);

        expect(formatWebhookEvent(env, parseWebhookPayload(env.eventPayload))).toBe(
            '──── charge.succeeded [evt_1] ────\n{\n  "id": "evt_1",\n  "type": "charge.succeeded"\n}',
        );
    });
});

describe('formatV2Event', () => {
    it('marks v2 events and fills in a missing id', () => {
        const env = decodeFrame(JSON.stringify({
            type: 'v2_event',
            payload: '{"type":"v1.billing.meter.no_meter_found"}',
            destination_id: 'ed_1',
        }));
        if (env.kind !== 'v2_event') throw new Error(`unexpected kind ${env.kind}`);

        expect(formatV2Event(env, parseV2Payload(env.payload))).toBe(
            '──── V2 v1.billing.meter.no_meter_found [<no id>] ────\n{\n  "type": "v1.billing.meter.no_meter_found"\n}',
        );
    });
});

describe('formatUnknownMessage', () => {
    it('prints text that is not JSON as received', () => {
        expect(formatUnknownMessage('', 'hello')).toBe('──── UNKNOWN type=<empty> ────\nhello');
    });
});
