import type {
    V2EventEnvelope,
    V2EventPayload,
    WebhookEventEnvelope,
    WebhookEventPayload,
} from '@stripe-listener/sdk';

function pretty(text: string): string {
    try {
        return JSON.stringify(JSON.parse(text), null, 2);
    } catch {
        // Not JSON; print it as received.
        return text;
    }
}

export function formatWebhookEvent(evt: WebhookEventEnvelope, parsed: WebhookEventPayload): string {
    return `──── ${parsed.type || '<untyped>'} [${parsed.id || '<no id>'}] ────\n${pretty(evt.eventPayload)}`;
}

export function formatV2Event(evt: V2EventEnvelope, parsed: V2EventPayload): string {
    return `──── V2 ${parsed.type || '<untyped>'} [${parsed.id || '<no id>'}] ────\n${pretty(evt.payload)}`;
}

export function formatUnknownMessage(rawType: string, raw: string): string {
    return `──── UNKNOWN type=${rawType || '<empty>'} ────\n${pretty(raw)}`;
}
