import * as dotenv from 'dotenv';
import { CancellationError, StripeListener, consoleLogger, type EventHandler } from '@stripe-listener/sdk';
import { readEnv } from './env';
import { formatUnknownMessage, formatV2Event, formatWebhookEvent } from './format';

dotenv.config();

const handler: EventHandler = {
    onWebhookEvent(evt, parsed) {
        console.log(`\n${formatWebhookEvent(evt, parsed)}`);
    },
    onV2Event(evt, parsed) {
        console.log(`\n${formatV2Event(evt, parsed)}`);
    },
    onUnknownMessage(rawType, raw) {
        console.log(`\n${formatUnknownMessage(rawType, raw)}`);
    },
};

async function run() {
    const env = readEnv(process.env);

    const listener = StripeListener.create({
        apiKey: env.apiKey,
        deviceName: env.deviceName,
        webSocketFeatures: env.webSocketFeatures,
        apiBase: env.apiBase,
        logger: consoleLogger(env.logLevel),
        handler,
    });

    // Graceful shutdown
    const ac = new AbortController();
    process.on('SIGINT', () => ac.abort());
    process.on('SIGTERM', () => ac.abort());

    console.log('Starting event printer...');
    try {
        await listener.listenAll(ac.signal);
    } catch (err) {
        if (!(err instanceof CancellationError)) throw err;
    }
    console.log('\nDone.');
}

run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
