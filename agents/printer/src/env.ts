import { z } from 'zod';
import { isLogLevel, type LogLevel } from '@stripe-listener/sdk';

const EnvSchema = z.object({
    STRIPE_API_KEY: z.string({ required_error: 'STRIPE_API_KEY is not set' }).min(1, 'STRIPE_API_KEY is empty'),
    STRIPE_DEVICE_NAME: z.string().min(1).optional(),
    STRIPE_WEBSOCKET_FEATURES: z.string().optional(),
    STRIPE_API_BASE: z.string().url().optional(),
    LOG_LEVEL: z.string().refine(isLogLevel, 'LOG_LEVEL must be one of debug, info, warn, error').optional(),
});

export interface PrinterEnv {
    apiKey: string;
    deviceName?: string;
    webSocketFeatures?: string[];
    apiBase?: string;
    logLevel: LogLevel;
}

export function readEnv(env: NodeJS.ProcessEnv): PrinterEnv {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(parsed.error.issues.map((i) => i.message).join('; '));
    }
    const e = parsed.data;
    const features = e.STRIPE_WEBSOCKET_FEATURES
        ?.split(',')
        .map((f) => f.trim())
        .filter((f) => f.length > 0);

    return {
        apiKey: e.STRIPE_API_KEY,
        deviceName: e.STRIPE_DEVICE_NAME,
        webSocketFeatures: features && features.length > 0 ? features : undefined,
        apiBase: e.STRIPE_API_BASE,
        logLevel: e.LOG_LEVEL ?? 'info',
    };
}
