import pino from 'pino';
import { config } from '../config';

// Credential fields by every name they travel under
export const REDACTED_PATHS = [
    'credentials',
    '*.credentials',
    'bedrockApiKey',
    'azureApiKey',
    'azureEndpoint',
    'endpoint',
    '*.bedrockApiKey',
    '*.azureApiKey',
    '*.azureEndpoint',
    '*.endpoint',
];

export function createLogger(options: { level?: string; destination?: pino.DestinationStream } = {}) {
    const opts: pino.LoggerOptions = {
        level: options.level ?? config.logLevel ?? (config.nodeEnv === 'production' ? 'info' : (config.nodeEnv === 'test' ? 'silent' : 'debug')),
        serializers: pino.stdSerializers,
        base: { service: 'prompt-router' },
        redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    };

    if (options.destination) {
        return pino(opts, options.destination);
    }

    // Only use pino-pretty in development (not test/production)
    if (config.nodeEnv === 'development') {
        try {
            require.resolve('pino-pretty');
            opts.transport = { target: 'pino-pretty', options: { colorize: true } };
        } catch {
            // pino-pretty not installed, skip
        }
    }

    return pino(opts);
}

export const logger = createLogger();

export type Logger = pino.Logger;
