import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const configSchema = z.object({
    port: z.number().default(3000),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    corsOrigin: z.string().optional(), // comma-separated whitelist; unset allows all origins

    // Secret store
    secretName: z.string().min(1).optional(),
    awsRegion: z.string().default('us-east-1'),

    // Providers
    providerMode: z.enum(['simulated', 'live']).default('simulated'),
    providerTimeoutMs: z.number().int().positive().default(8000),
    bedrockModelId: z.string().default('anthropic.claude-3-haiku-20240307-v1:0'),
    azureDeployment: z.string().default('gpt-4o-mini'),
    azureApiVersion: z.string().default('2024-06-01'),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return configSchema.parse({
        port: parseInt(env.PORT || '3000', 10),
        nodeEnv: env.NODE_ENV,
        logLevel: env.LOG_LEVEL || undefined,
        corsOrigin: env.CORS_ORIGIN || undefined,
        secretName: env.SECRET_NAME || undefined,
        awsRegion: env.AWS_REGION,
        providerMode: env.PROVIDER_MODE,
        providerTimeoutMs: parseInt(env.PROVIDER_TIMEOUT_MS || '8000', 10),
        bedrockModelId: env.BEDROCK_MODEL_ID,
        azureDeployment: env.AZURE_OPENAI_DEPLOYMENT,
        azureApiVersion: env.AZURE_OPENAI_API_VERSION,
    });
}

export const config = loadConfig();
