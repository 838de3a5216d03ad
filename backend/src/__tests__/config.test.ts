import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const cfg = loadConfig({});

        expect(cfg).toMatchObject({
            port: 3000,
            nodeEnv: 'development',
            awsRegion: 'us-east-1',
            providerMode: 'simulated',
            providerTimeoutMs: 8000,
            azureApiVersion: '2024-06-01',
        });
        expect(cfg.secretName).toBeUndefined();
    });

    it('should read the secret identifier and provider settings from the environment', () => {
        const cfg = loadConfig({
            SECRET_NAME: 'AIServiceSecrets',
            PROVIDER_MODE: 'live',
            PROVIDER_TIMEOUT_MS: '2500',
            AZURE_OPENAI_DEPLOYMENT: 'test-deployment',
        });

        expect(cfg.secretName).toBe('AIServiceSecrets');
        expect(cfg.providerMode).toBe('live');
        expect(cfg.providerTimeoutMs).toBe(2500);
        expect(cfg.azureDeployment).toBe('test-deployment');
    });

    it('should treat an empty SECRET_NAME as unset', () => {
        expect(loadConfig({ SECRET_NAME: '' }).secretName).toBeUndefined();
    });

    it('should reject unknown provider modes', () => {
        expect(() => loadConfig({ PROVIDER_MODE: 'mock' })).toThrow();
    });

    it('should reject a non-numeric timeout', () => {
        expect(() => loadConfig({ PROVIDER_TIMEOUT_MS: 'soon' })).toThrow();
    });
});
