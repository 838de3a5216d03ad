// ─── Request Types ───

export const TARGET_MODELS = ['bedrock', 'azure'] as const;

export type TargetModel = (typeof TARGET_MODELS)[number];

/**
 * A validated inbound request. `target` is already case-folded.
 */
export interface DispatchRequest {
    prompt: string;
    target: TargetModel;
}

/**
 * Transport-neutral view of an inbound message. `body` is the raw request text.
 */
export interface InboundMessage {
    method: string;
    body?: string | null;
}

// ─── Credentials ───

export interface CredentialSet {
    bedrockApiKey: string;
    azureApiKey: string;
    azureEndpoint: string;
}

// ─── Responses ───

export type ProviderModelName = 'bedrock' | 'azure_openai';

export interface ProviderResponse {
    readonly model: ProviderModelName;
    readonly reply: string;
}

export interface ErrorResponse {
    error: string;
}

export type DispatchStatusCode = 200 | 400 | 405 | 500;

export interface DispatchResult {
    statusCode: DispatchStatusCode;
    headers: Record<string, string>;
    body: string;
}
