import { z } from 'zod';
import { DispatchRequest, InboundMessage, TARGET_MODELS, TargetModel } from '../../types';
import { MethodNotAllowedError, ValidationError } from '../../errors';

export const MISSING_FIELDS_MESSAGE = "Missing 'prompt' or 'target_model' in request body";
export const INVALID_TARGET_MESSAGE = "Invalid target_model, choose 'bedrock' or 'azure'";
export const INVALID_JSON_MESSAGE = 'Invalid JSON in request body';

const requestBodySchema = z.object({
    prompt: z.string().min(1),
    target_model: z.string().min(1),
});

function isTargetModel(value: string): value is TargetModel {
    return TARGET_MODELS.some((model) => model === value);
}

/**
 * Turn a raw inbound message into a DispatchRequest, or throw.
 * The method check runs first so a wrong method wins over any body problem.
 */
export function validateRequest(message: InboundMessage): DispatchRequest {
    if (message.method !== 'POST') {
        throw new MethodNotAllowedError(message.method);
    }

    const parsed = requestBodySchema.safeParse(parseBody(message.body));
    if (!parsed.success) {
        throw new ValidationError(MISSING_FIELDS_MESSAGE);
    }

    const target = parsed.data.target_model.toLowerCase();
    if (!isTargetModel(target)) {
        throw new ValidationError(INVALID_TARGET_MESSAGE);
    }

    return { prompt: parsed.data.prompt, target };
}

function parseBody(body: string | null | undefined): unknown {
    if (body === undefined || body === null || body.trim() === '') {
        return {};
    }
    try {
        return JSON.parse(body);
    } catch {
        throw new ValidationError(INVALID_JSON_MESSAGE);
    }
}
