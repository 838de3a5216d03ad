import { DispatchResult, DispatchStatusCode, ErrorResponse, ProviderResponse } from '../../types';
import { DispatchError, INTERNAL_ERROR_MESSAGE, isDispatchError } from '../../errors';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function formatSuccess(response: ProviderResponse): DispatchResult {
    return {
        statusCode: 200,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify({ model: response.model, reply: response.reply }),
    };
}

/**
 * Map any thrown value to the error envelope. Only a DispatchError's public
 * message is exposed; everything else becomes the generic 500 text.
 */
export function formatError(err: unknown): DispatchResult {
    const statusCode: DispatchStatusCode = isDispatchError(err) ? err.statusCode : 500;
    const payload: ErrorResponse = { error: publicMessageOf(err) };

    const headers: Record<string, string> = { ...JSON_HEADERS };
    if (statusCode === 405) {
        headers.Allow = 'POST';
    }

    return { statusCode, headers, body: JSON.stringify(payload) };
}

function publicMessageOf(err: unknown): string {
    if (err instanceof DispatchError) return err.publicMessage;
    return INTERNAL_ERROR_MESSAGE;
}
