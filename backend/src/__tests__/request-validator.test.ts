import { describe, it, expect } from 'vitest';
import {
    validateRequest,
    MISSING_FIELDS_MESSAGE,
    INVALID_TARGET_MESSAGE,
    INVALID_JSON_MESSAGE,
} from '../services/dispatch';
import { MethodNotAllowedError, ValidationError } from '../errors';

function post(body: unknown) {
    return { method: 'POST', body: JSON.stringify(body) };
}

describe('Request Validator', () => {
    describe('method check', () => {
        it.each(['GET', 'PUT', 'DELETE', 'PATCH'])('should reject %s regardless of body', (method) => {
            const message = { method, body: JSON.stringify({ prompt: 'hello', target_model: 'bedrock' }) };

            expect(() => validateRequest(message)).toThrow(MethodNotAllowedError);
            expect(() => validateRequest(message)).toThrow('Method Not Allowed, only POST supported');
        });

        it('should reject a wrong method before looking at a broken body', () => {
            expect(() => validateRequest({ method: 'GET', body: '{not json' })).toThrow(MethodNotAllowedError);
        });

        it('should compare the method case-sensitively', () => {
            const message = { method: 'post', body: JSON.stringify({ prompt: 'hi', target_model: 'azure' }) };
            expect(() => validateRequest(message)).toThrow(MethodNotAllowedError);
        });
    });

    describe('required fields', () => {
        it('should reject an empty object', () => {
            expect(() => validateRequest(post({}))).toThrow(ValidationError);
            expect(() => validateRequest(post({}))).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should treat a missing body as an empty object', () => {
            expect(() => validateRequest({ method: 'POST' })).toThrow(MISSING_FIELDS_MESSAGE);
            expect(() => validateRequest({ method: 'POST', body: null })).toThrow(MISSING_FIELDS_MESSAGE);
            expect(() => validateRequest({ method: 'POST', body: '   ' })).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should reject an empty prompt', () => {
            expect(() => validateRequest(post({ prompt: '', target_model: 'bedrock' }))).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should reject an empty target_model', () => {
            expect(() => validateRequest(post({ prompt: 'hello', target_model: '' }))).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should reject non-string fields', () => {
            expect(() => validateRequest(post({ prompt: 42, target_model: 'bedrock' }))).toThrow(MISSING_FIELDS_MESSAGE);
            expect(() => validateRequest(post({ prompt: 'hello', target_model: ['azure'] }))).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should reject bodies that are not JSON objects', () => {
            expect(() => validateRequest(post(null))).toThrow(MISSING_FIELDS_MESSAGE);
            expect(() => validateRequest(post(['hello', 'bedrock']))).toThrow(MISSING_FIELDS_MESSAGE);
            expect(() => validateRequest(post('hello'))).toThrow(MISSING_FIELDS_MESSAGE);
        });

        it('should reject invalid JSON', () => {
            expect(() => validateRequest({ method: 'POST', body: '{"prompt": "hello",' })).toThrow(INVALID_JSON_MESSAGE);
        });
    });

    describe('target_model', () => {
        it('should reject unsupported providers', () => {
            expect(() => validateRequest(post({ prompt: 'x', target_model: 'openai' }))).toThrow(ValidationError);
            expect(() => validateRequest(post({ prompt: 'x', target_model: 'openai' }))).toThrow(INVALID_TARGET_MESSAGE);
        });

        it('should not trim or alias provider names', () => {
            expect(() => validateRequest(post({ prompt: 'x', target_model: ' bedrock' }))).toThrow(INVALID_TARGET_MESSAGE);
            expect(() => validateRequest(post({ prompt: 'x', target_model: 'azure_openai' }))).toThrow(INVALID_TARGET_MESSAGE);
        });

        it.each([
            ['bedrock', 'bedrock'],
            ['BEDROCK', 'bedrock'],
            ['BedRock', 'bedrock'],
            ['azure', 'azure'],
            ['AZURE', 'azure'],
        ])('should fold %s to %s', (input, expected) => {
            const request = validateRequest(post({ prompt: 'hello', target_model: input }));
            expect(request.target).toBe(expected);
            expect(request.prompt).toBe('hello');
        });

        it('should ignore unknown extra fields', () => {
            const request = validateRequest(post({ prompt: 'hello', target_model: 'azure', temperature: 0.5 }));
            expect(request).toEqual({ prompt: 'hello', target: 'azure' });
        });
    });

    it('should map error classes to their status codes', () => {
        expect(new ValidationError(MISSING_FIELDS_MESSAGE).statusCode).toBe(400);
        expect(new MethodNotAllowedError('GET').statusCode).toBe(405);
    });
});
