import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { jsonResponse } from './fixtures.js';

describe('HttpClient', () => {
    let client: HttpClient;
    let fetchMock: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, maxRetries: 1, version: '0.0.0-test', email: 'test@example.org' });
        fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('openalex')).toBe(0);
        });

        it('should count attempts per source', async () => {
            fetchMock.mockImplementation(() => Promise.resolve(jsonResponse({ ok: true })));

            await client.get('https://api.example.org/a', { source: 'openalex' });
            await client.get('https://api.example.org/b', { source: 'openalex' });
            await client.get('https://api.example.org/c');

            expect(client.getRequestCount('openalex')).toBe(2);
            expect(client.getRequestCount('default')).toBe(1);
        });
    });

    describe('get', () => {
        it('should decode JSON bodies', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ results: [1, 2] }));

            const response = await client.get<{ results: number[] }>('https://api.example.org/works');

            expect(response.status).toBe(200);
            expect(response.ok).toBe(true);
            expect(response.data).toEqual({ results: [1, 2] });
        });

        it('should return text for non-JSON bodies', async () => {
            fetchMock.mockResolvedValueOnce(new Response('plain body', { status: 200, headers: { 'content-type': 'text/plain' } }));

            const response = await client.get('https://api.example.org/text');
            expect(response.data).toBe('plain body');
        });

        it('should send a User-Agent with the contact address', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({}));

            await client.get('https://api.example.org/works');

            const init: unknown = fetchMock.mock.calls[0]?.[1];
            expect(init).toMatchObject({
                method: 'GET',
                headers: { 'User-Agent': 'bibharvest/0.0.0-test (mailto:test@example.org)' },
            });
        });

        it('should fail immediately on a non-retryable status', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'missing' }, 404));

            const error = await client.get('https://api.example.org/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: { error: 'missing' } });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should retry a 503 and succeed', async () => {
            fetchMock
                .mockResolvedValueOnce(jsonResponse({}, 503, { 'retry-after': '0' }))
                .mockResolvedValueOnce(jsonResponse({ recovered: true }));

            const response = await client.get('https://api.example.org/flaky');

            expect(response.data).toEqual({ recovered: true });
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should give up after maxRetries on a persistent 503', async () => {
            fetchMock.mockImplementation(() => Promise.resolve(jsonResponse({}, 503, { 'retry-after': '0' })));

            const error = await client.get('https://api.example.org/down').catch((e: unknown) => e);

            expect(error).toMatchObject({ name: 'HttpError', status: 503, retryable: true });
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should wrap non-retryable network failures', async () => {
            fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

            const error = await client.get('https://api.example.org/offline').catch((e: unknown) => e);

            expect(error).toMatchObject({ name: 'HttpError', status: 0, retryable: false });
            expect(error).toHaveProperty('message', 'Network error: fetch failed');
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });
});
