import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };
const RATE_LIMITS: Record<string, RateLimit> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },  // 10/s with polite pool
};

export interface HttpClientOptions {
    /** Per-attempt timeout in milliseconds */
    timeout?: number;
    /** Retries on 429/5xx, timeouts and connection resets */
    maxRetries?: number;
    version?: string;
    /** Contact address sent in the User-Agent */
    email?: string;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * GET-only HTTP client with per-source rate limiting, a per-attempt timeout
 * and bounded exponential backoff with jitter.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 3;
        const version = options?.version ?? '1.0.0';
        this.userAgent = options?.email
            ? `bibharvest/${version} (mailto:${options.email})`
            : `bibharvest/${version}`;
    }

    /**
     * GET a URL and decode the body (JSON when the server says so, text otherwise).
     * Throws `HttpError` on a non-success status once retries are exhausted.
     */
    async get<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            // Every attempt, retries included, spends a rate limit token
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = Math.min(maxBackoff, retryAfter ?? this.calculateBackoff(attempt, initialBackoff, maxBackoff));

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: Math.round(backoff), url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                // The caller names the payload type; JSON bodies are not validated here
                return { status: response.status, headers: responseHeaders, data: data as T, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const timedOut = error instanceof Error && error.name === 'AbortError';
                const errorCode = networkErrorCode(error);
                const retryable = timedOut || (errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false);

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    logger.warn(
                        { errorCode: errorCode ?? (timedOut ? 'TIMEOUT' : undefined), attempt: attempt + 1, backoffMs: Math.round(backoff), url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        // Should never reach here, but TypeScript needs it
        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Get request count (attempts, retries included) for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Pull the errno-style code off a fetch failure (undici puts it on `cause`).
 */
function networkErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
