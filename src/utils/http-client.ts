import type { ZodType, ZodTypeDef } from 'zod';
import { getLogger } from './logger.js';

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

    async acquire(signal?: AbortSignal): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs, signal);
        this.refill();
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    europepmc: { tokensPerSecond: 10, maxBurst: 10 },
    quickgo: { tokensPerSecond: 10, maxBurst: 10 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting

    /** Overrides the client's retry budget for this request (0 disables retries) */
    maxRetries?: number;

    /** Caller-side cancellation, on top of the timeout */
    signal?: AbortSignal;
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
 * Options for HttpClient construction.
 */
export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    rateLimits?: Record<string, RateLimit>;
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
 * The body was not JSON, or did not match the expected shape.
 */
export class ResponseValidationError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = 'ResponseValidationError';
    }
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 3;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.maxBackoff = options?.maxBackoffMs ?? 30000;
        this.rateLimits = { ...RATE_LIMITS, ...options?.rateLimits };
        const version = options?.version ?? '1.0.0';
        const contact = options?.email ? ` (mailto:${options.email})` : '';
        this.userAgent = `cooccur/${version}${contact}`;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            maxRetries = this.maxRetries,
            signal,
        } = options;

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            if (signal?.aborted) {
                throw new HttpError(`Request aborted: ${url}`, 0, false);
            }

            // Acquire rate limit token
            await this.getBucket(source).acquire(signal);
            if (signal?.aborted) {
                throw new HttpError(`Request aborted: ${url}`, 0, false);
            }

            // Track request count
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);
            const onAbort = (): void => controller.abort();
            signal?.addEventListener('abort', onAbort, { once: true });

            try {
                const response = await fetch(url, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                // Parse response
                const contentType = response.headers.get('content-type') ?? '';
                const text = await response.text();
                const data: unknown = response.ok && contentType.includes('json') ? parseJson(text, url) : text;

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                // Check for errors
                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        getLogger().warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff, signal);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError || error instanceof ResponseValidationError) throw error;

                if (signal?.aborted) {
                    throw new HttpError(`Request aborted: ${url}`, 0, false);
                }

                const errorCode = errorCodeOf(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    getLogger().warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff, signal);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
                signal?.removeEventListener('abort', onAbort);
            }
        }

        // Should never reach here, but TypeScript needs it
        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        return this.request(url, options);
    }

    /**
     * GET a JSON document and validate it against `schema`.
     * @throws ResponseValidationError when the body is not JSON or does not match
     */
    async getJson<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>, options?: HttpRequestOptions): Promise<T> {
        const response = await this.get(url, options);
        const raw = typeof response.data === 'string' ? parseJson(response.data, url) : response.data;

        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            throw new ResponseValidationError(`Unexpected response shape from ${url}`, url, issues);
        }
        return parsed.data;
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? DEFAULT_RATE_LIMIT;
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

    private calculateBackoff(attempt: number): number {
        return calculateBackoff(attempt, this.initialBackoff, this.maxBackoff);
    }
}

/**
 * Exponential backoff with jitter, capped at `max`.
 */
export function calculateBackoff(attempt: number, initial: number, max: number): number {
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}

/**
 * Sleep for the specified number of milliseconds, waking early when `signal` aborts.
 * Callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

function parseJson(text: string, url: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new ResponseValidationError(
            `Malformed JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
            url
        );
    }
}

/**
 * Node error code of a failure, looking through `cause` (undici wraps socket errors).
 */
function errorCodeOf(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    return errorCodeOf(error.cause);
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
