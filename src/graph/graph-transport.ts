import { GraphTransportError } from '../errors';

export type GraphMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface GraphOperation {
    method: GraphMethod;
    path: string;
    body?: Record<string, unknown>;
    headers?: Record<string, string>;
    description?: string;
}

export interface GraphResponseHeaders {
    etag?: string;
    retryAfter?: string;
    requestId?: string;
}

export interface GraphResponse {
    statusCode: number;
    body: Record<string, unknown> | undefined;
    headers: GraphResponseHeaders;
}

export interface GraphTransport {
    send(operation: GraphOperation): Promise<GraphResponse>;
}

type FetchLike = (
    input: string,
    init?: RequestInit,
) => Promise<Response>;

export interface FetchGraphTransportConfig {
    baseUrl: string;
    accessToken: string;
    timeoutMs: number;
    fetchImpl?: FetchLike;
}

export const MUTATING_METHODS: ReadonlySet<GraphMethod> = new Set([
    'POST',
    'PATCH',
    'DELETE',
]);

function trimTrailingSlash(value: string): string {
    while (value.endsWith('/')) {
        value = value.slice(0, -1);
    }

    return value;
}

function parseRequiredString(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
        throw new Error(`${fieldName} is required`);
    }

    const trimmed = value.trim();

    if (!trimmed) {
        throw new Error(`${fieldName} is required`);
    }

    return trimmed;
}

export function asObject(
    value: unknown,
): Record<string, unknown> | undefined {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
        return undefined;
    }

    return value as Record<string, unknown>;
}

/**
 * Pulls `error.message` (and `error.code`) out of a Graph error envelope.
 */
export function extractGraphErrorMessage(
    body: Record<string, unknown> | undefined,
): string | undefined {
    const error = asObject(body?.error);

    if (!error) {
        return undefined;
    }

    const message = typeof error.message === 'string'
        ? error.message.trim()
        : '';
    const code = typeof error.code === 'string' ? error.code.trim() : '';

    if (message && code) {
        return `${code}: ${message}`;
    }

    return message || code || undefined;
}

async function readResponseBody(
    response: Response,
): Promise<Record<string, unknown> | undefined> {
    const text = await response.text();

    if (text.trim() === '') {
        return undefined;
    }

    let parsed: unknown;

    try {
        parsed = JSON.parse(text);
    } catch {
        return undefined;
    }

    return asObject(parsed);
}

function readHeaders(response: Response): GraphResponseHeaders {
    return {
        etag: response.headers.get('etag') ?? undefined,
        retryAfter: response.headers.get('retry-after') ?? undefined,
        requestId: response.headers.get('request-id') ?? undefined,
    };
}

export class FetchGraphTransport implements GraphTransport {
    private readonly baseUrl: string;

    private readonly accessToken: string;

    private readonly timeoutMs: number;

    private readonly fetchImpl: FetchLike;

    constructor(config: FetchGraphTransportConfig) {
        const baseUrl = parseRequiredString(config.baseUrl, 'baseUrl');
        const accessToken = parseRequiredString(
            config.accessToken,
            'accessToken',
        );

        let parsedBaseUrl: URL;

        try {
            parsedBaseUrl = new URL(baseUrl);
        } catch {
            throw new Error('baseUrl must be a valid URL');
        }

        if (
            !Number.isInteger(config.timeoutMs) ||
            config.timeoutMs <= 0
        ) {
            throw new Error('timeoutMs must be a positive integer');
        }

        this.baseUrl = trimTrailingSlash(parsedBaseUrl.toString());
        this.accessToken = accessToken;
        this.timeoutMs = config.timeoutMs;
        this.fetchImpl = config.fetchImpl || fetch;
    }

    async send(operation: GraphOperation): Promise<GraphResponse> {
        const controller = new AbortController();
        const timeoutHandle = setTimeout(() => {
            controller.abort();
        }, this.timeoutMs);
        const headers: Record<string, string> = {
            accept: 'application/json',
            authorization: `Bearer ${this.accessToken}`,
            ...operation.headers,
        };

        if (operation.body !== undefined) {
            headers['content-type'] = 'application/json';
        }

        try {
            const httpResponse = await this.fetchImpl(
                `${this.baseUrl}${operation.path}`,
                {
                    method: operation.method,
                    headers,
                    body: operation.body === undefined
                        ? undefined
                        : JSON.stringify(operation.body),
                    signal: controller.signal,
                },
            );
            const body = await readResponseBody(httpResponse);

            return {
                statusCode: httpResponse.status,
                body,
                headers: readHeaders(httpResponse),
            };
        } catch (error: unknown) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new GraphTransportError(
                    `Graph request timed out after ${this.timeoutMs}ms`,
                    true,
                );
            }

            if (error instanceof Error && error.message.trim() !== '') {
                throw new GraphTransportError(
                    `Graph request failed: ${error.message}`,
                );
            }

            throw new GraphTransportError('Graph request failed');
        } finally {
            clearTimeout(timeoutHandle);
        }
    }
}
