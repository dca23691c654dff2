import {
    DEFAULT_BACKOFF_BASE_SECONDS,
    DEFAULT_MAX_RETRIES,
    DEFAULT_MIN_REQUEST_DELAY_MS,
    DEFAULT_RETRY_AFTER_SECONDS,
} from '../constants';
import { consoleLogger, RestoreLogger } from '../logger';
import {
    classifyStatusCode,
    describeError,
    errorCodeForStatus,
    FailureClassification,
    GraphRequestError,
    GraphTransportError,
} from '../errors';
import {
    extractGraphErrorMessage,
    GraphOperation,
    GraphResponse,
    GraphTransport,
} from './graph-transport';

export interface RequestExecutorConfig {
    minRequestDelayMs?: number;
    maxRetries?: number;
    backoffBaseSeconds?: number;
    defaultRetryAfterSeconds?: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
    logger?: RestoreLogger;
}

export interface ExecuteOptions {
    /** Caps the attempts for this call below the executor's budget. */
    maxAttempts?: number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

function parseNonNegativeInteger(
    value: number,
    fieldName: string,
): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return value;
}

function describeOperation(operation: GraphOperation): string {
    return operation.description || `${operation.method} ${operation.path}`;
}

/**
 * Reads `Retry-After` as delta-seconds or as an HTTP date. Returns
 * undefined when the header is absent or unusable.
 */
export function parseRetryAfterSeconds(
    raw: string | undefined,
    now: Date,
): number | undefined {
    if (!raw || raw.trim() === '') {
        return undefined;
    }

    const trimmed = raw.trim();

    if (/^\d+$/.test(trimmed)) {
        return Number(trimmed);
    }

    const retryAtMs = Date.parse(trimmed);

    if (Number.isNaN(retryAtMs)) {
        return undefined;
    }

    return Math.max(0, Math.ceil((retryAtMs - now.getTime()) / 1000));
}

/**
 * Runs one logical Graph operation at a time. Every attempt waits the
 * minimum request delay first; 429s wait for Retry-After, transient
 * failures back off linearly, and permanent failures surface at once.
 * `maxRetries` is the total attempt budget shared by both retry paths.
 */
export class RequestExecutor {
    private readonly minRequestDelayMs: number;

    private readonly maxRetries: number;

    private readonly backoffBaseSeconds: number;

    private readonly defaultRetryAfterSeconds: number;

    private readonly sleep: (ms: number) => Promise<void>;

    private readonly now: () => Date;

    private readonly logger: RestoreLogger;

    constructor(
        private readonly transport: GraphTransport,
        config: RequestExecutorConfig = {},
    ) {
        this.minRequestDelayMs = parseNonNegativeInteger(
            config.minRequestDelayMs ?? DEFAULT_MIN_REQUEST_DELAY_MS,
            'minRequestDelayMs',
        );
        this.maxRetries = parseNonNegativeInteger(
            config.maxRetries ?? DEFAULT_MAX_RETRIES,
            'maxRetries',
        );
        this.backoffBaseSeconds = parseNonNegativeInteger(
            config.backoffBaseSeconds ?? DEFAULT_BACKOFF_BASE_SECONDS,
            'backoffBaseSeconds',
        );
        this.defaultRetryAfterSeconds = parseNonNegativeInteger(
            config.defaultRetryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS,
            'defaultRetryAfterSeconds',
        );

        if (this.maxRetries < 1) {
            throw new Error('maxRetries must be at least 1');
        }

        this.sleep = config.sleep || sleep;
        this.now = config.now || (() => new Date());
        this.logger = config.logger || consoleLogger;
    }

    async execute(
        operation: GraphOperation,
        options: ExecuteOptions = {},
    ): Promise<GraphResponse> {
        const description = describeOperation(operation);
        const attemptBudget = this.resolveAttemptBudget(options.maxAttempts);
        let lastStatusCode: number | undefined;
        let lastMessage = 'no attempt made';
        let lastClassification: FailureClassification = 'transient';

        for (let attempt = 1; attempt <= attemptBudget; attempt += 1) {
            await this.sleep(this.minRequestDelayMs);

            let response: GraphResponse;

            try {
                response = await this.transport.send(operation);
            } catch (error: unknown) {
                // No status code: DNS, refused connection, timeout.
                lastStatusCode = undefined;
                lastMessage = describeError(error);
                lastClassification = 'transient';

                if (attempt < attemptBudget) {
                    await this.waitBeforeRetry(
                        operation,
                        attempt,
                        attemptBudget,
                        'transient',
                        this.backoffMs(attempt),
                        undefined,
                        error instanceof GraphTransportError && error.timedOut,
                    );
                }

                continue;
            }

            if (response.statusCode >= 200 && response.statusCode < 300) {
                return response;
            }

            lastStatusCode = response.statusCode;
            lastMessage = extractGraphErrorMessage(response.body)
                || `status ${response.statusCode}`;
            lastClassification = classifyStatusCode(response.statusCode);

            if (lastClassification === 'permanent') {
                throw new GraphRequestError(
                    `${description} failed with status `
                        + `${response.statusCode}: ${lastMessage}`,
                    {
                        code: errorCodeForStatus(response.statusCode),
                        statusCode: response.statusCode,
                        attempts: attempt,
                        requestId: response.headers.requestId,
                    },
                );
            }

            if (attempt >= attemptBudget) {
                break;
            }

            const waitMs = lastClassification === 'rate_limited'
                ? this.rateLimitWaitMs(response)
                : this.backoffMs(attempt);

            await this.waitBeforeRetry(
                operation,
                attempt,
                attemptBudget,
                lastClassification,
                waitMs,
                response.statusCode,
                false,
            );
        }

        throw new GraphRequestError(
            `${description} failed after ${attemptBudget} attempts `
                + `(last status: ${lastStatusCode ?? 'none'}): ${lastMessage}`,
            {
                code: lastClassification === 'rate_limited'
                    ? 'rate_limited'
                    : 'transient_network',
                statusCode: lastStatusCode,
                attempts: attemptBudget,
                exhausted: true,
            },
        );
    }

    private resolveAttemptBudget(maxAttempts: number | undefined): number {
        if (maxAttempts === undefined) {
            return this.maxRetries;
        }

        if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
            throw new Error('maxAttempts must be at least 1');
        }

        return Math.min(maxAttempts, this.maxRetries);
    }

    private backoffMs(attempt: number): number {
        return attempt * this.backoffBaseSeconds * 1000;
    }

    private rateLimitWaitMs(response: GraphResponse): number {
        const advertised = parseRetryAfterSeconds(
            response.headers.retryAfter,
            this.now(),
        );

        return (advertised ?? this.defaultRetryAfterSeconds) * 1000;
    }

    private async waitBeforeRetry(
        operation: GraphOperation,
        attempt: number,
        attemptBudget: number,
        classification: FailureClassification,
        waitMs: number,
        statusCode: number | undefined,
        timedOut: boolean,
    ): Promise<void> {
        this.logger.warn('graph request retry scheduled', {
            operation: describeOperation(operation),
            attempt,
            max_retries: attemptBudget,
            classification,
            status_code: statusCode,
            timed_out: timedOut,
            wait_ms: waitMs,
        });

        await this.sleep(waitMs);
    }
}
