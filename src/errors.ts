import { RestoreErrorCode } from './constants';

export type FailureClassification =
    | 'rate_limited'
    | 'transient'
    | 'permanent';

export interface GraphRequestErrorInit {
    code: RestoreErrorCode;
    statusCode?: number;
    attempts: number;
    exhausted?: boolean;
    requestId?: string;
}

export class GraphRequestError extends Error {
    readonly code: RestoreErrorCode;

    readonly statusCode?: number;

    readonly attempts: number;

    readonly exhausted: boolean;

    readonly requestId?: string;

    constructor(message: string, init: GraphRequestErrorInit) {
        super(message);
        this.name = 'GraphRequestError';
        this.code = init.code;
        this.statusCode = init.statusCode;
        this.attempts = init.attempts;
        this.exhausted = init.exhausted ?? false;
        this.requestId = init.requestId;
    }
}

/**
 * Raised by a transport when no HTTP response was received at all
 * (timeout, DNS failure, refused connection). Carries no status code.
 */
export class GraphTransportError extends Error {
    constructor(
        message: string,
        readonly timedOut = false,
    ) {
        super(message);
        this.name = 'GraphTransportError';
    }
}

export function isGraphRequestError(
    error: unknown,
): error is GraphRequestError {
    return error instanceof GraphRequestError;
}

export function classifyStatusCode(
    statusCode: number | undefined,
): FailureClassification {
    if (statusCode === undefined) {
        return 'transient';
    }

    if (statusCode === 429) {
        return 'rate_limited';
    }

    if (statusCode === 408 || statusCode >= 500) {
        return 'transient';
    }

    return 'permanent';
}

export function errorCodeForStatus(
    statusCode: number | undefined,
): RestoreErrorCode {
    if (statusCode === 409 || statusCode === 412) {
        return 'concurrency_conflict';
    }

    if (statusCode === 400 || statusCode === 422) {
        return 'validation_failure';
    }

    switch (classifyStatusCode(statusCode)) {
    case 'rate_limited':
        return 'rate_limited';
    case 'transient':
        return 'transient_network';
    default:
        return 'permanent_client';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error && error.message.trim() !== '') {
        return error.message;
    }

    if (typeof error === 'string' && error.trim() !== '') {
        return error;
    }

    return 'unknown error';
}

export class ValidationFailureError extends Error {
    readonly code: RestoreErrorCode = 'validation_failure';

    constructor(
        message: string,
        readonly issuePath?: string,
    ) {
        super(message);
        this.name = 'ValidationFailureError';
    }
}
