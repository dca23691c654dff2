import { randomUUID } from 'node:crypto';
import {
    createIdentityRunState,
    IdentityRunState,
} from './identity/identity-resolver';
import { ErrorTracker } from './tracking/error-tracker';

/**
 * Everything mutable that lives for exactly one restoration run. Each
 * component receives the pieces it needs at construction; nothing is
 * shared between runs.
 */
export interface RunContext {
    runId: string;
    startedAt: string;
    identity: IdentityRunState;
    errors: ErrorTracker;
}

export interface CreateRunContextOptions {
    failureExampleLimit?: number;
    now?: () => Date;
    runId?: string;
}

export function createRunContext(
    options: CreateRunContextOptions = {},
): RunContext {
    const now = options.now || (() => new Date());

    return {
        runId: options.runId || randomUUID(),
        startedAt: now().toISOString(),
        identity: createIdentityRunState(),
        errors: new ErrorTracker({
            failureExampleLimit: options.failureExampleLimit,
            now,
        }),
    };
}
