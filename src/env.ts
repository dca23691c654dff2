import {
    DEFAULT_BACKOFF_BASE_SECONDS,
    DEFAULT_FAILURE_EXAMPLE_LIMIT,
    DEFAULT_GRAPH_BASE_URL,
    DEFAULT_MAX_RETRIES,
    DEFAULT_MIN_REQUEST_DELAY_MS,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_RETRY_AFTER_SECONDS,
} from './constants';

export interface PlannerRestoreEnv {
    graphBaseUrl: string;
    accessToken: string;
    targetGroupId: string;
    inputPath: string;
    requestTimeoutMs: number;
    minRequestDelayMs: number;
    maxRetries: number;
    backoffBaseSeconds: number;
    defaultRetryAfterSeconds: number;
    failureExampleLimit: number;
    dryRun: boolean;
    skipAssignments: boolean;
    skipCompletedTasks: boolean;
    userMappings: Record<string, string>;
    restorePgUrl?: string;
    reportPath?: string;
}

function parseNonNegativeInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return parsed;
}

function parseStrictPositiveInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseNonNegativeInteger(raw, fieldName, defaultValue);

    if (parsed <= 0) {
        throw new Error(`${fieldName} must be greater than zero`);
    }

    return parsed;
}

function parseBoolean(
    raw: string | undefined,
    fieldName: string,
    defaultValue: boolean,
): boolean {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const normalized = raw.trim().toLowerCase();

    if (
        normalized === '1' ||
        normalized === 'true' ||
        normalized === 'yes' ||
        normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0' ||
        normalized === 'false' ||
        normalized === 'no' ||
        normalized === 'off'
    ) {
        return false;
    }

    throw new Error(`${fieldName} must be a boolean value`);
}

function parseOptionalString(raw: string | undefined): string | undefined {
    if (!raw) {
        return undefined;
    }

    const trimmed = raw.trim();

    return trimmed ? trimmed : undefined;
}

function parseRequiredString(
    raw: string | undefined,
    fieldName: string,
): string {
    const parsed = parseOptionalString(raw);

    if (!parsed) {
        throw new Error(`${fieldName} is required`);
    }

    return parsed;
}

function parseUserMappings(
    raw: string | undefined,
): Record<string, string> {
    if (!raw || raw.trim() === '') {
        return {};
    }

    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error('PLANNER_RESTORE_USER_MAPPINGS_JSON must be valid JSON');
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new Error(
            'PLANNER_RESTORE_USER_MAPPINGS_JSON must be a JSON object',
        );
    }

    const mappings: Record<string, string> = {};

    for (const [sourceId, targetId] of Object.entries(parsed)) {
        if (sourceId.trim() === '') {
            throw new Error(
                'PLANNER_RESTORE_USER_MAPPINGS_JSON keys must be non-empty',
            );
        }

        if (typeof targetId !== 'string' || targetId.trim() === '') {
            throw new Error(
                `PLANNER_RESTORE_USER_MAPPINGS_JSON.${sourceId} `
                + 'must be a non-empty string',
            );
        }

        mappings[sourceId.trim()] = targetId.trim();
    }

    return mappings;
}

export function parsePlannerRestoreEnv(
    env: NodeJS.ProcessEnv,
): PlannerRestoreEnv {
    const dryRun = parseBoolean(
        env.PLANNER_RESTORE_DRY_RUN,
        'PLANNER_RESTORE_DRY_RUN',
        false,
    );

    return {
        graphBaseUrl: parseOptionalString(env.PLANNER_RESTORE_GRAPH_BASE_URL)
            || DEFAULT_GRAPH_BASE_URL,
        // A dry run issues no requests, so it needs no token.
        accessToken: dryRun
            ? parseOptionalString(env.PLANNER_RESTORE_ACCESS_TOKEN) || ''
            : parseRequiredString(
                env.PLANNER_RESTORE_ACCESS_TOKEN,
                'PLANNER_RESTORE_ACCESS_TOKEN',
            ),
        targetGroupId: parseRequiredString(
            env.PLANNER_RESTORE_TARGET_GROUP_ID,
            'PLANNER_RESTORE_TARGET_GROUP_ID',
        ),
        inputPath: parseRequiredString(
            env.PLANNER_RESTORE_INPUT_PATH,
            'PLANNER_RESTORE_INPUT_PATH',
        ),
        requestTimeoutMs: parseStrictPositiveInteger(
            env.PLANNER_RESTORE_REQUEST_TIMEOUT_MS,
            'PLANNER_RESTORE_REQUEST_TIMEOUT_MS',
            DEFAULT_REQUEST_TIMEOUT_MS,
        ),
        minRequestDelayMs: parseNonNegativeInteger(
            env.PLANNER_RESTORE_MIN_REQUEST_DELAY_MS,
            'PLANNER_RESTORE_MIN_REQUEST_DELAY_MS',
            DEFAULT_MIN_REQUEST_DELAY_MS,
        ),
        maxRetries: parseStrictPositiveInteger(
            env.PLANNER_RESTORE_MAX_RETRIES,
            'PLANNER_RESTORE_MAX_RETRIES',
            DEFAULT_MAX_RETRIES,
        ),
        backoffBaseSeconds: parseNonNegativeInteger(
            env.PLANNER_RESTORE_BACKOFF_BASE_SECONDS,
            'PLANNER_RESTORE_BACKOFF_BASE_SECONDS',
            DEFAULT_BACKOFF_BASE_SECONDS,
        ),
        defaultRetryAfterSeconds: parseNonNegativeInteger(
            env.PLANNER_RESTORE_DEFAULT_RETRY_AFTER_SECONDS,
            'PLANNER_RESTORE_DEFAULT_RETRY_AFTER_SECONDS',
            DEFAULT_RETRY_AFTER_SECONDS,
        ),
        failureExampleLimit: parseNonNegativeInteger(
            env.PLANNER_RESTORE_FAILURE_EXAMPLE_LIMIT,
            'PLANNER_RESTORE_FAILURE_EXAMPLE_LIMIT',
            DEFAULT_FAILURE_EXAMPLE_LIMIT,
        ),
        dryRun,
        skipAssignments: parseBoolean(
            env.PLANNER_RESTORE_SKIP_ASSIGNMENTS,
            'PLANNER_RESTORE_SKIP_ASSIGNMENTS',
            false,
        ),
        skipCompletedTasks: parseBoolean(
            env.PLANNER_RESTORE_SKIP_COMPLETED_TASKS,
            'PLANNER_RESTORE_SKIP_COMPLETED_TASKS',
            false,
        ),
        userMappings: parseUserMappings(
            env.PLANNER_RESTORE_USER_MAPPINGS_JSON,
        ),
        restorePgUrl: parseOptionalString(env.PLANNER_RESTORE_PG_URL),
        reportPath: parseOptionalString(env.PLANNER_RESTORE_REPORT_PATH),
    };
}
