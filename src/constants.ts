export const ERROR_REPORT_SCHEMA_VERSION =
    'planner.restore.error-report.v1';

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';

export const DEFAULT_MIN_REQUEST_DELAY_MS = 500;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_SECONDS = 2;
export const DEFAULT_RETRY_AFTER_SECONDS = 30;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_FAILURE_EXAMPLE_LIMIT = 10;

export const ENTITY_KINDS = [
    'plan',
    'category',
    'bucket',
    'task',
    'task_detail',
    'restoration_record',
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export const ERROR_CATEGORIES = [
    'network',
    'permission',
    'validation',
    'unknown',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export const RESTORE_ERROR_CODES = [
    'rate_limited',
    'transient_network',
    'permanent_client',
    'concurrency_conflict',
    'identity_unresolved',
    'validation_failure',
] as const;

export type RestoreErrorCode = (typeof RESTORE_ERROR_CODES)[number];

export const PLANNER_CATEGORY_KEYS = Array.from(
    { length: 25 },
    (_, index) => `category${index + 1}`,
);
