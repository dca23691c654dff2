import {
    DEFAULT_FAILURE_EXAMPLE_LIMIT,
    ENTITY_KINDS,
    ERROR_REPORT_SCHEMA_VERSION,
    EntityKind,
    ErrorCategory,
    RestoreErrorCode,
} from '../constants';
import {
    describeError,
    errorCodeForStatus,
    GraphRequestError,
    ValidationFailureError,
} from '../errors';
import { LookupAttempt } from '../identity/identity-resolver';

export interface ErrorRecord {
    kind: EntityKind;
    entityName: string;
    context: string;
    category: ErrorCategory;
    code?: RestoreErrorCode;
    statusCode?: number;
    message: string;
    timestamp: string;
}

export interface UnresolvedIdentityRecord {
    sourceUserId: string;
    entityName: string;
    attempts: LookupAttempt[];
    timestamp: string;
}

interface KindCounters {
    attempted: number;
    succeeded: number;
    failed: ErrorRecord[];
}

export interface ErrorClassification {
    category: ErrorCategory;
    code?: RestoreErrorCode;
    statusCode?: number;
    message: string;
}

export interface ErrorReportKindDetails {
    Attempted: number;
    Succeeded: number;
    Failed: number;
    Failures: ErrorRecord[];
}

export interface ErrorReportCategoryDetails {
    Count: number;
    Failures: ErrorRecord[];
}

export interface ErrorReportCategories {
    Network: ErrorReportCategoryDetails;
    Permission: ErrorReportCategoryDetails;
    Validation: ErrorReportCategoryDetails;
    Unknown: ErrorReportCategoryDetails;
}

export interface ErrorReport {
    SchemaVersion: string;
    Timestamp: string;
    ExitCode: RestoreExitCode;
    Summary: {
        TotalAttempted: number;
        TotalSucceeded: number;
        TotalFailed: number;
    };
    Details: Record<EntityKind, ErrorReportKindDetails>;
    Categories: ErrorReportCategories;
    UnresolvedIdentities: UnresolvedIdentityRecord[];
}

export type RestoreExitCode = 0 | 1 | 2;

export interface ErrorTrackerOptions {
    failureExampleLimit?: number;
    now?: () => Date;
}

// Approximate: only consulted when the error carries no status code.
const MESSAGE_PATTERNS: Array<[ErrorCategory, RegExp]> = [
    [
        'network',
        /timed? ?out|network|socket|econn(reset|refused|aborted)|enotfound|eai_again|fetch failed/i,
    ],
    [
        'permission',
        /forbidden|unauthori[sz]ed|access denied|insufficient privileges|permission/i,
    ],
    [
        'validation',
        /invalid|validation|bad request|required|malformed/i,
    ],
];

function readStatusCode(error: unknown): number | undefined {
    if (error instanceof GraphRequestError) {
        return error.statusCode;
    }

    if (!error || typeof error !== 'object') {
        return undefined;
    }

    const candidate = 'statusCode' in error
        ? error.statusCode
        : 'status' in error
            ? error.status
            : undefined;

    return typeof candidate === 'number' && Number.isInteger(candidate)
        ? candidate
        : undefined;
}

function categoryForStatus(statusCode: number): ErrorCategory {
    if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
        return 'network';
    }

    if (statusCode === 401 || statusCode === 403) {
        return 'permission';
    }

    if (statusCode === 400 || statusCode === 422) {
        return 'validation';
    }

    return 'unknown';
}

function categoryForMessage(message: string): ErrorCategory {
    for (const [category, pattern] of MESSAGE_PATTERNS) {
        if (pattern.test(message)) {
            return category;
        }
    }

    return 'unknown';
}

export function classifyError(error: unknown): ErrorClassification {
    const message = describeError(error);

    if (error instanceof ValidationFailureError) {
        return {
            category: 'validation',
            code: 'validation_failure',
            message,
        };
    }

    // Malformed 2xx bodies carry the taxonomy code but no failing status.
    if (
        error instanceof GraphRequestError &&
        error.code === 'validation_failure'
    ) {
        return {
            category: 'validation',
            code: error.code,
            statusCode: error.statusCode,
            message,
        };
    }

    const statusCode = readStatusCode(error);

    if (statusCode !== undefined) {
        return {
            category: categoryForStatus(statusCode),
            code: error instanceof GraphRequestError
                ? error.code
                : errorCodeForStatus(statusCode),
            statusCode,
            message,
        };
    }

    return {
        category: categoryForMessage(message),
        code: error instanceof GraphRequestError ? error.code : undefined,
        message,
    };
}

function emptyCounters(): KindCounters {
    return {
        attempted: 0,
        succeeded: 0,
        failed: [],
    };
}

function createCounters(): Record<EntityKind, KindCounters> {
    return {
        plan: emptyCounters(),
        category: emptyCounters(),
        bucket: emptyCounters(),
        task: emptyCounters(),
        task_detail: emptyCounters(),
        restoration_record: emptyCounters(),
    };
}

/**
 * Run-scoped outcome ledger. Failure records are append-only; the report
 * is built from the counters once, at the end of the run.
 */
export class ErrorTracker {
    private readonly counters = createCounters();

    private readonly categoryFailures: Record<ErrorCategory, ErrorRecord[]> = {
        network: [],
        permission: [],
        validation: [],
        unknown: [],
    };

    private readonly unresolvedIdentities: UnresolvedIdentityRecord[] = [];

    private readonly failureExampleLimit: number;

    private readonly now: () => Date;

    constructor(options: ErrorTrackerOptions = {}) {
        const limit = options.failureExampleLimit
            ?? DEFAULT_FAILURE_EXAMPLE_LIMIT;

        if (!Number.isInteger(limit) || limit < 0) {
            throw new Error(
                'failureExampleLimit must be a non-negative integer',
            );
        }

        this.failureExampleLimit = limit;
        this.now = options.now || (() => new Date());
    }

    recordAttempt(kind: EntityKind): void {
        this.counters[kind].attempted += 1;
    }

    recordSuccess(kind: EntityKind): void {
        this.counters[kind].succeeded += 1;
    }

    record(
        kind: EntityKind,
        entityName: string,
        error: unknown,
        context: string,
    ): ErrorRecord {
        const classification = classifyError(error);
        const record: ErrorRecord = {
            kind,
            entityName,
            context,
            category: classification.category,
            code: classification.code,
            statusCode: classification.statusCode,
            message: classification.message,
            timestamp: this.now().toISOString(),
        };

        this.counters[kind].failed.push(record);
        this.categoryFailures[record.category].push(record);

        return record;
    }

    recordUnresolvedIdentity(
        sourceUserId: string,
        entityName: string,
        attempts: LookupAttempt[],
    ): UnresolvedIdentityRecord {
        const record: UnresolvedIdentityRecord = {
            sourceUserId,
            entityName,
            attempts: attempts.map((attempt) => ({ ...attempt })),
            timestamp: this.now().toISOString(),
        };

        this.unresolvedIdentities.push(record);

        return record;
    }

    getFailures(kind?: EntityKind): ErrorRecord[] {
        if (kind) {
            return [...this.counters[kind].failed];
        }

        return ENTITY_KINDS.flatMap((entry) => this.counters[entry].failed);
    }

    getFailuresByCategory(category: ErrorCategory): ErrorRecord[] {
        return [...this.categoryFailures[category]];
    }

    getUnresolvedIdentities(): UnresolvedIdentityRecord[] {
        return [...this.unresolvedIdentities];
    }

    hasFailures(): boolean {
        return ENTITY_KINDS.some(
            (kind) => this.counters[kind].failed.length > 0,
        );
    }

    exitCode(): RestoreExitCode {
        if (this.counters.plan.failed.length > 0) {
            return 2;
        }

        return this.hasFailures() ? 1 : 0;
    }

    finalize(): { report: ErrorReport; exitCode: RestoreExitCode } {
        const exitCode = this.exitCode();
        const details: Record<EntityKind, ErrorReportKindDetails> = {
            plan: this.describeKind('plan'),
            category: this.describeKind('category'),
            bucket: this.describeKind('bucket'),
            task: this.describeKind('task'),
            task_detail: this.describeKind('task_detail'),
            restoration_record: this.describeKind('restoration_record'),
        };
        let totalAttempted = 0;
        let totalSucceeded = 0;
        let totalFailed = 0;

        for (const kind of ENTITY_KINDS) {
            totalAttempted += details[kind].Attempted;
            totalSucceeded += details[kind].Succeeded;
            totalFailed += details[kind].Failed;
        }

        return {
            report: {
                SchemaVersion: ERROR_REPORT_SCHEMA_VERSION,
                Timestamp: this.now().toISOString(),
                ExitCode: exitCode,
                Summary: {
                    TotalAttempted: totalAttempted,
                    TotalSucceeded: totalSucceeded,
                    TotalFailed: totalFailed,
                },
                Details: details,
                Categories: {
                    Network: this.describeCategory('network'),
                    Permission: this.describeCategory('permission'),
                    Validation: this.describeCategory('validation'),
                    Unknown: this.describeCategory('unknown'),
                },
                UnresolvedIdentities: this.getUnresolvedIdentities(),
            },
            exitCode,
        };
    }

    private describeKind(kind: EntityKind): ErrorReportKindDetails {
        const counters = this.counters[kind];

        return {
            Attempted: counters.attempted,
            Succeeded: counters.succeeded,
            Failed: counters.failed.length,
            Failures: this.capExamples(counters.failed),
        };
    }

    private describeCategory(
        category: ErrorCategory,
    ): ErrorReportCategoryDetails {
        const failures = this.categoryFailures[category];

        return {
            Count: failures.length,
            Failures: this.capExamples(failures),
        };
    }

    private capExamples(records: ErrorRecord[]): ErrorRecord[] {
        return records
            .slice(0, this.failureExampleLimit)
            .map((record) => ({ ...record }));
    }
}
