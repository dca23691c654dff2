import {
    GraphOperation,
    GraphResponse,
    GraphResponseHeaders,
    GraphTransport,
    MUTATING_METHODS,
} from './graph/graph-transport';
import { ConcurrencyGuard } from './graph/concurrency-guard';
import { RequestExecutor } from './graph/request-executor';
import { IdentityResolver } from './identity/identity-resolver';
import { LogFields, RestoreLogger } from './logger';
import { PlanExportDocument } from './restore/models';
import {
    InMemoryRestorationRecordStore,
    RestorationRecordStore,
} from './restore/record-store';
import { RestorationCoordinator } from './restore/restoration-coordinator';
import { createRunContext, RunContext } from './run-context';

export function jsonResponse(
    statusCode: number,
    body?: Record<string, unknown>,
    headers: GraphResponseHeaders = {},
): GraphResponse {
    return {
        statusCode,
        body,
        headers,
    };
}

export function graphError(
    statusCode: number,
    code: string,
    message: string,
    headers: GraphResponseHeaders = {},
): GraphResponse {
    return jsonResponse(
        statusCode,
        {
            error: {
                code,
                message,
            },
        },
        headers,
    );
}

type ScriptStep = GraphResponse | Error;

/**
 * Replays a fixed sequence of responses (or thrown errors), one per send.
 */
export class ScriptedTransport implements GraphTransport {
    readonly operations: GraphOperation[] = [];

    private readonly steps: ScriptStep[];

    constructor(steps: ScriptStep[]) {
        this.steps = [...steps];
    }

    async send(operation: GraphOperation): Promise<GraphResponse> {
        this.operations.push(operation);

        const step = this.steps.shift();

        if (!step) {
            throw new Error(
                `no scripted response for ${operation.method} ${operation.path}`,
            );
        }

        if (step instanceof Error) {
            throw step;
        }

        return step;
    }
}

export interface LogLine {
    level: 'info' | 'warn' | 'error';
    message: string;
    fields: LogFields;
}

export class CapturingLogger implements RestoreLogger {
    readonly lines: LogLine[] = [];

    info(message: string, fields: LogFields = {}): void {
        this.lines.push({ level: 'info', message, fields });
    }

    warn(message: string, fields: LogFields = {}): void {
        this.lines.push({ level: 'warn', message, fields });
    }

    error(message: string, fields: LogFields = {}): void {
        this.lines.push({ level: 'error', message, fields });
    }

    messages(level?: LogLine['level']): string[] {
        return this.lines
            .filter((line) => !level || line.level === level)
            .map((line) => line.message);
    }
}

export function recordingSleep(): {
    sleep: (ms: number) => Promise<void>;
    waits: number[];
} {
    const waits: number[] = [];

    return {
        waits,
        async sleep(ms: number): Promise<void> {
            waits.push(ms);
        },
    };
}

type FailureRule = (operation: GraphOperation) => GraphResponse | undefined;

/**
 * In-process stand-in for the Planner and users endpoints. Ids are
 * sequential per kind, details resources carry an etag that changes on
 * every PATCH, and `failWhen` rules run before the default routes.
 */
export class FakePlannerApi implements GraphTransport {
    readonly operations: GraphOperation[] = [];

    readonly plans = new Map<string, Record<string, unknown>>();

    readonly buckets = new Map<string, Record<string, unknown>>();

    readonly tasks = new Map<string, Record<string, unknown>>();

    readonly details = new Map<string, {
        etag: string;
        body: Record<string, unknown>;
    }>();

    private readonly counters = new Map<string, number>();

    private readonly failureRules: FailureRule[] = [];

    constructor(
        private readonly directory: Record<string, string> = {},
    ) {}

    failWhen(rule: FailureRule): void {
        this.failureRules.push(rule);
    }

    mutatingOperations(): GraphOperation[] {
        return this.operations.filter(
            (operation) => MUTATING_METHODS.has(operation.method),
        );
    }

    async send(operation: GraphOperation): Promise<GraphResponse> {
        this.operations.push(operation);

        for (const rule of this.failureRules) {
            const failure = rule(operation);

            if (failure) {
                return failure;
            }
        }

        const [pathname] = operation.path.split('?');

        if (operation.method === 'POST' && pathname === '/planner/plans') {
            return this.create('plan', this.plans, operation, true);
        }

        if (operation.method === 'POST' && pathname === '/planner/buckets') {
            return this.create('bucket', this.buckets, operation, false);
        }

        if (operation.method === 'POST' && pathname === '/planner/tasks') {
            return this.create('task', this.tasks, operation, true);
        }

        if (pathname.endsWith('/details')) {
            return this.handleDetails(pathname, operation);
        }

        const userMatch = /^\/users\/([^/]+)$/.exec(pathname);

        if (operation.method === 'GET' && userMatch) {
            const key = decodeURIComponent(userMatch[1]).toLowerCase();
            const targetId = this.directory[key];

            if (!targetId) {
                return graphError(
                    404,
                    'Request_ResourceNotFound',
                    `Resource '${key}' does not exist`,
                );
            }

            return jsonResponse(200, { id: targetId });
        }

        return graphError(400, 'BadRequest', `no route for ${pathname}`);
    }

    private nextId(kind: string): string {
        const next = (this.counters.get(kind) ?? 0) + 1;
        this.counters.set(kind, next);

        return `${kind}-new-${next}`;
    }

    private create(
        kind: string,
        store: Map<string, Record<string, unknown>>,
        operation: GraphOperation,
        withDetails: boolean,
    ): GraphResponse {
        const id = this.nextId(kind);
        const body = { ...operation.body, id };

        store.set(id, body);

        if (withDetails) {
            const prefix = kind === 'plan' ? 'plans' : 'tasks';

            this.details.set(`/planner/${prefix}/${id}/details`, {
                etag: `W/"${id}-v1"`,
                body: { id },
            });
        }

        return jsonResponse(201, body);
    }

    private handleDetails(
        pathname: string,
        operation: GraphOperation,
    ): GraphResponse {
        const current = this.details.get(pathname);

        if (!current) {
            return graphError(404, 'NotFound', `${pathname} not found`);
        }

        if (operation.method === 'GET') {
            return jsonResponse(200, {
                ...current.body,
                '@odata.etag': current.etag,
            });
        }

        if (operation.method !== 'PATCH') {
            return graphError(405, 'MethodNotAllowed', 'method not allowed');
        }

        if (operation.headers?.['if-match'] !== current.etag) {
            return graphError(
                412,
                'PreconditionFailed',
                'The If-Match header does not match the current etag',
            );
        }

        const version = Number(/-v(\d+)"$/.exec(current.etag)?.[1] ?? '1');
        const id = String(current.body.id);
        const updated = {
            etag: `W/"${id}-v${version + 1}"`,
            body: { ...current.body, ...operation.body },
        };

        this.details.set(pathname, updated);

        return jsonResponse(200, {
            ...updated.body,
            '@odata.etag': updated.etag,
        });
    }
}

export const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

export const TARGET_DIRECTORY: Record<string, string> = {
    'alice@target.test': 'target-alice',
    'bob.mail@target.test': 'target-bob',
    'shared-user-id': 'shared-user-id',
};

/**
 * Two buckets (listed out of order), five tasks: three assigned to users
 * the target directory knows, two to users it does not.
 */
export function buildPlanDocument(
    overrides: Partial<PlanExportDocument> = {},
): PlanExportDocument {
    return {
        Plan: {
            id: 'plan-src-1',
            title: 'Launch',
        },
        Buckets: [
            { id: 'b2', name: 'Done', planId: 'plan-src-1', orderHint: '8586' },
            { id: 'b1', name: 'To do', planId: 'plan-src-1', orderHint: '8585' },
        ],
        Tasks: [
            {
                id: 't1',
                title: 'Draft announcement',
                bucketId: 'b1',
                priority: 3,
                assignments: { 'u-alice': { orderHint: '1' } },
            },
            {
                id: 't2',
                title: 'Book venue',
                bucketId: 'b1',
                assignments: { 'u-bob': { orderHint: '1' } },
            },
            {
                id: 't3',
                title: 'Order swag',
                bucketId: 'b2',
                percentComplete: 100,
                assignments: { 'shared-user-id': { orderHint: '1' } },
            },
            {
                id: 't4',
                title: 'Invite press',
                bucketId: 'b2',
                assignments: { 'u-ghost-1': { orderHint: '1' } },
            },
            {
                id: 't5',
                title: 'Write recap',
                assignments: { 'u-ghost-2': { orderHint: '1' } },
            },
        ],
        TaskDetails: [
            {
                id: 't1',
                description: 'Announce the launch',
                checklist: {
                    'src-check-1': { title: 'Outline', isChecked: true },
                },
            },
            {
                id: 't2',
                description: '',
                previewType: 'automatic',
            },
            {
                id: 't3',
                references: {
                    'https%3A//example%2Etest/swag': {
                        alias: 'Swag list',
                        type: 'Other',
                    },
                },
            },
        ],
        Categories: { category1: 'Blocked', category2: null },
        UserMap: {
            'u-alice': { userPrincipalName: 'alice@target.test' },
            'u-bob': {
                userPrincipalName: 'bob@source.test',
                mail: 'bob.mail@target.test',
            },
            'u-ghost-1': { userPrincipalName: 'ghost1@source.test' },
            'u-ghost-2': { mail: 'ghost2@source.test' },
        },
        ...overrides,
    };
}

export interface CoordinatorHarness {
    api: FakePlannerApi;
    context: RunContext;
    coordinator: RestorationCoordinator;
    identities: IdentityResolver;
    recordStore: RestorationRecordStore;
    logger: CapturingLogger;
}

export interface CoordinatorHarnessOptions {
    dryRun?: boolean;
    skipAssignments?: boolean;
    skipCompletedTasks?: boolean;
    explicitMappings?: Record<string, string>;
    recordStore?: RestorationRecordStore;
}

export function buildCoordinatorHarness(
    options: CoordinatorHarnessOptions = {},
): CoordinatorHarness {
    const api = new FakePlannerApi(TARGET_DIRECTORY);
    const logger = new CapturingLogger();
    const context = createRunContext({
        now: () => FIXED_NOW,
        runId: 'run-test',
    });
    const executor = new RequestExecutor(api, {
        minRequestDelayMs: 0,
        sleep: recordingSleep().sleep,
        logger,
    });
    const identities = new IdentityResolver(
        executor,
        context.identity,
        options.explicitMappings,
    );
    const recordStore = options.recordStore
        || new InMemoryRestorationRecordStore();
    let generated = 0;
    const coordinator = new RestorationCoordinator(
        {
            executor,
            guard: new ConcurrencyGuard(executor),
            identities,
            recordStore,
            context,
        },
        {
            targetGroupId: 'group-target',
            dryRun: options.dryRun,
            skipAssignments: options.skipAssignments,
            skipCompletedTasks: options.skipCompletedTasks,
            now: () => FIXED_NOW,
            generateId: () => {
                generated += 1;

                return `checklist-${generated}`;
            },
            logger,
        },
    );

    return {
        api,
        context,
        coordinator,
        identities,
        recordStore,
        logger,
    };
}
