import { randomUUID } from 'node:crypto';
import { PLANNER_CATEGORY_KEYS } from '../constants';
import { describeError, GraphRequestError } from '../errors';
import { ConcurrencyGuard } from '../graph/concurrency-guard';
import { GraphResponse } from '../graph/graph-transport';
import { RequestExecutor } from '../graph/request-executor';
import {
    IdentityHints,
    IdentityResolver,
} from '../identity/identity-resolver';
import { consoleLogger, RestoreLogger } from '../logger';
import { RunContext } from '../run-context';
import {
    PlanExportDocument,
    PlannerBucket,
    PlannerTask,
    PlannerTaskDetail,
    RestorationRecord,
    UserHint,
} from './models';
import { RestorationRecordStore } from './record-store';

export type RestorationState =
    | 'creating_plan'
    | 'applying_categories'
    | 'creating_buckets'
    | 'creating_tasks'
    | 'setting_task_details'
    | 'finalizing'
    | 'done';

export interface DryRunAction {
    state: RestorationState;
    action: string;
    entityName: string;
}

export type PlanRestorationOutcome =
    | {
        status: 'restored';
        originalPlanId: string;
        record: RestorationRecord;
    }
    | {
        status: 'plan_failed';
        originalPlanId: string;
        message: string;
    }
    | {
        status: 'dry_run';
        originalPlanId: string;
        actions: DryRunAction[];
    };

export interface RestorationCoordinatorDependencies {
    executor: RequestExecutor;
    guard: ConcurrencyGuard;
    identities: IdentityResolver;
    recordStore: RestorationRecordStore;
    context: RunContext;
}

export interface RestorationCoordinatorOptions {
    targetGroupId: string;
    dryRun?: boolean;
    skipAssignments?: boolean;
    skipCompletedTasks?: boolean;
    now?: () => Date;
    generateId?: () => string;
    logger?: RestoreLogger;
}

const ASSIGNMENT_ODATA_TYPE = '#microsoft.graph.plannerAssignment';
const CHECKLIST_ITEM_ODATA_TYPE = '#microsoft.graph.plannerChecklistItem';
const EXTERNAL_REFERENCE_ODATA_TYPE =
    '#microsoft.graph.plannerExternalReference';

function compareOrderHints(
    left: string | null | undefined,
    right: string | null | undefined,
): number {
    if (!left && !right) {
        return 0;
    }

    if (!left) {
        return 1;
    }

    if (!right) {
        return -1;
    }

    // Planner order hints compare ordinally, not by locale.
    if (left < right) {
        return -1;
    }

    return left > right ? 1 : 0;
}

export function sortBucketsByOrderHint(
    buckets: PlannerBucket[],
): PlannerBucket[] {
    return buckets
        .map((bucket, index) => ({ bucket, index }))
        .sort((left, right) => compareOrderHints(
            left.bucket.orderHint,
            right.bucket.orderHint,
        ) || left.index - right.index)
        .map((entry) => entry.bucket);
}

export function normalizeCategoryDescriptions(
    categories: PlanExportDocument['Categories'],
): Record<string, string> {
    const descriptions: Record<string, string> = {};

    if (!categories) {
        return descriptions;
    }

    for (const key of PLANNER_CATEGORY_KEYS) {
        const label = categories[key];

        if (typeof label === 'string' && label.trim() !== '') {
            descriptions[key] = label;
        }
    }

    return descriptions;
}

export function hasTaskDetailContent(detail: PlannerTaskDetail): boolean {
    return (
        (typeof detail.description === 'string' &&
            detail.description.trim() !== '') ||
        Object.keys(detail.checklist ?? {}).length > 0 ||
        Object.keys(detail.references ?? {}).length > 0
    );
}

export function buildTaskDetailPayload(
    detail: PlannerTaskDetail,
    generateId: () => string,
): Record<string, unknown> {
    const payload: Record<string, unknown> = {};

    if (!hasTaskDetailContent(detail)) {
        return payload;
    }

    if (
        typeof detail.description === 'string' &&
        detail.description.trim() !== ''
    ) {
        payload.description = detail.description;
    }

    if (detail.previewType) {
        payload.previewType = detail.previewType;
    }

    const checklistEntries = Object.values(detail.checklist ?? {});

    if (checklistEntries.length > 0) {
        const checklist: Record<string, unknown> = {};

        // Checklist keys are per-task ids; the target needs fresh ones.
        for (const item of checklistEntries) {
            checklist[generateId()] = {
                '@odata.type': CHECKLIST_ITEM_ODATA_TYPE,
                title: item.title,
                isChecked: item.isChecked ?? false,
            };
        }

        payload.checklist = checklist;
    }

    const referenceEntries = Object.entries(detail.references ?? {});

    if (referenceEntries.length > 0) {
        const references: Record<string, unknown> = {};

        for (const [encodedUrl, reference] of referenceEntries) {
            references[encodedUrl] = {
                '@odata.type': EXTERNAL_REFERENCE_ODATA_TYPE,
                alias: reference.alias ?? undefined,
                type: reference.type ?? undefined,
                previewPriority: reference.previewPriority ?? undefined,
            };
        }

        payload.references = references;
    }

    return payload;
}

function toIdentityHints(hint: UserHint | undefined): IdentityHints {
    return {
        userPrincipalName: hint?.userPrincipalName ?? undefined,
        mail: hint?.mail ?? undefined,
        displayName: hint?.displayName ?? undefined,
    };
}

function readCreatedId(response: GraphResponse, entity: string): string {
    const id = response.body?.id;

    if (typeof id !== 'string' || id.trim() === '') {
        throw new GraphRequestError(
            `${entity} creation response has no id`,
            {
                code: 'validation_failure',
                attempts: 1,
            },
        );
    }

    return id;
}

function isCompleted(task: PlannerTask): boolean {
    return task.percentComplete === 100;
}

/**
 * Restores one exported plan at a time into the target group: plan,
 * category labels, buckets, tasks, then task details. Only a failed plan
 * creation stops a plan; every other failure is recorded and skipped.
 * Re-running against the same group creates duplicates.
 */
export class RestorationCoordinator {
    private readonly dryRun: boolean;

    private readonly skipAssignments: boolean;

    private readonly skipCompletedTasks: boolean;

    private readonly now: () => Date;

    private readonly generateId: () => string;

    private readonly logger: RestoreLogger;

    private readonly targetGroupId: string;

    constructor(
        private readonly dependencies: RestorationCoordinatorDependencies,
        options: RestorationCoordinatorOptions,
    ) {
        const targetGroupId = options.targetGroupId.trim();

        if (!targetGroupId) {
            throw new Error('targetGroupId is required');
        }

        this.targetGroupId = targetGroupId;
        this.dryRun = options.dryRun ?? false;
        this.skipAssignments = options.skipAssignments ?? false;
        this.skipCompletedTasks = options.skipCompletedTasks ?? false;
        this.now = options.now || (() => new Date());
        this.generateId = options.generateId || randomUUID;
        this.logger = options.logger || consoleLogger;
    }

    async restoreBatch(
        documents: PlanExportDocument[],
    ): Promise<PlanRestorationOutcome[]> {
        const outcomes: PlanRestorationOutcome[] = [];

        for (const document of documents) {
            outcomes.push(await this.restorePlan(document));
        }

        return outcomes;
    }

    async restorePlan(
        document: PlanExportDocument,
    ): Promise<PlanRestorationOutcome> {
        if (this.dryRun) {
            return this.describePlan(document);
        }

        const { executor, context } = this.dependencies;
        const errors = context.errors;
        const plan = document.Plan;

        this.enterState('creating_plan', plan.title);
        errors.recordAttempt('plan');

        let newPlanId: string;

        try {
            const response = await executor.execute({
                method: 'POST',
                path: '/planner/plans',
                body: {
                    owner: this.targetGroupId,
                    title: plan.title,
                },
                description: `create plan "${plan.title}"`,
            });
            newPlanId = readCreatedId(response, 'plan');
            errors.recordSuccess('plan');
        } catch (error: unknown) {
            errors.record('plan', plan.title, error, 'create plan');
            this.logger.error('plan creation failed; skipping plan', {
                plan_title: plan.title,
                original_plan_id: plan.id,
                error: describeError(error),
            });

            return {
                status: 'plan_failed',
                originalPlanId: plan.id,
                message: describeError(error),
            };
        }

        await this.applyCategories(document, newPlanId);

        const bucketMap = await this.createBuckets(document, newPlanId);
        const taskMap = await this.createTasks(document, newPlanId, bucketMap);

        this.enterState('finalizing', plan.title);

        const record: RestorationRecord = {
            ImportDate: this.now().toISOString(),
            OriginalPlanId: plan.id,
            NewPlanId: newPlanId,
            GroupId: this.targetGroupId,
            BucketMap: bucketMap,
            TaskMap: taskMap,
        };

        errors.recordAttempt('restoration_record');

        try {
            await this.dependencies.recordStore.save(record);
            errors.recordSuccess('restoration_record');
        } catch (error: unknown) {
            errors.record(
                'restoration_record',
                plan.title,
                error,
                'persist restoration record',
            );
            this.logger.error('restoration record could not be saved', {
                plan_title: plan.title,
                new_plan_id: newPlanId,
                error: describeError(error),
            });
        }

        this.enterState('done', plan.title);

        return {
            status: 'restored',
            originalPlanId: plan.id,
            record,
        };
    }

    private enterState(state: RestorationState, planTitle: string): void {
        this.logger.info('restoration state', {
            run_id: this.dependencies.context.runId,
            plan_title: planTitle,
            state,
        });
    }

    private async applyCategories(
        document: PlanExportDocument,
        newPlanId: string,
    ): Promise<void> {
        const categoryDescriptions = normalizeCategoryDescriptions(
            document.Categories,
        );

        if (Object.keys(categoryDescriptions).length === 0) {
            return;
        }

        const errors = this.dependencies.context.errors;

        this.enterState('applying_categories', document.Plan.title);
        errors.recordAttempt('category');

        try {
            await this.dependencies.guard.updateWithConcurrency(
                `/planner/plans/${newPlanId}/details`,
                () => ({ categoryDescriptions }),
            );
            errors.recordSuccess('category');
        } catch (error: unknown) {
            errors.record(
                'category',
                document.Plan.title,
                error,
                'apply category labels',
            );
            this.logger.warn('category labels not applied', {
                plan_title: document.Plan.title,
                error: describeError(error),
            });
        }
    }

    private async createBuckets(
        document: PlanExportDocument,
        newPlanId: string,
    ): Promise<Record<string, string>> {
        const { executor, context } = this.dependencies;
        const bucketMap: Record<string, string> = {};

        this.enterState('creating_buckets', document.Plan.title);

        for (const bucket of sortBucketsByOrderHint(document.Buckets)) {
            context.errors.recordAttempt('bucket');

            try {
                const body: Record<string, unknown> = {
                    name: bucket.name,
                    planId: newPlanId,
                };

                if (bucket.orderHint) {
                    body.orderHint = bucket.orderHint;
                }

                const response = await executor.execute({
                    method: 'POST',
                    path: '/planner/buckets',
                    body,
                    description: `create bucket "${bucket.name}"`,
                });

                bucketMap[bucket.id] = readCreatedId(response, 'bucket');
                context.errors.recordSuccess('bucket');
            } catch (error: unknown) {
                context.errors.record(
                    'bucket',
                    bucket.name,
                    error,
                    `plan "${document.Plan.title}"`,
                );
                this.logger.warn('bucket creation failed; continuing', {
                    bucket_name: bucket.name,
                    original_bucket_id: bucket.id,
                    error: describeError(error),
                });
            }
        }

        return bucketMap;
    }

    private async createTasks(
        document: PlanExportDocument,
        newPlanId: string,
        bucketMap: Record<string, string>,
    ): Promise<Record<string, string>> {
        const { executor, context } = this.dependencies;
        const taskMap: Record<string, string> = {};
        const detailsByTaskId = new Map(
            document.TaskDetails.map((detail) => [detail.id, detail]),
        );

        this.enterState('creating_tasks', document.Plan.title);

        for (const task of document.Tasks) {
            if (this.skipCompletedTasks && isCompleted(task)) {
                this.logger.info('skipping completed task', {
                    task_title: task.title,
                    original_task_id: task.id,
                });
                continue;
            }

            const bucketId = task.bucketId
                ? bucketMap[task.bucketId]
                : undefined;

            if (task.bucketId && !bucketId) {
                this.logger.warn('task bucket unavailable; creating without bucket', {
                    task_title: task.title,
                    original_bucket_id: task.bucketId,
                });
            }

            const assignments = this.skipAssignments
                ? {}
                : await this.resolveAssignments(task, document.UserMap);
            const body = this.buildTaskPayload(
                task,
                newPlanId,
                bucketId,
                assignments,
            );

            context.errors.recordAttempt('task');

            let newTaskId: string;

            try {
                const response = await executor.execute({
                    method: 'POST',
                    path: '/planner/tasks',
                    body,
                    description: `create task "${task.title}"`,
                });
                newTaskId = readCreatedId(response, 'task');
                taskMap[task.id] = newTaskId;
                context.errors.recordSuccess('task');
            } catch (error: unknown) {
                context.errors.record(
                    'task',
                    task.title,
                    error,
                    `plan "${document.Plan.title}"`,
                );
                this.logger.warn('task creation failed; continuing', {
                    task_title: task.title,
                    original_task_id: task.id,
                    error: describeError(error),
                });
                continue;
            }

            const detail = detailsByTaskId.get(task.id);

            if (detail) {
                await this.applyTaskDetails(task, detail, newTaskId);
            }
        }

        return taskMap;
    }

    private async resolveAssignments(
        task: PlannerTask,
        userMap: PlanExportDocument['UserMap'],
    ): Promise<Record<string, unknown>> {
        const assignments: Record<string, unknown> = {};
        const { identities, context } = this.dependencies;

        for (const sourceUserId of Object.keys(task.assignments ?? {})) {
            const resolution = await identities.resolve(
                sourceUserId,
                toIdentityHints(userMap[sourceUserId]),
            );

            if (resolution.status === 'unresolved') {
                context.errors.recordUnresolvedIdentity(
                    sourceUserId,
                    task.title,
                    resolution.attempts,
                );
                this.logger.warn('assignee unresolved; dropping from task', {
                    task_title: task.title,
                    source_user_id: sourceUserId,
                    cache_hit: resolution.cacheHit,
                });
                continue;
            }

            assignments[resolution.targetUserId] = {
                '@odata.type': ASSIGNMENT_ODATA_TYPE,
                orderHint: ' !',
            };
        }

        return assignments;
    }

    private buildTaskPayload(
        task: PlannerTask,
        newPlanId: string,
        bucketId: string | undefined,
        assignments: Record<string, unknown>,
    ): Record<string, unknown> {
        const body: Record<string, unknown> = {
            planId: newPlanId,
            title: task.title,
        };

        if (bucketId) {
            body.bucketId = bucketId;
        }

        if (Object.keys(assignments).length > 0) {
            body.assignments = assignments;
        }

        if (task.percentComplete !== undefined) {
            body.percentComplete = task.percentComplete;
        }

        if (task.priority !== undefined) {
            body.priority = task.priority;
        }

        if (task.startDateTime) {
            body.startDateTime = task.startDateTime;
        }

        if (task.dueDateTime) {
            body.dueDateTime = task.dueDateTime;
        }

        if (task.appliedCategories) {
            const applied = Object.entries(task.appliedCategories)
                .filter(([, enabled]) => enabled);

            if (applied.length > 0) {
                body.appliedCategories = Object.fromEntries(applied);
            }
        }

        return body;
    }

    private async applyTaskDetails(
        task: PlannerTask,
        detail: PlannerTaskDetail,
        newTaskId: string,
    ): Promise<void> {
        const payload = buildTaskDetailPayload(detail, this.generateId);

        if (Object.keys(payload).length === 0) {
            return;
        }

        const { guard, context } = this.dependencies;

        context.errors.recordAttempt('task_detail');

        try {
            await guard.updateWithConcurrency(
                `/planner/tasks/${newTaskId}/details`,
                () => payload,
            );
            context.errors.recordSuccess('task_detail');
        } catch (error: unknown) {
            context.errors.record(
                'task_detail',
                task.title,
                error,
                'update task details',
            );
            this.logger.warn('task details not applied', {
                task_title: task.title,
                new_task_id: newTaskId,
                error: describeError(error),
            });
        }
    }

    private describePlan(
        document: PlanExportDocument,
    ): PlanRestorationOutcome {
        const plan = document.Plan;
        const actions: DryRunAction[] = [];
        const intend = (
            state: RestorationState,
            action: string,
            entityName: string,
        ): void => {
            actions.push({ state, action, entityName });
            this.logger.info(`dry run: would ${action}`, {
                state,
                entity_name: entityName,
            });
        };

        intend('creating_plan', 'create plan', plan.title);

        const categories = normalizeCategoryDescriptions(document.Categories);

        if (Object.keys(categories).length > 0) {
            intend(
                'applying_categories',
                `apply ${Object.keys(categories).length} category labels`,
                plan.title,
            );
        }

        const bucketNames = new Map<string, string>();

        for (const bucket of sortBucketsByOrderHint(document.Buckets)) {
            bucketNames.set(bucket.id, bucket.name);
            intend('creating_buckets', 'create bucket', bucket.name);
        }

        const detailsByTaskId = new Map(
            document.TaskDetails.map((detail) => [detail.id, detail]),
        );

        for (const task of document.Tasks) {
            if (this.skipCompletedTasks && isCompleted(task)) {
                continue;
            }

            const assigneeCount = this.skipAssignments
                ? 0
                : Object.keys(task.assignments ?? {}).length;
            const bucketName = task.bucketId
                ? bucketNames.get(task.bucketId)
                : undefined;
            const placement = bucketName
                ? ` in bucket "${bucketName}"`
                : '';

            intend(
                'creating_tasks',
                `create task${placement} with ${assigneeCount} assignees`,
                task.title,
            );

            const detail = detailsByTaskId.get(task.id);

            if (detail && hasTaskDetailContent(detail)) {
                intend('setting_task_details', 'update task details', task.title);
            }
        }

        intend('finalizing', 'save restoration record', plan.title);

        return {
            status: 'dry_run',
            originalPlanId: plan.id,
            actions,
        };
    }
}
