import { z } from 'zod';
import { ValidationFailureError } from '../errors';

const NullableString = z.string().nullable().optional();

export const PlannerPlanSchema = z
    .object({
        id: z.string().min(1),
        title: z.string().min(1),
        owner: NullableString,
        createdDateTime: NullableString,
    })
    .passthrough();

export const PlannerBucketSchema = z
    .object({
        id: z.string().min(1),
        name: z.string(),
        planId: NullableString,
        orderHint: NullableString,
    })
    .passthrough();

const PlannerAssignmentSchema = z
    .object({
        orderHint: NullableString,
    })
    .passthrough();

export const PlannerTaskSchema = z
    .object({
        id: z.string().min(1),
        title: z.string(),
        planId: NullableString,
        bucketId: NullableString,
        orderHint: NullableString,
        percentComplete: z.number().int().min(0).max(100).optional(),
        priority: z.number().int().min(0).max(10).optional(),
        startDateTime: NullableString,
        dueDateTime: NullableString,
        assignments: z.record(z.string(), PlannerAssignmentSchema)
            .nullable()
            .optional(),
        appliedCategories: z.record(z.string(), z.boolean())
            .nullable()
            .optional(),
    })
    .passthrough();

const PlannerChecklistItemSchema = z
    .object({
        title: z.string(),
        isChecked: z.boolean().optional(),
        orderHint: NullableString,
    })
    .passthrough();

const PlannerExternalReferenceSchema = z
    .object({
        alias: NullableString,
        type: NullableString,
        previewPriority: NullableString,
    })
    .passthrough();

export const PlannerTaskDetailSchema = z
    .object({
        id: z.string().min(1),
        description: NullableString,
        previewType: NullableString,
        checklist: z.record(z.string(), PlannerChecklistItemSchema)
            .nullable()
            .optional(),
        references: z.record(z.string(), PlannerExternalReferenceSchema)
            .nullable()
            .optional(),
    })
    .passthrough();

export const UserHintSchema = z
    .object({
        userPrincipalName: NullableString,
        mail: NullableString,
        displayName: NullableString,
    })
    .passthrough();

export const PlanExportDocumentSchema = z.object({
    Plan: PlannerPlanSchema,
    Buckets: z.array(PlannerBucketSchema).default([]),
    Tasks: z.array(PlannerTaskSchema).default([]),
    TaskDetails: z.array(PlannerTaskDetailSchema).default([]),
    Categories: z.record(z.string(), z.string().nullable())
        .nullable()
        .optional(),
    UserMap: z.record(z.string(), UserHintSchema).default({}),
});

export type PlannerPlan = z.infer<typeof PlannerPlanSchema>;
export type PlannerBucket = z.infer<typeof PlannerBucketSchema>;
export type PlannerTask = z.infer<typeof PlannerTaskSchema>;
export type PlannerTaskDetail = z.infer<typeof PlannerTaskDetailSchema>;
export type UserHint = z.infer<typeof UserHintSchema>;
export type PlanExportDocument = z.infer<typeof PlanExportDocumentSchema>;

export const RestorationRecordSchema = z
    .object({
        ImportDate: z.string().min(1),
        OriginalPlanId: z.string().min(1),
        NewPlanId: z.string().min(1),
        GroupId: z.string().min(1),
        BucketMap: z.record(z.string(), z.string()),
        TaskMap: z.record(z.string(), z.string()),
    })
    .strict();

export type RestorationRecord = z.infer<typeof RestorationRecordSchema>;

export type ParseExportDocumentResult =
    | {
        success: true;
        document: PlanExportDocument;
    }
    | {
        success: false;
        error: ValidationFailureError;
    };

function formatIssuePath(path: Array<string | number>): string {
    return path.length === 0 ? '(root)' : path.join('.');
}

export function parseExportDocument(
    raw: unknown,
): ParseExportDocumentResult {
    const parsed = PlanExportDocumentSchema.safeParse(raw);

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const issuePath = issue ? formatIssuePath(issue.path) : '(root)';

        return {
            success: false,
            error: new ValidationFailureError(
                `invalid export document at ${issuePath}: `
                    + `${issue?.message || 'Invalid input'}`,
                issuePath,
            ),
        };
    }

    return {
        success: true,
        document: parsed.data,
    };
}

/**
 * Accepts a single export document or an array of them, as written by the
 * export step for one plan or a batch.
 */
export function parseExportBatch(raw: unknown): ParseExportDocumentResult[] {
    const entries = Array.isArray(raw) ? raw : [raw];

    return entries.map((entry) => parseExportDocument(entry));
}
