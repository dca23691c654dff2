import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parsePlannerRestoreEnv } from './env';
import { ConcurrencyGuard } from './graph/concurrency-guard';
import {
    FetchGraphTransport,
    GraphTransport,
} from './graph/graph-transport';
import { RequestExecutor } from './graph/request-executor';
import { IdentityResolver } from './identity/identity-resolver';
import { consoleLogger } from './logger';
import { PlanExportDocument, parseExportBatch } from './restore/models';
import {
    InMemoryRestorationRecordStore,
    PostgresRestorationRecordStore,
    RestorationRecordStore,
} from './restore/record-store';
import { RestorationCoordinator } from './restore/restoration-coordinator';
import { createRunContext } from './run-context';

export * from './constants';
export { ConcurrencyGuard } from './graph/concurrency-guard';
export { FetchGraphTransport } from './graph/graph-transport';
export type { GraphOperation, GraphResponse, GraphTransport } from './graph/graph-transport';
export { RequestExecutor } from './graph/request-executor';
export { IdentityResolver } from './identity/identity-resolver';
export { ErrorTracker, classifyError } from './tracking/error-tracker';
export type { ErrorReport, RestoreExitCode } from './tracking/error-tracker';
export { RestorationCoordinator } from './restore/restoration-coordinator';
export { parseExportDocument, parseExportBatch } from './restore/models';
export type { PlanExportDocument, RestorationRecord } from './restore/models';
export { createRunContext } from './run-context';
export { GraphRequestError, ValidationFailureError } from './errors';

const dryRunTransport: GraphTransport = {
    async send(operation) {
        throw new Error(
            `dry run must not issue requests (${operation.method} ${operation.path})`,
        );
    },
};

async function main(): Promise<void> {
    const env = parsePlannerRestoreEnv(process.env);
    const logger = consoleLogger;
    const context = createRunContext({
        failureExampleLimit: env.failureExampleLimit,
    });
    const rawInput = JSON.parse(
        readFileSync(resolve(env.inputPath), 'utf8'),
    ) as unknown;
    const documents: PlanExportDocument[] = [];

    parseExportBatch(rawInput).forEach((result, index) => {
        if (result.success) {
            documents.push(result.document);

            return;
        }

        context.errors.recordAttempt('plan');
        context.errors.record(
            'plan',
            `export document ${index}`,
            result.error,
            'ingestion',
        );
        logger.error('export document rejected', {
            index,
            issue_path: result.error.issuePath,
            error: result.error.message,
        });
    });

    const transport = env.dryRun
        ? dryRunTransport
        : new FetchGraphTransport({
            baseUrl: env.graphBaseUrl,
            accessToken: env.accessToken,
            timeoutMs: env.requestTimeoutMs,
        });
    const executor = new RequestExecutor(transport, {
        minRequestDelayMs: env.minRequestDelayMs,
        maxRetries: env.maxRetries,
        backoffBaseSeconds: env.backoffBaseSeconds,
        defaultRetryAfterSeconds: env.defaultRetryAfterSeconds,
        logger,
    });
    const identities = new IdentityResolver(
        executor,
        context.identity,
        env.userMappings,
    );
    const recordStore: RestorationRecordStore = env.restorePgUrl
        && !env.dryRun
        ? new PostgresRestorationRecordStore(env.restorePgUrl)
        : new InMemoryRestorationRecordStore();
    const coordinator = new RestorationCoordinator(
        {
            executor,
            guard: new ConcurrencyGuard(executor),
            identities,
            recordStore,
            context,
        },
        {
            targetGroupId: env.targetGroupId,
            dryRun: env.dryRun,
            skipAssignments: env.skipAssignments,
            skipCompletedTasks: env.skipCompletedTasks,
            logger,
        },
    );

    logger.info('planner-restore starting', {
        run_id: context.runId,
        documents: documents.length,
        dry_run: env.dryRun,
        target_group_id: env.targetGroupId,
        min_request_delay_ms: env.minRequestDelayMs,
        max_retries: env.maxRetries,
        explicit_user_mappings: Object.keys(env.userMappings).length,
        record_store: recordStore instanceof PostgresRestorationRecordStore
            ? 'postgres'
            : 'memory',
    });

    try {
        const outcomes = await coordinator.restoreBatch(documents);

        for (const outcome of outcomes) {
            if (outcome.status === 'restored') {
                logger.info('restoration record', outcome.record);
            }
        }
    } finally {
        await recordStore.close();
    }

    const { report, exitCode } = context.errors.finalize();
    const reportJson = JSON.stringify(report, null, 2);

    if (env.reportPath) {
        writeFileSync(resolve(env.reportPath), `${reportJson}\n`, 'utf8');
    }

    console.log(reportJson);
    logger.info('identity cache statistics', {
        ...identities.getStatistics(),
    });

    process.exitCode = exitCode;
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('planner-restore failed', error);
        process.exitCode = 2;
    });
}
