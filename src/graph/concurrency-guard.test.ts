import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { GraphRequestError } from '../errors';
import {
    FakePlannerApi,
    graphError,
    jsonResponse,
    recordingSleep,
    ScriptedTransport,
} from '../test-helpers';
import { ConcurrencyGuard } from './concurrency-guard';
import { GraphTransport } from './graph-transport';
import { RequestExecutor } from './request-executor';

function buildGuard(transport: GraphTransport): ConcurrencyGuard {
    return new ConcurrencyGuard(new RequestExecutor(transport, {
        minRequestDelayMs: 0,
        sleep: recordingSleep().sleep,
    }));
}

async function seedTask(api: FakePlannerApi): Promise<string> {
    const created = await api.send({
        method: 'POST',
        path: '/planner/tasks',
        body: { planId: 'plan-new-1', title: 'Seed' },
    });

    return String(created.body?.id);
}

describe('ConcurrencyGuard', () => {
    test('reads a fresh token and sends it as If-Match', async () => {
        const api = new FakePlannerApi();
        const taskId = await seedTask(api);
        const guard = buildGuard(api);
        let seenCurrent: Record<string, unknown> | undefined;

        const result = await guard.updateWithConcurrency(
            `/planner/tasks/${taskId}/details`,
            (current) => {
                seenCurrent = current;

                return { description: 'restored' };
            },
        );

        assert.equal(result.status, 'updated');
        assert.deepEqual(seenCurrent, {
            id: 'task-new-1',
            '@odata.etag': 'W/"task-new-1-v1"',
        });

        const [read, write] = api.operations.slice(1);
        assert.equal(read?.method, 'GET');
        assert.equal(write?.method, 'PATCH');
        assert.equal(write?.headers?.['if-match'], 'W/"task-new-1-v1"');
        assert.equal(write?.headers?.prefer, 'return=representation');
        assert.deepEqual(write?.body, { description: 'restored' });
        assert.equal(
            api.details.get('/planner/tasks/task-new-1/details')?.body.description,
            'restored',
        );
    });

    test('never reuses a token across two updates', async () => {
        const api = new FakePlannerApi();
        const taskId = await seedTask(api);
        const guard = buildGuard(api);
        const path = `/planner/tasks/${taskId}/details`;

        await guard.updateWithConcurrency(path, () => ({ description: 'one' }));
        await guard.updateWithConcurrency(path, () => ({ description: 'two' }));

        const ifMatchValues = api.operations
            .filter((operation) => operation.method === 'PATCH')
            .map((operation) => operation.headers?.['if-match']);

        assert.deepEqual(ifMatchValues, [
            'W/"task-new-1-v1"',
            'W/"task-new-1-v2"',
        ]);
    });

    test('skips the write when the mutation is empty', async () => {
        const api = new FakePlannerApi();
        const taskId = await seedTask(api);
        const guard = buildGuard(api);

        const result = await guard.updateWithConcurrency(
            `/planner/tasks/${taskId}/details`,
            () => ({}),
        );

        assert.deepEqual(result, { status: 'skipped' });
        assert.deepEqual(
            api.operations.map((operation) => operation.method),
            ['POST', 'GET'],
        );
    });

    test('surfaces a stale token as a conflict without retrying', async () => {
        const api = new FakePlannerApi();
        const taskId = await seedTask(api);
        const guard = buildGuard(api);

        api.failWhen((operation) => operation.method === 'PATCH'
            ? graphError(412, 'PreconditionFailed', 'etag mismatch')
            : undefined);

        await assert.rejects(
            guard.updateWithConcurrency(
                `/planner/tasks/${taskId}/details`,
                () => ({ description: 'late' }),
            ),
            (error: unknown) => {
                assert.ok(error instanceof GraphRequestError);
                assert.equal(error.code, 'concurrency_conflict');
                assert.equal(error.statusCode, 412);
                assert.equal(error.attempts, 1);

                return true;
            },
        );
        assert.equal(
            api.operations.filter((operation) => operation.method === 'PATCH')
                .length,
            1,
        );
    });

    test('a transient failure on the write is not retried with the same token', async () => {
        const transport = new ScriptedTransport([
            jsonResponse(200, { id: 'd1', '@odata.etag': 'W/"v1"' }),
            graphError(503, 'ServiceUnavailable', 'busy'),
            jsonResponse(200, { id: 'd1', '@odata.etag': 'W/"v2"' }),
        ]);
        const guard = buildGuard(transport);

        await assert.rejects(
            guard.updateWithConcurrency(
                '/planner/tasks/t1/details',
                () => ({ description: 'restored' }),
            ),
            (error: unknown) => {
                assert.ok(error instanceof GraphRequestError);
                assert.equal(error.code, 'transient_network');
                assert.equal(error.statusCode, 503);
                assert.equal(error.attempts, 1);

                return true;
            },
        );
        assert.deepEqual(
            transport.operations.map((operation) => operation.method),
            ['GET', 'PATCH'],
        );
    });

    test('falls back to the ETag header when the body has no token', async () => {
        const transport = new ScriptedTransport([
            jsonResponse(200, { id: 'd1' }, { etag: 'W/"header-token"' }),
            jsonResponse(200, { id: 'd1' }),
        ]);
        const guard = buildGuard(transport);

        await guard.updateWithConcurrency(
            '/planner/plans/p1/details',
            () => ({ categoryDescriptions: { category1: 'Urgent' } }),
        );

        assert.equal(
            transport.operations[1]?.headers?.['if-match'],
            'W/"header-token"',
        );
    });

    test('rejects a resource without any version token', async () => {
        const transport = new ScriptedTransport([
            jsonResponse(200, { id: 'd1' }),
        ]);
        const guard = buildGuard(transport);

        await assert.rejects(
            guard.updateWithConcurrency(
                '/planner/plans/p1/details',
                () => ({ categoryDescriptions: { category1: 'Urgent' } }),
            ),
            (error: unknown) => {
                assert.ok(error instanceof GraphRequestError);
                assert.equal(error.code, 'validation_failure');
                assert.equal(error.statusCode, undefined);
                assert.equal(
                    error.message,
                    '/planner/plans/p1/details returned no version token',
                );

                return true;
            },
        );
        assert.equal(transport.operations.length, 1);
    });
});
