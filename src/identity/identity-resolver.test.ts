import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { RequestExecutor } from '../graph/request-executor';
import { silentLogger } from '../logger';
import {
    FakePlannerApi,
    graphError,
    recordingSleep,
} from '../test-helpers';
import {
    createIdentityRunState,
    IdentityResolver,
} from './identity-resolver';

const DIRECTORY = {
    'alice@target.test': 'target-alice',
    'bob.mail@target.test': 'target-bob',
    'shared-user-id': 'shared-user-id',
};

function buildResolver(
    api: FakePlannerApi,
    explicitMappings: Record<string, string> = {},
): IdentityResolver {
    const executor = new RequestExecutor(api, {
        minRequestDelayMs: 0,
        sleep: recordingSleep().sleep,
        logger: silentLogger,
    });

    return new IdentityResolver(
        executor,
        createIdentityRunState(),
        explicitMappings,
    );
}

describe('IdentityResolver', () => {
    test('resolves by principal name first', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        const result = await resolver.resolve('source-alice', {
            userPrincipalName: 'alice@target.test',
            mail: 'bob.mail@target.test',
        });

        assert.deepEqual(result, {
            status: 'resolved',
            sourceUserId: 'source-alice',
            targetUserId: 'target-alice',
            strategy: 'principal_name',
            cacheHit: false,
        });
        assert.deepEqual(
            api.operations.map((operation) => operation.path),
            ['/users/alice%40target.test?$select=id'],
        );
    });

    test('falls back to mail when the principal name is unknown', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        const result = await resolver.resolve('source-bob', {
            userPrincipalName: 'bob@source.test',
            mail: 'bob.mail@target.test',
        });

        assert.equal(result.status, 'resolved');
        assert.equal(
            result.status === 'resolved' ? result.strategy : undefined,
            'mail',
        );
        assert.equal(api.operations.length, 2);
    });

    test('skips a mail hint that repeats the principal name', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        const result = await resolver.resolve('shared-user-id', {
            userPrincipalName: 'Carol@source.test',
            mail: 'carol@SOURCE.test',
        });

        assert.equal(result.status, 'resolved');
        assert.deepEqual(
            api.operations.map((operation) => operation.path),
            [
                '/users/Carol%40source.test?$select=id',
                '/users/shared-user-id?$select=id',
            ],
        );
    });

    test('tries the source id directly for same-tenant restores', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        const result = await resolver.resolve('shared-user-id');

        assert.deepEqual(result, {
            status: 'resolved',
            sourceUserId: 'shared-user-id',
            targetUserId: 'shared-user-id',
            strategy: 'source_id',
            cacheHit: false,
        });
    });

    test('prefers an explicit mapping over a lookup that would also succeed', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api, {
            'source-alice': 'mapped-alice',
        });

        const result = await resolver.resolve('source-alice', {
            userPrincipalName: 'alice@target.test',
        });

        assert.equal(result.status, 'resolved');
        assert.equal(
            result.status === 'resolved' ? result.targetUserId : undefined,
            'mapped-alice',
        );
        assert.equal(
            result.status === 'resolved' ? result.strategy : undefined,
            'explicit_mapping',
        );
        assert.equal(api.operations.length, 0);
    });

    test('serves the second resolution from cache', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);
        const hints = { userPrincipalName: 'alice@target.test' };

        const first = await resolver.resolve('source-alice', hints);
        const second = await resolver.resolve('source-alice', hints);

        assert.equal(first.cacheHit, false);
        assert.equal(second.cacheHit, true);
        assert.equal(
            second.status === 'resolved' ? second.targetUserId : undefined,
            'target-alice',
        );
        assert.equal(api.operations.length, 1);
        assert.equal(resolver.getCacheSize(), 1);
    });

    test('caches unresolved identities with tagged attempts', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);
        const hints = {
            userPrincipalName: 'ghost@source.test',
            mail: 'ghost.mail@source.test',
        };

        const first = await resolver.resolve('ghost-id', hints);
        const second = await resolver.resolve('ghost-id', hints);

        assert.equal(first.status, 'unresolved');
        assert.deepEqual(
            first.status === 'unresolved'
                ? first.attempts.map((attempt) => [
                    attempt.strategy,
                    attempt.status,
                    attempt.status === 'found' ? undefined : attempt.statusCode,
                ])
                : [],
            [
                ['principal_name', 'not_found', 404],
                ['mail', 'not_found', 404],
                ['source_id', 'not_found', 404],
            ],
        );
        assert.equal(second.status, 'unresolved');
        assert.equal(second.cacheHit, true);
        assert.equal(api.operations.length, 3);
    });

    test('records failed lookups and keeps walking the chain', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        api.failWhen((operation) => operation.path.startsWith('/users/dave')
            ? graphError(403, 'Authorization_RequestDenied', 'Insufficient privileges')
            : undefined);

        const result = await resolver.resolve('shared-user-id', {
            userPrincipalName: 'dave@source.test',
        });

        assert.equal(result.status, 'resolved');
        assert.equal(
            result.status === 'resolved' ? result.strategy : undefined,
            'source_id',
        );
    });

    test('tags permission failures with their code and status', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);

        api.failWhen(() => graphError(
            403,
            'Authorization_RequestDenied',
            'Insufficient privileges',
        ));

        const result = await resolver.resolve('erin-id');

        assert.equal(result.status, 'unresolved');

        const attempt = result.status === 'unresolved'
            ? result.attempts[0]
            : undefined;

        assert.equal(attempt?.status, 'failed');
        assert.equal(
            attempt?.status === 'failed' ? attempt.code : undefined,
            'permanent_client',
        );
        assert.equal(
            attempt?.status === 'failed' ? attempt.statusCode : undefined,
            403,
        );
    });

    test('reports hit rate and calls avoided', async () => {
        const api = new FakePlannerApi(DIRECTORY);
        const resolver = buildResolver(api);
        const aliceHints = { userPrincipalName: 'alice@target.test' };
        const ghostHints = {
            userPrincipalName: 'ghost@source.test',
            mail: 'ghost.mail@source.test',
        };

        await resolver.resolve('source-alice', aliceHints);
        await resolver.resolve('source-alice', aliceHints);
        await resolver.resolve('ghost-id', ghostHints);
        await resolver.resolve('ghost-id', ghostHints);

        assert.deepEqual(resolver.getStatistics(), {
            totalLookups: 4,
            cacheHits: 2,
            cacheMisses: 2,
            hitRate: 50,
            estimatedCallsAvoided: 4,
            resolved: 1,
            unresolved: 1,
            apiCalls: 4,
        });
    });

    test('rejects explicit mappings with empty targets', () => {
        const api = new FakePlannerApi();

        assert.throws(
            () => buildResolver(api, { 'source-alice': ' ' }),
            /explicit user mappings must map non-empty ids/,
        );
    });
});
