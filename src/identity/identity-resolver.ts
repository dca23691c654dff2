import { RestoreErrorCode } from '../constants';
import { isGraphRequestError } from '../errors';
import { RequestExecutor } from '../graph/request-executor';

export interface IdentityHints {
    userPrincipalName?: string;
    mail?: string;
    displayName?: string;
}

export type LookupStrategy =
    | 'explicit_mapping'
    | 'principal_name'
    | 'mail'
    | 'source_id';

export type LookupAttempt =
    | {
        strategy: LookupStrategy;
        key: string;
        status: 'found';
        targetUserId: string;
    }
    | {
        strategy: LookupStrategy;
        key: string;
        status: 'not_found';
        statusCode?: number;
        reason: string;
    }
    | {
        strategy: LookupStrategy;
        key: string;
        status: 'failed';
        code: RestoreErrorCode;
        statusCode?: number;
        reason: string;
    };

export interface ResolvedIdentity {
    status: 'resolved';
    sourceUserId: string;
    targetUserId: string;
    strategy: LookupStrategy;
}

export interface UnresolvedIdentity {
    status: 'unresolved';
    sourceUserId: string;
    attempts: LookupAttempt[];
}

export type IdentityResolution = (ResolvedIdentity | UnresolvedIdentity) & {
    cacheHit: boolean;
};

export interface IdentityCacheEntry {
    resolution: ResolvedIdentity | UnresolvedIdentity;
    apiCalls: number;
}

export interface IdentityStats {
    lookups: number;
    cacheHits: number;
    cacheMisses: number;
    resolved: number;
    unresolved: number;
    apiCalls: number;
    callsAvoided: number;
}

export interface IdentityRunState {
    cache: Map<string, IdentityCacheEntry>;
    stats: IdentityStats;
}

export interface IdentityCacheStatistics {
    totalLookups: number;
    cacheHits: number;
    cacheMisses: number;
    hitRate: number;
    estimatedCallsAvoided: number;
    resolved: number;
    unresolved: number;
    apiCalls: number;
}

export function createIdentityRunState(): IdentityRunState {
    return {
        cache: new Map(),
        stats: {
            lookups: 0,
            cacheHits: 0,
            cacheMisses: 0,
            resolved: 0,
            unresolved: 0,
            apiCalls: 0,
            callsAvoided: 0,
        },
    };
}

function normalizeKey(value: string | undefined): string | undefined {
    if (!value) {
        return undefined;
    }

    const trimmed = value.trim();

    return trimmed ? trimmed : undefined;
}

function normalizeExplicitMappings(
    mappings: Record<string, string>,
): Map<string, string> {
    const normalized = new Map<string, string>();

    for (const [sourceId, targetId] of Object.entries(mappings)) {
        const source = normalizeKey(sourceId);
        const target = normalizeKey(targetId);

        if (!source || !target) {
            throw new Error(
                'explicit user mappings must map non-empty ids to non-empty ids',
            );
        }

        normalized.set(source, target);
    }

    return normalized;
}

function cloneResolution(
    resolution: ResolvedIdentity | UnresolvedIdentity,
): ResolvedIdentity | UnresolvedIdentity {
    if (resolution.status === 'resolved') {
        return { ...resolution };
    }

    return {
        ...resolution,
        attempts: resolution.attempts.map((attempt) => ({ ...attempt })),
    };
}

/**
 * Maps source-tenant user ids onto target-tenant ids. Explicit mappings
 * win, then principal name, mail and the raw source id are tried in turn
 * against `/users/{key}`. Both outcomes are cached for the run, so an
 * unresolved user costs one lookup chain at most.
 */
export class IdentityResolver {
    private readonly explicitMappings: Map<string, string>;

    constructor(
        private readonly executor: RequestExecutor,
        private readonly state: IdentityRunState,
        explicitMappings: Record<string, string> = {},
    ) {
        this.explicitMappings = normalizeExplicitMappings(explicitMappings);
    }

    async resolve(
        sourceUserId: string,
        hints: IdentityHints = {},
    ): Promise<IdentityResolution> {
        const stats = this.state.stats;
        stats.lookups += 1;

        const cached = this.state.cache.get(sourceUserId);

        if (cached) {
            stats.cacheHits += 1;
            stats.callsAvoided += cached.apiCalls;

            return {
                ...cloneResolution(cached.resolution),
                cacheHit: true,
            };
        }

        stats.cacheMisses += 1;

        const { resolution, apiCalls } = await this.runChain(
            sourceUserId,
            hints,
        );

        stats.apiCalls += apiCalls;

        if (resolution.status === 'resolved') {
            stats.resolved += 1;
        } else {
            stats.unresolved += 1;
        }

        this.state.cache.set(sourceUserId, {
            resolution: cloneResolution(resolution),
            apiCalls,
        });

        return {
            ...resolution,
            cacheHit: false,
        };
    }

    getStatistics(): IdentityCacheStatistics {
        const stats = this.state.stats;
        const hitRate = stats.lookups === 0
            ? 0
            : Math.round((stats.cacheHits / stats.lookups) * 10000) / 100;

        return {
            totalLookups: stats.lookups,
            cacheHits: stats.cacheHits,
            cacheMisses: stats.cacheMisses,
            hitRate,
            estimatedCallsAvoided: stats.callsAvoided,
            resolved: stats.resolved,
            unresolved: stats.unresolved,
            apiCalls: stats.apiCalls,
        };
    }

    getCacheSize(): number {
        return this.state.cache.size;
    }

    private async runChain(
        sourceUserId: string,
        hints: IdentityHints,
    ): Promise<{
        resolution: ResolvedIdentity | UnresolvedIdentity;
        apiCalls: number;
    }> {
        const explicitTarget = this.explicitMappings.get(sourceUserId);

        if (explicitTarget) {
            return {
                resolution: {
                    status: 'resolved',
                    sourceUserId,
                    targetUserId: explicitTarget,
                    strategy: 'explicit_mapping',
                },
                apiCalls: 0,
            };
        }

        const attempts: LookupAttempt[] = [];
        const triedKeys = new Set<string>();
        const candidates: Array<[LookupStrategy, string | undefined]> = [
            ['principal_name', normalizeKey(hints.userPrincipalName)],
            ['mail', normalizeKey(hints.mail)],
            ['source_id', normalizeKey(sourceUserId)],
        ];

        for (const [strategy, key] of candidates) {
            if (!key || triedKeys.has(key.toLowerCase())) {
                continue;
            }

            triedKeys.add(key.toLowerCase());

            const attempt = await this.lookup(strategy, key);
            attempts.push(attempt);

            if (attempt.status === 'found') {
                return {
                    resolution: {
                        status: 'resolved',
                        sourceUserId,
                        targetUserId: attempt.targetUserId,
                        strategy,
                    },
                    apiCalls: attempts.length,
                };
            }
        }

        return {
            resolution: {
                status: 'unresolved',
                sourceUserId,
                attempts,
            },
            apiCalls: attempts.length,
        };
    }

    private async lookup(
        strategy: LookupStrategy,
        key: string,
    ): Promise<LookupAttempt> {
        try {
            const response = await this.executor.execute({
                method: 'GET',
                path: `/users/${encodeURIComponent(key)}?$select=id`,
                description: `lookup user by ${strategy}`,
            });
            const targetUserId = response.body?.id;

            if (typeof targetUserId !== 'string' || targetUserId === '') {
                return {
                    strategy,
                    key,
                    status: 'failed',
                    code: 'validation_failure',
                    statusCode: response.statusCode,
                    reason: 'user lookup response has no id',
                };
            }

            return {
                strategy,
                key,
                status: 'found',
                targetUserId,
            };
        } catch (error: unknown) {
            if (!isGraphRequestError(error)) {
                throw error;
            }

            if (error.statusCode === 404) {
                return {
                    strategy,
                    key,
                    status: 'not_found',
                    statusCode: 404,
                    reason: error.message,
                };
            }

            return {
                strategy,
                key,
                status: 'failed',
                code: error.code,
                statusCode: error.statusCode,
                reason: error.message,
            };
        }
    }
}
