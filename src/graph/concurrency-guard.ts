import { GraphRequestError } from '../errors';
import { GraphResponse } from './graph-transport';
import { RequestExecutor } from './request-executor';

export type MutationBuilder = (
    current: Record<string, unknown>,
) => Record<string, unknown>;

export type ConcurrencyUpdateResult =
    | {
        status: 'updated';
        resource: Record<string, unknown> | undefined;
    }
    | {
        status: 'skipped';
    };

export function readConcurrencyToken(
    response: GraphResponse,
): string | undefined {
    const bodyToken = response.body?.['@odata.etag'];

    if (typeof bodyToken === 'string' && bodyToken.trim() !== '') {
        return bodyToken;
    }

    const headerToken = response.headers.etag;

    if (headerToken && headerToken.trim() !== '') {
        return headerToken;
    }

    return undefined;
}

/**
 * Read-modify-write for resources guarded by version tokens. The token is
 * read fresh for every call and sent once. The write is never retried:
 * a 409/412 comes back as a `concurrency_conflict` GraphRequestError and
 * a transient failure surfaces as-is for the caller to record.
 */
export class ConcurrencyGuard {
    constructor(private readonly executor: RequestExecutor) {}

    async updateWithConcurrency(
        resourcePath: string,
        buildMutation: MutationBuilder,
    ): Promise<ConcurrencyUpdateResult> {
        const current = await this.executor.execute({
            method: 'GET',
            path: resourcePath,
            description: `read ${resourcePath}`,
        });
        const token = readConcurrencyToken(current);

        if (!token) {
            throw new GraphRequestError(
                `${resourcePath} returned no version token`,
                {
                    code: 'validation_failure',
                    attempts: 1,
                },
            );
        }

        const payload = buildMutation(current.body ?? {});

        if (Object.keys(payload).length === 0) {
            return {
                status: 'skipped',
            };
        }

        // One attempt per token: a retried PATCH would resend a spent token.
        const updated = await this.executor.execute(
            {
                method: 'PATCH',
                path: resourcePath,
                body: payload,
                headers: {
                    'if-match': token,
                    prefer: 'return=representation',
                },
                description: `update ${resourcePath}`,
            },
            { maxAttempts: 1 },
        );

        return {
            status: 'updated',
            resource: updated.body,
        };
    }
}
