import { strict as assert } from 'node:assert';
import { once } from 'node:events';
import {
    createServer,
    IncomingHttpHeaders,
    IncomingMessage,
    Server,
} from 'node:http';
import { describe, test } from 'node:test';
import { GraphTransportError } from '../errors';
import {
    extractGraphErrorMessage,
    FetchGraphTransport,
} from './graph-transport';

interface RecordedRequest {
    method: string;
    url: string;
    headers: IncomingHttpHeaders;
    body: string;
}

async function listen(server: Server): Promise<string> {
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();

    if (!address || typeof address === 'string') {
        throw new Error('server address unavailable');
    }

    return `http://127.0.0.1:${address.port}/v1.0/`;
}

async function closeServer(server: Server): Promise<void> {
    server.closeAllConnections();
    await new Promise<void>((resolve) => {
        server.close(() => {
            resolve();
        });
    });
}

async function readBody(request: IncomingMessage): Promise<string> {
    const buffers: Buffer[] = [];

    for await (const chunk of request) {
        buffers.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    return Buffer.concat(buffers).toString('utf8');
}

describe('FetchGraphTransport', () => {
    test('sends authorized JSON requests and reads status, body and headers', async () => {
        const requests: RecordedRequest[] = [];
        const server = createServer((request, response) => {
            void readBody(request).then((body) => {
                requests.push({
                    method: request.method || '',
                    url: request.url || '',
                    headers: request.headers,
                    body,
                });
                response.writeHead(201, {
                    'content-type': 'application/json',
                    etag: 'W/"etag-1"',
                    'retry-after': '3',
                    'request-id': 'req-42',
                });
                response.end(JSON.stringify({ id: 'bucket-1' }));
            });
        });
        const baseUrl = await listen(server);

        try {
            const transport = new FetchGraphTransport({
                baseUrl,
                accessToken: 'test-token',
                timeoutMs: 2000,
            });
            const response = await transport.send({
                method: 'POST',
                path: '/planner/buckets',
                body: { name: 'Backlog', planId: 'plan-1' },
                headers: { prefer: 'return=representation' },
            });

            assert.equal(response.statusCode, 201);
            assert.deepEqual(response.body, { id: 'bucket-1' });
            assert.deepEqual(response.headers, {
                etag: 'W/"etag-1"',
                retryAfter: '3',
                requestId: 'req-42',
            });
            assert.equal(requests.length, 1);
            assert.equal(requests[0]?.method, 'POST');
            assert.equal(requests[0]?.url, '/v1.0/planner/buckets');
            assert.equal(
                requests[0]?.headers.authorization,
                'Bearer test-token',
            );
            assert.equal(
                requests[0]?.headers['content-type'],
                'application/json',
            );
            assert.equal(
                requests[0]?.headers.prefer,
                'return=representation',
            );
            assert.deepEqual(JSON.parse(requests[0]?.body || '{}'), {
                name: 'Backlog',
                planId: 'plan-1',
            });
        } finally {
            await closeServer(server);
        }
    });

    test('returns error statuses instead of throwing', async () => {
        const server = createServer((_request, response) => {
            response.writeHead(404, { 'content-type': 'application/json' });
            response.end(JSON.stringify({
                error: { code: 'NotFound', message: 'no such plan' },
            }));
        });
        const baseUrl = await listen(server);

        try {
            const transport = new FetchGraphTransport({
                baseUrl,
                accessToken: 'test-token',
                timeoutMs: 2000,
            });
            const response = await transport.send({
                method: 'GET',
                path: '/planner/plans/missing',
            });

            assert.equal(response.statusCode, 404);
            assert.equal(
                extractGraphErrorMessage(response.body),
                'NotFound: no such plan',
            );
        } finally {
            await closeServer(server);
        }
    });

    test('treats an empty or non-JSON body as absent', async () => {
        const server = createServer((request, response) => {
            if (request.url?.endsWith('/empty')) {
                response.writeHead(204);
                response.end();

                return;
            }

            response.writeHead(502, { 'content-type': 'text/html' });
            response.end('<html>bad gateway</html>');
        });
        const baseUrl = await listen(server);

        try {
            const transport = new FetchGraphTransport({
                baseUrl,
                accessToken: 'test-token',
                timeoutMs: 2000,
            });
            const empty = await transport.send({ method: 'DELETE', path: '/empty' });
            const html = await transport.send({ method: 'GET', path: '/html' });

            assert.equal(empty.statusCode, 204);
            assert.equal(empty.body, undefined);
            assert.equal(html.statusCode, 502);
            assert.equal(html.body, undefined);
        } finally {
            await closeServer(server);
        }
    });

    test('raises a timed-out transport error when the server stalls', async () => {
        const server = createServer((_request, response) => {
            setTimeout(() => {
                response.writeHead(200);
                response.end('{}');
            }, 500);
        });
        const baseUrl = await listen(server);

        try {
            const transport = new FetchGraphTransport({
                baseUrl,
                accessToken: 'test-token',
                timeoutMs: 25,
            });

            await assert.rejects(
                transport.send({ method: 'GET', path: '/slow' }),
                (error: unknown) => {
                    assert.ok(error instanceof GraphTransportError);
                    assert.equal(error.timedOut, true);
                    assert.equal(
                        error.message,
                        'Graph request timed out after 25ms',
                    );

                    return true;
                },
            );
        } finally {
            await closeServer(server);
        }
    });

    test('wraps connection failures without a status code', async () => {
        const transport = new FetchGraphTransport({
            baseUrl: 'https://graph.example.test/v1.0',
            accessToken: 'test-token',
            timeoutMs: 2000,
            fetchImpl: async () => {
                throw new TypeError('fetch failed');
            },
        });

        await assert.rejects(
            transport.send({ method: 'GET', path: '/users/someone' }),
            (error: unknown) => {
                assert.ok(error instanceof GraphTransportError);
                assert.equal(error.timedOut, false);
                assert.equal(error.message, 'Graph request failed: fetch failed');

                return true;
            },
        );
    });

    test('validates its configuration', () => {
        assert.throws(
            () => new FetchGraphTransport({
                baseUrl: 'not a url',
                accessToken: 'test-token',
                timeoutMs: 1000,
            }),
            /baseUrl must be a valid URL/,
        );
        assert.throws(
            () => new FetchGraphTransport({
                baseUrl: 'https://graph.example.test',
                accessToken: ' ',
                timeoutMs: 1000,
            }),
            /accessToken is required/,
        );
        assert.throws(
            () => new FetchGraphTransport({
                baseUrl: 'https://graph.example.test',
                accessToken: 'test-token',
                timeoutMs: 0,
            }),
            /timeoutMs must be a positive integer/,
        );
    });
});

describe('extractGraphErrorMessage', () => {
    test('returns undefined when there is no error envelope', () => {
        assert.equal(extractGraphErrorMessage(undefined), undefined);
        assert.equal(extractGraphErrorMessage({ id: 'x' }), undefined);
    });

    test('uses whichever of code and message is present', () => {
        assert.equal(
            extractGraphErrorMessage({ error: { message: 'only message' } }),
            'only message',
        );
        assert.equal(
            extractGraphErrorMessage({ error: { code: 'OnlyCode' } }),
            'OnlyCode',
        );
    });
});
