import { Pool, type PoolConfig } from 'pg';
import { RestorationRecord, RestorationRecordSchema } from './models';

export interface RestorationRecordStore {
    save(record: RestorationRecord): Promise<void>;
    list(): Promise<RestorationRecord[]>;
    close(): Promise<void>;
}

function cloneRecord(record: RestorationRecord): RestorationRecord {
    return {
        ...record,
        BucketMap: { ...record.BucketMap },
        TaskMap: { ...record.TaskMap },
    };
}

export class InMemoryRestorationRecordStore implements RestorationRecordStore {
    private readonly records: RestorationRecord[] = [];

    async save(record: RestorationRecord): Promise<void> {
        this.records.push(cloneRecord(RestorationRecordSchema.parse(record)));
    }

    async list(): Promise<RestorationRecord[]> {
        return this.records.map((record) => cloneRecord(record));
    }

    async close(): Promise<void> {}
}

export interface PostgresRestorationRecordStoreOptions {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
    tableName?: string;
}

const DEFAULT_SCHEMA_NAME = 'planner_restore';
const DEFAULT_TABLE_NAME = 'restoration_records';

interface RestorationRecordRow {
    record_json: unknown;
}

function validateSqlIdentifier(
    value: string,
    fieldName: string,
): string {
    const trimmed = String(value || '').trim();

    if (trimmed.length === 0) {
        throw new Error(`${fieldName} is required`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${fieldName} must match [A-Za-z_][A-Za-z0-9_]*`,
        );
    }

    return trimmed;
}

function parseRecordJson(raw: unknown): RestorationRecord {
    const value = typeof raw === 'string' ? JSON.parse(raw) as unknown : raw;
    const parsed = RestorationRecordSchema.safeParse(value);

    if (!parsed.success) {
        throw new Error('invalid persisted restoration record payload');
    }

    return parsed.data;
}

/**
 * Append-only table of restoration records, one row per restored plan.
 * Rows are what audit or rollback tooling reads back later.
 */
export class PostgresRestorationRecordStore implements RestorationRecordStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly ready: Promise<void>;

    private readonly schemaName: string;

    private readonly tableQualified: string;

    constructor(
        pgUrl: string,
        options: PostgresRestorationRecordStoreOptions = {},
    ) {
        const connectionString = String(pgUrl || '').trim();

        this.schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_SCHEMA_NAME,
            'record schema name',
        );

        const tableName = validateSqlIdentifier(
            options.tableName || DEFAULT_TABLE_NAME,
            'record table name',
        );

        this.tableQualified = `"${this.schemaName}"."${tableName}"`;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            if (connectionString.length === 0) {
                throw new Error('PLANNER_RESTORE_PG_URL is required');
            }

            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
                idleTimeoutMillis:
                    options.poolConfig?.idleTimeoutMillis || 30000,
                max: options.poolConfig?.max || 2,
                ...options.poolConfig,
            });
            this.ownsPool = true;
        }

        this.ready = this.initialize();
        // save and list rethrow this; a run that never saves must not crash.
        this.ready.catch(() => undefined);
    }

    async save(record: RestorationRecord): Promise<void> {
        await this.ready;

        const validated = RestorationRecordSchema.parse(record);

        await this.pool.query(
            `INSERT INTO ${this.tableQualified} (
                original_plan_id,
                new_plan_id,
                group_id,
                import_date,
                record_json
            ) VALUES (
                $1,
                $2,
                $3,
                $4,
                $5::jsonb
            )`,
            [
                validated.OriginalPlanId,
                validated.NewPlanId,
                validated.GroupId,
                validated.ImportDate,
                JSON.stringify(validated),
            ],
        );
    }

    async list(): Promise<RestorationRecord[]> {
        await this.ready;

        const result = await this.pool.query<RestorationRecordRow>(
            `SELECT record_json
            FROM ${this.tableQualified}
            ORDER BY record_id ASC`,
        );

        return result.rows.map((row) => parseRecordJson(row.record_json));
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    private async initialize(): Promise<void> {
        await this.pool.query(
            `CREATE SCHEMA IF NOT EXISTS "${this.schemaName}"`,
        );
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.tableQualified} (
    record_id SERIAL PRIMARY KEY,
    original_plan_id TEXT NOT NULL,
    new_plan_id TEXT NOT NULL,
    group_id TEXT NOT NULL,
    import_date TEXT NOT NULL,
    record_json JSONB NOT NULL
)
`);
    }
}
