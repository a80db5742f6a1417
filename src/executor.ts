import type { z } from 'zod';
import type { Driver, Row, SQLStatement } from './types.js';
import type { QueryPlan } from './query-plan.js';
import type { PluginContext, PluginManager, QueryOperation } from './plugin-system.js';
import { CompilationError, DatabaseError, NotFoundError, ValidationError } from './errors.js';

/** Maps a raw row to the caller's result type. */
export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

function mapRows<T>(rows: Row[], schema: RowSchema<T>): T[] {
    return rows.map((row) => {
        const result = schema.safeParse(row);
        if (!result.success) {
            throw new ValidationError('Row does not match the result schema', result.error.issues);
        }
        return result.data;
    });
}

function readCount(rows: Row[]): number {
    const value = rows[0]?.count;
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    throw new DatabaseError('Count query returned no numeric result', 'INVALID_COUNT');
}

/**
 * Runs compiled plans. A plan carrying compilation errors is refused with a
 * `CompilationError` before anything reaches the driver; errors raised by the
 * driver propagate unchanged.
 *
 * The async methods run the `onBeforeQuery`, `onAfterQuery` and `onError`
 * plugin hooks; the sync variants do not.
 */
export class Executor {
    constructor(
        private readonly driver: Driver,
        private readonly pluginManager?: PluginManager
    ) {}

    async findAll(plan: QueryPlan): Promise<Row[]>;
    async findAll<T>(plan: QueryPlan, schema: RowSchema<T>): Promise<T[]>;
    async findAll<T>(plan: QueryPlan, schema?: RowSchema<T>): Promise<Array<T | Row>> {
        const rows = await this.run(plan, 'findAll', this.statement(plan));
        return schema ? mapRows(rows, schema) : rows;
    }

    /** @throws NotFoundError when no row matches */
    async findOne(plan: QueryPlan): Promise<Row>;
    async findOne<T>(plan: QueryPlan, schema: RowSchema<T>): Promise<T>;
    async findOne<T>(plan: QueryPlan, schema?: RowSchema<T>): Promise<T | Row> {
        const rows = await this.run(plan, 'findOne', this.statement(plan.limit(1)));
        return schema ? mapRows([this.first(plan, rows)], schema)[0] : this.first(plan, rows);
    }

    /** Rows the plan selects, ignoring ordering and paging. */
    async count(plan: QueryPlan): Promise<number> {
        return readCount(await this.run(plan, 'count', this.countStatement(plan)));
    }

    findAllSync(plan: QueryPlan): Row[];
    findAllSync<T>(plan: QueryPlan, schema: RowSchema<T>): T[];
    findAllSync<T>(plan: QueryPlan, schema?: RowSchema<T>): Array<T | Row> {
        const { sql, params } = this.statement(plan);
        const rows = this.driver.querySync(sql, params);
        return schema ? mapRows(rows, schema) : rows;
    }

    findOneSync(plan: QueryPlan): Row;
    findOneSync<T>(plan: QueryPlan, schema: RowSchema<T>): T;
    findOneSync<T>(plan: QueryPlan, schema?: RowSchema<T>): T | Row {
        const { sql, params } = this.statement(plan.limit(1));
        const row = this.first(plan, this.driver.querySync(sql, params));
        return schema ? mapRows([row], schema)[0] : row;
    }

    countSync(plan: QueryPlan): number {
        const { sql, params } = this.countStatement(plan);
        return readCount(this.driver.querySync(sql, params));
    }

    private statement(plan: QueryPlan): SQLStatement {
        if (plan.hasErrors) throw new CompilationError(plan.errors);
        return plan.toSQL();
    }

    private countStatement(plan: QueryPlan): SQLStatement {
        if (plan.hasErrors) throw new CompilationError(plan.errors);
        return plan.toCountSQL();
    }

    private first(plan: QueryPlan, rows: Row[]): Row {
        const row = rows[0];
        if (!row) {
            throw new NotFoundError(`No row in '${plan.table}' matches the request`, plan.table);
        }
        return row;
    }

    private async run(plan: QueryPlan, operation: QueryOperation, statement: SQLStatement): Promise<Row[]> {
        const context: PluginContext = {
            table: plan.table,
            operation,
            sql: statement.sql,
            params: statement.params,
        };

        await this.pluginManager?.executeHookSafe('onBeforeQuery', context);

        try {
            const rows = await this.driver.query(statement.sql, statement.params);
            await this.pluginManager?.executeHookSafe('onAfterQuery', { ...context, result: rows });
            return rows;
        } catch (error) {
            await this.pluginManager?.executeHookSafe('onError', { ...context, error: toError(error) });
            throw error;
        }
    }
}
