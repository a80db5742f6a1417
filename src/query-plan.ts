import type { SQLParam, SQLStatement } from './types.js';
import { ValidationError } from './errors.js';
import { quoteIdentifier } from './sql-utils.js';

/** A placeholder argument. An array expands its `?` into one placeholder per element. */
export type PlanArg = SQLParam | readonly SQLParam[];

interface Fragment {
    sql: string;
    params: SQLParam[];
}

interface PlanState {
    table: string;
    quotedTable: string;
    /** undefined = default `"table".*` projection */
    selects?: Fragment[];
    distinct: boolean;
    joins: Fragment[];
    wheres: Fragment[];
    groups: string[];
    havings: Fragment[];
    orders: string[];
    limit?: number;
    offset?: number;
    errors: Error[];
}

function isArgList(arg: PlanArg): arg is readonly SQLParam[] {
    return Array.isArray(arg);
}

/**
 * Binds `args` to the `?` placeholders of `sql`, skipping placeholders inside
 * single-quoted literals. Array arguments expand to `?, ?, ...`.
 */
export function bindPlaceholders(sql: string, args: readonly PlanArg[]): Fragment {
    const params: SQLParam[] = [];
    let out = '';
    let argIndex = 0;
    let inLiteral = false;

    for (const ch of sql) {
        if (ch === "'") {
            inLiteral = !inLiteral;
            out += ch;
            continue;
        }
        if (ch !== '?' || inLiteral) {
            out += ch;
            continue;
        }
        if (argIndex >= args.length) {
            throw new ValidationError(
                `Expected ${args.length} argument(s) for '${sql}' but found more placeholders`
            );
        }
        const arg = args[argIndex++];
        if (isArgList(arg)) {
            out += arg.map(() => '?').join(', ');
            params.push(...arg);
        } else {
            out += '?';
            params.push(arg);
        }
    }

    if (argIndex !== args.length) {
        throw new ValidationError(
            `Expected ${argIndex} argument(s) for '${sql}' but got ${args.length}`
        );
    }
    return { sql: out, params };
}

/**
 * The accumulated, not-yet-executed form of a request. Plans are immutable:
 * every builder method returns a new plan, so scopes can never mutate a plan
 * another caller holds.
 */
export class QueryPlan {
    private constructor(private readonly state: PlanState) {}

    static from(table: string): QueryPlan {
        return new QueryPlan({
            table,
            quotedTable: quoteIdentifier(table),
            distinct: false,
            joins: [],
            wheres: [],
            groups: [],
            havings: [],
            orders: [],
            errors: [],
        });
    }

    /** Name of the base table */
    get table(): string {
        return this.state.table;
    }

    /** Deferred compilation errors. A plan with errors is never executed. */
    get errors(): readonly Error[] {
        return this.state.errors;
    }

    get hasErrors(): boolean {
        return this.state.errors.length > 0;
    }

    get isPaginated(): boolean {
        return this.state.limit !== undefined || this.state.offset !== undefined;
    }

    /** Replaces the projection. */
    select(sql: string, ...args: PlanArg[]): QueryPlan {
        return this.with({ selects: [bindPlaceholders(sql, args)] });
    }

    /** Appends to the projection, starting from the default one if none was set. */
    addSelect(sql: string, ...args: PlanArg[]): QueryPlan {
        const current = this.state.selects ?? [{ sql: `${this.state.quotedTable}.*`, params: [] }];
        return this.with({ selects: [...current, bindPlaceholders(sql, args)] });
    }

    distinct(enabled: boolean = true): QueryPlan {
        return this.with({ distinct: enabled });
    }

    /** Appends a full join clause, e.g. `LEFT JOIN orders ON ...`. */
    join(sql: string, ...args: PlanArg[]): QueryPlan {
        return this.with({ joins: [...this.state.joins, bindPlaceholders(sql, args)] });
    }

    where(sql: string, ...args: PlanArg[]): QueryPlan {
        return this.with({ wheres: [...this.state.wheres, bindPlaceholders(sql, args)] });
    }

    group(sql: string): QueryPlan {
        return this.with({ groups: [...this.state.groups, sql] });
    }

    having(sql: string, ...args: PlanArg[]): QueryPlan {
        return this.with({ havings: [...this.state.havings, bindPlaceholders(sql, args)] });
    }

    order(sql: string): QueryPlan {
        return this.with({ orders: [...this.state.orders, sql] });
    }

    limit(count: number): QueryPlan {
        if (count < 0) throw new ValidationError('Limit must be non-negative');
        if (!Number.isInteger(count)) throw new ValidationError('Limit must be an integer');
        return this.with({ limit: count });
    }

    offset(count: number): QueryPlan {
        if (count < 0) throw new ValidationError('Offset must be non-negative');
        if (!Number.isInteger(count)) throw new ValidationError('Offset must be an integer');
        return this.with({ offset: count });
    }

    addError(error: Error): QueryPlan {
        return this.with({ errors: [...this.state.errors, error] });
    }

    /** Merges another plan's errors into this one. */
    addErrors(errors: readonly Error[]): QueryPlan {
        if (errors.length === 0) return this;
        return this.with({ errors: [...this.state.errors, ...errors] });
    }

    toSQL(): SQLStatement {
        return this.render(true);
    }

    /**
     * Counts the rows this plan selects, ignoring ordering and paging. Grouped,
     * filtered-by-HAVING, distinct or custom projections are counted through a
     * derived table.
     */
    toCountSQL(): SQLStatement {
        const { distinct, groups, havings, selects } = this.state;
        if (!distinct && groups.length === 0 && havings.length === 0 && selects === undefined) {
            const sqlParts: string[] = ['SELECT COUNT(*) AS count'];
            const params: SQLParam[] = [];
            this.renderBody(sqlParts, params);
            return { sql: sqlParts.join(' '), params };
        }
        const inner = this.render(false);
        return {
            sql: `SELECT COUNT(*) AS count FROM (${inner.sql}) AS "counted"`,
            params: inner.params,
        };
    }

    private render(withPaging: boolean): SQLStatement {
        const params: SQLParam[] = [];
        const sqlParts: string[] = [];

        let selectClause = this.state.distinct ? 'SELECT DISTINCT' : 'SELECT';
        if (this.state.selects === undefined) {
            selectClause += ` ${this.state.quotedTable}.*`;
        } else {
            selectClause += ` ${this.state.selects.map((s) => s.sql).join(', ')}`;
            for (const s of this.state.selects) params.push(...s.params);
        }
        sqlParts.push(selectClause);

        this.renderBody(sqlParts, params);

        if (this.state.groups.length > 0) {
            sqlParts.push('GROUP BY', this.state.groups.join(', '));
        }

        if (this.state.havings.length > 0) {
            sqlParts.push('HAVING', joinConditions(this.state.havings));
            for (const h of this.state.havings) params.push(...h.params);
        }

        if (!withPaging) {
            return { sql: sqlParts.join(' '), params };
        }

        if (this.state.orders.length > 0) {
            sqlParts.push('ORDER BY', this.state.orders.join(', '));
        }

        // Build LIMIT and OFFSET clauses
        if (this.state.limit !== undefined) {
            sqlParts.push('LIMIT ?');
            params.push(this.state.limit);

            if (this.state.offset) {
                sqlParts.push('OFFSET ?');
                params.push(this.state.offset);
            }
        } else if (this.state.offset) {
            // SQLite requires LIMIT when using OFFSET, so we use a very large limit
            sqlParts.push('LIMIT ? OFFSET ?');
            params.push(Number.MAX_SAFE_INTEGER, this.state.offset);
        }

        return { sql: sqlParts.join(' '), params };
    }

    /** FROM, JOIN and WHERE */
    private renderBody(sqlParts: string[], params: SQLParam[]): void {
        sqlParts.push(`FROM ${this.state.quotedTable}`);

        for (const join of this.state.joins) {
            sqlParts.push(join.sql);
            params.push(...join.params);
        }

        if (this.state.wheres.length > 0) {
            sqlParts.push('WHERE', joinConditions(this.state.wheres));
            for (const w of this.state.wheres) params.push(...w.params);
        }
    }

    private with(patch: Partial<PlanState>): QueryPlan {
        return new QueryPlan({ ...this.state, ...patch });
    }
}

function joinConditions(conditions: readonly Fragment[]): string {
    if (conditions.length === 1) return conditions[0].sql;
    return conditions
        .map((c) => (/\bOR\b/i.test(c.sql) ? `(${c.sql})` : c.sql))
        .join(' AND ');
}
