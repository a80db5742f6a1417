import type { Driver, Row, SQLParam } from './types.js';
import type { PluginManager } from './plugin-system.js';
import {
    aggregationName,
    operatorName,
    type Aggregation,
    type CustomField,
    type CustomFilter,
    type Filter,
    type FilterRequest,
    type Group,
    type Join,
    type JoinType,
    type Pagination,
    type Sort,
    type SubQuery,
} from './request.js';
import { FieldCatalog, type EntityDefinition } from './field-catalog.js';
import { ScopeRegistry, type ScopeCategory, type ScopeContext, type ScopeFunc } from './scope-registry.js';
import { QueryPlan } from './query-plan.js';
import { buildAggregate, translateFilter } from './operator-translator.js';
import { Executor, type RowSchema } from './executor.js';
import {
    FieldValidationError,
    ScopeNotFoundError,
    UnsupportedFeatureError,
    ValidationError,
} from './errors.js';
import { isValidIdentifier, quoteIdentifier, sanitizeForErrorMessage } from './sql-utils.js';

export interface CompilerOptions {
    /** Shared scope registry; each compiler gets its own when omitted. */
    registry?: ScopeRegistry;
    /**
     * When true (the default) a reference to an unregistered scope records a
     * `ScopeNotFoundError`. When false the clause is skipped with a warning.
     */
    strictScopes?: boolean;
    /** Definitions of other tables, used to compile sub-queries against them. */
    related?: readonly EntityDefinition[];
    /** Hooks run around the async executor calls. */
    plugins?: PluginManager;
}

const JOIN_KEYWORDS: Record<JoinType, string> = {
    LEFT: 'LEFT JOIN',
    RIGHT: 'RIGHT JOIN',
    INNER: 'INNER JOIN',
    FULL: 'FULL OUTER JOIN',
};

function isJoinType(kind: string): kind is JoinType {
    return Object.prototype.hasOwnProperty.call(JOIN_KEYWORDS, kind);
}

function isKnownOperator(op: number): boolean {
    return operatorName(op) !== 'UNKNOWN';
}

/**
 * Folds a `FilterRequest` into a `QueryPlan` for one entity.
 *
 * Stages always run in the same order: custom fields, distinct, joins,
 * sub-query, filters, custom filter, groups, sorts, aggregations,
 * pagination. A clause that fails validation is not applied; its error is
 * recorded on the plan and compilation carries on, so one call reports every
 * bad field. Errors thrown by scope functions are not caught.
 */
export class QueryCompiler {
    readonly catalog: FieldCatalog;
    readonly registry: ScopeRegistry;
    readonly executor: Executor;

    private readonly strictScopes: boolean;
    private readonly related: ReadonlyMap<string, EntityDefinition>;

    constructor(
        entity: EntityDefinition | FieldCatalog,
        private readonly driver: Driver,
        private readonly options: CompilerOptions = {}
    ) {
        this.catalog = entity instanceof FieldCatalog ? entity : new FieldCatalog(entity);
        this.registry = options.registry ?? new ScopeRegistry();
        this.executor = new Executor(driver, options.plugins);
        this.strictScopes = options.strictScopes ?? true;
        this.related = new Map((options.related ?? []).map((definition) => [definition.table, definition]));
    }

    registerScope(category: ScopeCategory, name: string, scope: ScopeFunc): void {
        this.registry.register(category, name, scope);
    }

    /**
     * Compiles `request`. When `request.page` is set and no error has been
     * recorded so far, the unpaginated row count is run against the driver and
     * written to `request.page.total`.
     */
    compile(request: FilterRequest): QueryPlan {
        let plan = QueryPlan.from(this.catalog.table);

        plan = this.applyCustomFields(plan, request.customFields ?? []);
        if (request.distinct) {
            plan = plan.distinct();
        }
        plan = this.applyJoins(plan, request.joins ?? []);
        plan = this.applySubQuery(plan, request.subQuery);
        plan = this.applyFilters(plan, request.filters ?? []);
        plan = this.applyCustomFilter(plan, request.customFilter);

        const grouped = this.applyGroups(plan, request.groups ?? []);
        plan = this.applySorts(grouped.plan, request.sorts ?? []);
        plan = this.applyAggregations(plan, request.aggrs ?? [], grouped.columns);

        return this.applyPagination(plan, request.page);
    }

    async findAll(request: FilterRequest): Promise<Row[]>;
    async findAll<T>(request: FilterRequest, schema: RowSchema<T>): Promise<T[]>;
    async findAll<T>(request: FilterRequest, schema?: RowSchema<T>): Promise<Array<T | Row>> {
        const plan = this.compile(request);
        return schema ? this.executor.findAll(plan, schema) : this.executor.findAll(plan);
    }

    async findOne(request: FilterRequest): Promise<Row>;
    async findOne<T>(request: FilterRequest, schema: RowSchema<T>): Promise<T>;
    async findOne<T>(request: FilterRequest, schema?: RowSchema<T>): Promise<T | Row> {
        const plan = this.compile(request);
        return schema ? this.executor.findOne(plan, schema) : this.executor.findOne(plan);
    }

    async count(request: FilterRequest): Promise<number> {
        return this.executor.count(this.compile(request));
    }

    findAllSync(request: FilterRequest): Row[];
    findAllSync<T>(request: FilterRequest, schema: RowSchema<T>): T[];
    findAllSync<T>(request: FilterRequest, schema?: RowSchema<T>): Array<T | Row> {
        const plan = this.compile(request);
        return schema ? this.executor.findAllSync(plan, schema) : this.executor.findAllSync(plan);
    }

    findOneSync(request: FilterRequest): Row;
    findOneSync<T>(request: FilterRequest, schema: RowSchema<T>): T;
    findOneSync<T>(request: FilterRequest, schema?: RowSchema<T>): T | Row {
        const plan = this.compile(request);
        return schema ? this.executor.findOneSync(plan, schema) : this.executor.findOneSync(plan);
    }

    countSync(request: FilterRequest): number {
        return this.executor.countSync(this.compile(request));
    }

    private applyCustomFields(plan: QueryPlan, fields: readonly CustomField[]): QueryPlan {
        for (const field of fields) {
            plan = this.applyScope(plan, {
                category: 'select',
                scope: field.scope,
                values: [],
                alias: field.name,
            });
        }
        return plan;
    }

    private applyJoins(plan: QueryPlan, joins: readonly Join[]): QueryPlan {
        for (const join of joins) {
            const kind = (join.type ?? '').trim().toUpperCase();

            if (kind === '') {
                if (join.scope) {
                    plan = this.applyScope(plan, {
                        category: 'join',
                        scope: join.scope,
                        values: [],
                        table: join.table,
                    });
                } else {
                    plan = plan.addError(new ValidationError('A join needs a type or a scope'));
                }
                continue;
            }

            if (!isJoinType(kind)) {
                plan = plan.addError(
                    new UnsupportedFeatureError(
                        `unsupported join type: ${sanitizeForErrorMessage(join.type ?? '')}`,
                        'join'
                    )
                );
                continue;
            }
            const table = join.table ?? '';
            if (!isValidIdentifier(table)) {
                plan = plan.addError(
                    new FieldValidationError(table, `invalid join table: ${sanitizeForErrorMessage(table)}`)
                );
                continue;
            }
            if (!join.condition) {
                plan = plan.addError(new ValidationError(`Join on '${table}' has no condition`));
                continue;
            }
            plan = this.joinRaw(plan, `${JOIN_KEYWORDS[kind]} ${quoteIdentifier(table)} ON ${join.condition}`);
        }
        return plan;
    }

    /**
     * Join conditions are caller text and take no arguments, so a stray `?`
     * in one is recorded on the plan rather than thrown.
     */
    private joinRaw(plan: QueryPlan, sql: string, ...params: SQLParam[]): QueryPlan {
        try {
            return plan.join(sql, ...params);
        } catch (error) {
            if (error instanceof ValidationError) return plan.addError(error);
            throw error;
        }
    }

    private applySubQuery(plan: QueryPlan, sub: SubQuery | undefined): QueryPlan {
        if (!sub) return plan;

        if (!isValidIdentifier(sub.field)) {
            return plan.addError(
                new FieldValidationError(sub.field, `invalid sub-query alias: ${sanitizeForErrorMessage(sub.field)}`)
            );
        }
        if (!isValidIdentifier(sub.table)) {
            return plan.addError(
                new FieldValidationError(sub.table, `invalid sub-query table: ${sanitizeForErrorMessage(sub.table)}`)
            );
        }
        if (!sub.joinCond) {
            return plan.addError(new ValidationError(`Sub-query '${sub.field}' has no join condition`));
        }

        const entity = this.related.get(sub.table) ?? this.catalog.rebind(sub.table);
        const nested = new QueryCompiler(entity, this.driver, {
            ...this.options,
            registry: this.registry,
        }).compile(sub.filter);

        if (nested.hasErrors) {
            return plan.addErrors(nested.errors);
        }

        const { sql, params } = nested.toSQL();
        return this.joinRaw(plan, `JOIN (${sql}) AS ${quoteIdentifier(sub.field)} ON ${sub.joinCond}`, ...params);
    }

    private applyFilters(plan: QueryPlan, filters: readonly Filter[]): QueryPlan {
        for (const filter of filters) {
            if (!this.catalog.has(filter.field)) {
                plan = plan.addError(this.fieldError(filter.field));
                continue;
            }
            if (!isKnownOperator(filter.op)) {
                plan = plan.addError(
                    new UnsupportedFeatureError(`unsupported filter operator: ${operatorName(filter.op)}`, 'operator')
                );
                continue;
            }

            const predicate = translateFilter(
                this.catalog.qualified(filter.field),
                filter.op,
                filter.value ?? '',
                filter.noCase ?? false
            );
            // BETWEEN without exactly two operands adds no predicate
            if (predicate) {
                plan = plan.where(predicate.sql, ...predicate.params);
            }
        }
        return plan;
    }

    private applyCustomFilter(plan: QueryPlan, filter: CustomFilter | undefined): QueryPlan {
        if (!filter || !filter.scope) return plan;
        return this.applyScope(plan, {
            category: 'filter',
            scope: filter.scope,
            values: filter.values ?? [],
        });
    }

    /** Returns the plan and the grouped columns, which aggregations project. */
    private applyGroups(plan: QueryPlan, groups: readonly Group[]): { plan: QueryPlan; columns: string[] } {
        const columns: string[] = [];

        for (const group of groups) {
            if (group.scope) {
                const scope = this.registry.lookup('group', group.scope);
                if (scope) {
                    plan = scope(plan, { category: 'group', scope: group.scope, values: [] });
                    continue;
                }
                plan = this.missingScope(plan, 'group', group.scope);
                if (this.strictScopes || !group.field) continue;
            }

            const field = group.field ?? '';
            if (!this.catalog.has(field)) {
                plan = plan.addError(this.fieldError(field));
                continue;
            }
            if (group.having) {
                plan = plan.addError(
                    new UnsupportedFeatureError('having conditions must be implemented with a group scope', 'having')
                );
                continue;
            }
            columns.push(this.catalog.qualified(field));
        }

        if (columns.length > 0) {
            plan = plan.group(columns.join(', '));
        }
        return { plan, columns };
    }

    private applySorts(plan: QueryPlan, sorts: readonly Sort[]): QueryPlan {
        for (const sort of sorts) {
            if (sort.scope) {
                const scope = this.registry.lookup('sort', sort.scope);
                if (scope) {
                    plan = scope(plan, { category: 'sort', scope: sort.scope, values: [] });
                    continue;
                }
                plan = this.missingScope(plan, 'sort', sort.scope);
                if (this.strictScopes || !sort.field) continue;
            }

            const field = sort.field ?? '';
            if (!this.catalog.has(field)) {
                plan = plan.addError(this.fieldError(field));
                continue;
            }
            const column = this.catalog.qualified(field);
            const expr = sort.noCase ? `LOWER(${column})` : column;
            plan = plan.order(`${expr} ${sort.desc ? 'DESC' : 'ASC'}`);
        }
        return plan;
    }

    private applyAggregations(
        plan: QueryPlan,
        aggrs: readonly Aggregation[],
        groupColumns: readonly string[]
    ): QueryPlan {
        if (aggrs.length === 0) return plan;

        const selects: string[] = [];
        for (const aggr of aggrs) {
            if (aggr.addSelects && aggr.addSelects.length > 0) {
                plan = plan.addError(
                    new UnsupportedFeatureError('additional selects must be implemented with a select scope', 'addSelects')
                );
                continue;
            }
            if (!this.catalog.has(aggr.field)) {
                plan = plan.addError(this.fieldError(aggr.field));
                continue;
            }

            const expr = buildAggregate(this.catalog.qualified(aggr.field), aggr.op, aggr.noCase ?? false);
            if (!expr) {
                plan = plan.addError(
                    new UnsupportedFeatureError(`unsupported aggregation: ${aggregationName(aggr.op)}`, 'aggregation')
                );
                continue;
            }

            let alias = this.catalog.unqualified(aggr.field);
            if (aggr.alias) {
                if (!isValidIdentifier(aggr.alias)) {
                    plan = plan.addError(
                        new FieldValidationError(aggr.alias, `invalid alias: ${sanitizeForErrorMessage(aggr.alias)}`)
                    );
                    continue;
                }
                alias = quoteIdentifier(aggr.alias);
            }
            selects.push(`${expr} AS ${alias}`);
        }

        if (selects.length === 0) return plan;
        return plan.select([...groupColumns, ...selects].join(', '));
    }

    private applyPagination(plan: QueryPlan, page: Pagination | undefined): QueryPlan {
        if (!page) return plan;

        if (!Number.isInteger(page.page) || page.page < 1) {
            return plan.addError(new ValidationError(`Page must be a positive integer, got ${page.page}`));
        }
        if (!Number.isInteger(page.pageSize) || page.pageSize < 1) {
            return plan.addError(new ValidationError(`Page size must be a positive integer, got ${page.pageSize}`));
        }
        if (plan.hasErrors) return plan;

        page.total = this.executor.countSync(plan);
        return plan.offset((page.page - 1) * page.pageSize).limit(page.pageSize);
    }

    private applyScope(plan: QueryPlan, context: ScopeContext): QueryPlan {
        const scope = this.registry.lookup(context.category, context.scope);
        if (!scope) return this.missingScope(plan, context.category, context.scope);
        return scope(plan, context);
    }

    private missingScope(plan: QueryPlan, category: ScopeCategory, name: string): QueryPlan {
        if (this.strictScopes) {
            return plan.addError(new ScopeNotFoundError(category, name));
        }
        console.warn(`${category} scope '${name}' is not registered, skipping`);
        return plan;
    }

    private fieldError(name: string): FieldValidationError {
        return new FieldValidationError(name, `invalid field name: ${sanitizeForErrorMessage(name)}`);
    }
}
