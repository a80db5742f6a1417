/**
 * Declarative request model. A `FilterRequest` is built by the caller (or
 * parsed from its wire form by `parseFilterRequest`) and is read-only to the
 * compiler, apart from `page.total`.
 */

/** Filter operators. The numeric value is the wire encoding. */
export enum Operator {
    EQ = 0,
    NE,
    GT,
    GE,
    LT,
    LE,
    LIKE,
    IN,
    BETWEEN,
    NOT_IN,
    IS_NULL,
    NOT_NULL,
    STARTS_WITH,
    ENDS_WITH,
    CONTAINS,
    NOT_LIKE,
    REGEXP,
    NOT_REGEXP,
    OVERLAP,
    ARRAY_CONTAINS,
    ARRAY_CONTAINED,
}

export enum AggregationOp {
    UNKNOWN_OP = 0,
    COUNT,
    SUM,
    AVG,
    MAX,
    MIN,
}

/** Stable diagnostic name of an operator; `"UNKNOWN"` for values outside the enum. */
export function operatorName(op: number): string {
    return Operator[op] ?? 'UNKNOWN';
}

export function aggregationName(op: number): string {
    if (op === AggregationOp.UNKNOWN_OP) return 'UNKNOWN';
    return AggregationOp[op] ?? 'UNKNOWN';
}

/**
 * A single predicate. `IN`, `NOT_IN` and `BETWEEN` carry their operands
 * comma-joined in `value`, so an operand containing a comma cannot be
 * expressed; use a filter scope for such values.
 */
export interface Filter {
    field: string;
    op: Operator;
    value?: string;
    noCase?: boolean;
}

export interface Sort {
    field?: string;
    desc?: boolean;
    noCase?: boolean;
    scope?: string;
}

export interface Group {
    field?: string;
    /** Rejected at compile time; register a group scope instead. */
    having?: string;
    scope?: string;
}

export interface Aggregation {
    field: string;
    op: AggregationOp;
    noCase?: boolean;
    /** Result column name; defaults to the aggregated column's own name. */
    alias?: string;
    /** Rejected at compile time; register a select scope instead. */
    addSelects?: string[];
}

export type JoinType = 'LEFT' | 'RIGHT' | 'INNER' | 'FULL';

export interface Join {
    /** Case-insensitive join kind. When empty, `scope` is used instead. */
    type?: string;
    table?: string;
    /** Raw SQL condition; the caller is responsible for its safety. */
    condition?: string;
    scope?: string;
}

export interface SubQuery {
    /** Alias of the derived table. */
    field: string;
    table: string;
    filter: FilterRequest;
    joinCond: string;
}

export interface Pagination {
    /** 1-based */
    page: number;
    pageSize: number;
    /** Written during compilation with the unpaginated row count. */
    total?: number;
}

export type ScopeValue = string | number | boolean | null;

export interface CustomFilter {
    scope: string;
    values?: ScopeValue[];
}

export interface CustomField {
    name?: string;
    scope: string;
}

export interface FilterRequest {
    filters?: Filter[];
    customFields?: CustomField[];
    customFilter?: CustomFilter;
    sorts?: Sort[];
    aggrs?: Aggregation[];
    page?: Pagination;
    groups?: Group[];
    joins?: Join[];
    subQuery?: SubQuery;
    distinct?: boolean;
}
