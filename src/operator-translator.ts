import type { SQLStatement } from './types.js';
import { AggregationOp, Operator } from './request.js';

/** Operators whose operand is not a plain scalar; case folding never applies to them. */
const ARRAY_OPERATORS = new Set<Operator>([
    Operator.OVERLAP,
    Operator.ARRAY_CONTAINS,
    Operator.ARRAY_CONTAINED,
]);

const VALUELESS_OPERATORS = new Set<Operator>([Operator.IS_NULL, Operator.NOT_NULL]);

/** Splits a comma-joined operand list. Empty segments are kept as empty strings. */
export function splitOperands(value: string): string[] {
    return value.split(',');
}

/**
 * Translates one filter into a predicate with bound parameters.
 *
 * `column` must already be a catalog-qualified reference; it is the only text
 * placed into the predicate. Returns null when the operator yields no
 * predicate: a `BETWEEN` without exactly two operands, or an unknown operator.
 */
export function translateFilter(
    column: string,
    op: Operator,
    value: string = '',
    noCase: boolean = false
): SQLStatement | null {
    const fold = noCase && !ARRAY_OPERATORS.has(op) && !VALUELESS_OPERATORS.has(op);
    const col = fold ? `LOWER(${column})` : column;
    const v = fold ? value.toLowerCase() : value;

    switch (op) {
        case Operator.EQ:
            return { sql: `${col} = ?`, params: [v] };
        case Operator.NE:
            return { sql: `${col} != ?`, params: [v] };
        case Operator.GT:
            return { sql: `${col} > ?`, params: [v] };
        case Operator.GE:
            return { sql: `${col} >= ?`, params: [v] };
        case Operator.LT:
            return { sql: `${col} < ?`, params: [v] };
        case Operator.LE:
            return { sql: `${col} <= ?`, params: [v] };
        case Operator.LIKE:
        case Operator.CONTAINS:
            return { sql: `${col} LIKE ?`, params: [`%${v}%`] };
        case Operator.NOT_LIKE:
            return { sql: `${col} NOT LIKE ?`, params: [`%${v}%`] };
        case Operator.STARTS_WITH:
            return { sql: `${col} LIKE ?`, params: [`${v}%`] };
        case Operator.ENDS_WITH:
            return { sql: `${col} LIKE ?`, params: [`%${v}`] };
        case Operator.IN:
        case Operator.NOT_IN: {
            const values = splitOperands(v);
            const placeholders = values.map(() => '?').join(', ');
            return {
                sql: `${col}${op === Operator.NOT_IN ? ' NOT' : ''} IN (${placeholders})`,
                params: values,
            };
        }
        case Operator.BETWEEN: {
            const values = splitOperands(v);
            if (values.length !== 2) return null;
            return { sql: `${col} BETWEEN ? AND ?`, params: [values[0], values[1]] };
        }
        case Operator.IS_NULL:
            return { sql: `${col} IS NULL`, params: [] };
        case Operator.NOT_NULL:
            return { sql: `${col} IS NOT NULL`, params: [] };
        case Operator.REGEXP:
            return { sql: `${col} REGEXP ?`, params: [v] };
        case Operator.NOT_REGEXP:
            return { sql: `${col} NOT REGEXP ?`, params: [v] };
        // Array relationships; only backends with array types accept these
        case Operator.OVERLAP:
            return { sql: `${col} && ?`, params: [v] };
        case Operator.ARRAY_CONTAINS:
            return { sql: `${col} @> ?`, params: [v] };
        case Operator.ARRAY_CONTAINED:
            return { sql: `${col} <@ ?`, params: [v] };
        default:
            return null;
    }
}

/** `AGG(column)`, or null for an unknown operation. */
export function buildAggregate(column: string, op: AggregationOp, noCase: boolean = false): string | null {
    const col = noCase ? `LOWER(${column})` : column;
    switch (op) {
        case AggregationOp.COUNT:
            return `COUNT(${col})`;
        case AggregationOp.SUM:
            return `SUM(${col})`;
        case AggregationOp.AVG:
            return `AVG(${col})`;
        case AggregationOp.MAX:
            return `MAX(${col})`;
        case AggregationOp.MIN:
            return `MIN(${col})`;
        default:
            return null;
    }
}
