import { describe, test, expect } from 'vitest';
import { buildAggregate, splitOperands, translateFilter } from '../src/operator-translator.js';
import { AggregationOp, Operator, aggregationName, operatorName } from '../src/request.js';

const col = '"users"."name"';

describe('operator names', () => {
    test('operators keep their wire ordinals', () => {
        expect(Operator.EQ).toBe(0);
        expect(Operator.IN).toBe(7);
        expect(Operator.REGEXP).toBe(16);
        expect(Operator.ARRAY_CONTAINED).toBe(20);
    });

    test('render stable diagnostic names', () => {
        expect(operatorName(Operator.STARTS_WITH)).toBe('STARTS_WITH');
        expect(operatorName(Operator.NOT_NULL)).toBe('NOT_NULL');
        expect(aggregationName(AggregationOp.AVG)).toBe('AVG');
    });

    test('unknown values render as UNKNOWN', () => {
        expect(operatorName(99)).toBe('UNKNOWN');
        expect(operatorName(-1)).toBe('UNKNOWN');
        expect(aggregationName(AggregationOp.UNKNOWN_OP)).toBe('UNKNOWN');
        expect(aggregationName(42)).toBe('UNKNOWN');
    });
});

describe('translateFilter', () => {
    test('comparison operators bind the raw value', () => {
        expect(translateFilter(col, Operator.EQ, 'John Doe')).toEqual({ sql: '"users"."name" = ?', params: ['John Doe'] });
        expect(translateFilter(col, Operator.NE, 'x')).toEqual({ sql: '"users"."name" != ?', params: ['x'] });
        expect(translateFilter(col, Operator.GT, '30')).toEqual({ sql: '"users"."name" > ?', params: ['30'] });
        expect(translateFilter(col, Operator.GE, '30')).toEqual({ sql: '"users"."name" >= ?', params: ['30'] });
        expect(translateFilter(col, Operator.LT, '30')).toEqual({ sql: '"users"."name" < ?', params: ['30'] });
        expect(translateFilter(col, Operator.LE, '30')).toEqual({ sql: '"users"."name" <= ?', params: ['30'] });
    });

    test('pattern operators wrap the value', () => {
        expect(translateFilter(col, Operator.LIKE, 'oh')).toEqual({ sql: '"users"."name" LIKE ?', params: ['%oh%'] });
        expect(translateFilter(col, Operator.CONTAINS, 'oh')).toEqual({ sql: '"users"."name" LIKE ?', params: ['%oh%'] });
        expect(translateFilter(col, Operator.STARTS_WITH, 'Jo')).toEqual({ sql: '"users"."name" LIKE ?', params: ['Jo%'] });
        expect(translateFilter(col, Operator.ENDS_WITH, 'son')).toEqual({ sql: '"users"."name" LIKE ?', params: ['%son'] });
        expect(translateFilter(col, Operator.NOT_LIKE, 'Doe')).toEqual({
            sql: '"users"."name" NOT LIKE ?',
            params: ['%Doe%'],
        });
    });

    test('set membership expands one placeholder per operand, keeping empty segments', () => {
        expect(translateFilter(col, Operator.IN, 'a,,b')).toEqual({
            sql: '"users"."name" IN (?, ?, ?)',
            params: ['a', '', 'b'],
        });
        expect(translateFilter(col, Operator.NOT_IN, 'a,b')).toEqual({
            sql: '"users"."name" NOT IN (?, ?)',
            params: ['a', 'b'],
        });
    });

    test('BETWEEN needs exactly two operands', () => {
        expect(translateFilter(col, Operator.BETWEEN, '1,5')).toEqual({
            sql: '"users"."name" BETWEEN ? AND ?',
            params: ['1', '5'],
        });
        expect(translateFilter(col, Operator.BETWEEN, '1')).toBeNull();
        expect(translateFilter(col, Operator.BETWEEN, '1,2,3')).toBeNull();
    });

    test('case-insensitive filters lower both sides', () => {
        expect(translateFilter('"users"."status"', Operator.EQ, 'ACTIVE', true)).toEqual({
            sql: 'LOWER("users"."status") = ?',
            params: ['active'],
        });
        expect(translateFilter(col, Operator.IN, 'A,B', true)).toEqual({
            sql: 'LOWER("users"."name") IN (?, ?)',
            params: ['a', 'b'],
        });
    });

    test('case folding skips null checks and array operators', () => {
        expect(translateFilter(col, Operator.IS_NULL, '', true)).toEqual({ sql: '"users"."name" IS NULL', params: [] });
        expect(translateFilter(col, Operator.NOT_NULL, '', true)).toEqual({
            sql: '"users"."name" IS NOT NULL',
            params: [],
        });
        expect(translateFilter(col, Operator.OVERLAP, 'A', true)).toEqual({ sql: '"users"."name" && ?', params: ['A'] });
        expect(translateFilter(col, Operator.ARRAY_CONTAINS, 'A', true)).toEqual({
            sql: '"users"."name" @> ?',
            params: ['A'],
        });
        expect(translateFilter(col, Operator.ARRAY_CONTAINED, 'A', true)).toEqual({
            sql: '"users"."name" <@ ?',
            params: ['A'],
        });
    });

    test('regular expressions use the REGEXP operator', () => {
        expect(translateFilter(col, Operator.REGEXP, '^J')).toEqual({ sql: '"users"."name" REGEXP ?', params: ['^J'] });
        expect(translateFilter(col, Operator.NOT_REGEXP, '^J')).toEqual({
            sql: '"users"."name" NOT REGEXP ?',
            params: ['^J'],
        });
    });

    test('unknown operators yield no predicate', () => {
        const unknownOp: number = 99;
        expect(translateFilter(col, unknownOp, 'x')).toBeNull();
    });
});

describe('buildAggregate', () => {
    test('wraps the column in the aggregate function', () => {
        expect(buildAggregate('"users"."age"', AggregationOp.COUNT)).toBe('COUNT("users"."age")');
        expect(buildAggregate('"users"."age"', AggregationOp.SUM)).toBe('SUM("users"."age")');
        expect(buildAggregate('"users"."age"', AggregationOp.AVG)).toBe('AVG("users"."age")');
        expect(buildAggregate('"users"."age"', AggregationOp.MAX)).toBe('MAX("users"."age")');
        expect(buildAggregate('"users"."age"', AggregationOp.MIN)).toBe('MIN("users"."age")');
    });

    test('lowers the column when case-insensitive', () => {
        expect(buildAggregate('"users"."status"', AggregationOp.COUNT, true)).toBe('COUNT(LOWER("users"."status"))');
    });

    test('returns null for an unknown operation', () => {
        expect(buildAggregate('"users"."age"', AggregationOp.UNKNOWN_OP)).toBeNull();
    });
});

describe('splitOperands', () => {
    test('splits on commas without trimming', () => {
        expect(splitOperands('a, b')).toEqual(['a', ' b']);
        expect(splitOperands('')).toEqual(['']);
    });
});
