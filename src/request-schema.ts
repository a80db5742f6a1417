import { z } from 'zod';
import { ValidationError } from './errors.js';
import { AggregationOp, Operator, type FilterRequest } from './request.js';

/** Accepts the numeric wire value or the textual name of an enum member. */
function enumValue<E extends Record<string, string | number>>(enumObject: E, label: string) {
    return z.union([z.number().int(), z.string()]).transform((raw, ctx): number => {
        const value = typeof raw === 'number' ? enumObject[raw] : enumObject[raw.toUpperCase()];
        const numeric = typeof raw === 'number' ? raw : value;
        if (typeof value === 'undefined' || typeof numeric !== 'number') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown ${label}: ${String(raw)}` });
            return z.NEVER;
        }
        return numeric;
    });
}

const operatorSchema = enumValue(Operator, 'operator').transform((value): Operator => value);
const aggregationSchema = enumValue(AggregationOp, 'aggregation').transform((value): AggregationOp => value);

const scopeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const filterSchema = z
    .object({
        field: z.string(),
        op: operatorSchema,
        value: z.string().optional(),
        nocase: z.boolean().optional(),
    })
    .transform(({ nocase, ...rest }) => ({ ...rest, noCase: nocase }));

const sortSchema = z
    .object({
        field: z.string().optional(),
        desc: z.boolean().optional(),
        nocase: z.boolean().optional(),
        scope: z.string().optional(),
    })
    .transform(({ nocase, ...rest }) => ({ ...rest, noCase: nocase }));

const groupSchema = z.object({
    field: z.string().optional(),
    having: z.string().optional(),
    scope: z.string().optional(),
});

const aggregationEntrySchema = z
    .object({
        field: z.string(),
        op: aggregationSchema,
        nocase: z.boolean().optional(),
        alias: z.string().optional(),
        add_selects: z.array(z.string()).optional(),
    })
    .transform(({ nocase, add_selects, ...rest }) => ({ ...rest, noCase: nocase, addSelects: add_selects }));

const joinSchema = z.object({
    type: z.string().optional(),
    table: z.string().optional(),
    condition: z.string().optional(),
    scope: z.string().optional(),
});

const paginationSchema = z
    .object({
        page: z.number().int(),
        page_size: z.number().int(),
        total: z.number().int().optional(),
    })
    .transform(({ page_size, ...rest }) => ({ ...rest, pageSize: page_size }));

const customFilterSchema = z.object({
    scope: z.string(),
    values: z.array(scopeValueSchema).optional(),
});

const customFieldSchema = z.object({
    name: z.string().optional(),
    scope: z.string(),
});

/**
 * Wire form of a `FilterRequest`. Keys are snake_case; operators may be given
 * as their ordinal or their name (`"EQ"`, `"starts_with"`).
 */
export const filterRequestSchema: z.ZodType<FilterRequest, z.ZodTypeDef, unknown> = z.lazy(() =>
    z
        .object({
            filters: z.array(filterSchema).optional(),
            custom_fields: z.array(customFieldSchema).optional(),
            custom_filter: customFilterSchema.optional(),
            sorts: z.array(sortSchema).optional(),
            aggrs: z.array(aggregationEntrySchema).optional(),
            page: paginationSchema.optional(),
            groups: z.array(groupSchema).optional(),
            joins: z.array(joinSchema).optional(),
            sub_query: subQuerySchema.optional(),
            distinct: z.boolean().optional(),
        })
        .transform(({ custom_fields, custom_filter, sub_query, ...rest }) => ({
            ...rest,
            customFields: custom_fields,
            customFilter: custom_filter,
            subQuery: sub_query,
        }))
);

const subQuerySchema = z
    .object({
        field: z.string(),
        table: z.string(),
        filter: filterRequestSchema,
        join_cond: z.string(),
    })
    .transform(({ join_cond, ...rest }) => ({ ...rest, joinCond: join_cond }));

/**
 * Parses the wire form of a request.
 * @throws ValidationError carrying the zod issues
 */
export function parseFilterRequest(input: unknown): FilterRequest {
    const result = filterRequestSchema.safeParse(input);
    if (!result.success) {
        const message = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Invalid filter request: ${message}`, result.error.issues);
    }
    return result.data;
}
