import type { z } from 'zod';
import { FieldValidationError, ValidationError } from './errors.js';
import { quoteIdentifier, sanitizeForErrorMessage, validateIdentifier } from './sql-utils.js';

export interface FieldInfo {
    /** Physical column name */
    readonly column: string;
    /** Owning table */
    readonly table: string;
}

/** Logical field name -> physical column name */
export type FieldMap = Readonly<Record<string, string>>;

export interface EntityDefinition {
    table: string;
    fields: FieldMap;
}

/**
 * Converts a logical field name to a snake_case column name, keeping runs of
 * capitals together: `ID` -> `id`, `CreatedAt` -> `created_at`,
 * `UserID` -> `user_id`, `HTTPStatus` -> `http_status`.
 */
export function toColumnName(field: string): string {
    return field
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase();
}

/**
 * Builds an entity definition from an explicit map, or from a list of
 * logical names whose columns follow `toColumnName`.
 */
export function defineEntity(table: string, fields: FieldMap | readonly string[]): EntityDefinition {
    if (isFieldList(fields)) {
        const map: Record<string, string> = {};
        for (const field of fields) {
            map[field] = toColumnName(field);
        }
        return { table, fields: map };
    }
    return { table, fields: { ...fields } };
}

/**
 * Derives an entity definition from the keys of a zod object schema.
 * `columns` overrides the derived column for individual fields.
 */
export function entityFromSchema(
    table: string,
    schema: z.AnyZodObject,
    columns: Readonly<Record<string, string>> = {}
): EntityDefinition {
    const fields: Record<string, string> = {};
    for (const field of Object.keys(schema.shape)) {
        fields[field] = columns[field] ?? toColumnName(field);
    }
    return { table, fields };
}

function isFieldList(fields: FieldMap | readonly string[]): fields is readonly string[] {
    return Array.isArray(fields);
}

/**
 * The allow-list of field names for one entity. Every identifier the compiler
 * writes into SQL text comes from here.
 */
export class FieldCatalog {
    readonly table: string;
    private readonly fields: ReadonlyMap<string, FieldInfo>;

    constructor(definition: EntityDefinition) {
        this.table = validateIdentifier(definition.table, 'table name');

        const fields = new Map<string, FieldInfo>();
        for (const [name, column] of Object.entries(definition.fields)) {
            if (!name) {
                throw new ValidationError(`Entity '${this.table}' has an empty field name`);
            }
            validateIdentifier(column, `column name for field '${sanitizeForErrorMessage(name)}'`);
            fields.set(name, Object.freeze({ column, table: this.table }));
        }
        if (fields.size === 0) {
            throw new ValidationError(`Entity '${this.table}' declares no fields`);
        }
        this.fields = fields;
        Object.freeze(this);
    }

    resolve(name: string): FieldInfo | undefined {
        return this.fields.get(name);
    }

    has(name: string): boolean {
        return this.fields.has(name);
    }

    fieldNames(): string[] {
        return Array.from(this.fields.keys());
    }

    /**
     * `"table"."column"`, used wherever the reference may be ambiguous
     * (filters, sorts, groups, aggregate arguments).
     * @throws FieldValidationError for names outside the catalog
     */
    qualified(name: string): string {
        const info = this.require(name);
        return `${quoteIdentifier(info.table)}.${quoteIdentifier(info.column)}`;
    }

    /** `"column"`, the default alias of an aggregate. */
    unqualified(name: string): string {
        return quoteIdentifier(this.require(name).column);
    }

    /** Same fields, owned by another table. */
    rebind(table: string): FieldCatalog {
        const fields: Record<string, string> = {};
        for (const [name, info] of this.fields) {
            fields[name] = info.column;
        }
        return new FieldCatalog({ table, fields });
    }

    private require(name: string): FieldInfo {
        const info = this.fields.get(name);
        if (!info) {
            throw new FieldValidationError(name, `invalid field name: ${sanitizeForErrorMessage(name)}`);
        }
        return info;
    }
}
