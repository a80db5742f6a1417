import type { QueryPlan } from './query-plan.js';
import type { ScopeValue } from './request.js';

export type ScopeCategory = 'filter' | 'sort' | 'group' | 'select' | 'join';

export const SCOPE_CATEGORIES: readonly ScopeCategory[] = ['filter', 'sort', 'group', 'select', 'join'];

export interface ScopeContext {
    category: ScopeCategory;
    /** Name the scope was looked up by */
    scope: string;
    /** `customFilter.values`, empty for other categories */
    values: readonly ScopeValue[];
    /** `customField.name` for select scopes */
    alias?: string;
    /** `join.table` for join scopes */
    table?: string;
}

/**
 * A named transform from one plan state to the next. Scopes are not limited
 * to their category's clause: a group scope may set the projection as well as
 * the grouping, and the compiler keeps whatever the scope returns. Raw SQL a
 * scope writes is not validated against the field catalog.
 */
export type ScopeFunc = (plan: QueryPlan, context: ScopeContext) => QueryPlan;

/**
 * Named scopes, one namespace per category. Registration replaces any
 * previous scope of the same category and name.
 */
export class ScopeRegistry {
    private scopes = new Map<ScopeCategory, Map<string, ScopeFunc>>(
        SCOPE_CATEGORIES.map((category) => [category, new Map<string, ScopeFunc>()])
    );

    register(category: ScopeCategory, name: string, scope: ScopeFunc): void {
        this.bucket(category).set(name, scope);
    }

    lookup(category: ScopeCategory, name: string): ScopeFunc | undefined {
        return this.bucket(category).get(name);
    }

    has(category: ScopeCategory, name: string): boolean {
        return this.bucket(category).has(name);
    }

    unregister(category: ScopeCategory, name: string): boolean {
        return this.bucket(category).delete(name);
    }

    names(category: ScopeCategory): string[] {
        return Array.from(this.bucket(category).keys());
    }

    private bucket(category: ScopeCategory): Map<string, ScopeFunc> {
        let bucket = this.scopes.get(category);
        if (!bucket) {
            bucket = new Map();
            this.scopes.set(category, bucket);
        }
        return bucket;
    }
}
