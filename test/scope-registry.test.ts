import { describe, test, expect } from 'vitest';
import { ScopeRegistry, SCOPE_CATEGORIES, type ScopeFunc } from '../src/scope-registry.js';
import { QueryPlan } from '../src/query-plan.js';

describe('ScopeRegistry', () => {
    const activeOnly: ScopeFunc = (plan) => plan.where('"users"."status" = ?', 'active');
    const newestFirst: ScopeFunc = (plan) => plan.order('"users"."id" DESC');

    test('looks up registered scopes', () => {
        const registry = new ScopeRegistry();
        registry.register('filter', 'active_only', activeOnly);

        expect(registry.lookup('filter', 'active_only')).toBe(activeOnly);
        expect(registry.has('filter', 'active_only')).toBe(true);
        expect(registry.lookup('filter', 'missing')).toBeUndefined();
    });

    test('last registration wins', () => {
        const registry = new ScopeRegistry();
        registry.register('sort', 'default', activeOnly);
        registry.register('sort', 'default', newestFirst);

        expect(registry.lookup('sort', 'default')).toBe(newestFirst);
        expect(registry.names('sort')).toEqual(['default']);
    });

    test('keeps categories apart', () => {
        const registry = new ScopeRegistry();
        registry.register('filter', 'shared_name', activeOnly);

        for (const category of SCOPE_CATEGORIES) {
            expect(registry.has(category, 'shared_name')).toBe(category === 'filter');
        }
    });

    test('unregister reports whether a scope was removed', () => {
        const registry = new ScopeRegistry();
        registry.register('join', 'with_orders', activeOnly);

        expect(registry.unregister('join', 'with_orders')).toBe(true);
        expect(registry.unregister('join', 'with_orders')).toBe(false);
        expect(registry.names('join')).toEqual([]);
    });

    test('registered functions transform plans', () => {
        const registry = new ScopeRegistry();
        registry.register('filter', 'active_only', activeOnly);

        const scope = registry.lookup('filter', 'active_only');
        expect(scope).toBeDefined();
        if (!scope) return;

        const plan = scope(QueryPlan.from('users'), { category: 'filter', scope: 'active_only', values: [] });
        expect(plan.toSQL()).toEqual({
            sql: 'SELECT "users".* FROM "users" WHERE "users"."status" = ?',
            params: ['active'],
        });
    });
});
