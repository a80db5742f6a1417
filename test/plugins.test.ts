import { describe, test, expect, vi, afterEach } from 'vitest';
import { PluginManager, type Plugin, type PluginContext } from '../src/plugin-system.js';
import { MetricsPlugin } from '../src/plugins/metrics.js';
import { PluginError, PluginTimeoutError } from '../src/errors.js';
import { QueryCompiler } from '../src/query-compiler.js';
import { defineEntity } from '../src/field-catalog.js';
import { RecordingDriver } from './recording-driver.js';

const context: PluginContext = {
    table: 'users',
    operation: 'findAll',
    sql: 'SELECT "users".* FROM "users"',
    params: [],
};

describe('PluginManager', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('registers plugins by name', () => {
        const manager = new PluginManager();
        manager.register({ name: 'audit' });

        expect(manager.getPlugin('audit')?.name).toBe('audit');
        expect(() => manager.register({ name: 'audit' })).toThrow("Plugin 'audit' is already registered");

        manager.unregister('audit');
        expect(manager.listPlugins()).toEqual([]);
        expect(() => manager.unregister('audit')).toThrow("Plugin 'audit' is not registered");
    });

    test('runs hooks in registration order', async () => {
        const seen: string[] = [];
        const manager = new PluginManager();
        manager.register({ name: 'first', onBeforeQuery: () => void seen.push('first') });
        manager.register({ name: 'second', onBeforeQuery: async () => void seen.push('second') });

        await manager.executeHook('onBeforeQuery', context);
        expect(seen).toEqual(['first', 'second']);
    });

    test('wraps hook failures and reports them to onError', async () => {
        const errors: Array<Error | undefined> = [];
        const manager = new PluginManager();
        manager.register({
            name: 'failing',
            onAfterQuery: () => {
                throw new Error('boom');
            },
            onError: (ctx) => void errors.push(ctx.error),
        });

        await expect(manager.executeHook('onAfterQuery', context)).rejects.toThrow(
            "Plugin 'failing' hook 'onAfterQuery' failed: boom"
        );
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(PluginError);
    });

    test('times out slow hooks', async () => {
        const manager = new PluginManager();
        manager.register({
            name: 'slow',
            systemOptions: { timeout: 10 },
            onBeforeQuery: () => new Promise<void>(() => {}),
        });

        await expect(manager.executeHook('onBeforeQuery', context)).rejects.toThrow(PluginTimeoutError);
    });

    test('executeHookSafe logs failures unless strict', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const failing: Plugin = {
            name: 'failing',
            onBeforeQuery: () => {
                throw new Error('boom');
            },
        };
        const manager = new PluginManager();
        manager.register(failing);

        await expect(manager.executeHookSafe('onBeforeQuery', context)).resolves.toBeUndefined();
        expect(warn).toHaveBeenCalledTimes(1);

        manager.setStrictMode(true);
        await expect(manager.executeHookSafe('onBeforeQuery', context)).rejects.toThrow(PluginError);
        expect(manager.getOptions().strictMode).toBe(true);
    });

    test('a failing plugin does not fail the query', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const manager = new PluginManager();
        manager.register({
            name: 'failing',
            onAfterQuery: () => {
                throw new Error('boom');
            },
        });
        const driver = new RecordingDriver([{ id: 1 }]);
        const compiler = new QueryCompiler(defineEntity('users', ['ID']), driver, { plugins: manager });

        await expect(compiler.findAll({})).resolves.toEqual([{ id: 1 }]);
    });

    test('hooks see the statement being run', async () => {
        const seen: PluginContext[] = [];
        const manager = new PluginManager();
        manager.register({ name: 'recorder', onBeforeQuery: (ctx) => void seen.push(ctx) });
        const compiler = new QueryCompiler(defineEntity('users', ['ID']), new RecordingDriver([], 4), {
            plugins: manager,
        });

        await compiler.count({});
        compiler.countSync({});

        expect(seen).toEqual([
            { table: 'users', operation: 'count', sql: 'SELECT COUNT(*) AS count FROM "users"', params: [] },
        ]);
    });
});

describe('MetricsPlugin', () => {
    test('counts operations and errors per table', () => {
        const metrics = new MetricsPlugin();

        const call: PluginContext = { ...context };
        metrics.onBeforeQuery(call);
        metrics.onAfterQuery({ ...call, result: [] });

        const failed: PluginContext = { ...context, operation: 'count' };
        metrics.onBeforeQuery(failed);
        metrics.onError({ ...failed, error: new Error('boom') });

        const tableMetrics = metrics.getMetrics('users');
        expect(tableMetrics?.findAll.count).toBe(1);
        expect(tableMetrics?.findAll.minTime).toBeGreaterThanOrEqual(0);
        expect(tableMetrics?.count.count).toBe(0);
        expect(tableMetrics?.count.errors).toBe(1);
        expect(metrics.getSummary()).toEqual({ totalOperations: 1, totalErrors: 1, tables: ['users'] });

        metrics.resetMetrics();
        expect(metrics.getMetrics('users')).toBeUndefined();
    });

    test('skips timings when performance tracking is off', () => {
        const metrics = new MetricsPlugin({ trackPerformance: false, trackErrors: false });
        const call: PluginContext = { ...context };

        metrics.onBeforeQuery(call);
        metrics.onAfterQuery(call);
        metrics.onError({ ...call, error: new Error('boom') });

        expect(call.data).toBeUndefined();
        expect(metrics.getMetrics('users')?.findAll).toEqual({
            count: 1,
            totalTime: 0,
            avgTime: 0,
            minTime: Infinity,
            maxTime: 0,
            errors: 0,
        });
    });
});
