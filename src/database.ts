import type { DBConfig, Driver, Row, SQLParam } from './types.js';
import { NodeDriver } from './drivers/node.js';
import { PluginManager, type Plugin, type PluginManagerOptions } from './plugin-system.js';
import { QueryCompiler, type CompilerOptions } from './query-compiler.js';
import type { EntityDefinition } from './field-catalog.js';

export interface DatabaseOptions {
    plugins?: PluginManagerOptions;
}

/**
 * Owns a driver and a plugin manager, and hands out one compiler per entity.
 * Entities declared earlier are visible to later ones as sub-query targets.
 */
export class Database {
    readonly driver: Driver;
    readonly plugins: PluginManager;
    private definitions = new Map<string, EntityDefinition>();

    constructor(config: DBConfig = {}, options: DatabaseOptions = {}) {
        this.driver = new NodeDriver(config);
        this.plugins = new PluginManager(options.plugins);
    }

    /**
     * Creates a compiler for `definition`. Plugins registered on this database
     * run around the compiler's async queries.
     */
    entity(definition: EntityDefinition, options: Omit<CompilerOptions, 'plugins'> = {}): QueryCompiler {
        const related = new Map(this.definitions);
        for (const other of options.related ?? []) {
            related.set(other.table, other);
        }

        const compiler = new QueryCompiler(definition, this.driver, {
            ...options,
            related: Array.from(related.values()),
            plugins: this.plugins,
        });
        this.definitions.set(definition.table, definition);
        return compiler;
    }

    use(plugin: Plugin): this {
        this.plugins.register(plugin);
        return this;
    }

    unuse(pluginName: string): this {
        this.plugins.unregister(pluginName);
        return this;
    }

    getPlugin(name: string): Plugin | undefined {
        return this.plugins.getPlugin(name);
    }

    listPlugins(): Plugin[] {
        return this.plugins.listPlugins();
    }

    listEntities(): string[] {
        return Array.from(this.definitions.keys());
    }

    async exec(sql: string, params?: readonly SQLParam[]): Promise<void> {
        return this.driver.exec(sql, params);
    }

    async query(sql: string, params?: readonly SQLParam[]): Promise<Row[]> {
        return this.driver.query(sql, params);
    }

    async close(): Promise<void> {
        await this.driver.close();
    }

    /** Does not run plugin hooks. */
    execSync(sql: string, params?: readonly SQLParam[]): void {
        this.driver.execSync(sql, params);
    }

    /** Does not run plugin hooks. */
    querySync(sql: string, params?: readonly SQLParam[]): Row[] {
        return this.driver.querySync(sql, params);
    }

    closeSync(): void {
        this.driver.closeSync();
    }
}

export function createDB(config: DBConfig = {}, options: DatabaseOptions = {}): Database {
    return new Database(config, options);
}
