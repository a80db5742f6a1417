import type { SQLParam } from './types.js';
import { PluginError, PluginTimeoutError } from './errors.js';

export type QueryOperation = 'findAll' | 'findOne' | 'count';

export interface PluginContext {
    table: string;
    operation: QueryOperation;
    sql: string;
    params: readonly SQLParam[];
    /** Scratch space shared between the before and after hooks of one call */
    data?: Record<string, unknown>;
    result?: unknown;
    error?: Error;
}

export interface PluginSystemOptions {
    timeout?: number; // Timeout in milliseconds, default 5000
}

export interface Plugin {
    name: string;
    version?: string;
    systemOptions?: PluginSystemOptions;

    onBeforeQuery?(context: PluginContext): Promise<void> | void;
    onAfterQuery?(context: PluginContext): Promise<void> | void;

    // Error handling
    onError?(context: PluginContext): Promise<void> | void;
}

export type HookName = 'onBeforeQuery' | 'onAfterQuery' | 'onError';

export interface PluginManagerOptions {
    strictMode?: boolean; // If true, plugin errors are thrown as PluginErrors
    defaultTimeout?: number; // Default timeout for plugins in milliseconds
}

export class PluginManager {
    private plugins: Map<string, Plugin> = new Map();
    private options: Required<PluginManagerOptions>;

    constructor(options: PluginManagerOptions = {}) {
        this.options = {
            strictMode: false,
            defaultTimeout: 5000,
            ...options,
        };
    }

    register(plugin: Plugin): void {
        if (this.plugins.has(plugin.name)) {
            throw new Error(`Plugin '${plugin.name}' is already registered`);
        }
        this.plugins.set(plugin.name, plugin);
    }

    unregister(pluginName: string): void {
        if (!this.plugins.delete(pluginName)) {
            throw new Error(`Plugin '${pluginName}' is not registered`);
        }
    }

    getPlugin(name: string): Plugin | undefined {
        return this.plugins.get(name);
    }

    listPlugins(): Plugin[] {
        return Array.from(this.plugins.values());
    }

    private async executeHookWithTimeout(
        plugin: Plugin,
        hookName: HookName,
        context: PluginContext
    ): Promise<void> {
        const hook = plugin[hookName];
        if (!hook) return;

        const timeout = plugin.systemOptions?.timeout ?? this.options.defaultTimeout;
        let timer: NodeJS.Timeout | undefined;

        try {
            await Promise.race([
                Promise.resolve().then(() => hook.call(plugin, context)),
                new Promise<never>((_, reject) => {
                    timer = setTimeout(() => {
                        reject(new PluginTimeoutError(plugin.name, hookName, timeout));
                    }, timeout);
                }),
            ]);
        } catch (error) {
            if (error instanceof PluginError) throw error;
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new PluginError(
                `Plugin '${plugin.name}' hook '${hookName}' failed: ${cause.message}`,
                plugin.name,
                hookName,
                cause
            );
        } finally {
            // Guaranteed cleanup even if the hook throws
            if (timer) clearTimeout(timer);
        }
    }

    async executeHook(hookName: HookName, context: PluginContext): Promise<void> {
        for (const plugin of this.plugins.values()) {
            try {
                await this.executeHookWithTimeout(plugin, hookName, context);
            } catch (error) {
                const pluginError =
                    error instanceof PluginError
                        ? error
                        : new PluginError(
                              `Plugin '${plugin.name}' hook '${hookName}' failed: ${String(error)}`,
                              plugin.name,
                              hookName
                          );

                // If there's an error in a hook, try to call onError hooks
                if (hookName !== 'onError') {
                    try {
                        await this.executeHook('onError', { ...context, error: pluginError });
                    } catch (onErrorFailure) {
                        console.warn(`Plugin onError hook failed while reporting '${hookName}':`, onErrorFailure);
                    }
                }

                throw pluginError;
            }
        }
    }

    async executeHookSafe(hookName: HookName, context: PluginContext): Promise<void> {
        try {
            await this.executeHook(hookName, context);
        } catch (error) {
            if (this.options.strictMode) {
                throw error;
            }
            if (error instanceof PluginTimeoutError) {
                console.warn(
                    `Plugin '${error.pluginName}' hook '${hookName}' timed out after ${error.timeout}ms - ` +
                        'consider increasing timeout or optimizing plugin performance'
                );
            } else if (error instanceof PluginError) {
                console.warn(
                    `Plugin '${error.pluginName}' hook '${hookName}' failed: ${error.message}`,
                    error.originalError ? error.originalError : ''
                );
            } else {
                console.warn(`Plugin hook '${hookName}' failed:`, error);
            }
        }
    }

    setStrictMode(enabled: boolean): void {
        this.options.strictMode = enabled;
    }

    setDefaultTimeout(timeout: number): void {
        this.options.defaultTimeout = timeout;
    }

    getOptions(): PluginManagerOptions {
        return { ...this.options };
    }
}
