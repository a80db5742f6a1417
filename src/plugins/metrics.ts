import type { Plugin, PluginContext, QueryOperation } from '../plugin-system.js';

export interface MetricsOptions {
    trackPerformance?: boolean;
    trackErrors?: boolean;
}

export interface OperationMetrics {
    count: number;
    totalTime: number;
    avgTime: number;
    minTime: number;
    maxTime: number;
    errors: number;
}

export type TableMetrics = Record<QueryOperation, OperationMetrics>;

/** Per-table counts and timings of executor calls. */
export class MetricsPlugin implements Plugin {
    name = 'metrics';
    version = '1.0.0';

    private options: Required<MetricsOptions>;
    private metrics = new Map<string, TableMetrics>();
    private operationStartTimes = new Map<string, number>();
    private nextKey = 0;

    constructor(options: MetricsOptions = {}) {
        this.options = {
            trackPerformance: true,
            trackErrors: true,
            ...options,
        };
    }

    private getTableMetrics(table: string): TableMetrics {
        let metrics = this.metrics.get(table);
        if (!metrics) {
            metrics = {
                findAll: this.createOperationMetrics(),
                findOne: this.createOperationMetrics(),
                count: this.createOperationMetrics(),
            };
            this.metrics.set(table, metrics);
        }
        return metrics;
    }

    private createOperationMetrics(): OperationMetrics {
        return {
            count: 0,
            totalTime: 0,
            avgTime: 0,
            minTime: Infinity,
            maxTime: 0,
            errors: 0,
        };
    }

    private updateOperationMetrics(metrics: OperationMetrics, duration?: number): void {
        metrics.count++;

        if (duration !== undefined) {
            metrics.totalTime += duration;
            metrics.avgTime = metrics.totalTime / metrics.count;
            metrics.minTime = Math.min(metrics.minTime, duration);
            metrics.maxTime = Math.max(metrics.maxTime, duration);
        }
    }

    onBeforeQuery(context: PluginContext): void {
        if (this.options.trackPerformance) {
            const key = `${context.table}:${context.operation}:${this.nextKey++}`;
            this.operationStartTimes.set(key, performance.now());
            context.data = { ...context.data, _metricsKey: key };
        }
    }

    onAfterQuery(context: PluginContext): void {
        const metrics = this.getTableMetrics(context.table);
        let duration: number | undefined;

        const key = context.data?._metricsKey;
        if (this.options.trackPerformance && typeof key === 'string') {
            const startTime = this.operationStartTimes.get(key);
            if (startTime !== undefined) {
                duration = performance.now() - startTime;
                this.operationStartTimes.delete(key);
            }
        }

        this.updateOperationMetrics(metrics[context.operation], duration);
    }

    onError(context: PluginContext): void {
        const key = context.data?._metricsKey;
        if (typeof key === 'string') {
            this.operationStartTimes.delete(key);
        }
        if (this.options.trackErrors) {
            this.getTableMetrics(context.table)[context.operation].errors++;
        }
    }

    getMetrics(table: string): TableMetrics | undefined {
        return this.metrics.get(table);
    }

    getSummary(): { totalOperations: number; totalErrors: number; tables: string[] } {
        let totalOperations = 0;
        let totalErrors = 0;

        for (const metrics of this.metrics.values()) {
            for (const op of Object.values(metrics)) {
                totalOperations += op.count;
                totalErrors += op.errors;
            }
        }

        return {
            totalOperations,
            totalErrors,
            tables: Array.from(this.metrics.keys()),
        };
    }

    resetMetrics(): void {
        this.metrics.clear();
        this.operationStartTimes.clear();
    }
}
