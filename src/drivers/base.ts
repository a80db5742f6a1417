import type { Driver, Row, DBConfig, SQLParam } from '../types.js';
import { DatabaseError } from '../errors.js';

/** A value the SQLite bindings accept; booleans are stored as 0/1. */
export type BoundValue = Exclude<SQLParam, boolean>;

export interface PreparedStatement {
    run(params: BoundValue[]): void;
    all(params: BoundValue[]): Row[];
}

/**
 * Shared driver behaviour: closed-state checks, parameter conversion and an
 * LRU cache of prepared statements. Statement errors from the backend are
 * rethrown unchanged.
 */
export abstract class BaseDriver implements Driver {
    protected isClosed = false;
    protected config: DBConfig;

    // Prepared statement cache with LRU eviction
    protected statementCache = new Map<string, PreparedStatement>();
    protected static readonly MAX_STATEMENTS = 100;
    protected cacheAccessOrder: string[] = [];

    constructor(config: DBConfig) {
        this.config = config;
    }

    protected abstract prepare(sql: string): PreparedStatement;
    protected abstract pragma(statement: string): void;
    protected abstract closeDatabase(): void;

    protected getCachedStatement(sql: string): PreparedStatement | undefined {
        const stmt = this.statementCache.get(sql);
        if (stmt) {
            // Move to end (most recently used)
            const idx = this.cacheAccessOrder.indexOf(sql);
            if (idx > -1) {
                this.cacheAccessOrder.splice(idx, 1);
            }
            this.cacheAccessOrder.push(sql);
        }
        return stmt;
    }

    protected cacheStatement(sql: string, stmt: PreparedStatement): void {
        // Evict oldest if at capacity
        if (this.statementCache.size >= BaseDriver.MAX_STATEMENTS && !this.statementCache.has(sql)) {
            const oldest = this.cacheAccessOrder.shift();
            if (oldest !== undefined) {
                this.statementCache.delete(oldest);
            }
        }
        this.statementCache.set(sql, stmt);
        this.cacheAccessOrder.push(sql);
    }

    protected clearStatementCache(): void {
        this.statementCache.clear();
        this.cacheAccessOrder = [];
    }

    private statement(sql: string): PreparedStatement {
        const cached = this.getCachedStatement(sql);
        if (cached) return cached;
        const stmt = this.prepare(sql);
        this.cacheStatement(sql, stmt);
        return stmt;
    }

    private ensureOpen(): void {
        if (this.isClosed) {
            throw new DatabaseError('Driver is closed', 'DRIVER_CLOSED');
        }
    }

    /**
     * Convert JavaScript values to SQLite-compatible values.
     * Booleans are converted to 0/1 for SQLite compatibility.
     */
    protected static convertParams(params: readonly SQLParam[]): BoundValue[] {
        return params.map((value) => (typeof value === 'boolean' ? (value ? 1 : 0) : value));
    }

    async exec(sql: string, params: readonly SQLParam[] = []): Promise<void> {
        this.execSync(sql, params);
    }

    async query(sql: string, params: readonly SQLParam[] = []): Promise<Row[]> {
        return this.querySync(sql, params);
    }

    async close(): Promise<void> {
        this.closeSync();
    }

    execSync(sql: string, params: readonly SQLParam[] = []): void {
        this.ensureOpen();
        this.statement(sql).run(BaseDriver.convertParams(params));
    }

    querySync(sql: string, params: readonly SQLParam[] = []): Row[] {
        this.ensureOpen();
        return this.statement(sql).all(BaseDriver.convertParams(params));
    }

    closeSync(): void {
        if (this.isClosed) return;
        this.isClosed = true;
        this.clearStatementCache();
        this.closeDatabase();
    }

    protected configureSQLite(config: DBConfig): void {
        const options = config.sqlite;
        if (!options) return;

        // SECURITY: Define whitelists for PRAGMA values to prevent SQL injection
        const VALID_JOURNAL_MODES = new Set(['DELETE', 'TRUNCATE', 'PERSIST', 'MEMORY', 'WAL', 'OFF']);
        const VALID_SYNCHRONOUS = new Set(['OFF', 'NORMAL', 'FULL', 'EXTRA']);
        const VALID_TEMP_STORE = new Set(['DEFAULT', 'FILE', 'MEMORY']);

        const validateKeyword = (value: string, validSet: Set<string>, name: string): string => {
            const strValue = value.toUpperCase();
            if (!validSet.has(strValue)) {
                throw new DatabaseError(
                    `Invalid ${name}: '${value}' is not allowed. Valid values: ${Array.from(validSet).join(', ')}`,
                    'INVALID_PRAGMA'
                );
            }
            return strValue;
        };

        const validateInteger = (value: number, name: string): number => {
            if (!Number.isInteger(value) || !Number.isFinite(value)) {
                throw new DatabaseError(`Invalid ${name}: must be a finite integer`, 'INVALID_PRAGMA');
            }
            return value;
        };

        if (options.journalMode !== undefined) {
            this.pragma(`journal_mode = ${validateKeyword(options.journalMode, VALID_JOURNAL_MODES, 'journalMode')}`);
        }
        if (options.synchronous !== undefined) {
            this.pragma(`synchronous = ${validateKeyword(options.synchronous, VALID_SYNCHRONOUS, 'synchronous')}`);
        }
        if (options.tempStore !== undefined) {
            this.pragma(`temp_store = ${validateKeyword(options.tempStore, VALID_TEMP_STORE, 'tempStore')}`);
        }
        if (options.busyTimeout !== undefined) {
            this.pragma(`busy_timeout = ${validateInteger(options.busyTimeout, 'busyTimeout')}`);
        }
        if (options.cacheSize !== undefined) {
            this.pragma(`cache_size = ${validateInteger(options.cacheSize, 'cacheSize')}`);
        }
        if (options.foreignKeys !== undefined) {
            this.pragma(`foreign_keys = ${options.foreignKeys ? 'ON' : 'OFF'}`);
        }
    }
}
