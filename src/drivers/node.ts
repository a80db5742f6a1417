import Database from 'better-sqlite3';
import type { DBConfig, Row } from '../types.js';
import { DatabaseError } from '../errors.js';
import { validateDatabasePath } from '../sql-utils.js';
import { BaseDriver, type BoundValue, type PreparedStatement } from './base.js';

function openDatabase(path: string): Database.Database {
    try {
        return new Database(path);
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        throw new DatabaseError(
            `Failed to open SQLite database '${path}': ${errorMessage}`,
            'DB_OPEN_FAILED'
        );
    }
}

/** SQLite through better-sqlite3. */
export class NodeDriver extends BaseDriver {
    private db: Database.Database;

    constructor(config: DBConfig = {}) {
        super(config);
        const path = config.memory ? ':memory:' : validateDatabasePath(config.path) ?? ':memory:';

        this.db = openDatabase(path);

        this.registerFunctions();
        this.configureSQLite(config);
    }

    /**
     * SQLite parses `X REGEXP Y` but ships no implementation; it calls
     * `regexp(Y, X)`. A NULL on either side yields NULL.
     *
     * The built-in `lower` folds ASCII only, while case-insensitive filters
     * lowercase their operand in JavaScript; both sides must fold alike.
     */
    private registerFunctions(): void {
        const patterns = new Map<string, RegExp>();
        this.db.function('regexp', { deterministic: true }, (pattern: unknown, value: unknown) => {
            if (pattern === null || value === null) return null;
            const source = String(pattern);
            let re = patterns.get(source);
            if (!re) {
                re = new RegExp(source);
                patterns.set(source, re);
            }
            return re.test(String(value)) ? 1 : 0;
        });
        this.db.function('lower', { deterministic: true }, (value: unknown) =>
            value === null ? null : String(value).toLowerCase()
        );
    }

    protected prepare(sql: string): PreparedStatement {
        const stmt = this.db.prepare<BoundValue[], Row>(sql);
        return {
            run: (params) => {
                stmt.run(...params);
            },
            all: (params) => stmt.all(...params),
        };
    }

    protected pragma(statement: string): void {
        this.db.pragma(statement);
    }

    protected closeDatabase(): void {
        this.db.close();
    }
}
