export interface DBConfig {
    path?: string;
    memory?: boolean;
    // SQLite optimization options
    sqlite?: {
        journalMode?: 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'WAL' | 'OFF';
        synchronous?: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
        busyTimeout?: number; // milliseconds
        cacheSize?: number; // pages (negative = KB)
        tempStore?: 'DEFAULT' | 'FILE' | 'MEMORY';
        foreignKeys?: boolean;
    };
}

/** A value that can be bound to a `?` placeholder. */
export type SQLParam = string | number | bigint | boolean | null | Buffer;

export interface Row {
    [column: string]: unknown;
}

export interface Driver {
    exec(sql: string, params?: readonly SQLParam[]): Promise<void>;
    query(sql: string, params?: readonly SQLParam[]): Promise<Row[]>;
    close(): Promise<void>;

    // Sync methods
    execSync(sql: string, params?: readonly SQLParam[]): void;
    querySync(sql: string, params?: readonly SQLParam[]): Row[];
    closeSync(): void;
}

/** A rendered statement and its parameters, in placeholder order. */
export interface SQLStatement {
    sql: string;
    params: SQLParam[];
}
