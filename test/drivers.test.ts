import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { NodeDriver } from '../src/drivers/node.js';
import { DatabaseError, ValidationError } from '../src/errors.js';

describe('NodeDriver', () => {
    let driver: NodeDriver;

    beforeEach(() => {
        driver = new NodeDriver({ memory: true });
        driver.execSync('CREATE TABLE flags (id INTEGER PRIMARY KEY, name TEXT, enabled INTEGER)');
    });

    afterEach(() => {
        driver.closeSync();
    });

    test('binds parameters and stores booleans as integers', async () => {
        driver.execSync('INSERT INTO flags (id, name, enabled) VALUES (?, ?, ?)', [1, 'dark_mode', true]);
        await driver.exec('INSERT INTO flags (id, name, enabled) VALUES (?, ?, ?)', [2, 'beta', false]);

        expect(driver.querySync('SELECT name, enabled FROM flags ORDER BY id')).toEqual([
            { name: 'dark_mode', enabled: 1 },
            { name: 'beta', enabled: 0 },
        ]);
        await expect(driver.query('SELECT id FROM flags WHERE enabled = ?', [true])).resolves.toEqual([{ id: 1 }]);
    });

    test('provides a regexp function', () => {
        expect(driver.querySync("SELECT 'abc' REGEXP 'b' AS matched")).toEqual([{ matched: 1 }]);
        expect(driver.querySync("SELECT 'abc' REGEXP '^b' AS matched")).toEqual([{ matched: 0 }]);
        expect(driver.querySync("SELECT NULL REGEXP 'b' AS matched")).toEqual([{ matched: null }]);
    });

    test('reuses prepared statements', () => {
        for (let id = 1; id <= 3; id++) {
            driver.execSync('INSERT INTO flags (id, name, enabled) VALUES (?, ?, ?)', [id, `flag_${id}`, 1]);
        }
        expect(driver.querySync('SELECT COUNT(*) AS n FROM flags')).toEqual([{ n: 3 }]);
    });

    test('surfaces SQLite errors unchanged', () => {
        expect(() => driver.querySync('SELECT * FROM missing_table')).toThrow('no such table: missing_table');
    });

    test('refuses to run after close', async () => {
        driver.closeSync();
        driver.closeSync();

        expect(() => driver.querySync('SELECT 1')).toThrow(DatabaseError);
        await expect(driver.query('SELECT 1')).rejects.toThrow('Driver is closed');
    });
});

describe('NodeDriver configuration', () => {
    test('applies whitelisted pragmas', () => {
        const driver = new NodeDriver({ memory: true, sqlite: { foreignKeys: true, cacheSize: -2000 } });

        expect(driver.querySync('PRAGMA foreign_keys')).toEqual([{ foreign_keys: 1 }]);
        driver.closeSync();
    });

    test('rejects invalid pragma values', () => {
        expect(() => new NodeDriver({ memory: true, sqlite: { busyTimeout: 1.5 } })).toThrow(
            'Invalid busyTimeout: must be a finite integer'
        );
    });

    test('rejects unsafe paths', () => {
        expect(() => new NodeDriver({ path: '../escape.db' })).toThrow(ValidationError);
    });
});
