import Database from 'better-sqlite3';
import { FixtureDatabase } from './database';
import { FixtureRecord, ScalarValue } from './types';

export type IsolationMode = 'transaction' | 'truncate';

type BindValue = string | number | null;

/** SQLITE_MAX_VARIABLE_NUMBER of the SQLite builds better-sqlite3 ships */
export const SQLITE_MAX_VARIABLES = 32766;

function quote(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
}

// SQLite has no boolean type and better-sqlite3 refuses to bind one
function toBindValue(value: ScalarValue): BindValue {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    return value;
}

/**
 * better-sqlite3 binding. Every call runs synchronously on the given connection.
 */
export class SqliteFixtureDatabase implements FixtureDatabase {
    readonly supportsTransactions: boolean;
    private readonly connection: Database.Database;

    constructor(connection: Database.Database, isolation: IsolationMode = 'transaction') {
        this.connection = connection;
        this.supportsTransactions = isolation === 'transaction';
    }

    tableColumns(table: string): string[] {
        const rows: unknown[] = this.connection.prepare(`PRAGMA table_info(${quote(table)})`).all();
        const columns: string[] = [];
        for (const row of rows) {
            if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
                columns.push(row.name);
            }
        }
        return columns;
    }

    insertRows(table: string, columns: readonly string[], rows: readonly ScalarValue[][]): number {
        if (rows.length === 0) {
            return 0;
        }

        if (columns.length === 0) {
            const statement = this.connection.prepare(`INSERT INTO ${quote(table)} DEFAULT VALUES`);
            let inserted = 0;
            for (let i = 0; i < rows.length; i++) {
                inserted += statement.run().changes;
            }
            return inserted;
        }

        // One statement per chunk keeps every insert under the bound parameter limit
        const chunkSize = Math.max(1, Math.floor(SQLITE_MAX_VARIABLES / columns.length));
        const tuple = `(${columns.map(() => '?').join(', ')})`;
        const prefix = `INSERT INTO ${quote(table)} (${columns.map(quote).join(', ')}) VALUES `;

        let inserted = 0;
        for (let start = 0; start < rows.length; start += chunkSize) {
            const chunk = rows.slice(start, start + chunkSize);
            const values = chunk.flatMap(row => row.map(toBindValue));
            inserted += this.connection.prepare(prefix + chunk.map(() => tuple).join(', ')).run(...values).changes;
        }
        return inserted;
    }

    insertRow(table: string, row: FixtureRecord): number | bigint {
        const columns = Object.keys(row);
        if (columns.length === 0) {
            return this.connection.prepare(`INSERT INTO ${quote(table)} DEFAULT VALUES`).run().lastInsertRowid;
        }

        const sql =
            `INSERT INTO ${quote(table)} (${columns.map(quote).join(', ')}) ` +
            `VALUES (${columns.map(() => '?').join(', ')})`;
        return this.connection.prepare(sql).run(...columns.map(column => toBindValue(row[column]))).lastInsertRowid;
    }

    countRows(table: string): number {
        const count: unknown = this.connection.prepare(`SELECT COUNT(*) FROM ${quote(table)}`).pluck().get();
        if (typeof count !== 'number') {
            throw new Error(`Unexpected row count for table '${table}': ${String(count)}`);
        }
        return count;
    }

    begin(): void {
        this.connection.exec('BEGIN');
    }

    rollback(): void {
        this.connection.exec('ROLLBACK');
    }

    savepoint(name: string): void {
        this.connection.exec(`SAVEPOINT ${quote(name)}`);
    }

    rollbackToSavepoint(name: string): void {
        this.connection.exec(`ROLLBACK TO SAVEPOINT ${quote(name)}`);
    }

    releaseSavepoint(name: string): void {
        this.connection.exec(`RELEASE SAVEPOINT ${quote(name)}`);
    }

    truncate(tables: readonly string[]): void {
        for (const table of tables) {
            this.connection.prepare(`DELETE FROM ${quote(table)}`).run();
        }
    }
}
