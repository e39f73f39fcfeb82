import { FixtureRecord, ScalarValue } from './types';

/**
 * What the engine needs from the relational database. Only the lifecycle
 * manager opens, releases or rolls back boundaries.
 */
export interface FixtureDatabase {
    /** False when rollback-based isolation is unavailable; teardown then truncates */
    readonly supportsTransactions: boolean;

    /** Column names of a table, or an empty list when the table does not exist */
    tableColumns(table: string): string[];
    /** Insert all rows, in order, and return the number inserted */
    insertRows(table: string, columns: readonly string[], rows: readonly ScalarValue[][]): number;
    /** Insert one row and return its generated row id */
    insertRow(table: string, row: FixtureRecord): number | bigint;
    countRows(table: string): number;

    begin(): void;
    rollback(): void;
    savepoint(name: string): void;
    rollbackToSavepoint(name: string): void;
    releaseSavepoint(name: string): void;
    /** Delete every row of the given tables, in the given order */
    truncate(tables: readonly string[]): void;
}

/**
 * A model type the fixtures can name by its qualified type name.
 */
export interface ModelType<T extends object = object> {
    readonly typeName: string;
    readonly tableName: string;
    /** Build an unsaved instance; model defaults fill attributes the record leaves out */
    create(attributes: FixtureRecord): T;
    toRow(instance: T): FixtureRecord;
    /** Receives the generated row id once the instance is inserted */
    afterInsert?(instance: T, rowId: number | bigint): void;
}

/**
 * Unit of work for model instances: `add` queues, `flush` writes.
 */
export interface ModelSession {
    add<T extends object>(model: ModelType<T>, instance: T): void;
    /** Persist every queued instance in order; returns the number written */
    flush(): number;
    /** Drop queued instances without writing them */
    discard(): void;
}
