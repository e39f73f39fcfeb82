import { FixtureDatabase, ModelSession, ModelType } from './database';

type PendingWrite = () => void;

/**
 * Queues model instances and inserts them, in the order they were added,
 * when flushed. Generated row ids are handed back through `afterInsert`.
 */
export class SqliteModelSession implements ModelSession {
    private readonly database: FixtureDatabase;
    private pending: PendingWrite[] = [];

    constructor(database: FixtureDatabase) {
        this.database = database;
    }

    add<T extends object>(model: ModelType<T>, instance: T): void {
        this.pending.push(() => {
            const rowId = this.database.insertRow(model.tableName, model.toRow(instance));
            model.afterInsert?.(instance, rowId);
        });
    }

    flush(): number {
        const writes = this.pending;
        this.pending = [];
        for (const write of writes) {
            write();
        }
        return writes.length;
    }

    discard(): void {
        this.pending = [];
    }

    get pendingCount(): number {
        return this.pending.length;
    }
}
