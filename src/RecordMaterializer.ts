import { FixtureDatabase, ModelSession } from './database';
import { HeterogeneousRecordsError, SchemaMismatchError } from './errors';
import { ModelRegistry } from './ModelRegistry';
import { PlaceholderProcessor } from './PlaceholderProcessor';
import { FixtureFile, FixtureRecord, RecordGroup } from './types';

export interface MaterializeContext {
    database: FixtureDatabase;
    models: ModelRegistry;
    session: ModelSession;
    placeholders?: PlaceholderProcessor;
}

function sameKeys(expected: readonly string[], actual: readonly string[]): boolean {
    return expected.length === actual.length && expected.every((key, index) => key === actual[index]);
}

/**
 * Turns record groups into rows. Table groups go in as one bulk insert and
 * skip model defaults entirely; model groups are built and persisted one
 * instance at a time through the model session.
 */
export class RecordMaterializer {
    /**
     * Materialize every group of a file in order. The session is flushed after
     * each group so later groups can reference rows written by earlier ones.
     */
    materializeFile(file: FixtureFile, context: MaterializeContext, touched: Set<string> = new Set()): number {
        let rows = 0;
        for (const group of file.groups) {
            rows += this.materialize(group, context, file.name, touched);
        }
        context.session.flush();
        return rows;
    }

    materialize(
        group: RecordGroup,
        context: MaterializeContext,
        fixture: string,
        touched: Set<string> = new Set()
    ): number {
        const { target } = group;
        if (target.kind === 'table') {
            return this.insertTable(target.name, group.records, context, fixture, touched);
        }
        return this.insertModels(target.typeName, group.records, context, fixture, touched);
    }

    private insertTable(
        table: string,
        records: FixtureRecord[],
        context: MaterializeContext,
        fixture: string,
        touched: Set<string>
    ): number {
        const columns = context.database.tableColumns(table);
        if (columns.length === 0) {
            throw new SchemaMismatchError(table, 'table does not exist');
        }
        if (records.length === 0) {
            return 0;
        }

        const keys = Object.keys(records[0]);
        const expected = [...keys].sort();
        records.forEach((record, index) => {
            const actual = Object.keys(record).sort();
            if (!sameKeys(expected, actual)) {
                throw new HeterogeneousRecordsError(table, index, expected, actual);
            }
        });

        const unknownColumns = keys.filter(key => !columns.includes(key));
        if (unknownColumns.length > 0) {
            throw new SchemaMismatchError(table, `unknown column(s) ${unknownColumns.join(', ')}`);
        }

        const rows = records.map(record => {
            const processed = this.expand(record, context, fixture);
            return keys.map(key => processed[key]);
        });

        touched.add(table);
        return context.database.insertRows(table, keys, rows);
    }

    private insertModels(
        typeName: string,
        records: FixtureRecord[],
        context: MaterializeContext,
        fixture: string,
        touched: Set<string>
    ): number {
        const model = context.models.resolve(typeName);

        for (const record of records) {
            context.session.add(model, model.create(this.expand(record, context, fixture)));
        }

        touched.add(model.tableName);
        context.session.flush();
        return records.length;
    }

    private expand(record: FixtureRecord, context: MaterializeContext, fixture: string): FixtureRecord {
        return context.placeholders ? context.placeholders.processRecord(record, fixture) : record;
    }
}
