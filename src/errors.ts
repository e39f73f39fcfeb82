/**
 * Base class for every error raised while loading or tearing down fixtures.
 */
export class FixtureError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class FixtureNotFoundError extends FixtureError {
    readonly fixture: string;
    readonly searchDirs: readonly string[];

    constructor(fixture: string, searchDirs: readonly string[]) {
        super(`Fixture '${fixture}' could not be found in: ${searchDirs.join(', ') || '(no directories)'}`);
        this.fixture = fixture;
        this.searchDirs = searchDirs;
    }
}

export class FixtureFormatError extends FixtureError {
    readonly fixture: string;
    readonly problems: readonly string[];

    constructor(fixture: string, problems: string | readonly string[]) {
        const list = typeof problems === 'string' ? [problems] : problems;
        super(`Invalid fixture file ${fixture}: ${list.join('; ')}`);
        this.fixture = fixture;
        this.problems = list;
    }
}

export class HeterogeneousRecordsError extends FixtureError {
    readonly table: string;
    readonly recordIndex: number;

    constructor(table: string, recordIndex: number, expected: readonly string[], actual: readonly string[]) {
        super(
            `Records for table '${table}' must share the same fields: record ${recordIndex} has ` +
            `[${actual.join(', ')}], expected [${expected.join(', ')}]`
        );
        this.table = table;
        this.recordIndex = recordIndex;
    }
}

export class ModelNotFoundError extends FixtureError {
    readonly typeName: string;

    constructor(typeName: string) {
        super(`No model registered for '${typeName}'`);
        this.typeName = typeName;
    }
}

export class SchemaMismatchError extends FixtureError {
    readonly table: string;

    constructor(table: string, detail: string) {
        super(`Table '${table}': ${detail}`);
        this.table = table;
    }
}

export class LifecycleError extends FixtureError {}

export class FixtureConfigError extends FixtureError {}
