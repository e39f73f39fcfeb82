export type ScalarValue = string | number | boolean | null;

export type FixtureRecord = Record<string, ScalarValue>;

export type FixtureTarget =
    | { kind: 'table'; name: string }
    | { kind: 'model'; typeName: string };

export interface RecordGroup {
    target: FixtureTarget;
    records: FixtureRecord[];
}

export interface FixtureFile {
    /** File name as found on disk, e.g. `authors.yaml` */
    name: string;
    path: string;
    groups: RecordGroup[];
}

export const LoadScope = {
    PerTest: 'per-test',
    PerClass: 'per-class',
} as const;

export type LoadScope = typeof LoadScope[keyof typeof LoadScope];

export interface LoadSummary {
    fixtures: string[];
    files: string[];
    rows: number;
    tables: string[];
}

export interface FixtureLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
}
