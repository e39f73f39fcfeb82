// Main exports for the SQL fixture loader
export { FixtureFileResolver, FIXTURE_EXTENSIONS } from './FixtureFileResolver';
export { FixtureParser, FixtureFileSchema } from './FixtureParser';
export { PlaceholderProcessor } from './PlaceholderProcessor';
export type { PlaceholderOptions } from './PlaceholderProcessor';
export { RecordMaterializer } from './RecordMaterializer';
export type { MaterializeContext } from './RecordMaterializer';
export { FixtureLoader } from './FixtureLoader';
export type { FixtureLoaderOptions } from './FixtureLoader';
export { FixtureLifecycle } from './FixtureLifecycle';
export type { FixtureContext, LifecycleState } from './FixtureLifecycle';
export { ModelRegistry } from './ModelRegistry';
export { SqliteFixtureDatabase, SQLITE_MAX_VARIABLES } from './SqliteFixtureDatabase';
export type { IsolationMode } from './SqliteFixtureDatabase';
export { SqliteModelSession } from './SqliteModelSession';
export type { FixtureDatabase, ModelSession, ModelType } from './database';
export { loadFixturesConfig, searchDirectories, DEFAULT_FIXTURES_DIR } from './config';
export type { FixturesConfig, HostApplication } from './config';
export { createFixtureEngine } from './engine';
export type { FixtureEngineOptions } from './engine';
export {
    FixtureError,
    FixtureNotFoundError,
    FixtureFormatError,
    HeterogeneousRecordsError,
    ModelNotFoundError,
    SchemaMismatchError,
    LifecycleError,
    FixtureConfigError,
} from './errors';
export { LoadScope } from './types';
export type {
    FixtureFile,
    FixtureLogger,
    FixtureRecord,
    FixtureTarget,
    LoadSummary,
    RecordGroup,
    ScalarValue,
} from './types';

// Test-runner adapters
export { registerFixtureHooks } from './adapters/runnerHooks';
export type { RunnerHooks } from './adapters/runnerHooks';
export { fixtureScope, withFixtures } from './adapters/fixtureScope';
export { FixtureCollectorPlugin } from './adapters/FixtureCollectorPlugin';
export { declarationOf } from './adapters/declaration';
export type { FixtureDeclaration } from './adapters/declaration';
