import Database from 'better-sqlite3';
import { loadFixturesConfig, HostApplication } from './config';
import { ModelType } from './database';
import { FixtureContext, FixtureLifecycle } from './FixtureLifecycle';
import { ModelRegistry } from './ModelRegistry';
import { PlaceholderProcessor } from './PlaceholderProcessor';
import { SqliteFixtureDatabase } from './SqliteFixtureDatabase';
import { SqliteModelSession } from './SqliteModelSession';
import { FixtureLogger } from './types';

export interface FixtureEngineOptions {
    app: HostApplication;
    connection: Database.Database;
    models?: ModelRegistry | readonly ModelType[];
    logger?: FixtureLogger;
    env?: NodeJS.ProcessEnv;
}

/**
 * Bind a host application and its database connection into a fixture lifecycle.
 *
 * @example
 * const fixtures = createFixtureEngine({
 *     app: { rootPath: __dirname, config: { FIXTURES_DIRS: ['seeds'] } },
 *     connection: new Database(':memory:'),
 *     models: [BookModel],
 * });
 */
export function createFixtureEngine(options: FixtureEngineOptions): FixtureLifecycle {
    const env = options.env ?? process.env;
    const config = loadFixturesConfig(options.app, env);
    const database = new SqliteFixtureDatabase(options.connection, config.isolation);
    const models = options.models instanceof ModelRegistry
        ? options.models
        : new ModelRegistry(options.models ?? []);

    const context: FixtureContext = {
        database,
        models,
        session: new SqliteModelSession(database),
        placeholders: new PlaceholderProcessor({ seed: config.seed, env }),
        searchDirs: config.searchDirs,
        logger: options.logger ?? console,
    };

    return new FixtureLifecycle(context);
}
