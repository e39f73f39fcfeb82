import * as path from 'path';
import { z } from 'zod';
import { FixtureConfigError } from './errors';
import { IsolationMode } from './SqliteFixtureDatabase';

export const DEFAULT_FIXTURES_DIR = 'fixtures';

/**
 * The slice of the host application the engine reads.
 */
export interface HostApplication {
    /** Directory relative fixture paths are resolved against */
    rootPath: string;
    config: { [key: string]: unknown };
}

export interface FixturesConfig {
    rootPath: string;
    /** Search order: the default `fixtures` directory first, then FIXTURES_DIRS */
    searchDirs: string[];
    seed?: number;
    isolation: IsolationMode;
}

const IsolationSchema = z.enum(['transaction', 'truncate']);

const AppConfigSchema = z.object({
    FIXTURES_DIRS: z.array(z.string().min(1)).optional(),
    FIXTURES_SEED: z.number().int().optional(),
    FIXTURES_ISOLATION: IsolationSchema.optional(),
});

const EnvConfigSchema = z.object({
    FIXTURES_DIRS: z.string().optional(),
    FIXTURES_SEED: z.coerce.number().int().optional(),
    FIXTURES_ISOLATION: IsolationSchema.optional(),
});

/**
 * Read the fixture settings from the host application's config, falling back
 * to environment variables for anything the app config leaves unset.
 * `FIXTURES_DIRS` in the environment is split on the platform path delimiter.
 */
export function loadFixturesConfig(app: HostApplication, env: NodeJS.ProcessEnv = process.env): FixturesConfig {
    const fromApp = AppConfigSchema.safeParse(app.config);
    if (!fromApp.success) {
        throw new FixtureConfigError(`Invalid application config: ${describeIssues(fromApp.error)}`);
    }

    const fromEnv = EnvConfigSchema.safeParse({
        FIXTURES_DIRS: env.FIXTURES_DIRS || undefined,
        FIXTURES_SEED: env.FIXTURES_SEED || undefined,
        FIXTURES_ISOLATION: env.FIXTURES_ISOLATION || undefined,
    });
    if (!fromEnv.success) {
        throw new FixtureConfigError(`Invalid environment: ${describeIssues(fromEnv.error)}`);
    }

    const dirs = fromApp.data.FIXTURES_DIRS
        ?? fromEnv.data.FIXTURES_DIRS?.split(path.delimiter).filter(dir => dir.length > 0)
        ?? [];

    return {
        rootPath: path.resolve(app.rootPath),
        searchDirs: searchDirectories(app.rootPath, dirs),
        seed: fromApp.data.FIXTURES_SEED ?? fromEnv.data.FIXTURES_SEED,
        isolation: fromApp.data.FIXTURES_ISOLATION ?? fromEnv.data.FIXTURES_ISOLATION ?? 'transaction',
    };
}

export function searchDirectories(rootPath: string, dirs: readonly string[]): string[] {
    return [DEFAULT_FIXTURES_DIR, ...dirs].map(dir => path.resolve(rootPath, dir));
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}
