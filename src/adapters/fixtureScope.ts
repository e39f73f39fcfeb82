import { FixtureLifecycle } from '../FixtureLifecycle';
import { LoadScope, LoadSummary } from '../types';

/**
 * Load a fixture set, hand control to `use`, and tear the set down once
 * `use` settles. Fits runners whose fixtures are functions with a `use`
 * callback.
 *
 * @example
 * const test = base.extend<{ library: LoadSummary }>({
 *     library: async ({}, use) => fixtureScope(fixtures, ['library'], LoadScope.PerTest, use),
 * });
 */
export async function fixtureScope<T>(
    lifecycle: FixtureLifecycle,
    fixtureSet: readonly string[],
    scope: LoadScope,
    use: (summary: LoadSummary) => Promise<T> | T
): Promise<T> {
    const summary = lifecycle.setup(fixtureSet, scope);
    try {
        return await use(summary);
    } finally {
        lifecycle.teardown(scope);
    }
}

/** Synchronous variant of {@link fixtureScope} */
export function withFixtures<T>(
    lifecycle: FixtureLifecycle,
    fixtureSet: readonly string[],
    scope: LoadScope,
    use: (summary: LoadSummary) => T
): T {
    const summary = lifecycle.setup(fixtureSet, scope);
    try {
        return use(summary);
    } finally {
        lifecycle.teardown(scope);
    }
}
