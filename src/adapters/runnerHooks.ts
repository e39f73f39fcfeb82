import { FixtureLifecycle } from '../FixtureLifecycle';
import { LoadScope } from '../types';
import { FixtureDeclaration } from './declaration';

type Hook = (fn: () => void) => void;

/**
 * Suite hooks of an xUnit-style runner. Jest, Vitest and Mocha globals all fit.
 */
export interface RunnerHooks {
    beforeAll: Hook;
    beforeEach: Hook;
    afterEach: Hook;
    afterAll: Hook;
}

/**
 * Register setup and teardown for the enclosing suite: class fixtures around
 * the whole suite, test fixtures around each test.
 *
 * @example
 * describe('Book API', () => {
 *     registerFixtureHooks({ beforeAll, beforeEach, afterEach, afterAll }, fixtures, {
 *         classFixtures: ['authors'],
 *         fixtures: ['books'],
 *     });
 * });
 */
export function registerFixtureHooks(
    hooks: RunnerHooks,
    lifecycle: FixtureLifecycle,
    declaration: FixtureDeclaration
): void {
    const classFixtures = declaration.classFixtures ?? [];
    const fixtures = declaration.fixtures ?? [];

    // Each registration only tears down the frames its own setup opened
    if (classFixtures.length > 0) {
        let classLoaded = false;
        hooks.beforeAll(() => {
            lifecycle.setup(classFixtures, LoadScope.PerClass);
            classLoaded = true;
        });
        hooks.afterAll(() => {
            if (classLoaded) {
                classLoaded = false;
                lifecycle.teardown(LoadScope.PerClass);
            }
        });
    }

    if (fixtures.length > 0) {
        let testLoaded = false;
        hooks.beforeEach(() => {
            lifecycle.setup(fixtures, LoadScope.PerTest);
            testLoaded = true;
        });
        hooks.afterEach(() => {
            if (testLoaded) {
                testLoaded = false;
                lifecycle.teardown(LoadScope.PerTest);
            }
        });
    }
}
