import { FixtureLifecycle } from '../FixtureLifecycle';
import { LoadScope } from '../types';
import { declarationOf } from './declaration';

/**
 * Plugin for runners that discover test units and report each context
 * (class or module) and test as it starts and stops.
 */
export class FixtureCollectorPlugin {
    private readonly lifecycle: FixtureLifecycle;
    /** Contexts and tests whose fixtures this plugin loaded */
    private readonly opened = new WeakSet<object>();

    constructor(lifecycle: FixtureLifecycle) {
        this.lifecycle = lifecycle;
    }

    startContext(unit: object): void {
        const { classFixtures } = declarationOf(unit);
        if (classFixtures.length > 0) {
            this.lifecycle.setup(classFixtures, LoadScope.PerClass);
            this.opened.add(unit);
        }
    }

    stopContext(unit: object): void {
        if (this.opened.delete(unit)) {
            this.lifecycle.teardown(LoadScope.PerClass);
        }
    }

    startTest(test: object): void {
        const { fixtures } = declarationOf(test);
        if (fixtures.length > 0) {
            this.lifecycle.setup(fixtures, LoadScope.PerTest);
            this.opened.add(test);
        }
    }

    stopTest(test: object): void {
        if (this.opened.delete(test)) {
            this.lifecycle.teardown(LoadScope.PerTest);
        }
    }
}
