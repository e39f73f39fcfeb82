import { LifecycleError } from './errors';
import { FixtureLoader } from './FixtureLoader';
import { MaterializeContext } from './RecordMaterializer';
import { FixtureLogger, LoadScope, LoadSummary } from './types';

export type LifecycleState = 'idle' | 'loading' | 'loaded' | 'tearing-down';

/**
 * Everything one fixture lifecycle operates on. Owned by the test harness
 * and handed to the lifecycle when the engine is bound; one per process or worker.
 */
export interface FixtureContext extends MaterializeContext {
    searchDirs: readonly string[];
    logger: FixtureLogger;
}

type Boundary =
    | { kind: 'transaction' }
    | { kind: 'savepoint'; name: string }
    | { kind: 'none' };

interface ScopeFrame {
    scope: LoadScope;
    boundary: Boundary;
    touched: Set<string>;
    summary: LoadSummary;
    /** Outstanding setups of the same class fixture set sharing this frame */
    users: number;
}

function sameFixtures(left: readonly string[], right: readonly string[]): boolean {
    return left.length === right.length && left.every((name, index) => name === right[index]);
}

/**
 * Loads fixture sets inside a transaction boundary and rolls them back at the
 * matching teardown.
 *
 * The outermost class scope holds the transaction. Nested class scopes and
 * per-test fixtures get a savepoint inside the innermost class scope, so
 * rolling one back leaves the enclosing class data in place. Without
 * transaction support the tables a scope wrote to are truncated instead.
 */
export class FixtureLifecycle {
    private readonly context: FixtureContext;
    private readonly loader: FixtureLoader;
    private currentState: LifecycleState = 'idle';
    private readonly classFrames: ScopeFrame[] = [];
    private testFrame?: ScopeFrame;
    private savepoints = 0;

    constructor(context: FixtureContext, loader?: FixtureLoader) {
        this.context = context;
        this.loader = loader ?? new FixtureLoader({ logger: context.logger });
    }

    get state(): LifecycleState {
        return this.currentState;
    }

    /** Scope of the innermost loaded frame */
    get activeScope(): LoadScope | undefined {
        return (this.testFrame ?? this.innermostClassFrame)?.scope;
    }

    /** Number of nested class scopes currently loaded */
    get classDepth(): number {
        return this.classFrames.length;
    }

    isLoaded(scope: LoadScope): boolean {
        return scope === LoadScope.PerTest ? this.testFrame !== undefined : this.classFrames.length > 0;
    }

    /**
     * Load a fixture set for a scope. Every successful call must be paired
     * with one `teardown` of the same scope.
     */
    setup(fixtureSet: readonly string[], scope: LoadScope): LoadSummary {
        this.assertSettled('setup');

        if (scope === LoadScope.PerClass) {
            if (this.testFrame) {
                throw new LifecycleError('Cannot load class fixtures while per-test fixtures are loaded');
            }
            const current = this.innermostClassFrame;
            if (current && sameFixtures(current.summary.fixtures, fixtureSet)) {
                // Same class set again: its data stays as it is
                current.users++;
                return current.summary;
            }
        } else if (this.testFrame) {
            throw new LifecycleError('Per-test fixtures are already loaded; tear them down first');
        }

        const previous = this.currentState;
        this.currentState = 'loading';

        let boundary: Boundary;
        try {
            boundary = this.openBoundary(scope);
        } catch (error) {
            this.currentState = previous;
            throw error;
        }

        const touched = new Set<string>();
        try {
            const summary = this.loader.load(fixtureSet, this.context.searchDirs, this.context, touched);
            const frame: ScopeFrame = { scope, boundary, touched, summary, users: 1 };
            if (scope === LoadScope.PerClass) {
                this.classFrames.push(frame);
            } else {
                this.testFrame = frame;
            }
            this.currentState = 'loaded';
            this.context.logger.info(
                `Loaded ${summary.rows} row(s) from ${summary.files.length} fixture file(s) for ${scope} scope`
            );
            return summary;
        } catch (error) {
            this.abort(boundary, touched, error);
            this.currentState = previous;
            throw error;
        }
    }

    /**
     * Tear down the innermost frame of a scope. A class frame shared by
     * repeated setups of the same set is only rolled back by its last teardown.
     */
    teardown(scope: LoadScope): void {
        this.assertSettled('teardown');

        const frame = scope === LoadScope.PerTest ? this.testFrame : this.innermostClassFrame;
        if (!frame) {
            throw new LifecycleError(`teardown('${scope}') called but no ${scope} fixtures are loaded`);
        }
        if (scope === LoadScope.PerClass && this.testFrame) {
            throw new LifecycleError('Per-test fixtures must be torn down before class fixtures');
        }

        if (frame.users > 1) {
            frame.users--;
            return;
        }

        this.currentState = 'tearing-down';
        try {
            this.context.session.discard();
            this.rollback(frame);
            this.context.logger.debug(`Rolled back ${scope} fixtures (${frame.summary.rows} row(s))`);
        } finally {
            if (scope === LoadScope.PerTest) {
                this.testFrame = undefined;
            } else {
                this.classFrames.pop();
            }
            this.currentState = this.classFrames.length > 0 ? 'loaded' : 'idle';
        }
    }

    /**
     * Roll back every loaded scope, innermost first. The first rollback
     * error is rethrown once every frame has been released.
     */
    reset(): void {
        this.assertSettled('reset');

        const failures: unknown[] = [];
        const release = (scope: LoadScope) => {
            try {
                this.teardown(scope);
            } catch (error) {
                failures.push(error);
            }
        };

        if (this.testFrame) {
            this.testFrame.users = 1;
            release(LoadScope.PerTest);
        }
        let frame = this.innermostClassFrame;
        while (frame) {
            frame.users = 1;
            release(LoadScope.PerClass);
            frame = this.innermostClassFrame;
        }

        if (failures.length > 0) {
            throw failures[0];
        }
    }

    private get innermostClassFrame(): ScopeFrame | undefined {
        return this.classFrames[this.classFrames.length - 1];
    }

    private assertSettled(operation: string): void {
        if (this.currentState === 'loading' || this.currentState === 'tearing-down') {
            throw new LifecycleError(`Cannot ${operation} while fixtures are ${this.currentState}`);
        }
    }

    private openBoundary(scope: LoadScope): Boundary {
        const { database, logger } = this.context;
        if (!database.supportsTransactions) {
            return { kind: 'none' };
        }

        if (this.classFrames.length > 0) {
            const name = `fixtures_${++this.savepoints}`;
            database.savepoint(name);
            logger.debug(`Opened savepoint ${name} for ${scope} fixtures`);
            return { kind: 'savepoint', name };
        }

        database.begin();
        logger.debug(`Opened transaction for ${scope} fixtures`);
        return { kind: 'transaction' };
    }

    private rollback(frame: Pick<ScopeFrame, 'boundary' | 'touched'>): void {
        const { database } = this.context;
        const { boundary } = frame;

        switch (boundary.kind) {
            case 'transaction':
                database.rollback();
                break;
            case 'savepoint':
                database.rollbackToSavepoint(boundary.name);
                database.releaseSavepoint(boundary.name);
                break;
            case 'none':
                database.truncate(Array.from(frame.touched).reverse());
                break;
        }
    }

    private abort(boundary: Boundary, touched: Set<string>, cause: unknown): void {
        this.context.session.discard();
        try {
            this.rollback({ boundary, touched });
        } catch (rollbackError) {
            // The load error is the one the test should fail with
            this.context.logger.warn('Failed to roll back partially loaded fixtures', rollbackError, cause);
        }
    }
}
