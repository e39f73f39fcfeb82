import { FixtureConfigError } from '../errors';

/**
 * Fixtures a test unit asks for: `fixtures` load around every test,
 * `classFixtures` once for the whole class or suite.
 */
export interface FixtureDeclaration {
    fixtures?: readonly string[];
    classFixtures?: readonly string[];
}

function fixtureNames(value: unknown, label: string): string[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new FixtureConfigError(`'${label}' must be a list of fixture names`);
    }
    const names = value.filter((item): item is string => typeof item === 'string');
    if (names.length !== value.length) {
        throw new FixtureConfigError(`'${label}' must only contain fixture names`);
    }
    return names;
}

/**
 * Read the declaration off a discovered test unit: a class (static fields),
 * an instance, or a plain object. `class_fixtures` is accepted as an alias.
 */
export function declarationOf(unit: object): Required<FixtureDeclaration> {
    const fixtures = 'fixtures' in unit ? unit.fixtures : undefined;
    let classFixtures: unknown;
    let label = 'classFixtures';
    if ('classFixtures' in unit) {
        classFixtures = unit.classFixtures;
    } else if ('class_fixtures' in unit) {
        classFixtures = unit.class_fixtures;
        label = 'class_fixtures';
    }

    return {
        fixtures: fixtureNames(fixtures, 'fixtures'),
        classFixtures: fixtureNames(classFixtures, label),
    };
}
