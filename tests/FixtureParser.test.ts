import { FixtureFormatError, FixtureParser } from '../src';
import { createTempDir, removeDir, writeFixture } from './setup';

describe('FixtureParser', () => {
    let parser: FixtureParser;
    let testFixturesDir: string;

    beforeEach(() => {
        parser = new FixtureParser();
        testFixturesDir = createTempDir();
    });

    afterEach(() => {
        removeDir(testFixturesDir);
    });

    function formatErrorFor(name: string, content: string): FixtureFormatError {
        const filePath = writeFixture(testFixturesDir, name, content);
        try {
            parser.parse(filePath);
        } catch (error) {
            if (error instanceof FixtureFormatError) {
                return error;
            }
            throw error;
        }
        throw new Error(`Expected ${name} to be rejected`);
    }

    describe('parse', () => {
        it('should parse a YAML file into record groups in file order', () => {
            const filePath = writeFixture(testFixturesDir, 'library.yaml', `
- table: author
  records:
    - id: 1
      name: Ursula Example
- model: library.models.Book
  records:
    - title: First Book
      author_id: 1
    - title: Second Book
      author_id: 1
      published: true
            `);

            const file = parser.parse(filePath);

            expect(file.name).toBe('library.yaml');
            expect(file.path).toBe(filePath);
            expect(file.groups).toEqual([
                {
                    target: { kind: 'table', name: 'author' },
                    records: [{ id: 1, name: 'Ursula Example' }],
                },
                {
                    target: { kind: 'model', typeName: 'library.models.Book' },
                    records: [
                        { title: 'First Book', author_id: 1 },
                        { title: 'Second Book', author_id: 1, published: true },
                    ],
                },
            ]);
        });

        it('should decode JSON and YAML into the same groups', () => {
            const jsonPath = writeFixture(testFixturesDir, 'readers.json', JSON.stringify([
                { table: 'reader', records: [{ id: 1, email: 'first@example.com', active: true, note: null }] },
            ]));
            const yamlPath = writeFixture(testFixturesDir, 'readers.yml', `
- table: reader
  records:
    - { id: 1, email: first@example.com, active: true, note: null }
            `);

            expect(parser.parse(yamlPath).groups).toEqual(parser.parse(jsonPath).groups);
        });

        it('should keep YAML dates as strings', () => {
            const filePath = writeFixture(testFixturesDir, 'dates.yaml', `
- table: event
  records:
    - happened_on: 2020-01-31
            `);

            expect(parser.parse(filePath).groups[0].records).toEqual([{ happened_on: '2020-01-31' }]);
        });

        it('should accept a group with no records', () => {
            const filePath = writeFixture(testFixturesDir, 'empty-group.json', '[{ "table": "author", "records": [] }]');

            expect(parser.parse(filePath).groups).toEqual([{ target: { kind: 'table', name: 'author' }, records: [] }]);
        });

        it('should let model records have different fields', () => {
            const filePath = writeFixture(testFixturesDir, 'mixed.json', JSON.stringify([
                { model: 'library.models.Book', records: [{ title: 'A' }, { title: 'B', status: 'published' }] },
            ]));

            expect(parser.parse(filePath).groups[0].records).toEqual([{ title: 'A' }, { title: 'B', status: 'published' }]);
        });
    });

    describe('format errors', () => {
        it('should reject a group with both table and model', () => {
            const error = formatErrorFor('both.yaml', `
- table: author
  model: library.models.Author
  records: []
            `);

            expect(error.fixture).toBe('both.yaml');
            expect(error.problems).toEqual(["[0]: 'table' and 'model' cannot both be set"]);
            expect(error.message).toBe("Invalid fixture file both.yaml: [0]: 'table' and 'model' cannot both be set");
        });

        it('should reject a group with neither table nor model', () => {
            const error = formatErrorFor('neither.json', '[{ "table": "author", "records": [] }, { "records": [] }]');

            expect(error.problems).toEqual(["[1]: one of 'table' or 'model' is required"]);
        });

        it('should reject records that are not a sequence', () => {
            const error = formatErrorFor('records.yaml', `
- table: author
  records: nope
            `);

            expect(error.problems).toEqual(['[0].records: Expected array, received string']);
        });

        it('should reject a top level that is not a sequence', () => {
            const error = formatErrorFor('mapping.yaml', `
table: author
records: []
            `);

            expect(error.problems).toEqual(['(root): Expected array, received object']);
        });

        it('should reject unknown group keys', () => {
            const error = formatErrorFor('extra.yaml', `
- table: author
  rows: []
  records: []
            `);

            expect(error.problems).toEqual(["[0]: Unrecognized key(s) in object: 'rows'"]);
        });

        it('should reject nested record values', () => {
            const error = formatErrorFor('nested.json', JSON.stringify([
                { table: 'author', records: [{ id: 1, tags: ['a', 'b'] }] },
            ]));

            expect(error.problems).toHaveLength(1);
            expect(error.problems[0]).toMatch(/^\[0\]\.records\[0\]\.tags: /);
        });

        it('should reject an empty file', () => {
            const error = formatErrorFor('empty.yaml', '');

            expect(error.problems).toEqual(['file is empty, expected a list of record groups']);
        });

        it('should report YAML syntax errors', () => {
            const error = formatErrorFor('broken.yaml', '- table: author\n  records: [\n');

            expect(error.message).toMatch(/^Invalid fixture file broken\.yaml: could not be decoded: /);
        });

        it('should report JSON syntax errors', () => {
            const error = formatErrorFor('broken.json', '[{ "table": ');

            expect(error.message).toMatch(/^Invalid fixture file broken\.json: could not be decoded: /);
        });

        it('should reject unsupported extensions', () => {
            const error = formatErrorFor('authors.csv', 'id,name');

            expect(error.problems).toEqual(["unsupported file extension '.csv'"]);
        });
    });
});
