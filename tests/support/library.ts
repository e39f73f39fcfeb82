import Database from 'better-sqlite3';
import { z } from 'zod';
import { FixtureRecord, ModelType, SqliteFixtureDatabase } from '../../src';

export const LIBRARY_SCHEMA = `
  CREATE TABLE author (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    country TEXT NOT NULL DEFAULT 'unknown'
  );
  CREATE TABLE book (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    author_id INTEGER NOT NULL REFERENCES author(id),
    status TEXT NOT NULL,
    published INTEGER NOT NULL
  );
  CREATE TABLE reader (
    id INTEGER PRIMARY KEY,
    email TEXT NOT NULL,
    active INTEGER NOT NULL
  );
`;

export const LIBRARY_TABLES = ['author', 'book', 'reader'] as const;

export function createLibraryConnection(): Database.Database {
    const connection = new Database(':memory:');
    connection.pragma('foreign_keys = ON');
    connection.exec(LIBRARY_SCHEMA);
    return connection;
}

export function rowCounts(connection: Database.Database): { [table: string]: number } {
    const database = new SqliteFixtureDatabase(connection);
    const counts: { [table: string]: number } = {};
    for (const table of LIBRARY_TABLES) {
        counts[table] = database.countRows(table);
    }
    return counts;
}

export interface Author {
    id?: number;
    name: string;
    country: string;
}

export const AuthorModel: ModelType<Author> = {
    typeName: 'library.models.Author',
    tableName: 'author',
    create(attributes) {
        return {
            id: typeof attributes.id === 'number' ? attributes.id : undefined,
            name: String(attributes.name),
            country: typeof attributes.country === 'string' ? attributes.country : 'n/a',
        };
    },
    toRow(author) {
        const row: FixtureRecord = { name: author.name, country: author.country };
        if (author.id !== undefined) {
            row.id = author.id;
        }
        return row;
    },
    afterInsert(author, rowId) {
        author.id = Number(rowId);
    },
};

export interface Book {
    id?: number;
    title: string;
    author_id: number;
    status: string;
    published: boolean;
}

export const BookModel: ModelType<Book> = {
    typeName: 'library.models.Book',
    tableName: 'book',
    create(attributes) {
        return {
            title: String(attributes.title),
            author_id: Number(attributes.author_id),
            status: typeof attributes.status === 'string' ? attributes.status : 'draft',
            published: attributes.published === true,
        };
    },
    toRow(book) {
        return {
            title: book.title,
            author_id: book.author_id,
            status: book.status,
            published: book.published,
        };
    },
    afterInsert(book, rowId) {
        book.id = Number(rowId);
    },
};

const BookWithAuthorSchema = z.object({
    title: z.string(),
    status: z.string(),
    published: z.number(),
    author_id: z.number(),
    author_name: z.string(),
});

export type BookWithAuthor = z.infer<typeof BookWithAuthorSchema>;

/** Each book joined to the author its `author_id` points at */
export function booksWithAuthors(connection: Database.Database): BookWithAuthor[] {
    const rows: unknown = connection
        .prepare(
            `SELECT book.title, book.status, book.published, author.id AS author_id, author.name AS author_name
       FROM book JOIN author ON author.id = book.author_id
       ORDER BY book.id`
        )
        .all();
    return z.array(BookWithAuthorSchema).parse(rows);
}

export function authorCountries(connection: Database.Database): { [id: number]: string } {
    const rows: unknown = connection.prepare('SELECT id, country FROM author').all();
    const countries: { [id: number]: string } = {};
    for (const row of z.array(z.object({ id: z.number(), country: z.string() })).parse(rows)) {
        countries[row.id] = row.country;
    }
    return countries;
}

export function readerFlags(connection: Database.Database): number[] {
    const flags: unknown = connection.prepare('SELECT active FROM reader ORDER BY id').pluck().all();
    return z.array(z.number()).parse(flags);
}
