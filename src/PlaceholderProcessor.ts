import { Faker, en } from '@faker-js/faker';
import { FixtureFormatError } from './errors';
import { FixtureRecord, ScalarValue } from './types';

type Generator = (faker: Faker) => ScalarValue;

const generators: { [type: string]: Generator } = {
    // Person data
    email: f => f.internet.email(),
    firstName: f => f.person.firstName(),
    lastName: f => f.person.lastName(),
    fullName: f => f.person.fullName(),
    username: f => f.internet.username(),
    password: f => f.internet.password(),
    jobTitle: f => f.person.jobTitle(),

    // Company and address data
    company: f => f.company.name(),
    street: f => f.location.streetAddress(),
    city: f => f.location.city(),
    zipCode: f => f.location.zipCode(),
    country: f => f.location.country(),
    state: f => f.location.state(),
    phone: f => f.phone.number(),
    url: f => f.internet.url(),

    // IDs and unique values
    uuid: f => f.string.uuid(),
    alphanumeric: f => f.string.alphanumeric(10),
    slug: f => f.helpers.slugify(f.lorem.words(3)),

    // Numbers and booleans
    number: f => f.number.int({ min: 1, max: 1000 }),
    float: f => f.number.float({ min: 0, max: 100, fractionDigits: 2 }),
    price: f => f.commerce.price(),
    boolean: f => f.datatype.boolean(),

    // Dates, as ISO strings
    date: f => f.date.recent().toISOString(),
    pastDate: f => f.date.past().toISOString(),
    futureDate: f => f.date.future().toISOString(),
    birthdate: f => f.date.birthdate().toISOString(),

    // Text content
    word: f => f.lorem.word(),
    words: f => f.lorem.words(),
    sentence: f => f.lorem.sentence(),
    paragraph: f => f.lorem.paragraph(),
    product: f => f.commerce.productName(),
    department: f => f.commerce.department(),
    iban: f => f.finance.iban(),
};

const aliases: { [alias: string]: string } = {
    'internet.email': 'email',
    'person.firstName': 'firstName',
    'person.lastName': 'lastName',
    'person.fullName': 'fullName',
    'internet.username': 'username',
    'internet.password': 'password',
    'person.jobTitle': 'jobTitle',
    job_title: 'jobTitle',
    'company.name': 'company',
    address: 'street',
    'location.streetAddress': 'street',
    'location.city': 'city',
    zipcode: 'zipCode',
    'location.zipCode': 'zipCode',
    'location.country': 'country',
    'location.state': 'state',
    'phone.number': 'phone',
    'internet.url': 'url',
    'string.uuid': 'uuid',
    'string.alphanumeric': 'alphanumeric',
    'number.int': 'number',
    'number.float': 'float',
    'datatype.boolean': 'boolean',
    'date.recent': 'date',
    'date.past': 'pastDate',
    date_past: 'pastDate',
    'date.future': 'futureDate',
    date_future: 'futureDate',
    'date.birthdate': 'birthdate',
    'lorem.word': 'word',
    'lorem.words': 'words',
    'lorem.sentence': 'sentence',
    'lorem.paragraph': 'paragraph',
    'commerce.productName': 'product',
    'commerce.department': 'department',
    'finance.iban': 'iban',
};

const SINGLE_PLACEHOLDER = /^\{([^{}]+)\}$/;
const ANY_PLACEHOLDER = /\{([^{}]+)\}/g;

export interface PlaceholderOptions {
    /** Seed for generated values; unseeded output differs between runs */
    seed?: number;
    env?: NodeJS.ProcessEnv;
}

/**
 * Expands `{faker.<type>}` and `{env.<NAME>}` placeholders in string record values.
 */
export class PlaceholderProcessor {
    private readonly faker: Faker;
    private readonly env: NodeJS.ProcessEnv;

    constructor(options: PlaceholderOptions = {}) {
        this.faker = new Faker({ locale: [en] });
        if (options.seed !== undefined) {
            this.faker.seed(options.seed);
        }
        this.env = options.env ?? process.env;
    }

    processRecord(record: FixtureRecord, fixture: string): FixtureRecord {
        const processed: FixtureRecord = {};
        for (const [key, value] of Object.entries(record)) {
            processed[key] = typeof value === 'string' ? this.processValue(value, fixture) : value;
        }
        return processed;
    }

    processValue(value: string, fixture: string): ScalarValue {
        if (!value.includes('{')) {
            return value;
        }

        // A value that is exactly one placeholder keeps the generated type
        const single = value.match(SINGLE_PLACEHOLDER);
        if (single) {
            const resolved = this.resolvePlaceholder(single[1], value, fixture);
            return resolved === undefined ? value : resolved;
        }

        return value.replace(ANY_PLACEHOLDER, (match: string, placeholder: string) => {
            const resolved = this.resolvePlaceholder(placeholder, value, fixture);
            return resolved === undefined ? match : String(resolved);
        });
    }

    private resolvePlaceholder(placeholder: string, value: string, fixture: string): ScalarValue | undefined {
        const separator = placeholder.search(/[:.]/);
        if (separator < 0) {
            return undefined;
        }
        const source = placeholder.slice(0, separator);
        const type = placeholder.slice(separator + 1);

        if (source === 'faker' || source === 'fake') {
            const key = Object.hasOwn(aliases, type) ? aliases[type] : type;
            if (!Object.hasOwn(generators, key)) {
                throw new FixtureFormatError(fixture, `unknown faker type '${type}' in '${value}'`);
            }
            return generators[key](this.faker);
        }

        if (source === 'env') {
            return this.env[type] ?? '';
        }

        return undefined;
    }
}
