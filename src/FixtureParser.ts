import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { FixtureFormatError } from './errors';
import { FixtureFile, RecordGroup } from './types';

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const RecordSchema = z.record(z.string().min(1), ScalarSchema);

/**
 * One record group. Exactly one of `table` or `model` names the target.
 */
const RecordGroupSchema = z
    .object({
        table: z.string().min(1).optional(),
        model: z.string().min(1).optional(),
        records: z.array(RecordSchema),
    })
    .strict()
    .transform((raw, ctx): RecordGroup => {
        if (raw.table !== undefined && raw.model === undefined) {
            return { target: { kind: 'table', name: raw.table }, records: raw.records };
        }
        if (raw.model !== undefined && raw.table === undefined) {
            return { target: { kind: 'model', typeName: raw.model }, records: raw.records };
        }
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: raw.table === undefined
                ? "one of 'table' or 'model' is required"
                : "'table' and 'model' cannot both be set",
        });
        return z.NEVER;
    });

export const FixtureFileSchema = z.array(RecordGroupSchema);

type Decoder = (content: string, filePath: string) => unknown;

const decoders: { [extension: string]: Decoder } = {
    '.json': content => JSON.parse(content),
    // The core schema keeps YAML scalars to the JSON types: no timestamps or binaries.
    '.yaml': (content, filePath) => yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath }),
    '.yml': (content, filePath) => yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath }),
};

export class FixtureParser {
    /**
     * Read a fixture file and return its record groups in file order.
     */
    parse(filePath: string): FixtureFile {
        const name = path.basename(filePath);
        const decoder = decoders[path.extname(filePath).toLowerCase()];

        if (!decoder) {
            throw new FixtureFormatError(name, `unsupported file extension '${path.extname(filePath)}'`);
        }

        const content = fs.readFileSync(filePath, 'utf8');
        let decoded: unknown;
        try {
            decoded = decoder(content, filePath);
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            throw new FixtureFormatError(name, `could not be decoded: ${errorMessage}`);
        }

        return { name, path: filePath, groups: this.validate(name, decoded) };
    }

    validate(name: string, decoded: unknown): RecordGroup[] {
        if (decoded === undefined || decoded === null) {
            throw new FixtureFormatError(name, 'file is empty, expected a list of record groups');
        }

        const result = FixtureFileSchema.safeParse(decoded);
        if (!result.success) {
            throw new FixtureFormatError(
                name,
                result.error.issues.map(issue => `${formatPath(issue.path)}: ${issue.message}`)
            );
        }
        return result.data;
    }
}

function formatPath(segments: ReadonlyArray<string | number>): string {
    if (segments.length === 0) {
        return '(root)';
    }
    return segments
        .map((segment, index) => {
            if (typeof segment === 'number') {
                return `[${segment}]`;
            }
            return index === 0 ? segment : `.${segment}`;
        })
        .join('');
}
