import * as fs from 'fs';
import * as path from 'path';
import { FixtureNotFoundError } from './errors';

export const FIXTURE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

export class FixtureFileResolver {
    private readonly extensions: readonly string[];

    constructor(extensions: readonly string[] = FIXTURE_EXTENSIONS) {
        this.extensions = extensions;
    }

    /**
     * Find the file for a fixture name. Every extension is tried in a directory
     * before moving on to the next one; the first existing file wins.
     */
    resolve(name: string, searchDirs: readonly string[]): string {
        const candidates = this.candidateNames(name);

        for (const directory of searchDirs) {
            for (const candidate of candidates) {
                const filePath = path.resolve(directory, candidate);
                if (this.isFile(filePath)) {
                    return filePath;
                }
            }
        }

        throw new FixtureNotFoundError(name, searchDirs);
    }

    private candidateNames(name: string): string[] {
        const ext = path.extname(name).toLowerCase();
        if (this.extensions.includes(ext)) {
            return [name];
        }
        return this.extensions.map(extension => `${name}${extension}`);
    }

    private isFile(filePath: string): boolean {
        return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
    }
}
