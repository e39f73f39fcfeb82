import { FixtureFileResolver } from './FixtureFileResolver';
import { FixtureParser } from './FixtureParser';
import { MaterializeContext, RecordMaterializer } from './RecordMaterializer';
import { FixtureLogger, LoadSummary } from './types';

export interface FixtureLoaderOptions {
    resolver?: FixtureFileResolver;
    parser?: FixtureParser;
    materializer?: RecordMaterializer;
    logger?: FixtureLogger;
}

/**
 * Resolves, parses and materializes fixtures in the order they are named.
 * Opens no transaction of its own; callers own the boundary.
 */
export class FixtureLoader {
    private readonly resolver: FixtureFileResolver;
    private readonly parser: FixtureParser;
    private readonly materializer: RecordMaterializer;
    private readonly logger: FixtureLogger;

    constructor(options: FixtureLoaderOptions = {}) {
        this.resolver = options.resolver ?? new FixtureFileResolver();
        this.parser = options.parser ?? new FixtureParser();
        this.materializer = options.materializer ?? new RecordMaterializer();
        this.logger = options.logger ?? console;
    }

    load(
        fixtures: readonly string[],
        searchDirs: readonly string[],
        context: MaterializeContext,
        touched: Set<string> = new Set()
    ): LoadSummary {
        const summary: LoadSummary = { fixtures: [...fixtures], files: [], rows: 0, tables: [] };

        for (const fixture of fixtures) {
            const filePath = this.resolver.resolve(fixture, searchDirs);
            const file = this.parser.parse(filePath);
            const rows = this.materializer.materializeFile(file, context, touched);

            this.logger.debug(`Loaded fixture ${file.name}: ${rows} row(s) in ${file.groups.length} group(s)`);
            summary.files.push(filePath);
            summary.rows += rows;
        }

        summary.tables = Array.from(touched);
        return summary;
    }
}
