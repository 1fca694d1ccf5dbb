/**
 * Bulk result import
 * Loads a newline-delimited JSON results file, or every file in a folder,
 * into PostgreSQL. Cached models are keyed by repository revision, so the
 * service refits on its next request.
 *
 * Usage: npm run import:matches -- <file.ndjson | folder>
 */

import { createDatabase } from '../services/predictor/src/database';
import { loadMatchSource } from '../services/predictor/src/ingest';
import { createPgMatchRepository } from '../services/predictor/src/repository';

const source = process.argv[2];
if (!source) {
    console.error('Usage: npm run import:matches -- <file.ndjson | folder>');
    process.exit(1);
}

const db = createDatabase();

console.log(`Reading ${source}...`);

try {
    const { matches, files, unreadable } = await loadMatchSource(source);

    for (const { file, reason } of unreadable) {
        console.warn(`skip file ${file}: ${reason}`);
    }

    let skippedLines = 0;
    for (const { file, matches: count, skipped } of files) {
        console.log(`${file}: ${count} matches, ${skipped.length} lines skipped`);
        for (const { line, reason } of skipped) {
            console.warn(`  skip line ${line}: ${reason}`);
        }
        skippedLines += skipped.length;
    }

    const repository = createPgMatchRepository({
        query: (text, values) => db.query(text, values),
    });
    await repository.ensureSchema();
    const stored = await repository.addMatches(matches);

    console.log(
        `Imported ${stored} matches from ${files.length} files ` +
        `(${unreadable.length} files and ${skippedLines} lines skipped).`
    );
} catch (e) {
    console.error('Import failed:', e);
    process.exitCode = 1;
} finally {
    await db.end();
}
