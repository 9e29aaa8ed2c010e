/**
 * 01 - Basic Usage
 *
 * Lint a documentation tree and print the text report:
 * 1. Create a linter with createDocsiteLinter()
 * 2. Run lint()
 * 3. Render the report
 *
 * Run: npx tsx examples/01-basic-usage.ts ./docs
 */

import { createDocsiteLinter, formatText } from '../src/index.js';

async function main() {
    const root = process.argv[2] ?? 'docs';

    const linter = createDocsiteLinter({
        root,
        // Only the languages this site actually ships
        languages: ['en', 'tr'],
        rules: {
            'front-matter/unknown-key': 'off',
        },
    });

    linter.on('rule:complete', ({ ruleId, findings, durationMs }) => {
        if (findings > 0) {
            console.log(`   ${ruleId}: ${findings} finding(s) in ${durationMs}ms`);
        }
    });

    const report = await linter.lint();

    console.log();
    process.stdout.write(formatText(report));
    process.exitCode = report.counts.error > 0 ? 1 : 0;
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
