/**
 * 03 - Error Handling
 *
 * Lint failures are DocsiteLintError subclasses carrying a code, details and
 * the run's correlation ID. Findings in the docs are never thrown: they are
 * diagnostics in the report.
 *
 * Run: npx tsx examples/03-error-handling.ts
 */

import {
    createDocsiteLinter,
    ConfigurationError,
    DocsiteLintError,
    NotFoundError,
    ValidationError,
} from '../src/index.js';

async function main() {
    // 1. Invalid options fail at construction
    try {
        createDocsiteLinter({ root: 'docs', languages: ['en'], defaultLanguage: 'tr' });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.log(`Configuration: ${error.message}`);
        }
    }

    const linter = createDocsiteLinter({ root: './does-not-exist' });

    linter.on('lint:error', ({ error }) => {
        console.log(`lint:error event: ${error.message}`);
    });

    // 2. A missing root surfaces as NotFoundError
    try {
        await linter.lint();
    } catch (error) {
        if (error instanceof NotFoundError) {
            console.log(`Not found: ${error.resourceType} (${error.resourceId})`);
        }
    }

    // 3. Unknown languages are rejected before anything is read
    try {
        await linter.lint({ languages: ['xx'] });
    } catch (error) {
        if (error instanceof ValidationError) {
            console.log(`Validation: ${error.message} [field: ${error.field ?? '-'}]`);
        } else if (error instanceof DocsiteLintError) {
            console.log(JSON.stringify(error.toJSON(), null, 2));
        }
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
