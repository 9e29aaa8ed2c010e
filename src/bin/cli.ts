#!/usr/bin/env node

import 'dotenv/config';
import { Command, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG_FILE } from '../config/constants.js';
import {
    buildLinter,
    parseInteger,
    parseList,
    runCheck,
    type CheckOptions,
    type CommonOptions,
} from './commands.js';

/**
 * Version from the nearest package.json above this file (src/bin or dist/src/bin)
 */
function readVersion(): string {
    let dir = path.dirname(fileURLToPath(import.meta.url));
    for (let depth = 0; depth < 5; depth++) {
        const candidate = path.join(dir, 'package.json');
        if (fs.existsSync(candidate)) {
            const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
            if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                return pkg.version;
            }
        }
        dir = path.dirname(dir);
    }
    return '0.0.0';
}

function fail(error: unknown): never {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(2);
}

const program = new Command();

program
    .name('docsite-lint')
    .description('Check a localized documentation site: front matter, links, code samples and translations')
    .version(readVersion());

program
    .command('check')
    .description('Lint the documentation tree')
    .argument('[root]', 'Docs root directory (default: $DOCSITE_ROOT or ./docs)')
    .option('-c, --config <path>', `Config file (default: ./${DEFAULT_CONFIG_FILE} when present)`)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
    .option('-l, --lang <languages>', 'Only report pages in these languages (comma-separated)', parseList)
    .option('--max-warnings <n>', 'Fail when warnings exceed this number', parseInteger)
    .option('-q, --quiet', 'Report errors only')
    .action(async (root: string | undefined, options: CheckOptions) => {
        try {
            const result = await runCheck(root, options);

            process.stdout.write(result.output);
            if (result.tooManyWarnings && options.format === 'text') {
                console.error(
                    `Too many warnings (${result.report.counts.warning}); maximum allowed is ${options.maxWarnings}.`
                );
            }
            process.exitCode = result.exitCode;
        } catch (error) {
            fail(error);
        }
    });

program
    .command('pages')
    .description('List the pages found in the documentation tree')
    .argument('[root]', 'Docs root directory (default: $DOCSITE_ROOT or ./docs)')
    .option('-c, --config <path>', 'Config file')
    .action(async (root: string | undefined, options: CommonOptions) => {
        try {
            const linter = await buildLinter(root, options);
            const pages = await linter.listPages();

            for (const page of pages) {
                const { nav_order: navOrder, title } = page.frontMatter.data;
                console.log([
                    page.path.padEnd(48),
                    (page.language ?? '-').padEnd(4),
                    String(navOrder ?? '-').padStart(4),
                    typeof title === 'string' ? title : '',
                ].join('  '));
            }
            console.log(`\n${pages.length} page(s)`);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('rules')
    .description('List the rules and the severity each reports at')
    .option('-c, --config <path>', 'Config file')
    .action(async (options: CommonOptions) => {
        try {
            const linter = await buildLinter('.', options);
            for (const { rule, severity } of linter.listRules()) {
                console.log(`${rule.id.padEnd(36)}${severity.padEnd(9)}${rule.description}`);
            }
        } catch (error) {
            fail(error);
        }
    });

await program.parseAsync();
