import * as fs from 'fs/promises';
import * as path from 'path';
import type { IPageSource } from '../types/source.types.js';
import { NotFoundError, SourceReadError } from '../errors/index.js';
import { toPosix } from '../utils/paths.js';
import { DEFAULT_EXCLUDE } from '../types/config.types.js';

/**
 * Page source backed by a directory on disk.
 * Generator output and dependency directories are always skipped;
 * `exclude` adds to them.
 */
export class FileSystemPageSource implements IPageSource {
    readonly root: string;
    private readonly exclude: Set<string>;

    constructor(root: string, exclude: readonly string[] = []) {
        this.root = path.resolve(root);
        this.exclude = new Set([...DEFAULT_EXCLUDE, ...exclude]);
    }

    async list(): Promise<string[]> {
        const stat = await fs.stat(this.root).catch(() => undefined);
        if (!stat) {
            throw new NotFoundError('Docs root', this.root);
        }
        if (!stat.isDirectory()) {
            throw new NotFoundError('Docs root directory', this.root);
        }

        const files: string[] = [];
        await this.walk(this.root, files);
        return files.sort();
    }

    async read(relativePath: string): Promise<string> {
        const fullPath = path.join(this.root, relativePath);
        try {
            return await fs.readFile(fullPath, 'utf-8');
        } catch (error) {
            throw new SourceReadError(`Cannot read ${relativePath}`, { path: relativePath }, {
                cause: error instanceof Error ? error : undefined,
                operation: 'read',
            });
        }
    }

    private async walk(dir: string, files: string[]): Promise<void> {
        const entries = await fs.readdir(dir, { withFileTypes: true });

        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);

            if (entry.isDirectory()) {
                // Hidden directories and configured excludes
                if (entry.name.startsWith('.') || this.exclude.has(entry.name)) continue;
                await this.walk(fullPath, files);
            } else if (entry.isFile()) {
                files.push(toPosix(path.relative(this.root, fullPath)));
            }
        }
    }
}
