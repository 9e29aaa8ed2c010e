/**
 * In-memory page source
 *
 * Stands in for FileSystemPageSource so rule and engine tests need no disk.
 */

import type { IPageSource } from '../../src/types/source.types.js';
import { SourceReadError } from '../../src/errors/index.js';

export class MemoryPageSource implements IPageSource {
    readonly root = '/virtual/docs';
    readonly reads: string[] = [];

    constructor(private readonly files: Record<string, string>) { }

    async list(): Promise<string[]> {
        return Object.keys(this.files).sort();
    }

    async read(path: string): Promise<string> {
        this.reads.push(path);
        const content = this.files[path];
        if (content === undefined) {
            throw new SourceReadError(`Cannot read ${path}`, { path });
        }
        return content;
    }
}
