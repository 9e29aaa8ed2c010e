/**
 * Read-only access to a documentation tree
 *
 * Paths are POSIX-style and relative to `root`.
 */
export interface IPageSource {
    readonly root: string;
    /** List every file below the root, excluded directories skipped */
    list(): Promise<string[]>;
    /** Read a file as UTF-8 */
    read(path: string): Promise<string>;
}
