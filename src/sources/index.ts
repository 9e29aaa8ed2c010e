export { FileSystemPageSource } from './file-system.source.js';
export type { IPageSource } from '../types/source.types.js';
