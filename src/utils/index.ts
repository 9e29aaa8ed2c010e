export { createLogger, generateCorrelationId } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashNormalized } from './hash.js';

export { DocsiteLintEventEmitter, createEventEmitter } from './events.js';
export type { DocsiteLintEvents } from './events.js';

export {
    toPosix,
    stripQueryAndFragment,
    normalizeSitePath,
    posixDirname,
    stripExtension,
    extensionOf,
    safeDecode,
} from './paths.js';
