import { EventEmitter } from 'events';
import type { LintReport } from '../types/diagnostic.types.js';
import type { DocPage } from '../types/page.types.js';
import type { RuleIdEnumType } from '../types/enums.js';

/**
 * Event types emitted by docsite-lint
 */
export interface DocsiteLintEvents {
    'lint:start': { root: string; correlationId: string };
    'page:loaded': { page: DocPage };
    'rule:complete': { ruleId: RuleIdEnumType; findings: number; durationMs: number };
    'lint:complete': LintReport;
    'lint:error': { root: string; error: Error };
}

/**
 * Type-safe event emitter for docsite-lint
 */
export class DocsiteLintEventEmitter extends EventEmitter {
    override emit<K extends keyof DocsiteLintEvents>(
        event: K,
        data: DocsiteLintEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    override on<K extends keyof DocsiteLintEvents>(
        event: K,
        listener: (data: DocsiteLintEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    override once<K extends keyof DocsiteLintEvents>(
        event: K,
        listener: (data: DocsiteLintEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    override off<K extends keyof DocsiteLintEvents>(
        event: K,
        listener: (data: DocsiteLintEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): DocsiteLintEventEmitter {
    return new DocsiteLintEventEmitter();
}
