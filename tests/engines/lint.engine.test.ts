import { describe, it, expect, vi } from 'vitest';
import { LintEngine, compareDiagnostics } from '../../src/engines/lint.engine.js';
import { RuleRegistry } from '../../src/rules/rule-registry.js';
import { createDefaultValidatorRegistry } from '../../src/validators/validator-registry.js';
import { createEventEmitter } from '../../src/utils/events.js';
import { RuleExecutionError } from '../../src/errors/index.js';
import type { LintRule } from '../../src/types/rule.types.js';
import type { RuleFinding } from '../../src/types/diagnostic.types.js';
import type { RuleIdEnumType, SeverityEnumType } from '../../src/types/enums.js';
import type { DocsiteLintConfig } from '../../src/types/config.types.js';
import { createMockLogger, createMockResolvedConfig, loadTestSite } from '../mocks/index.js';

class StubRule implements LintRule {
    readonly description = 'stub';

    constructor(
        readonly id: RuleIdEnumType,
        readonly defaultSeverity: SeverityEnumType,
        private readonly findings: RuleFinding[]
    ) { }

    check(): RuleFinding[] {
        return this.findings;
    }
}

function createEngine(rules: LintRule[], overrides: Partial<DocsiteLintConfig> = {}) {
    const registry = new RuleRegistry();
    for (const rule of rules) registry.register(rule);

    const logger = createMockLogger();
    const events = createEventEmitter();
    const engine = new LintEngine({
        config: createMockResolvedConfig(overrides),
        logger,
        rules: registry,
        validators: createDefaultValidatorRegistry(),
        events,
    });
    return { engine, logger, events };
}

const rules = [
    new StubRule('links/broken', 'error', [
        { file: 'b.md', line: 3, message: 'm1' },
        { file: 'a.md', line: 10, message: 'm2' },
    ]),
    new StubRule('code/empty', 'warning', [
        { file: 'a.md', line: 2, message: 'm3' },
        { file: 'a.md', message: 'm4' },
    ]),
    new StubRule('code/missing-language', 'info', [{ file: 'a.md', line: 2, message: 'm5' }]),
];

describe('LintEngine', () => {
    it('should apply severity overrides and skip rules turned off', () => {
        const { engine } = createEngine(rules, {
            rules: { 'code/empty': 'error', 'code/missing-language': 'off' },
        });

        expect(engine.enabledRules().map(({ rule, severity }) => [rule.id, severity])).toEqual([
            ['links/broken', 'error'],
            ['code/empty', 'error'],
        ]);
    });

    it('should sort diagnostics by file, line and rule id', async () => {
        const { engine } = createEngine(rules);
        const site = await loadTestSite({});

        expect(engine.run(site)).toEqual([
            { file: 'a.md', message: 'm4', ruleId: 'code/empty', severity: 'warning' },
            { file: 'a.md', line: 2, message: 'm3', ruleId: 'code/empty', severity: 'warning' },
            { file: 'a.md', line: 2, message: 'm5', ruleId: 'code/missing-language', severity: 'info' },
            { file: 'a.md', line: 10, message: 'm2', ruleId: 'links/broken', severity: 'error' },
            { file: 'b.md', line: 3, message: 'm1', ruleId: 'links/broken', severity: 'error' },
        ]);
    });

    it('should emit rule:complete per enabled rule', async () => {
        const { engine, events } = createEngine(rules, { rules: { 'code/missing-language': 'off' } });
        const listener = vi.fn();
        events.on('rule:complete', listener);

        engine.run(await loadTestSite({}));

        expect(listener).toHaveBeenCalledTimes(2);
        expect(listener).toHaveBeenNthCalledWith(1, {
            ruleId: 'links/broken',
            findings: 2,
            durationMs: expect.any(Number),
        });
    });

    it('should wrap rule failures in RuleExecutionError', async () => {
        const failing: LintRule = {
            id: 'links/broken',
            defaultSeverity: 'error',
            description: 'fails',
            check: () => {
                throw new TypeError('boom');
            },
        };
        const { engine, logger } = createEngine([failing]);
        const site = await loadTestSite({});

        expect(() => engine.run(site)).toThrow(RuleExecutionError);
        expect(() => engine.run(site)).toThrow('Rule links/broken failed: boom');
        expect(logger.error).toHaveBeenCalledWith('Rule failed', { ruleId: 'links/broken', error: 'boom' });
    });

    it('should compare diagnostics without lines as line 0', () => {
        expect(compareDiagnostics(
            { file: 'a.md', message: 'x', ruleId: 'links/broken', severity: 'error' },
            { file: 'a.md', line: 1, message: 'y', ruleId: 'code/empty', severity: 'error' }
        )).toBeLessThan(0);
    });
});
