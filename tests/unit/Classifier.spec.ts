/**
 * Unit Tests: Classifier
 *
 * Tier precedence: exact, mapping, pattern, fallback, then passthrough or
 * the unexpected identity.
 *
 * @see libs/classification/classifier.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { classify, explain } from '../../libs/classification/classifier.js';
import { RuleRegistry } from '../../libs/classification/ruleRegistry.js';
import { IMPROPER_USE_ERROR, UNEXPECTED_ERROR } from '../../libs/errors/identities.js';
import { DiagnosticsCollector } from '../helpers/fakes.js';

describe('Classifier', () => {
    let diagnostics: DiagnosticsCollector;

    const EDisk = new Error('storage unavailable');
    const ENet = new Error('network unavailable');
    const EFallback = new Error('something went wrong');

    beforeEach(() => {
        diagnostics = new DiagnosticsCollector();
    });

    describe('misuse', () => {
        it('should keep the improper-use identity despite a fallback and a matching pattern', () => {
            const registry = new RuleRegistry({ unmatched: 'unexpected' })
                .registerPattern('improper', EDisk)
                .registerMapping(IMPROPER_USE_ERROR, ENet)
                .setFallback(EFallback);

            const result = explain(IMPROPER_USE_ERROR, registry, { diagnostics });

            assert.strictEqual(result.error, IMPROPER_USE_ERROR);
            assert.strictEqual(result.tier, 'misuse');
            assert.deepStrictEqual(diagnostics.lines, []);
        });
    });

    describe('exact tier', () => {
        it('should return a registered error unchanged', () => {
            const E1 = new Error('conflict');
            const registry = new RuleRegistry().registerExact(E1);

            const result = explain(E1, registry, { diagnostics });

            assert.strictEqual(result.error, E1);
            assert.strictEqual(result.tier, 'exact');
            assert.deepStrictEqual(diagnostics.lines, []);
        });

        it('should win over a mapping for the same error', () => {
            const E1 = new Error('conflict');
            const registry = new RuleRegistry()
                .registerExact(E1)
                .registerMapping(E1, EDisk);

            assert.strictEqual(classify(E1, registry, { diagnostics }), E1);
        });
    });

    describe('mapping tier', () => {
        it('should substitute the mapped identity', () => {
            const E2 = new Error('ENOSPC');
            const E3 = new Error('out of space');
            const registry = new RuleRegistry().registerMapping(E2, E3);

            const result = explain(E2, registry, { diagnostics });

            assert.strictEqual(result.error, E3);
            assert.strictEqual(result.tier, 'mapping');
        });

        it('should win over an overlapping pattern', () => {
            const raw = new Error('disk: full');
            const mapped = new Error('mapped');
            const registry = new RuleRegistry()
                .registerPattern('disk:', EDisk)
                .registerMapping(raw, mapped);

            assert.strictEqual(classify(raw, registry, { diagnostics }), mapped);
        });

        it('should match by identity, not by message', () => {
            const key = new Error('ENOSPC');
            const registry = new RuleRegistry()
                .registerMapping(key, EDisk)
                .setFallback(EFallback);

            assert.strictEqual(classify(new Error('ENOSPC'), registry, { diagnostics }), EFallback);
        });
    });

    describe('pattern tier', () => {
        it('should match a prefix against the message', () => {
            const registry = new RuleRegistry().registerPattern('disk:', EDisk);

            const result = explain(new Error('disk: no space'), registry, { diagnostics });

            assert.strictEqual(result.error, EDisk);
            assert.strictEqual(result.tier, 'pattern');
        });

        it('should not match a prefix in the middle of the message', () => {
            const raw = new Error('remote disk: no space');
            const registry = new RuleRegistry().registerPattern('disk:', EDisk);

            assert.strictEqual(classify(raw, registry, { diagnostics }), raw);
        });

        it('should match regular expressions anywhere in the message', () => {
            const registry = new RuleRegistry().registerPattern(/no space/, EDisk);

            assert.strictEqual(classify(new Error('disk: no space left'), registry, { diagnostics }), EDisk);
        });

        it('should compile string patterns in regex syntax', () => {
            const registry = new RuleRegistry({ patternSyntax: 'regex' })
                .registerPattern('conn(ection)? reset', ENet);

            assert.strictEqual(classify(new Error('socket: connection reset by peer'), registry, { diagnostics }), ENet);
        });

        it('should pick the first registered of two overlapping patterns', () => {
            const registry = new RuleRegistry()
                .registerPattern('disk', EDisk)
                .registerPattern('disk:', ENet);

            assert.strictEqual(classify(new Error('disk: full'), registry, { diagnostics }), EDisk);
        });

        it('should give the same answer on repeated global-regex matches', () => {
            const registry = new RuleRegistry().registerPattern(/timeout/g, ENet);
            const raw = new Error('read timeout');

            assert.strictEqual(classify(raw, registry, { diagnostics }), ENet);
            assert.strictEqual(classify(raw, registry, { diagnostics }), ENet);
        });
    });

    describe('fallback tier', () => {
        it('should use the fallback when nothing matches', () => {
            const registry = new RuleRegistry()
                .registerPattern('disk:', EDisk)
                .setFallback(EFallback);

            const result = explain(new Error('unrelated'), registry, { diagnostics });

            assert.strictEqual(result.error, EFallback);
            assert.strictEqual(result.tier, 'fallback');
            assert.deepStrictEqual(diagnostics.lines, []);
        });
    });

    describe('unmatched errors', () => {
        it('should pass the error through and emit one diagnostic line', () => {
            const raw = new Error('boom');
            const result = explain(raw, new RuleRegistry(), { diagnostics, trace: '    at somewhere' });

            assert.strictEqual(result.error, raw);
            assert.strictEqual(result.tier, 'passthrough');
            assert.deepStrictEqual(diagnostics.lines, ['UNCLASSIFIED: boom (at somewhere)\n']);
        });

        it('should take the call site from the first non-empty trace line', () => {
            classify(new Error('boom'), new RuleRegistry(), {
                diagnostics,
                trace: '\n    at parseInvoice (file:///srv/app/invoice.ts:4:9)\n    at main'
            });

            assert.deepStrictEqual(diagnostics.lines, ['UNCLASSIFIED: boom (at parseInvoice (file:///srv/app/invoice.ts:4:9))\n']);
        });

        it('should write long messages in full', () => {
            const long = 'x'.repeat(800);

            classify(new Error(long), new RuleRegistry(), { diagnostics });

            assert.deepStrictEqual(diagnostics.lines, [`UNCLASSIFIED: ${long}\n`]);
        });

        it('should return the unexpected identity in unexpected mode', () => {
            const registry = new RuleRegistry({ unmatched: 'unexpected' });

            const result = explain(new Error('boom'), registry, { diagnostics });

            assert.strictEqual(result.error, UNEXPECTED_ERROR);
            assert.strictEqual(result.tier, 'unexpected');
            assert.deepStrictEqual(diagnostics.lines, ['UNCLASSIFIED: boom\n']);
        });

        it('should redact credentials in the diagnostic line', () => {
            classify(new Error('login failed password=test-secret'), new RuleRegistry(), { diagnostics });

            assert.deepStrictEqual(diagnostics.lines, ['UNCLASSIFIED: login failed password=[REDACTED]\n']);
        });
    });
});
