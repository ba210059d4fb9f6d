/**
 * Unit Tests: ScopeResolver
 *
 * @see libs/scope/scopeResolver.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { handlerFor, ScopeResolver, scopeKeyFor } from '../../libs/scope/scopeResolver.js';
import { checkResult } from '../../libs/capture/guards.js';
import { DiagnosticsCollector, MemorySink, TEST_CONFIG } from '../helpers/fakes.js';

describe('ScopeResolver', () => {
    let resolver: ScopeResolver;

    beforeEach(() => {
        resolver = new ScopeResolver();
    });

    it('should return the same registry for the same key', () => {
        const first = resolver.resolve('billing');
        const second = resolver.resolve('billing');

        assert.strictEqual(first, second);
    });

    it('should make registrations visible through every handle', () => {
        const E1 = new Error('declined');
        resolver.resolve('billing').registerExact(E1);

        assert.strictEqual(resolver.resolve('billing').isExact(E1), true);
    });

    it('should keep separate keys separate', () => {
        assert.notStrictEqual(resolver.resolve('billing'), resolver.resolve('shipping'));
        assert.deepStrictEqual(resolver.scopes(), ['billing', 'shipping']);
    });

    it('should create registries lazily with the configured options', () => {
        const configured = new ScopeResolver(() => ({ unmatched: 'unexpected' }));

        assert.strictEqual(configured.has('orders'), false);
        assert.strictEqual(configured.resolve('orders').options.unmatched, 'unexpected');
        assert.strictEqual(configured.has('orders'), true);
    });

    it('should forget registries on reset()', () => {
        const before = resolver.resolve('billing');
        resolver.reset();

        assert.deepStrictEqual(resolver.scopes(), []);
        assert.notStrictEqual(resolver.resolve('billing'), before);
    });

    describe('scopeKeyFor', () => {
        it('should key file URLs by their directory', () => {
            assert.strictEqual(scopeKeyFor('file:///srv/app/billing/charge.ts'), '/srv/app/billing');
        });

        it('should give modules in one directory the same key', () => {
            assert.strictEqual(
                scopeKeyFor('file:///srv/app/billing/charge.ts'),
                scopeKeyFor('file:///srv/app/billing/refund.ts')
            );
        });

        it('should use other URLs as-is', () => {
            assert.strictEqual(scopeKeyFor('plugin:reports'), 'plugin:reports');
        });
    });

    describe('handlerFor', () => {
        it('should bind handlers for one key to the same rules', () => {
            const sink = new MemorySink();
            const diagnostics = new DiagnosticsCollector();
            const ERaw = new Error('ENOTFOUND');
            const EMapped = new Error('host unknown');

            const registering = handlerFor('net', { config: TEST_CONFIG }, resolver);
            const recovering = handlerFor('net', { sink, diagnostics, config: TEST_CONFIG }, resolver);
            registering.registerMapping(ERaw, EMapped);

            const result = recovering.recover(() => checkResult(ERaw));

            assert.ok(!result.ok);
            assert.strictEqual(result.error, EMapped);
            assert.strictEqual(recovering.scope, 'net');
        });
    });
});
