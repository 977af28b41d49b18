import { describe, it, expect } from 'vitest';
import {
    mergeConfig,
    metadataFromConfig,
    DEFAULT_CONFIG,
    PartialConfigSchema,
} from '../../src/config/GeneratorConfig.js';

// ============================================================================
// GeneratorConfig Tests
// ============================================================================

describe('GeneratorConfig', () => {
    // ── Default Config ──

    describe('DEFAULT_CONFIG', () => {
        it('should default to profile 20.09 under BSD-3-Clause', () => {
            expect(DEFAULT_CONFIG.profile).toBe('20.09');
            expect(DEFAULT_CONFIG.license).toBe('BSD-3-Clause');
        });

        it('should indent by four spaces', () => {
            expect(DEFAULT_CONFIG.indent).toBe(4);
        });

        it('should only order root sections by default', () => {
            expect(DEFAULT_CONFIG.sectionOrders).toEqual({});
        });

        it('should have no input or output path', () => {
            expect(DEFAULT_CONFIG.input).toBeUndefined();
            expect(DEFAULT_CONFIG.output).toBeUndefined();
        });
    });

    // ── mergeConfig ──

    describe('mergeConfig()', () => {
        it('should return defaults for empty partial', () => {
            expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
        });

        it('should override top-level fields', () => {
            const config = mergeConfig({ profile: '21.01', indent: 2, output: 'out.xml' });
            expect(config.profile).toBe('21.01');
            expect(config.indent).toBe(2);
            expect(config.output).toBe('out.xml');
            expect(config.license).toBe('BSD-3-Clause'); // unchanged
        });

        it('should override copyright fields individually', () => {
            const config = mergeConfig({ copyright: { holder: 'Example Team' } });
            expect(config.copyright.holder).toBe('Example Team');
            expect(config.copyright.notice).toBe(DEFAULT_CONFIG.copyright.notice); // unchanged
        });

        it('should override provenance versions without touching names', () => {
            const config = mergeConfig({
                provenance: { generator: { version: '2.0.0' }, target: { version: '2024.5.0' } },
            });
            expect(config.provenance.generator).toEqual({ name: 'galaxy-tool-writer', version: '2.0.0' });
            expect(config.provenance.target).toEqual({ name: 'qiime2', version: '2024.5.0' });
        });

        it('should take section orders as given', () => {
            const config = mergeConfig({ sectionOrders: { conditional: ['param', 'when'] } });
            expect(config.sectionOrders).toEqual({ conditional: ['param', 'when'] });
        });

        it('should not carry undefined optional paths', () => {
            const config = mergeConfig({});
            expect('input' in config).toBe(false);
            expect('output' in config).toBe(false);
        });
    });

    // ── PartialConfigSchema ──

    describe('PartialConfigSchema', () => {
        it('should accept a full config', () => {
            const result = PartialConfigSchema.safeParse({
                profile: '20.09',
                license: 'MIT',
                indent: 4,
                copyright: { holder: 'A', notice: 'B' },
                provenance: { generator: { name: 'g', version: '1' }, target: { name: 't', version: '2' } },
                sectionOrders: { section: ['param'] },
            });
            expect(result.success).toBe(true);
        });

        it('should reject unknown keys', () => {
            expect(PartialConfigSchema.safeParse({ profiles: '20.09' }).success).toBe(false);
        });

        it('should reject a non-positive or fractional indent', () => {
            expect(PartialConfigSchema.safeParse({ indent: 0 }).success).toBe(false);
            expect(PartialConfigSchema.safeParse({ indent: 2.5 }).success).toBe(false);
        });

        it('should reject a numeric profile', () => {
            expect(PartialConfigSchema.safeParse({ profile: 20.09 }).success).toBe(false);
        });
    });

    // ── metadataFromConfig ──

    describe('metadataFromConfig()', () => {
        it('should copy the provenance systems', () => {
            expect(metadataFromConfig(DEFAULT_CONFIG)).toEqual({
                generator: { name: 'galaxy-tool-writer', version: '0.1.0' },
                target: { name: 'qiime2', version: 'unknown' },
            });
        });

        it('should only set the year when given', () => {
            expect('year' in metadataFromConfig(DEFAULT_CONFIG)).toBe(false);
            expect(metadataFromConfig(DEFAULT_CONFIG, 2024).year).toBe(2024);
        });
    });
});
