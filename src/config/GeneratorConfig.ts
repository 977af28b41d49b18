/**
 * GeneratorConfig — Configuration for Tool Document Generation
 *
 * Controls the fixed metadata stamped onto every generated tool: the
 * Galaxy profile, license, comment blocks, indentation, and optional
 * child orders for nested sections.
 *
 * Can be loaded from a YAML file (`galaxy-tool-writer.yaml`) or passed
 * programmatically.
 *
 * @module
 */
import { z } from 'zod';
import type { DocumentMetadata } from '../emitter/DocumentAssembler.js';

// ── Sections ─────────────────────────────────────────────

/** A named system with a version, as printed in the provenance comment */
export interface SystemVersion {
    readonly name: string;
    readonly version: string;
}

/** Text of the leading copyright comment */
export interface CopyrightConfig {
    /** Printed after the year: `Copyright (c) <year>, <holder>.` */
    readonly holder: string;
    /** License paragraph following the copyright line */
    readonly notice: string;
}

/** Systems named in the provenance comment */
export interface ProvenanceConfig {
    /** The system that generated the document */
    readonly generator: SystemVersion;
    /** The system the tool wraps */
    readonly target: SystemVersion;
}

// ── Full Config ──────────────────────────────────────────

/**
 * Complete generator configuration.
 * All fields have defaults — see {@link DEFAULT_CONFIG}.
 */
export interface GeneratorConfig {
    /** Path to the tool tree (YAML or JSON) */
    readonly input?: string;
    /** Path of the XML file to write */
    readonly output?: string;
    /** Value of the root `profile` attribute */
    readonly profile: string;
    /** Value of the root `license` attribute (SPDX identifier) */
    readonly license: string;
    /** Spaces per indentation level */
    readonly indent: number;
    readonly copyright: CopyrightConfig;
    readonly provenance: ProvenanceConfig;
    /**
     * Child orders for nested elements, keyed by parent tag.
     * Empty by default: only the root's sections are re-sorted.
     */
    readonly sectionOrders: Readonly<Record<string, readonly string[]>>;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: GeneratorConfig = {
    profile: '20.09',
    license: 'BSD-3-Clause',
    indent: 4,
    copyright: {
        holder: 'QIIME 2 development team',
        notice: 'Distributed under the terms of the Modified BSD License. (SPDX: BSD-3-Clause)',
    },
    provenance: {
        generator: { name: 'galaxy-tool-writer', version: '0.1.0' },
        target: { name: 'qiime2', version: 'unknown' },
    },
    sectionOrders: {},
};

// ── Partial Config ───────────────────────────────────────

const SystemVersionSchema = z.object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
}).strict();

/** Schema for config files and programmatic partial configs */
export const PartialConfigSchema = z.object({
    input: z.string().optional(),
    output: z.string().optional(),
    profile: z.string().min(1).optional(),
    license: z.string().min(1).optional(),
    indent: z.number().int().min(1).max(16).optional(),
    copyright: z.object({
        holder: z.string().optional(),
        notice: z.string().optional(),
    }).strict().optional(),
    provenance: z.object({
        generator: SystemVersionSchema.optional(),
        target: SystemVersionSchema.optional(),
    }).strict().optional(),
    sectionOrders: z.record(z.string(), z.array(z.string())).optional(),
}).strict();

/** Partial config shape for merging */
export type PartialConfig = z.input<typeof PartialConfigSchema>;

// ── Merge Helper ─────────────────────────────────────────

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): GeneratorConfig {
    const generator = partial.provenance?.generator;
    const target = partial.provenance?.target;

    return {
        ...(partial.input !== undefined ? { input: partial.input } : {}),
        ...(partial.output !== undefined ? { output: partial.output } : {}),
        profile: partial.profile ?? DEFAULT_CONFIG.profile,
        license: partial.license ?? DEFAULT_CONFIG.license,
        indent: partial.indent ?? DEFAULT_CONFIG.indent,
        copyright: {
            holder: partial.copyright?.holder ?? DEFAULT_CONFIG.copyright.holder,
            notice: partial.copyright?.notice ?? DEFAULT_CONFIG.copyright.notice,
        },
        provenance: {
            generator: {
                name: generator?.name ?? DEFAULT_CONFIG.provenance.generator.name,
                version: generator?.version ?? DEFAULT_CONFIG.provenance.generator.version,
            },
            target: {
                name: target?.name ?? DEFAULT_CONFIG.provenance.target.name,
                version: target?.version ?? DEFAULT_CONFIG.provenance.target.version,
            },
        },
        sectionOrders: {
            ...DEFAULT_CONFIG.sectionOrders,
            ...(partial.sectionOrders ?? {}),
        },
    };
}

/**
 * Comment metadata from a config's provenance section.
 * `year` is left out unless given, so the assembler stamps the current one.
 */
export function metadataFromConfig(config: GeneratorConfig, year?: number): DocumentMetadata {
    return {
        generator: config.provenance.generator,
        target: config.provenance.target,
        ...(year !== undefined ? { year } : {}),
    };
}
