/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `galaxy-tool-writer.yaml` from cwd or a specified path, validates
 * the structure, and merges with defaults. CLI args override file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { mergeConfig, PartialConfigSchema, type GeneratorConfig } from './GeneratorConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'galaxy-tool-writer.yaml',
    'galaxy-tool-writer.yml',
    'galaxy-tool-writer.json',
];

// ── Errors ───────────────────────────────────────────────

/** Thrown when a config file does not match the expected shape */
export class ConfigError extends Error {
    readonly filePath: string;
    readonly issues: readonly ZodIssue[];

    constructor(filePath: string, issues: readonly ZodIssue[]) {
        const details = issues
            .map(issue => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('\n');
        super(`Invalid config file "${filePath}":\n${details}`);
        this.name = 'ConfigError';
        this.filePath = filePath;
        this.issues = issues;
    }
}

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `galaxy-tool-writer.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 */
export function loadConfig(configPath?: string, cwd?: string): GeneratorConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: GeneratorConfig, cli: CliOverrides): GeneratorConfig {
    return {
        ...config,
        ...(cli.input !== undefined ? { input: cli.input } : {}),
        ...(cli.output !== undefined ? { output: cli.output } : {}),
        provenance: {
            generator: {
                ...config.provenance.generator,
                ...(cli.generatorVersion !== undefined ? { version: cli.generatorVersion } : {}),
            },
            target: {
                ...config.provenance.target,
                ...(cli.targetVersion !== undefined ? { version: cli.targetVersion } : {}),
            },
        },
    };
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly input?: string;
    readonly output?: string;
    readonly generatorVersion?: string;
    readonly targetVersion?: string;
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): GeneratorConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json')
        ? JSON.parse(content)
        : parseYaml(content);

    // An empty YAML file parses to null: treat it as "no overrides"
    const result = PartialConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigError(filePath, result.error.issues);
    }
    return mergeConfig(result.data);
}
